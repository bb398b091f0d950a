/**
 * Network range math for both families.
 *
 * IPv4 reserves the network and broadcast addresses as non-host up to /30;
 * /31 (point-to-point) and /32 (single host) reserve nothing. IPv6 has no
 * broadcast and reserves nothing.
 */

import { err, ok, type BinaryAddress, type Family, type Result } from '../types';
import { add, and, bitWidth, not, or } from './address';
import { prefixToMask } from './mask';

/** Host counts at or above 2^NATIVE_WORD_BITS are reported as "2^(k)" */
export const NATIVE_WORD_BITS = 64;

export interface HostRange {
    mask: BinaryAddress;
    network: BinaryAddress;
    broadcast?: BinaryAddress; // v4 only
    hostMin: BinaryAddress;
    hostMax: BinaryAddress;
}

export function calculateRange(address: BinaryAddress, prefix: number): Result<HostRange> {
    const mask = prefixToMask(prefix, address.family);
    if (!mask.ok) return err(mask.error);

    const network = and(address, mask.value);
    const last = or(network, not(mask.value));

    if (address.family === 'v6') {
        return ok({
            mask: mask.value,
            network,
            hostMin: network,
            hostMax: prefix < 128 ? last : network,
        });
    }

    const reserved = prefix <= 30;
    return ok({
        mask: mask.value,
        network,
        broadcast: last,
        hostMin: reserved ? add(network, 1n) : network,
        hostMax: reserved ? add(last, -1n) : last,
    });
}

export function hostCount(family: Family, prefix: number): bigint {
    const total = 1n << BigInt(bitWidth(family) - prefix);
    return family === 'v4' && prefix <= 30 ? total - 2n : total;
}

export function formatHostCount(family: Family, prefix: number): string {
    const exponent = bitWidth(family) - prefix;
    if (family === 'v6' && exponent >= NATIVE_WORD_BITS) {
        return `2^(${exponent})`;
    }
    return hostCount(family, prefix).toString();
}
