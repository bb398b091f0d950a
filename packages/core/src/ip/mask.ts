import { invalidPrefix, malformedNetmask, nonContiguousMask } from '../errors';
import { err, ok, type BinaryAddress, type Family, type Result } from '../types';
import { allOnes, bitWidth, fromValue } from './address';
import { formatAddress, parseAddress } from './text';

/** Smallest accepted prefix: IPv4 /0 matches everything, IPv6 /0 is refused */
export function minPrefix(family: Family): number {
    return family === 'v4' ? 0 : 1;
}

function maskValue(family: Family, prefix: number): bigint {
    const bits = bitWidth(family);
    return (allOnes(family) << BigInt(bits - prefix)) & allOnes(family);
}

export function prefixToMask(prefix: number, family: Family): Result<BinaryAddress> {
    if (!Number.isInteger(prefix) || prefix < minPrefix(family) || prefix > bitWidth(family)) {
        return err(invalidPrefix(family, prefix));
    }
    return ok(fromValue(family, maskValue(family, prefix)));
}

/**
 * Count the leading 1-bits of a netmask. The all-zero mask and any mask with
 * a 1 after a 0 are refused.
 */
export function maskToPrefix(mask: BinaryAddress): Result<number> {
    const bits = bitWidth(mask.family);
    let prefix = 0;
    while (prefix < bits && ((mask.value >> BigInt(bits - 1 - prefix)) & 1n) === 1n) {
        prefix++;
    }

    if (prefix === 0 || mask.value !== maskValue(mask.family, prefix)) {
        return err(nonContiguousMask(formatAddress(mask)));
    }
    return ok(prefix);
}

/** Netmask text (255.255.255.0) to prefix length */
export function netmaskToPrefix(text: string, family: Family): Result<number> {
    const mask = parseAddress(text, family);
    if (!mask.ok) return err(malformedNetmask(text));
    return maskToPrefix(mask.value);
}

/** Pre-CIDR class A/B/C default for an IPv4 address */
export function classfulPrefix(address: BinaryAddress): number {
    const byte1 = Number((address.value >> 24n) & 0xffn);
    if (byte1 <= 127) return 8;
    if (byte1 <= 191) return 16;
    return 24;
}
