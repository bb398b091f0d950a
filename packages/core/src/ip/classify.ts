/**
 * Address-space classification, based on IANA's special-purpose registries
 * for IPv4 and IPv6.
 *
 * Each table is evaluated top to bottom and the first match wins, so the
 * order matters where ranges overlap.
 */

import type { BinaryAddress } from '../types';
import { toBytes } from './address';

export interface AddressSpaceRule {
    label: string;
    matches: (b: Uint8Array) => boolean;
}

export const IPV4_DEFAULT_SPACE = 'Internet or Reserved for Future use';
export const IPV6_DEFAULT_SPACE = 'Reserved';

function startsWith(b: Uint8Array, prefix: readonly number[]): boolean {
    return prefix.every((byte, i) => b[i] === byte);
}

const word = (b: Uint8Array, i: number): number => (b[i * 2] << 8) | b[i * 2 + 1];

export const IPV4_ADDRESS_SPACE: readonly AddressSpaceRule[] = [
    { label: 'This host on this network', matches: b => b[0] === 0 },
    { label: 'Private Use', matches: b => b[0] === 10 },
    { label: 'Shared Address Space', matches: b => b[0] === 100 && (b[1] & 0xc0) === 64 },
    { label: 'Loopback', matches: b => b[0] === 127 },
    { label: 'Link Local', matches: b => b[0] === 169 && b[1] === 254 },
    { label: 'Private Use', matches: b => b[0] === 172 && (b[1] & 0xf0) === 16 },
    { label: 'IETF Protocol Assignments', matches: b => startsWith(b, [192, 0, 0]) },
    { label: 'Documentation (TEST-NET-1)', matches: b => startsWith(b, [192, 0, 2]) },
    { label: 'Documentation (TEST-NET-2)', matches: b => startsWith(b, [198, 51, 100]) },
    { label: 'Documentation (TEST-NET-3)', matches: b => startsWith(b, [203, 0, 113]) },
    { label: '6 to 4 Relay Anycast (Deprecated)', matches: b => startsWith(b, [192, 88, 99]) },
    { label: 'AMT', matches: b => startsWith(b, [192, 52, 193]) },
    { label: 'Private Use', matches: b => b[0] === 192 && b[1] === 168 },
    { label: 'Limited Broadcast', matches: b => startsWith(b, [255, 255, 255, 255]) },
    // 192.18.x and 192.19.x
    { label: 'Private Use', matches: b => b[0] === 192 && (b[1] & 0xfe) === 18 },
    { label: 'Multicast', matches: b => b[0] >= 224 && b[0] <= 239 },
    { label: 'Reserved', matches: b => (b[0] & 0xf0) === 240 },
];

export const IPV6_ADDRESS_SPACE: readonly AddressSpaceRule[] = [
    { label: 'Loopback Address', matches: b => startsWith(b, [...Array<number>(15).fill(0), 1]) },
    { label: 'Unspecified Address', matches: b => b.every(byte => byte === 0) },
    { label: 'IPv4-mapped Address', matches: b => startsWith(b, [...Array<number>(10).fill(0), 0xff, 0xff]) },
    { label: 'IPv4-IPv6 Translat.', matches: b => startsWith(b, [0x00, 0x64, 0xff, 0x9b, ...Array<number>(8).fill(0)]) },
    { label: 'Discard-Only Address Block', matches: b => startsWith(b, [0x01, ...Array<number>(7).fill(0)]) },
    { label: 'IETF Protocol Assignments', matches: b => word(b, 0) === 0x2001 && word(b, 1) === 0 },
    { label: 'Global Unicast', matches: b => (b[0] & 0xe0) === 0x20 },
    { label: 'Unique Local Unicast', matches: b => (b[0] & 0xfe) === 0xfc },
    { label: 'Link-Scoped Unicast', matches: b => (word(b, 0) & 0xffc0) === 0xfe80 },
    { label: 'Multicast', matches: b => b[0] === 0xff },
    // Shadowed by Global Unicast above; kept in registry order
    { label: '6to4', matches: b => word(b, 0) === 0x2002 },
];

/** Label the address space a network belongs to. Never fails. */
export function classify(network: BinaryAddress): string {
    const bytes = toBytes(network);
    if (network.family === 'v4') {
        return IPV4_ADDRESS_SPACE.find(rule => rule.matches(bytes))?.label ?? IPV4_DEFAULT_SPACE;
    }
    return IPV6_ADDRESS_SPACE.find(rule => rule.matches(bytes))?.label ?? IPV6_DEFAULT_SPACE;
}
