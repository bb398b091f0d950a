/**
 * Fixed-width address values and bit operations.
 * Operands of the binary helpers always share a family.
 */

import { FAMILY_BITS, type BinaryAddress, type Family } from '../types';

export function bitWidth(family: Family): number {
    return FAMILY_BITS[family];
}

/** All bits set for the family's width */
export function allOnes(family: Family): bigint {
    return (1n << BigInt(FAMILY_BITS[family])) - 1n;
}

/** Build an address, wrapping the value into the family's width */
export function fromValue(family: Family, value: bigint): BinaryAddress {
    return Object.freeze({ family, value: value & allOnes(family) });
}

export function and(a: BinaryAddress, b: BinaryAddress): BinaryAddress {
    return fromValue(a.family, a.value & b.value);
}

export function or(a: BinaryAddress, b: BinaryAddress): BinaryAddress {
    return fromValue(a.family, a.value | b.value);
}

export function not(a: BinaryAddress): BinaryAddress {
    return fromValue(a.family, ~a.value);
}

export function add(a: BinaryAddress, n: bigint): BinaryAddress {
    return fromValue(a.family, a.value + n);
}

/** Big-endian bytes: 4 for v4, 16 for v6 */
export function toBytes(a: BinaryAddress): Uint8Array {
    const bytes = new Uint8Array(FAMILY_BITS[a.family] / 8);
    let v = a.value;
    for (let i = bytes.length - 1; i >= 0; i--) {
        bytes[i] = Number(v & 0xffn);
        v >>= 8n;
    }
    return bytes;
}

export function fromBytes(family: Family, bytes: Uint8Array): BinaryAddress {
    let v = 0n;
    for (const b of bytes) {
        v = (v << 8n) | BigInt(b);
    }
    return fromValue(family, v);
}

/** Big-endian 16-bit words of an IPv6 address */
export function toWords(a: BinaryAddress): number[] {
    const bytes = toBytes(a);
    const words: number[] = [];
    for (let i = 0; i < bytes.length; i += 2) {
        words.push((bytes[i] << 8) | bytes[i + 1]);
    }
    return words;
}
