/**
 * Address text codec: parsing and rendering for IPv4 and IPv6.
 */

import { badPrefixText, malformedAddress } from '../errors';
import { err, ok, type BinaryAddress, type Family, type Result } from '../types';
import { fromValue, toWords } from './address';

const DEC_OCTET = /^(0|[1-9]\d{0,2})$/;
const HEX_GROUP = /^[0-9a-f]{1,4}$/i;

/** Detect if a string looks like IPv6 */
export function detectFamily(text: string): Family {
    return text.includes(':') ? 'v6' : 'v4';
}

/** Parse an IPv4 address string to a 32-bit number */
function ipv4ToNum(text: string): bigint | null {
    const parts = text.split('.');
    if (parts.length !== 4) return null;
    let num = 0n;
    for (const p of parts) {
        if (!DEC_OCTET.test(p)) return null;
        const n = parseInt(p, 10);
        if (n > 255) return null;
        num = (num << 8n) | BigInt(n);
    }
    return num;
}

function parseGroups(text: string): number[] | null {
    if (text === '') return [];
    const groups: number[] = [];
    for (const g of text.split(':')) {
        if (!HEX_GROUP.test(g)) return null;
        groups.push(parseInt(g, 16));
    }
    return groups;
}

/** Parse an IPv6 address to a 128-bit number */
function ipv6ToNum(text: string): bigint | null {
    let body = text;
    let tail: number[] = [];

    // Trailing dotted quad (::ffff:1.2.3.4, 64:ff9b::10.0.0.1)
    const lastColon = text.lastIndexOf(':');
    if (lastColon >= 0 && text.indexOf('.', lastColon) > lastColon) {
        const v4 = ipv4ToNum(text.slice(lastColon + 1));
        if (v4 === null) return null;
        tail = [Number(v4 >> 16n), Number(v4 & 0xffffn)];
        body = text.slice(0, lastColon + 1);
        // keep a '::' that ends right before the dotted quad, drop a plain separator
        body = body.endsWith('::') ? body : body.slice(0, -1);
    }

    const halves = body.split('::');
    if (halves.length > 2) return null;

    let words: number[];
    if (halves.length === 2) {
        const left = parseGroups(halves[0]);
        const right = parseGroups(halves[1]);
        if (!left || !right) return null;
        const fill = 8 - left.length - right.length - tail.length;
        if (fill < 1) return null;
        words = [...left, ...Array<number>(fill).fill(0), ...right, ...tail];
    } else {
        const groups = parseGroups(body);
        if (!groups) return null;
        words = [...groups, ...tail];
        if (words.length !== 8) return null;
    }

    let num = 0n;
    for (const w of words) {
        num = (num << 16n) | BigInt(w);
    }
    return num;
}

export function parseAddress(text: string, family: Family): Result<BinaryAddress> {
    const value = family === 'v4' ? ipv4ToNum(text) : ipv6ToNum(text);
    if (value === null) return err(malformedAddress(family, text));
    return ok(fromValue(family, value));
}

function formatIPv4(value: bigint): string {
    return [24n, 16n, 8n, 0n].map(shift => ((value >> shift) & 0xffn).toString()).join('.');
}

function formatIPv6(address: BinaryAddress): string {
    const words = toWords(address);

    // Longest run of zero words, first one wins on ties
    let bestStart = -1;
    let bestLen = 0;
    let curStart = -1;
    for (let i = 0; i < words.length; i++) {
        if (words[i] !== 0) {
            curStart = -1;
            continue;
        }
        if (curStart < 0) curStart = i;
        const len = i - curStart + 1;
        if (len > bestLen) {
            bestStart = curStart;
            bestLen = len;
        }
    }
    if (bestLen < 2) bestStart = -1;

    // Only IPv4-mapped addresses keep a dotted tail; IPv4-compatible ::a.b.c.d prints as hex
    if (bestStart === 0 && bestLen === 5 && words[5] === 0xffff) {
        return `::ffff:${formatIPv4(address.value & 0xffffffffn)}`;
    }

    const hex = words.map(w => w.toString(16));
    if (bestStart < 0) return hex.join(':');
    const head = hex.slice(0, bestStart).join(':');
    const tail = hex.slice(bestStart + bestLen).join(':');
    return `${head}::${tail}`;
}

/** Canonical text: dotted quad, or compressed lowercase hex */
export function formatAddress(address: BinaryAddress): string {
    return address.family === 'v4' ? formatIPv4(address.value) : formatIPv6(address);
}

/** All eight groups, zero-padded, no compression */
export function expandIPv6(address: BinaryAddress): string {
    return toWords(address).map(w => w.toString(16).padStart(4, '0')).join(':');
}

/** Handle CIDR entries such as 172/8: pad to four components with ".0" */
export function padShorthand(text: string): string {
    let padded = text;
    for (let dots = text.split('.').length - 1; dots < 3; dots++) {
        padded += '.0';
    }
    return padded;
}

export interface CidrParts {
    address: string;
    prefix?: number;
    netmask?: string;
}

/**
 * Split "addr/suffix". A numeric suffix is a prefix length; an IPv4 suffix
 * with dots (10.0.0.1/255.0.0.0) is netmask text.
 */
export function splitCidr(text: string, family: Family): Result<CidrParts> {
    const slash = text.indexOf('/');
    if (slash < 0) return ok({ address: text });

    const address = text.slice(0, slash);
    const suffix = text.slice(slash + 1);
    if (/^\d+$/.test(suffix)) {
        return ok({ address, prefix: parseInt(suffix, 10) });
    }
    if (family === 'v4' && suffix.includes('.')) {
        return ok({ address, netmask: suffix });
    }
    return err(badPrefixText(suffix));
}
