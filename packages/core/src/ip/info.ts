/**
 * AddressInfo assembly: parse, resolve the prefix, derive the range, classify
 * and render. A query either yields a complete record or one error.
 */

import { ambiguousInput, hostnameUnavailable, missingPrefix } from '../errors';
import { log } from '../logger';
import {
    err,
    ok,
    type AddressInfo,
    type AddressQuery,
    type BinaryAddress,
    type Family,
    type HostnameLookup,
    type InfoField,
    type Result,
} from '../types';
import { bitWidth } from './address';
import { classify } from './classify';
import { classfulPrefix, netmaskToPrefix, prefixToMask } from './mask';
import { calculateRange, formatHostCount } from './range';
import { detectFamily, expandIPv6, formatAddress, padShorthand, parseAddress } from './text';

// IPv4 fields that are meaningless for an implicit /32
const NEEDS_EXPLICIT_MASK: readonly InfoField[] = ['broadcast', 'network', 'prefix'];

interface Calculation {
    info: AddressInfo;
    address: BinaryAddress;
}

function resolvePrefix(query: AddressQuery, family: Family, address: BinaryAddress): Result<number> {
    if (query.netmask !== undefined) {
        return netmaskToPrefix(query.netmask, family);
    }
    if (query.prefix !== undefined) {
        const mask = prefixToMask(query.prefix, family);
        return mask.ok ? ok(query.prefix) : err(mask.error);
    }
    if (family === 'v4' && query.classful) {
        return ok(classfulPrefix(address));
    }
    return ok(bitWidth(family));
}

function assemble(query: AddressQuery): Result<Calculation> {
    if (query.prefix !== undefined && query.netmask !== undefined) {
        return err(ambiguousInput());
    }

    const family = query.family ?? detectFamily(query.address);
    const hasMask = query.prefix !== undefined || query.netmask !== undefined;

    if (family === 'v4' && !hasMask && !query.classful && query.fields?.some(f => NEEDS_EXPLICIT_MASK.includes(f))) {
        return err(missingPrefix());
    }

    const text = family === 'v4' && hasMask ? padShorthand(query.address) : query.address;
    const address = parseAddress(text, family);
    if (!address.ok) return err(address.error);

    const prefix = resolvePrefix(query, family, address.value);
    if (!prefix.ok) return err(prefix.error);

    const range = calculateRange(address.value, prefix.value);
    if (!range.ok) return err(range.error);

    const { mask, network, broadcast, hostMin, hostMax } = range.value;
    const info: AddressInfo = {
        family,
        address: query.address,
        ...(family === 'v6' && { expandedAddress: expandIPv6(address.value) }),
        netmask: formatAddress(mask),
        prefix: prefix.value,
        network: formatAddress(network),
        ...(family === 'v6' && { expandedNetwork: expandIPv6(network) }),
        ...(broadcast && { broadcast: formatAddress(broadcast) }),
        hostMin: formatAddress(hostMin),
        hostMax: formatAddress(hostMax),
        hostCount: formatHostCount(family, prefix.value),
        addressSpace: classify(network),
    };
    return ok({ info, address: address.value });
}

function report(query: AddressQuery, error: { message: string }): void {
    if (!query.silent) log(`${query.address}: ${error.message}`);
}

/** Synchronous calculation; never performs a hostname lookup */
export function calculate(query: AddressQuery): Result<AddressInfo> {
    const result = assemble(query);
    if (!result.ok) {
        report(query, result.error);
        return err(result.error);
    }
    return ok(Object.freeze(result.value.info));
}

/**
 * Full query. When `fields` asks for the hostname, the lookup collaborator is
 * called once; an empty answer fails the query.
 */
export async function getAddressInfo(
    query: AddressQuery,
    lookup?: HostnameLookup,
): Promise<Result<AddressInfo>> {
    const result = assemble(query);
    if (!result.ok) {
        report(query, result.error);
        return err(result.error);
    }

    const { info, address } = result.value;
    if (!query.fields?.includes('hostname')) {
        return ok(Object.freeze(info));
    }

    const hostname = lookup ? await lookup(info.family, address) : undefined;
    if (!hostname) {
        const error = hostnameUnavailable(query.address);
        report(query, error);
        return err(error);
    }
    return ok(Object.freeze({ ...info, hostname }));
}
