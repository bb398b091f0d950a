/**
 * Reverse-DNS hostname lookup. Resolves undefined when no PTR name is
 * available; the reason is logged, never thrown.
 */

import { Resolver } from 'dns/promises';
import { log } from '../logger';
import type { HostnameLookup } from '../types';
import { formatAddress } from './text';

export interface DnsLookupOptions {
    /** Nameservers to query instead of the system's */
    servers?: string[];
    resolver?: Pick<Resolver, 'reverse' | 'setServers'>;
}

export function createDnsLookup(options: DnsLookupOptions = {}): HostnameLookup {
    const resolver = options.resolver ?? new Resolver();
    if (options.servers && options.servers.length > 0) {
        resolver.setServers(options.servers);
    }

    return async (_family, address) => {
        const ip = formatAddress(address);
        try {
            const names = await resolver.reverse(ip);
            return names[0]?.toLowerCase();
        } catch (e) {
            log(`Reverse lookup for ${ip} failed: ${e instanceof Error ? e.message : String(e)}`);
            return undefined;
        }
    };
}
