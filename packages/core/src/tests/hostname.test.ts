import { describe, it, expect, vi } from 'vitest';
import { createDnsLookup } from '../index';
import { addr } from './helpers';

function fakeResolver(reverse: (ip: string) => Promise<string[]>) {
    return { reverse: vi.fn(reverse), setServers: vi.fn() };
}

describe('createDnsLookup', () => {
    it('should return the first PTR name in lower case', async () => {
        const resolver = fakeResolver(async () => ['Host.Example.TEST', 'alias.example.test']);
        const lookup = createDnsLookup({ resolver });

        expect(await lookup('v4', addr('192.0.2.1'))).toBe('host.example.test');
        expect(resolver.reverse).toHaveBeenCalledWith('192.0.2.1');
    });

    it('should query IPv6 addresses in canonical form', async () => {
        const resolver = fakeResolver(async () => ['v6.example.test']);
        const lookup = createDnsLookup({ resolver });

        expect(await lookup('v6', addr('2001:0db8:0:0:0:0:0:1'))).toBe('v6.example.test');
        expect(resolver.reverse).toHaveBeenCalledWith('2001:db8::1');
    });

    it('should resolve undefined when the lookup fails', async () => {
        const resolver = fakeResolver(async () => {
            throw new Error('queryPtr ENOTFOUND');
        });
        const lookup = createDnsLookup({ resolver });

        expect(await lookup('v4', addr('192.0.2.1'))).toBeUndefined();
    });

    it('should resolve undefined when there is no PTR record', async () => {
        const lookup = createDnsLookup({ resolver: fakeResolver(async () => []) });
        expect(await lookup('v4', addr('192.0.2.1'))).toBeUndefined();
    });

    it('should use configured nameservers', () => {
        const resolver = fakeResolver(async () => []);
        createDnsLookup({ resolver, servers: ['192.0.2.53'] });
        expect(resolver.setServers).toHaveBeenCalledWith(['192.0.2.53']);
    });

    it('should keep the system nameservers by default', () => {
        const resolver = fakeResolver(async () => []);
        createDnsLookup({ resolver, servers: [] });
        expect(resolver.setServers).not.toHaveBeenCalled();
    });
});
