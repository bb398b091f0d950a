import { describe, it, expect } from 'vitest';
import {
    ErrorKind,
    calculateRange,
    formatAddress,
    formatHostCount,
    hostCount,
    type BinaryAddress,
    type HostRange,
} from '../index';
import { addr, expectOk } from './helpers';

function rendered(range: HostRange): Record<string, string | undefined> {
    const text = (a: BinaryAddress | undefined) => (a ? formatAddress(a) : undefined);
    return {
        network: text(range.network),
        broadcast: text(range.broadcast),
        hostMin: text(range.hostMin),
        hostMax: text(range.hostMax),
    };
}

// =============================================================================
// IPv4
// =============================================================================

describe('calculateRange (IPv4)', () => {
    it('should reserve network and broadcast up to /30', () => {
        expect(rendered(expectOk(calculateRange(addr('192.168.1.5'), 24)))).toEqual({
            network: '192.168.1.0',
            broadcast: '192.168.1.255',
            hostMin: '192.168.1.1',
            hostMax: '192.168.1.254',
        });
        expect(rendered(expectOk(calculateRange(addr('10.0.0.6'), 30)))).toEqual({
            network: '10.0.0.4',
            broadcast: '10.0.0.7',
            hostMin: '10.0.0.5',
            hostMax: '10.0.0.6',
        });
    });

    it('should reserve nothing at /31', () => {
        expect(rendered(expectOk(calculateRange(addr('10.0.0.1'), 31)))).toEqual({
            network: '10.0.0.0',
            broadcast: '10.0.0.1',
            hostMin: '10.0.0.0',
            hostMax: '10.0.0.1',
        });
    });

    it('should collapse to the address itself at /32', () => {
        expect(rendered(expectOk(calculateRange(addr('10.0.0.1'), 32)))).toEqual({
            network: '10.0.0.1',
            broadcast: '10.0.0.1',
            hostMin: '10.0.0.1',
            hostMax: '10.0.0.1',
        });
    });

    it('should span the whole space at /0', () => {
        expect(rendered(expectOk(calculateRange(addr('1.2.3.4'), 0)))).toEqual({
            network: '0.0.0.0',
            broadcast: '255.255.255.255',
            hostMin: '0.0.0.1',
            hostMax: '255.255.255.254',
        });
    });

    it('should satisfy the mask identities for every prefix', () => {
        for (const text of ['192.168.1.5', '10.200.33.77', '255.255.255.255', '0.0.0.1']) {
            const address = addr(text);
            for (let prefix = 0; prefix <= 32; prefix++) {
                const range = expectOk(calculateRange(address, prefix));
                const inverse = ~range.mask.value & 0xffffffffn;
                expect(range.network.value).toBe(address.value & range.mask.value);
                expect(range.broadcast?.value).toBe(range.network.value | inverse);
                if (prefix <= 30) {
                    expect(range.hostMin.value).toBe(range.network.value + 1n);
                    expect(range.hostMax.value).toBe(range.network.value + inverse - 1n);
                } else {
                    expect(range.hostMin.value).toBe(range.network.value);
                    expect(range.hostMax.value).toBe(range.network.value + inverse);
                }
            }
        }
    });

    it('should reject an out-of-range prefix', () => {
        expect(calculateRange(addr('10.0.0.1'), 33).error?.kind).toBe(ErrorKind.INVALID_PREFIX);
    });
});

// =============================================================================
// IPv6
// =============================================================================

describe('calculateRange (IPv6)', () => {
    it('should derive network and host bounds without a broadcast', () => {
        expect(rendered(expectOk(calculateRange(addr('2001:db8::1'), 32)))).toEqual({
            network: '2001:db8::',
            broadcast: undefined,
            hostMin: '2001:db8::',
            hostMax: '2001:db8:ffff:ffff:ffff:ffff:ffff:ffff',
        });
    });

    it('should handle prefixes that split a byte', () => {
        expect(rendered(expectOk(calculateRange(addr('fe80::1234:5678'), 10)))).toEqual({
            network: 'fe80::',
            broadcast: undefined,
            hostMin: 'fe80::',
            hostMax: 'febf:ffff:ffff:ffff:ffff:ffff:ffff:ffff',
        });
    });

    it('should use the network as both bounds at /128', () => {
        const range = expectOk(calculateRange(addr('2001:db8::42'), 128));
        expect(formatAddress(range.hostMin)).toBe('2001:db8::42');
        expect(formatAddress(range.hostMax)).toBe('2001:db8::42');
    });

    it('should satisfy the mask identities', () => {
        const all = (1n << 128n) - 1n;
        const address = addr('2001:db8:85a3::8a2e:370:7334');
        for (let prefix = 1; prefix < 128; prefix++) {
            const range = expectOk(calculateRange(address, prefix));
            expect(range.network.value).toBe(address.value & range.mask.value);
            expect(range.hostMin.value).toBe(range.network.value);
            expect(range.hostMax.value).toBe(range.network.value | (~range.mask.value & all));
        }
    });

    it('should reject prefix 0', () => {
        expect(calculateRange(addr('::1'), 0).error?.message).toBe('bad IPv6 prefix: 0');
    });
});

// =============================================================================
// HOST COUNTS
// =============================================================================

describe('hostCount', () => {
    it('should subtract the reserved addresses for IPv4 up to /30', () => {
        expect(hostCount('v4', 24)).toBe(254n);
        expect(hostCount('v4', 30)).toBe(2n);
        expect(hostCount('v4', 0)).toBe(4294967294n);
    });

    it('should count every address at /31 and /32', () => {
        expect(hostCount('v4', 31)).toBe(2n);
        expect(hostCount('v4', 32)).toBe(1n);
    });

    it('should count every IPv6 address', () => {
        expect(hostCount('v6', 120)).toBe(256n);
        expect(hostCount('v6', 64)).toBe(18446744073709551616n);
    });
});

describe('formatHostCount', () => {
    it('should render IPv4 counts numerically', () => {
        expect(formatHostCount('v4', 24)).toBe('254');
        expect(formatHostCount('v4', 0)).toBe('4294967294');
    });

    it('should switch to 2^(k) once k reaches the machine word width', () => {
        expect(formatHostCount('v6', 64)).toBe('2^(64)');
        expect(formatHostCount('v6', 1)).toBe('2^(127)');
        expect(formatHostCount('v6', 65)).toBe('9223372036854775808');
        expect(formatHostCount('v6', 128)).toBe('1');
    });
});
