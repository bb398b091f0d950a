import { parseAddress, type BinaryAddress, type Family, type Result } from '../index';

/** Unwrap a Result that the test expects to succeed */
export function expectOk<T>(result: Result<T>): T {
    if (!result.ok) throw new Error(`expected success, got ${result.error.kind}: ${result.error.message}`);
    return result.value;
}

export function addr(text: string, family: Family = text.includes(':') ? 'v6' : 'v4'): BinaryAddress {
    return expectOk(parseAddress(text, family));
}
