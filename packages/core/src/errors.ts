import { ErrorKind, type Family, type IpcalcError } from './types';

const FAMILY_NAME: Record<Family, string> = { v4: 'IPv4', v6: 'IPv6' };

export function malformedAddress(family: Family, input: string): IpcalcError {
    return { kind: ErrorKind.MALFORMED_ADDRESS, message: `bad ${FAMILY_NAME[family]} address: ${input}`, input };
}

export function malformedNetmask(input: string): IpcalcError {
    return { kind: ErrorKind.MALFORMED_ADDRESS, message: `bad netmask: ${input}`, input };
}

export function invalidPrefix(family: Family, input: string | number): IpcalcError {
    return {
        kind: ErrorKind.INVALID_PREFIX,
        message: `bad ${FAMILY_NAME[family]} prefix: ${input}`,
        input: String(input),
    };
}

export function badPrefixText(input: string): IpcalcError {
    return { kind: ErrorKind.INVALID_PREFIX, message: `bad prefix: ${input}`, input };
}

export function nonContiguousMask(input: string): IpcalcError {
    return { kind: ErrorKind.NON_CONTIGUOUS_MASK, message: `bad netmask: ${input} is not contiguous`, input };
}

export function ambiguousInput(): IpcalcError {
    return { kind: ErrorKind.AMBIGUOUS_INPUT, message: 'both netmask and prefix specified' };
}

export function missingPrefix(): IpcalcError {
    return { kind: ErrorKind.MISSING_PREFIX, message: 'netmask or prefix expected' };
}

export function hostnameUnavailable(input: string): IpcalcError {
    return { kind: ErrorKind.HOSTNAME_UNAVAILABLE, message: `cannot find hostname for ${input}`, input };
}
