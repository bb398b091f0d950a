export type Family = 'v4' | 'v6';

export const FAMILY_BITS: Record<Family, number> = {
    v4: 32,
    v6: 128,
};

/**
 * Fixed-width unsigned address value. The most significant bit of `value`
 * is the first bit on the wire.
 */
export interface BinaryAddress {
    readonly family: Family;
    readonly value: bigint;
}

export interface AddressInfo {
    readonly family: Family;
    readonly address: string;
    readonly expandedAddress?: string; // v6 only
    readonly netmask: string;
    readonly prefix: number;
    readonly network: string;
    readonly expandedNetwork?: string; // v6 only
    readonly broadcast?: string;       // v4 only
    readonly hostMin: string;
    readonly hostMax: string;
    readonly hostCount: string;
    readonly addressSpace: string;
    readonly hostname?: string;
}

export type InfoField =
    | 'netmask'
    | 'prefix'
    | 'broadcast'
    | 'network'
    | 'hostMin'
    | 'hostMax'
    | 'addressSpace'
    | 'hostname';

export interface AddressQuery {
    address: string;
    /** Overrides detection by ':' */
    family?: Family;
    prefix?: number;
    netmask?: string;
    fields?: readonly InfoField[];
    classful?: boolean;
    silent?: boolean;
}

export type HostnameLookup = (family: Family, address: BinaryAddress) => Promise<string | undefined>;

// ── Errors ──────────────────────────────────────────────────────────

export enum ErrorKind {
    MALFORMED_ADDRESS = 'MalformedAddress',
    INVALID_PREFIX = 'InvalidPrefix',
    NON_CONTIGUOUS_MASK = 'NonContiguousMask',
    AMBIGUOUS_INPUT = 'AmbiguousInput',
    MISSING_PREFIX = 'MissingPrefix',
    HOSTNAME_UNAVAILABLE = 'HostnameUnavailable',
}

export interface IpcalcError {
    readonly kind: ErrorKind;
    readonly message: string;
    readonly input?: string;
}

// ── Result ──────────────────────────────────────────────────────────

export interface Ok<T> {
    readonly ok: true;
    readonly value: T;
    readonly error?: never;
}

export interface Err<E> {
    readonly ok: false;
    readonly error: E;
    readonly value?: never;
}

/**
 * Either a value or a typed failure. Core operations return this instead of
 * throwing.
 */
export type Result<T, E = IpcalcError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
    return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
    return { ok: false, error };
}
