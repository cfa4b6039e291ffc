/**
 * Shared public types.
 */

/**
 * Protocol versions that use community-based access.
 */
export type SnmpVersion = 'v1' | 'v2c';

/**
 * A resolved, canonical OID.
 * Only `arcs` takes part in comparison and encoding; `label` is informational.
 */
export interface ObjectIdentifier {
    arcs: number[];
    label?: {
        module: string;
        symbol: string;
    };
}

/**
 * One component of an OID path before resolution:
 * a number, or a name still to be looked up in the MIBs.
 */
export type OidSegment = number | string;

/**
 * Minimal logging surface. `console` satisfies it.
 */
export interface Logger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
    error(message: string, ...meta: unknown[]): void;
}
