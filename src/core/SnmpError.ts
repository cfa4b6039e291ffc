/**
 * core/SnmpError.ts
 *
 * Error hierarchy for every failure the client can surface.
 * Features:
 * - A single base class (`SnmpError`) with a `kind` discriminator.
 * - Semantic getters (isTimeout, isNoSuchName, etc.)
 * - JSON serialization support for log systems.
 */
import { ErrorStatusMessages, ErrorStatus, errorStatusName } from './ErrorStatus';

export type SnmpErrorKind =
    | 'NotConfigured'
    | 'PathNotFound'
    | 'UnknownSymbol'
    | 'ValueRange'
    | 'ValueFormat'
    | 'Transport'
    | 'Agent'
    | 'ObjectNotFound';

export abstract class SnmpError extends Error {
    public readonly isSnmpError = true;
    public readonly timestamp: Date;
    public abstract readonly kind: SnmpErrorKind;

    protected constructor(message: string) {
        super(message);
        this.name = new.target.name;
        this.timestamp = new Date();

        // Fix for extending built-ins in TypeScript/ES5 targets
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /**
     * Custom generic JSON representation for logging systems.
     */
    public toJSON(): Record<string, unknown> {
        return {
            errorType: this.name,
            kind: this.kind,
            message: this.message,
            timestamp: this.timestamp,
        };
    }
}

/** A request was attempted before `setHost()`. */
export class NotConfiguredError extends SnmpError {
    public readonly kind = 'NotConfigured';

    constructor(message: string = 'No host set') {
        super(message);
    }
}

/** A MIB search path addition named something that is not a readable directory. */
export class PathNotFoundError extends SnmpError {
    public readonly kind = 'PathNotFound';

    constructor(public readonly path: string) {
        super(`Path "${path}" does not exist`);
    }
}

/** A symbolic OID component could not be found in any MIB on the search path. */
export class UnknownSymbolError extends SnmpError {
    public readonly kind = 'UnknownSymbol';

    constructor(public readonly module: string, public readonly symbol: string, detail?: string) {
        // An empty symbol means the module itself is missing
        const what = symbol
            ? `MIB symbol ${module ? `${module}::${symbol}` : symbol}`
            : `MIB module ${module}`;
        super(detail ? `Unknown ${what}: ${detail}` : `Unknown ${what}`);
    }
}

/** A value lies outside the domain of its SNMP type. */
export class ValueRangeError extends SnmpError {
    public readonly kind = 'ValueRange';

    constructor(public readonly type: string, public readonly value: string, range: string) {
        super(`Value ${value} is out of range for ${type} (${range})`);
    }
}

/** A value (or OID expression) has the wrong shape for what was asked of it. */
export class ValueFormatError extends SnmpError {
    public readonly kind = 'ValueFormat';

    constructor(public readonly type: string, public readonly value: string, reason: string) {
        super(`Cannot convert "${value}" to ${type}: ${reason}`);
    }
}

/**
 * Transport-level failure (timeout, socket error, unusable datagram).
 * `indication` is the short machine-readable cause, e.g. `requestTimedOut`.
 */
export class TransportError extends SnmpError {
    public readonly kind = 'Transport';

    constructor(public readonly indication: string, detail?: string) {
        super(detail ? `SNMP request failed: ${indication} (${detail})` : `SNMP request failed: ${indication}`);
    }

    get isTimeout(): boolean {
        return this.indication === 'requestTimedOut';
    }

    public toJSON(): Record<string, unknown> {
        return { ...super.toJSON(), indication: this.indication };
    }
}

/** A datagram arrived that is not a well-formed SNMP response. */
export class MessageDecodeError extends TransportError {
    constructor(detail: string) {
        super('malformedResponse', detail);
    }
}

/** The agent answered with a non-zero error-status. */
export class AgentError extends SnmpError {
    public readonly kind = 'Agent';
    public readonly statusName: string;

    constructor(
        public readonly operation: 'GET' | 'SET',
        public readonly status: number,
        public readonly index: number
    ) {
        const name = errorStatusName(status);
        const hint = ErrorStatusMessages[status];
        super(`SNMP ${operation} failed: ${name}${hint ? ` - ${hint}` : ''}`);
        this.statusName = name;
    }

    /** v1 "no such name" */
    get isNoSuchName(): boolean {
        return this.status === ErrorStatus.NO_SUCH_NAME;
    }

    /** True when the agent refused a write because of access rights. */
    get isAccessError(): boolean {
        return [
            ErrorStatus.READ_ONLY,
            ErrorStatus.NO_ACCESS,
            ErrorStatus.NOT_WRITABLE,
            ErrorStatus.AUTHORIZATION_ERROR,
        ].includes(this.status);
    }

    public toJSON(): Record<string, unknown> {
        return {
            ...super.toJSON(),
            operation: this.operation,
            status: this.status,
            statusName: this.statusName,
            index: this.index,
        };
    }
}

/** GET succeeded at the protocol level but the agent holds no value for the OID. */
export class ObjectNotFoundError extends SnmpError {
    public readonly kind = 'ObjectNotFound';

    constructor(public readonly oid: readonly number[], public readonly exception?: string) {
        super(`Object with OID ".${oid.join('.')}" not found`);
    }
}
