import { Buffer } from 'buffer';
import { vi } from 'vitest';
import { SnmpMessage, SnmpMessageFields, VarBind } from '../../src/core/SnmpMessage';
import { ErrorStatus } from '../../src/core/ErrorStatus';
import { TransportError } from '../../src/core/SnmpError';
import { SnmpTransport, TransportTarget } from '../../src/core/UdpClient';
import { SnmpValue, ValueCodec } from '../../src/core/ValueCodec';
import { Logger } from '../../src/types';
import { oidToString, parseNumericOid } from '../../src/utils/Helpers';

interface AgentObject {
    value: SnmpValue;
    writable: boolean;
}

export interface RecordedRequest {
    target: TransportTarget;
    message: SnmpMessageFields;
}

export function silentLogger(): Logger {
    return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function arcs(oid: string): number[] {
    const parsed = parseNumericOid(oid);
    if (!parsed) throw new Error(`bad test OID ${oid}`);
    return parsed;
}

/**
 * In-process agent behind the `SnmpTransport` interface.
 * Decodes each request, answers it from an object table, and re-encodes the response.
 */
export class FakeAgent implements SnmpTransport {
    public readonly requests: RecordedRequest[] = [];

    /** Rejects every exchange with this error when set */
    public failure: Error | null = null;
    /** Sends a response with the wrong request-id before the real one */
    public staleFirst = false;
    /** Replaces the varbind list of every response */
    public responseVarbinds: VarBind[] | null = null;

    public discarded = 0;
    public maxInFlight = 0;
    public closed = false;

    private readonly objects = new Map<string, AgentObject>();
    private inFlight = 0;

    public define(oid: string, value: SnmpValue, writable: boolean = false): this {
        this.objects.set(oidToString(arcs(oid)), { value, writable });
        return this;
    }

    public valueOf(oid: string): SnmpValue | undefined {
        return this.objects.get(oidToString(arcs(oid)))?.value;
    }

    public async exchange(target: TransportTarget, request: Buffer, accept: (response: Buffer) => boolean): Promise<Buffer> {
        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

        try {
            await new Promise(resolve => setImmediate(resolve));

            const message = SnmpMessage.decode(request);
            this.requests.push({ target, message });

            if (this.failure) throw this.failure;

            const response = this.respond(message);

            if (this.staleFirst) {
                const stale = SnmpMessage.encode({
                    ...response,
                    pdu: { ...response.pdu, requestId: response.pdu.requestId + 1 },
                });
                if (!accept(stale)) this.discarded++;
            }

            const bytes = SnmpMessage.encode(response);
            if (!accept(bytes)) {
                throw new TransportError('requestTimedOut', 'response rejected by the matcher');
            }
            return bytes;
        } finally {
            this.inFlight--;
        }
    }

    public close(): void {
        this.closed = true;
    }

    private respond(message: SnmpMessageFields): SnmpMessageFields {
        const { version, pdu } = message;
        let errorStatus = 0;
        let errorIndex = 0;

        const fail = (status: ErrorStatus, index: number) => {
            if (errorStatus === 0) {
                errorStatus = status;
                errorIndex = index;
            }
        };

        const varbinds = pdu.varbinds.map((vb, i): VarBind => {
            const object = this.objects.get(oidToString(vb.oid));

            if (pdu.type === 'GetRequest') {
                if (object) return { oid: vb.oid, value: object.value };
                if (version === 'v1') {
                    fail(ErrorStatus.NO_SUCH_NAME, i + 1);
                    return vb;
                }
                return { oid: vb.oid, value: { type: 'Null', value: null, exception: 'noSuchObject' } };
            }

            if (!object) {
                fail(version === 'v1' ? ErrorStatus.NO_SUCH_NAME : ErrorStatus.NO_CREATION, i + 1);
            } else if (!object.writable) {
                fail(version === 'v1' ? ErrorStatus.NO_SUCH_NAME : ErrorStatus.NOT_WRITABLE, i + 1);
            } else if (ValueCodec.toWire(object.value)[0] !== ValueCodec.toWire(vb.value)[0]) {
                fail(version === 'v1' ? ErrorStatus.BAD_VALUE : ErrorStatus.WRONG_TYPE, i + 1);
            } else {
                object.value = vb.value;
            }
            return vb;
        });

        return {
            version,
            community: message.community,
            pdu: {
                type: 'GetResponse',
                requestId: pdu.requestId,
                errorStatus,
                errorIndex,
                varbinds: this.responseVarbinds ?? varbinds,
            },
        };
    }
}

/**
 * Awaits a promise that must reject with `type` and returns the error.
 */
export async function rejectionOf<E extends Error>(
    promise: Promise<unknown>,
    type: new (...args: never[]) => E
): Promise<E> {
    const outcome = await promise.then(
        () => new Error('expected a rejection, but the promise resolved'),
        (error: unknown) => error
    );
    if (!(outcome instanceof type)) {
        throw new Error(`expected ${type.name}, got ${String(outcome)}`);
    }
    return outcome;
}
