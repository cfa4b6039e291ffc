import * as dotenv from 'dotenv';
import { SnmpSession, SnmpSessionOptions, SessionTarget } from './SnmpSession';
import { OidResolver } from './OidResolver';
import { formatValue } from './ValueFormatter';
import { SnmpTransport, UdpClient } from '../core/UdpClient';
import { SnmpMessage, VarBind } from '../core/SnmpMessage';
import {
    AgentError,
    MessageDecodeError,
    ObjectNotFoundError,
    TransportError,
    ValueFormatError,
} from '../core/SnmpError';
import {
    RawValue,
    SnmpValue,
    ValueCodec,
    convertToCounter32,
    convertToCounter64,
    convertToGauge32,
    convertToInteger,
    convertToInteger32,
    convertToIpAddress,
    convertToObjectIdentifier,
    convertToOctetString,
    convertToTimeTicks,
    convertToUnsigned32,
    isNullValue,
    isSnmpValue,
} from '../core/ValueCodec';
import { Logger, ObjectIdentifier, SnmpVersion } from '../types';
import { oidToString } from '../utils/Helpers';

// Load environment variables immediately
dotenv.config();

const MAX_REQUEST_ID = 2 ** 31 - 1;

export interface SnmpClientOptions extends SnmpSessionOptions {
    /**
     * Datagram transport. Defaults to a `UdpClient`.
     * Tests and embedders can pass any `SnmpTransport`.
     */
    transport?: SnmpTransport;
}

type Operation = 'GET' | 'SET';

/**
 * SnmpClient
 * * The facade for GET and SET against a single agent.
 * * Owns a `SnmpSession` (destination + MIBs), resolves OID expressions and
 * interprets responses into values or typed errors.
 *
 * Calls on one client run one at a time, in call order.
 *
 * @example
 * const client = new SnmpClient();
 * client.setHost('192.0.2.10');
 * client.setCommunityString('private');
 * await client.preloadMibs('SNMPv2-MIB');
 *
 * const descr = await client.get('.1.3.6.1.2.1.1.1.0');
 * await client.setOctetString('.1.3.6.1.2.1.1.6.0', 'Lab rack 3');
 * await client.getFormatted('SNMPv2-MIB::sysLocation.0'); // 'Lab rack 3'
 */
export class SnmpClient {
    public readonly session: SnmpSession;

    private readonly transport: SnmpTransport;
    private readonly resolver: OidResolver;
    private readonly logger: Logger;

    /** Tail of the request chain; never rejects. */
    private queue: Promise<void> = Promise.resolve();
    private requestId: number = Math.floor(Math.random() * MAX_REQUEST_ID);

    constructor(options: SnmpClientOptions = {}) {
        this.logger = options.logger ?? console;
        this.session = new SnmpSession(options);
        this.transport = options.transport ?? new UdpClient();
        this.resolver = new OidResolver(this.session.mibs);
    }

    // ===============================================
    // SESSION CONFIGURATION
    // ===============================================

    public setHost(host: string, port?: number): void {
        this.session.setHost(host, port);
    }

    public setCommunityString(community: string): void {
        this.session.setCommunityString(community);
    }

    public setVersion(version: SnmpVersion): void {
        this.session.setVersion(version);
    }

    public setTimeout(ms: number): void {
        this.session.setTimeout(ms);
    }

    public setRetries(retries: number): void {
        this.session.setRetries(retries);
    }

    public addMibSearchPath(dir: string): void {
        this.session.addMibSearchPath(dir);
    }

    public getMibSearchPath(): string[] {
        return this.session.getMibSearchPath();
    }

    public preloadMibs(...names: string[]): Promise<void> {
        return this.session.preloadMibs(...names);
    }

    /**
     * Resolves an OID expression without sending anything.
     */
    public resolve(oidExpr: string): Promise<ObjectIdentifier> {
        return this.resolver.resolve(oidExpr);
    }

    // ===============================================
    // GET
    // ===============================================

    /**
     * **SNMP GET**
     *
     * Accepted notations:
     * - `SNMPv2-MIB::sysDescr.0`
     * - `.1.3.6.1.2.1.1.1.0`
     * - `.iso.org.6.internet.2.1.1.1.0`
     * - `sysDescr.0` (any MIB on the search path)
     *
     * @throws NotConfiguredError before `setHost()`; nothing is sent.
     * @throws TransportError on timeout or socket failure.
     * @throws AgentError when the agent answers with a non-zero error-status.
     * @throws ObjectNotFoundError when the agent has no value for the OID.
     */
    public get(oidExpr: string): Promise<SnmpValue> {
        return this.serialize(async () => {
            const target = this.session.target();
            const oid = await this.resolver.resolve(oidExpr);

            const [varbind] = await this.exchange('GET', target, [
                { oid: oid.arcs, value: { type: 'Null', value: null } },
            ]);

            if (isNullValue(varbind.value)) {
                throw new ObjectNotFoundError(varbind.oid, varbind.value.exception);
            }
            return varbind.value;
        });
    }

    /**
     * GET, rendered as text (see `formatValue`).
     */
    public async getFormatted(oidExpr: string): Promise<string> {
        return formatValue(await this.get(oidExpr));
    }

    // ===============================================
    // SET
    // ===============================================

    /**
     * **SNMP SET**
     *
     * `value` is normally a typed value from one of the `convertTo*` helpers.
     * A raw string/number is only accepted when a loaded MIB declares the
     * syntax of the target object; otherwise use a typed setter such as
     * `setGauge32()`.
     *
     * @example
     * await client.set('SNMPv2-MIB::sysContact.0', 'noc@example.net'); // typed from the MIB
     * await client.set('.1.3.6.1.4.1.99999.1.0', client.convertToGauge32('200'));
     *
     * @throws ValueFormatError for a raw value with no MIB-declared syntax.
     * @throws AgentError when the agent rejects the assignment.
     */
    public set(oidExpr: string, value: SnmpValue | RawValue): Promise<void> {
        return this.serialize(async () => {
            const target = this.session.target();
            const oid = await this.resolver.resolve(oidExpr);
            const typed = isSnmpValue(value) ? value : this.encodeFromMib(oidExpr, oid, value);

            await this.exchange('SET', target, [{ oid: oid.arcs, value: typed }]);
        });
    }

    public async setOctetString(oidExpr: string, raw: RawValue): Promise<void> {
        await this.set(oidExpr, convertToOctetString(raw));
    }

    public async setInteger(oidExpr: string, raw: RawValue): Promise<void> {
        await this.set(oidExpr, convertToInteger(raw));
    }

    public async setInteger32(oidExpr: string, raw: RawValue): Promise<void> {
        await this.set(oidExpr, convertToInteger32(raw));
    }

    public async setCounter32(oidExpr: string, raw: RawValue): Promise<void> {
        await this.set(oidExpr, convertToCounter32(raw));
    }

    public async setCounter64(oidExpr: string, raw: RawValue): Promise<void> {
        await this.set(oidExpr, convertToCounter64(raw));
    }

    public async setGauge32(oidExpr: string, raw: RawValue): Promise<void> {
        await this.set(oidExpr, convertToGauge32(raw));
    }

    public async setUnsigned32(oidExpr: string, raw: RawValue): Promise<void> {
        await this.set(oidExpr, convertToUnsigned32(raw));
    }

    public async setTimeTicks(oidExpr: string, raw: RawValue): Promise<void> {
        await this.set(oidExpr, convertToTimeTicks(raw));
    }

    public async setIpAddress(oidExpr: string, raw: RawValue): Promise<void> {
        await this.set(oidExpr, convertToIpAddress(raw));
    }

    public async setObjectIdentifier(oidExpr: string, raw: RawValue): Promise<void> {
        await this.set(oidExpr, convertToObjectIdentifier(raw));
    }

    // ===============================================
    // CONVERSION HELPERS (no I/O)
    // ===============================================

    public convertToOctetString(raw: RawValue) { return convertToOctetString(raw); }
    public convertToInteger(raw: RawValue) { return convertToInteger(raw); }
    public convertToInteger32(raw: RawValue) { return convertToInteger32(raw); }
    public convertToCounter32(raw: RawValue) { return convertToCounter32(raw); }
    public convertToCounter64(raw: RawValue) { return convertToCounter64(raw); }
    public convertToGauge32(raw: RawValue) { return convertToGauge32(raw); }
    public convertToUnsigned32(raw: RawValue) { return convertToUnsigned32(raw); }
    public convertToTimeTicks(raw: RawValue) { return convertToTimeTicks(raw); }
    public convertToIpAddress(raw: RawValue) { return convertToIpAddress(raw); }
    public convertToObjectIdentifier(raw: RawValue) { return convertToObjectIdentifier(raw); }

    /**
     * Abandons in-flight exchanges and releases the transport.
     */
    public close(): void {
        this.transport.close();
    }

    // ===============================================
    // INTERNALS
    // ===============================================

    /**
     * Sends one request PDU and returns the response varbinds.
     */
    private async exchange(operation: Operation, target: SessionTarget, varbinds: VarBind[]): Promise<VarBind[]> {
        const requestId = this.allocateRequestId();
        const request = SnmpMessage.request(
            operation === 'GET' ? 'GetRequest' : 'SetRequest',
            target.version,
            target.community,
            requestId,
            varbinds
        );

        const description = varbinds
            .map(vb => operation === 'GET' ? oidToString(vb.oid) : `${oidToString(vb.oid)} = ${ValueCodec.describe(vb.value)}`)
            .join(', ');
        this.logger.debug(`[SnmpClient] ${operation} ${description} -> ${target.host}:${target.port} (request ${requestId})`);

        let datagram: Buffer;
        try {
            datagram = await this.transport.exchange(
                target,
                request,
                response => SnmpMessage.peekRequestId(response) === requestId
            );
        } catch (error) {
            if (error instanceof TransportError) throw error;
            throw new TransportError('socketError', error instanceof Error ? error.message : String(error));
        }

        const { pdu } = SnmpMessage.decode(datagram);

        if (pdu.type !== 'GetResponse') {
            throw new MessageDecodeError(`expected a GetResponse PDU, got ${pdu.type}`);
        }

        if (pdu.errorStatus !== 0) {
            const error = new AgentError(operation, pdu.errorStatus, pdu.errorIndex);
            this.logger.warn(`[SnmpClient] ${error.message}`);
            throw error;
        }

        if (pdu.varbinds.length !== varbinds.length) {
            throw new MessageDecodeError(`expected ${varbinds.length} varbind(s), got ${pdu.varbinds.length}`);
        }

        pdu.varbinds.forEach((received, i) => {
            const requested = oidToString(varbinds[i].oid);
            if (oidToString(received.oid) !== requested) {
                throw new MessageDecodeError(`response names .${oidToString(received.oid)} instead of .${requested}`);
            }
        });

        return pdu.varbinds;
    }

    /**
     * Encodes a raw SET value with the syntax a loaded MIB declares for the OID.
     */
    private encodeFromMib(oidExpr: string, oid: ObjectIdentifier, raw: RawValue): SnmpValue {
        const match = this.session.mibs.describe(oid.arcs);
        const syntax = match?.symbol.syntax;

        if (!syntax) {
            throw new ValueFormatError(
                'SNMP value',
                oidExpr,
                'no loaded MIB declares a type for this OID; use a typed setter or a convertTo* value'
            );
        }
        return ValueCodec.encode(syntax, raw);
    }

    private allocateRequestId(): number {
        this.requestId = this.requestId >= MAX_REQUEST_ID ? 1 : this.requestId + 1;
        return this.requestId;
    }

    /**
     * Runs `task` after every previously queued call has settled.
     */
    private serialize<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task);
        // The caller observes failures through `run`; the chain itself keeps going.
        this.queue = run.then(() => undefined, () => undefined);
        return run;
    }
}
