/**
 * SnmpMessage.ts
 *
 * Community-based SNMP message (RFC 1157 / RFC 3416):
 *
 *   Message ::= SEQUENCE { version INTEGER, community OCTET STRING, pdu PDU }
 *   PDU     ::= [tag] SEQUENCE { request-id, error-status, error-index, varbinds }
 *   VarBind ::= SEQUENCE { name OBJECT IDENTIFIER, value ANY }
 */
import { Buffer } from 'buffer';
import { BerProtocol, BerTag } from './BerProtocol';
import { MessageDecodeError, SnmpError, TransportError } from './SnmpError';
import { SnmpValue, ValueCodec } from './ValueCodec';
import { SnmpVersion } from '../types';

export type PduType = 'GetRequest' | 'GetNextRequest' | 'GetResponse' | 'SetRequest';

const PDU_TAGS: Record<PduType, number> = {
    GetRequest: BerTag.GET_REQUEST,
    GetNextRequest: BerTag.GET_NEXT_REQUEST,
    GetResponse: BerTag.GET_RESPONSE,
    SetRequest: BerTag.SET_REQUEST,
};

const PDU_TYPES: Record<number, PduType | undefined> = {
    [BerTag.GET_REQUEST]: 'GetRequest',
    [BerTag.GET_NEXT_REQUEST]: 'GetNextRequest',
    [BerTag.GET_RESPONSE]: 'GetResponse',
    [BerTag.SET_REQUEST]: 'SetRequest',
};

const VERSION_NUMBERS: Record<SnmpVersion, number> = {
    v1: 0,
    v2c: 1,
};

const VERSIONS: Record<number, SnmpVersion | undefined> = {
    0: 'v1',
    1: 'v2c',
};

export interface VarBind {
    oid: number[];
    value: SnmpValue;
}

export interface Pdu {
    type: PduType;
    requestId: number;
    errorStatus: number;
    errorIndex: number;
    varbinds: VarBind[];
}

export interface SnmpMessageFields {
    version: SnmpVersion;
    community: string;
    pdu: Pdu;
}

export class SnmpMessage {

    /**
     * Builds a request message. error-status and error-index are always 0 on requests.
     */
    public static request(
        type: 'GetRequest' | 'SetRequest',
        version: SnmpVersion,
        community: string,
        requestId: number,
        varbinds: VarBind[]
    ): Buffer {
        return SnmpMessage.encode({
            version,
            community,
            pdu: { type, requestId, errorStatus: 0, errorIndex: 0, varbinds },
        });
    }

    public static encode(message: SnmpMessageFields): Buffer {
        const { pdu } = message;

        const varbinds = pdu.varbinds.map(vb => BerProtocol.encodeTlv(
            BerTag.SEQUENCE,
            Buffer.concat([
                BerProtocol.encodeTlv(BerTag.OBJECT_IDENTIFIER, BerProtocol.encodeOid(vb.oid)),
                ValueCodec.toWire(vb.value),
            ])
        ));

        const pduBody = Buffer.concat([
            SnmpMessage.integer(pdu.requestId),
            SnmpMessage.integer(pdu.errorStatus),
            SnmpMessage.integer(pdu.errorIndex),
            BerProtocol.encodeTlv(BerTag.SEQUENCE, Buffer.concat(varbinds)),
        ]);

        return BerProtocol.encodeTlv(BerTag.SEQUENCE, Buffer.concat([
            SnmpMessage.integer(VERSION_NUMBERS[message.version]),
            BerProtocol.encodeTlv(BerTag.OCTET_STRING, Buffer.from(message.community, 'utf8')),
            BerProtocol.encodeTlv(PDU_TAGS[pdu.type], pduBody),
        ]));
    }

    /**
     * Parses a full datagram.
     * @throws MessageDecodeError for anything that is not a community-based SNMP message.
     */
    public static decode(datagram: Buffer): SnmpMessageFields {
        try {
            return SnmpMessage.parse(datagram);
        } catch (error) {
            // Bad values inside a varbind are a transport problem from the caller's side
            if (error instanceof SnmpError && !(error instanceof TransportError)) {
                throw new MessageDecodeError(error.message);
            }
            throw error;
        }
    }

    /**
     * Reads just the request-id, without decoding varbinds.
     * @returns null when the datagram is not parseable that far.
     */
    public static peekRequestId(datagram: Buffer): number | null {
        try {
            const message = BerProtocol.expectTlv(datagram, 0, BerTag.SEQUENCE, 'message');
            const [, , pdu] = BerProtocol.readChildren(message.contents);
            if (!pdu) return null;
            const requestId = BerProtocol.readTlv(pdu.contents, 0);
            if (requestId.tag !== BerTag.INTEGER) return null;
            return Number(BerProtocol.decodeInteger(requestId.contents));
        } catch (error) {
            if (error instanceof TransportError) return null;
            throw error;
        }
    }

    private static parse(datagram: Buffer): SnmpMessageFields {
        const message = BerProtocol.expectTlv(datagram, 0, BerTag.SEQUENCE, 'message');

        const version = BerProtocol.expectTlv(message.contents, 0, BerTag.INTEGER, 'version');
        const community = BerProtocol.expectTlv(message.contents, version.next, BerTag.OCTET_STRING, 'community');
        const pduTlv = BerProtocol.readTlv(message.contents, community.next);

        const versionNumber = Number(BerProtocol.decodeInteger(version.contents));
        const versionName = VERSIONS[versionNumber];
        if (!versionName) {
            throw new MessageDecodeError(`Unsupported SNMP version ${versionNumber}`);
        }

        const pduType = PDU_TYPES[pduTlv.tag];
        if (!pduType) {
            throw new MessageDecodeError(`Unsupported PDU tag 0x${pduTlv.tag.toString(16)}`);
        }

        const body = pduTlv.contents;
        const requestId = BerProtocol.expectTlv(body, 0, BerTag.INTEGER, 'request-id');
        const errorStatus = BerProtocol.expectTlv(body, requestId.next, BerTag.INTEGER, 'error-status');
        const errorIndex = BerProtocol.expectTlv(body, errorStatus.next, BerTag.INTEGER, 'error-index');
        const varbindList = BerProtocol.expectTlv(body, errorIndex.next, BerTag.SEQUENCE, 'varbind list');

        const varbinds = BerProtocol.readChildren(varbindList.contents).map(entry => {
            if (entry.tag !== BerTag.SEQUENCE) {
                throw new MessageDecodeError('VarBind is not a SEQUENCE');
            }
            const name = BerProtocol.expectTlv(entry.contents, 0, BerTag.OBJECT_IDENTIFIER, 'varbind name');
            const value = BerProtocol.readTlv(entry.contents, name.next);
            return {
                oid: BerProtocol.decodeOid(name.contents),
                value: ValueCodec.decodeTlv(value),
            };
        });

        return {
            version: versionName,
            community: community.contents.toString('utf8'),
            pdu: {
                type: pduType,
                requestId: Number(BerProtocol.decodeInteger(requestId.contents)),
                errorStatus: Number(BerProtocol.decodeInteger(errorStatus.contents)),
                errorIndex: Number(BerProtocol.decodeInteger(errorIndex.contents)),
                varbinds,
            },
        };
    }

    private static integer(value: number): Buffer {
        return BerProtocol.encodeTlv(BerTag.INTEGER, BerProtocol.encodeInteger(BigInt(value)));
    }
}
