/**
 * BerProtocol.ts
 * * The byte-level half of the library.
 * Encodes and decodes the ASN.1 BER subset that SNMP messages are built from:
 * definite lengths, INTEGER contents, OBJECT IDENTIFIER contents and generic TLVs.
 */
import { Buffer } from 'buffer';
import { MessageDecodeError, ValueFormatError } from './SnmpError';

/**
 * BER / SNMP tags used on the wire.
 */
export enum BerTag {
    INTEGER = 0x02,
    OCTET_STRING = 0x04,
    NULL = 0x05,
    OBJECT_IDENTIFIER = 0x06,
    SEQUENCE = 0x30,

    // SNMP application types (RFC 2578)
    IP_ADDRESS = 0x40,
    COUNTER32 = 0x41,
    GAUGE32 = 0x42,
    TIMETICKS = 0x43,
    OPAQUE = 0x44,
    COUNTER64 = 0x46,

    // SNMPv2 varbind exceptions (RFC 3416)
    NO_SUCH_OBJECT = 0x80,
    NO_SUCH_INSTANCE = 0x81,
    END_OF_MIB_VIEW = 0x82,

    // PDUs
    GET_REQUEST = 0xa0,
    GET_NEXT_REQUEST = 0xa1,
    GET_RESPONSE = 0xa2,
    SET_REQUEST = 0xa3,
}

/**
 * A decoded Tag-Length-Value triple.
 */
export interface Tlv {
    tag: number;
    contents: Buffer;
    /** Offset of the first byte after this TLV in the source buffer */
    next: number;
}

export class BerProtocol {

    /**
     * Encodes a definite length.
     * Short form below 128, long form (0x80 | byte count, then big-endian bytes) above.
     */
    public static encodeLength(length: number): Buffer {
        if (length < 0x80) {
            return Buffer.from([length]);
        }

        const bytes: number[] = [];
        let n = length;
        while (n > 0) {
            bytes.unshift(n & 0xff);
            n = Math.floor(n / 256);
        }
        return Buffer.from([0x80 | bytes.length, ...bytes]);
    }

    /**
     * Reads a definite length starting at `offset`.
     * @returns The length and how many bytes its header took.
     */
    public static decodeLength(buffer: Buffer, offset: number): { length: number; byteLength: number } {
        if (offset >= buffer.length) {
            throw new MessageDecodeError('Truncated BER length');
        }

        const first = buffer[offset];

        // Short form (0xxxxxxx)
        if ((first & 0x80) === 0) {
            return { length: first, byteLength: 1 };
        }

        const count = first & 0x7f;
        if (count === 0) {
            throw new MessageDecodeError('Indefinite BER length is not allowed in SNMP');
        }
        if (count > 4) {
            throw new MessageDecodeError(`BER length of ${count} bytes is too large`);
        }
        if (offset + 1 + count > buffer.length) {
            throw new MessageDecodeError('Truncated BER length');
        }

        let length = 0;
        for (let i = 1; i <= count; i++) {
            length = length * 256 + buffer[offset + i];
        }
        return { length, byteLength: 1 + count };
    }

    public static encodeTlv(tag: number, contents: Buffer): Buffer {
        return Buffer.concat([Buffer.from([tag]), BerProtocol.encodeLength(contents.length), contents]);
    }

    /**
     * Reads one TLV at `offset`. The contents are a view into `buffer`.
     */
    public static readTlv(buffer: Buffer, offset: number = 0): Tlv {
        if (offset >= buffer.length) {
            throw new MessageDecodeError('Unexpected end of BER data');
        }

        const tag = buffer[offset];
        const { length, byteLength } = BerProtocol.decodeLength(buffer, offset + 1);
        const start = offset + 1 + byteLength;
        const end = start + length;

        if (end > buffer.length) {
            throw new MessageDecodeError(`BER value of ${length} bytes overruns the buffer`);
        }

        return { tag, contents: buffer.subarray(start, end), next: end };
    }

    /**
     * Reads a TLV and checks its tag.
     */
    public static expectTlv(buffer: Buffer, offset: number, tag: number, what: string): Tlv {
        const tlv = BerProtocol.readTlv(buffer, offset);
        if (tlv.tag !== tag) {
            throw new MessageDecodeError(
                `Expected ${what} (tag 0x${tag.toString(16)}), got tag 0x${tlv.tag.toString(16)}`
            );
        }
        return tlv;
    }

    /**
     * Splits the contents of a constructed value into its child TLVs.
     */
    public static readChildren(contents: Buffer): Tlv[] {
        const children: Tlv[] = [];
        let offset = 0;
        while (offset < contents.length) {
            const child = BerProtocol.readTlv(contents, offset);
            children.push(child);
            offset = child.next;
        }
        return children;
    }

    /**
     * Minimal two's complement encoding of an integer.
     * Unsigned application values (Counter32, Counter64...) get a leading 0x00
     * when their top bit is set, exactly like a positive INTEGER.
     */
    public static encodeInteger(value: bigint): Buffer {
        const bytes: number[] = [];
        let n = value;

        if (n >= 0n) {
            do {
                bytes.unshift(Number(n & 0xffn));
                n >>= 8n;
            } while (n > 0n);

            // Keep it positive
            if (bytes[0] & 0x80) {
                bytes.unshift(0);
            }
        } else {
            do {
                bytes.unshift(Number(n & 0xffn));
                n >>= 8n;
            } while (n < -1n || (n === -1n && !(bytes[0] & 0x80)));
        }

        return Buffer.from(bytes);
    }

    /**
     * Decodes two's complement integer contents.
     */
    public static decodeInteger(contents: Buffer): bigint {
        if (contents.length === 0) {
            throw new MessageDecodeError('Empty INTEGER contents');
        }

        let value = 0n;
        for (const byte of contents) {
            value = (value << 8n) | BigInt(byte);
        }

        if (contents[0] & 0x80) {
            value -= 1n << BigInt(contents.length * 8);
        }
        return value;
    }

    /**
     * Reads integer contents as an unsigned quantity.
     * Application types (Counter32, Gauge32...) are unsigned, and some agents
     * omit the leading 0x00 that a positive two's complement value needs.
     */
    public static decodeUnsigned(contents: Buffer): bigint {
        if (contents.length === 0) {
            throw new MessageDecodeError('Empty INTEGER contents');
        }

        let value = 0n;
        for (const byte of contents) {
            value = (value << 8n) | BigInt(byte);
        }
        return value;
    }

    /**
     * Encodes OID arcs.
     * The first two arcs collapse into one subidentifier (40 * a + b), the rest
     * are base-128 with the high bit set on every byte but the last.
     */
    public static encodeOid(arcs: readonly number[]): Buffer {
        BerProtocol.assertValidArcs(arcs);

        const bytes: number[] = [];
        const subIds = [arcs[0] * 40 + arcs[1], ...arcs.slice(2)];

        for (const subId of subIds) {
            const encoded: number[] = [subId % 128];
            let rest = Math.floor(subId / 128);
            while (rest > 0) {
                encoded.unshift((rest % 128) | 0x80);
                rest = Math.floor(rest / 128);
            }
            bytes.push(...encoded);
        }

        return Buffer.from(bytes);
    }

    public static decodeOid(contents: Buffer): number[] {
        if (contents.length === 0) {
            throw new MessageDecodeError('Empty OBJECT IDENTIFIER contents');
        }

        const subIds: number[] = [];
        let value = 0;
        let pending = false;

        for (const byte of contents) {
            value = value * 128 + (byte & 0x7f);
            pending = (byte & 0x80) !== 0;
            if (!pending) {
                if (!Number.isSafeInteger(value)) {
                    throw new MessageDecodeError('OBJECT IDENTIFIER arc is too large');
                }
                subIds.push(value);
                value = 0;
            }
        }

        if (pending) {
            throw new MessageDecodeError('Truncated OBJECT IDENTIFIER subidentifier');
        }

        const first = subIds[0];
        const head = first < 80 ? [Math.floor(first / 40), first % 40] : [2, first - 80];
        return [...head, ...subIds.slice(1)];
    }

    private static assertValidArcs(arcs: readonly number[]): void {
        if (arcs.length < 2) {
            throw new ValueFormatError('ObjectIdentifier', arcs.join('.'), 'an OID needs at least two arcs');
        }
        if (arcs.some(arc => !Number.isSafeInteger(arc) || arc < 0)) {
            throw new ValueFormatError('ObjectIdentifier', arcs.join('.'), 'arcs must be non-negative integers');
        }
        if (arcs[0] > 2 || (arcs[0] < 2 && arcs[1] > 39)) {
            throw new ValueFormatError('ObjectIdentifier', arcs.join('.'), 'invalid root arc');
        }
    }
}
