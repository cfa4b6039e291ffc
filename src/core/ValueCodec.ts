/**
 * ValueCodec.ts
 *
 * The SNMP value types and everything needed to move them between
 * user input, typed values and BER bytes.
 *
 * - `encode(type, raw)` validates and converts raw input into a typed `SnmpValue`.
 * - `toWire(value)` produces the BER TLV for a value.
 * - `decode(wire, type?)` is the inverse of `toWire`.
 */
import { Buffer } from 'buffer';
import { BerProtocol, BerTag, Tlv } from './BerProtocol';
import { ValueFormatError, ValueRangeError } from './SnmpError';
import { isDecimalInteger, oidToString, parseNumericOid } from '../utils/Helpers';

/**
 * JS representation carried by each SNMP type.
 */
export interface SnmpValueMap {
    OctetString: Buffer;
    Integer: number;
    Integer32: number;
    Counter32: number;
    Counter64: bigint;
    Gauge32: number;
    Unsigned32: number;
    TimeTicks: number;
    IpAddress: string;
    ObjectIdentifier: number[];
    Opaque: Buffer;
    Null: null;
}

export type SnmpType = keyof SnmpValueMap;

/**
 * How an SNMPv2 agent said "nothing here" for a single varbind.
 */
export type NullException = 'noSuchObject' | 'noSuchInstance' | 'endOfMibView';

export type SnmpValueOf<T extends SnmpType> = T extends 'Null'
    ? { type: 'Null'; value: null; exception?: NullException }
    : { type: T; value: SnmpValueMap[T] };

export type SnmpValue = { [T in SnmpType]: SnmpValueOf<T> }[SnmpType];

export type NullValue = SnmpValueOf<'Null'>;

/**
 * Anything a caller may hand to `encode()`.
 */
export type RawValue = string | number | bigint | Buffer | readonly number[];

export const SNMP_TYPES: readonly SnmpType[] = [
    'OctetString',
    'Integer',
    'Integer32',
    'Counter32',
    'Counter64',
    'Gauge32',
    'Unsigned32',
    'TimeTicks',
    'IpAddress',
    'ObjectIdentifier',
    'Opaque',
    'Null',
];

type IntegerType = 'Integer' | 'Integer32' | 'Counter32' | 'Gauge32' | 'Unsigned32' | 'TimeTicks';

const INT32: readonly [bigint, bigint] = [-(2n ** 31n), 2n ** 31n - 1n];
const UINT32: readonly [bigint, bigint] = [0n, 2n ** 32n - 1n];
const UINT64: readonly [bigint, bigint] = [0n, 2n ** 64n - 1n];

const RANGES: Record<IntegerType | 'Counter64', readonly [bigint, bigint]> = {
    Integer: INT32,
    Integer32: INT32,
    Counter32: UINT32,
    Gauge32: UINT32,
    Unsigned32: UINT32,
    TimeTicks: UINT32,
    Counter64: UINT64,
};

/**
 * BER tag each type is written with.
 * Integer/Integer32 and Gauge32/Unsigned32 share a tag on the wire.
 */
const TYPE_TAGS: Record<SnmpType, number> = {
    OctetString: BerTag.OCTET_STRING,
    Integer: BerTag.INTEGER,
    Integer32: BerTag.INTEGER,
    Counter32: BerTag.COUNTER32,
    Counter64: BerTag.COUNTER64,
    Gauge32: BerTag.GAUGE32,
    Unsigned32: BerTag.GAUGE32,
    TimeTicks: BerTag.TIMETICKS,
    IpAddress: BerTag.IP_ADDRESS,
    ObjectIdentifier: BerTag.OBJECT_IDENTIFIER,
    Opaque: BerTag.OPAQUE,
    Null: BerTag.NULL,
};

/**
 * Type a tag decodes to when the caller does not say.
 */
const TAG_TYPES: Record<number, SnmpType> = {
    [BerTag.INTEGER]: 'Integer',
    [BerTag.OCTET_STRING]: 'OctetString',
    [BerTag.NULL]: 'Null',
    [BerTag.OBJECT_IDENTIFIER]: 'ObjectIdentifier',
    [BerTag.IP_ADDRESS]: 'IpAddress',
    [BerTag.COUNTER32]: 'Counter32',
    [BerTag.GAUGE32]: 'Gauge32',
    [BerTag.TIMETICKS]: 'TimeTicks',
    [BerTag.OPAQUE]: 'Opaque',
    [BerTag.COUNTER64]: 'Counter64',
    [BerTag.NO_SUCH_OBJECT]: 'Null',
    [BerTag.NO_SUCH_INSTANCE]: 'Null',
    [BerTag.END_OF_MIB_VIEW]: 'Null',
};

const EXCEPTION_TAGS: Record<NullException, number> = {
    noSuchObject: BerTag.NO_SUCH_OBJECT,
    noSuchInstance: BerTag.NO_SUCH_INSTANCE,
    endOfMibView: BerTag.END_OF_MIB_VIEW,
};

const TAG_EXCEPTIONS: Record<number, NullException> = {
    [BerTag.NO_SUCH_OBJECT]: 'noSuchObject',
    [BerTag.NO_SUCH_INSTANCE]: 'noSuchInstance',
    [BerTag.END_OF_MIB_VIEW]: 'endOfMibView',
};

const IPV4 = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})$/;

export function isSnmpType(name: string): name is SnmpType {
    return SNMP_TYPES.some(type => type === name);
}

export function isNullValue(value: SnmpValue): value is NullValue {
    return value.type === 'Null';
}

function describeRaw(raw: RawValue | undefined): string {
    if (raw === undefined) return 'undefined';
    if (Buffer.isBuffer(raw)) return `<Buffer ${raw.toString('hex')}>`;
    if (typeof raw === 'object') return raw.join('.');
    return String(raw);
}

function toBigInt(type: SnmpType, raw: RawValue | undefined): bigint {
    if (typeof raw === 'bigint') return raw;

    if (typeof raw === 'number') {
        if (!Number.isInteger(raw)) {
            throw new ValueFormatError(type, describeRaw(raw), 'not an integer');
        }
        return BigInt(raw);
    }

    if (typeof raw === 'string') {
        const text = raw.trim();
        if (!isDecimalInteger(text)) {
            throw new ValueFormatError(type, raw, 'not a decimal integer');
        }
        return BigInt(text.replace(/^\+/, ''));
    }

    throw new ValueFormatError(type, describeRaw(raw), 'expected a number, bigint or numeric string');
}

function checkRange(type: IntegerType | 'Counter64', value: bigint): bigint {
    const [min, max] = RANGES[type];
    if (value < min || value > max) {
        throw new ValueRangeError(type, value.toString(), `${min}..${max}`);
    }
    return value;
}

function toBytes(type: SnmpType, raw: RawValue | undefined): Buffer {
    if (Buffer.isBuffer(raw)) return Buffer.from(raw);
    if (typeof raw === 'string') return Buffer.from(raw, 'utf8');
    if (typeof raw === 'number' || typeof raw === 'bigint') return Buffer.from(String(raw), 'utf8');
    throw new ValueFormatError(type, describeRaw(raw), 'expected a string or Buffer');
}

function toIpAddress(raw: RawValue | undefined): string {
    if (Buffer.isBuffer(raw)) {
        if (raw.length !== 4) {
            throw new ValueFormatError('IpAddress', describeRaw(raw), 'an IpAddress is exactly 4 bytes');
        }
        return Array.from(raw).join('.');
    }

    if (typeof raw === 'string') {
        const match = IPV4.exec(raw.trim());
        if (match) {
            const octets = match.slice(1).map(Number);
            if (octets.every(octet => octet <= 255)) return octets.join('.');
        }
    }

    throw new ValueFormatError('IpAddress', describeRaw(raw), 'not a dotted-quad IPv4 address');
}

function toArcs(raw: RawValue | undefined): number[] {
    let arcs: number[] | null = null;

    if (typeof raw === 'string') {
        arcs = parseNumericOid(raw);
    } else if (typeof raw === 'object' && !Buffer.isBuffer(raw)) {
        arcs = [...raw];
    }

    if (!arcs) {
        throw new ValueFormatError('ObjectIdentifier', describeRaw(raw), 'not a numeric OID');
    }

    // Validates root arc and arc values.
    BerProtocol.encodeOid(arcs);
    return arcs;
}

// ===============================================
// convertTo<Type> helpers (pure, no I/O)
// ===============================================

export function convertToOctetString(raw: RawValue): SnmpValueOf<'OctetString'> {
    return { type: 'OctetString', value: toBytes('OctetString', raw) };
}

export function convertToInteger(raw: RawValue): SnmpValueOf<'Integer'> {
    return { type: 'Integer', value: Number(checkRange('Integer', toBigInt('Integer', raw))) };
}

export function convertToInteger32(raw: RawValue): SnmpValueOf<'Integer32'> {
    return { type: 'Integer32', value: Number(checkRange('Integer32', toBigInt('Integer32', raw))) };
}

export function convertToCounter32(raw: RawValue): SnmpValueOf<'Counter32'> {
    return { type: 'Counter32', value: Number(checkRange('Counter32', toBigInt('Counter32', raw))) };
}

export function convertToCounter64(raw: RawValue): SnmpValueOf<'Counter64'> {
    return { type: 'Counter64', value: checkRange('Counter64', toBigInt('Counter64', raw)) };
}

export function convertToGauge32(raw: RawValue): SnmpValueOf<'Gauge32'> {
    return { type: 'Gauge32', value: Number(checkRange('Gauge32', toBigInt('Gauge32', raw))) };
}

export function convertToUnsigned32(raw: RawValue): SnmpValueOf<'Unsigned32'> {
    return { type: 'Unsigned32', value: Number(checkRange('Unsigned32', toBigInt('Unsigned32', raw))) };
}

export function convertToTimeTicks(raw: RawValue): SnmpValueOf<'TimeTicks'> {
    return { type: 'TimeTicks', value: Number(checkRange('TimeTicks', toBigInt('TimeTicks', raw))) };
}

export function convertToIpAddress(raw: RawValue): SnmpValueOf<'IpAddress'> {
    return { type: 'IpAddress', value: toIpAddress(raw) };
}

export function convertToObjectIdentifier(raw: RawValue): SnmpValueOf<'ObjectIdentifier'> {
    return { type: 'ObjectIdentifier', value: toArcs(raw) };
}

export function convertToOpaque(raw: RawValue): SnmpValueOf<'Opaque'> {
    return { type: 'Opaque', value: toBytes('Opaque', raw) };
}

/**
 * ValueCodec
 * * Converts raw input to typed values and typed values to and from BER.
 */
export class ValueCodec {

    /**
     * Validates `raw` against the domain of `type` and wraps it.
     *
     * @throws ValueFormatError when `raw` cannot be read as that type at all.
     * @throws ValueRangeError when it can, but lies outside the type's width.
     *
     * @example
     * ValueCodec.encode('Gauge32', '200');   // { type: 'Gauge32', value: 200 }
     * ValueCodec.encode('Integer32', 2 ** 31); // throws ValueRangeError
     */
    public static encode(type: SnmpType, raw?: RawValue): SnmpValue {
        switch (type) {
            case 'OctetString': return convertToOctetString(ValueCodec.required(type, raw));
            case 'Integer': return convertToInteger(ValueCodec.required(type, raw));
            case 'Integer32': return convertToInteger32(ValueCodec.required(type, raw));
            case 'Counter32': return convertToCounter32(ValueCodec.required(type, raw));
            case 'Counter64': return convertToCounter64(ValueCodec.required(type, raw));
            case 'Gauge32': return convertToGauge32(ValueCodec.required(type, raw));
            case 'Unsigned32': return convertToUnsigned32(ValueCodec.required(type, raw));
            case 'TimeTicks': return convertToTimeTicks(ValueCodec.required(type, raw));
            case 'IpAddress': return convertToIpAddress(ValueCodec.required(type, raw));
            case 'ObjectIdentifier': return convertToObjectIdentifier(ValueCodec.required(type, raw));
            case 'Opaque': return convertToOpaque(ValueCodec.required(type, raw));
            case 'Null': return { type: 'Null', value: null };
        }
    }

    /**
     * BER-encodes a value (tag, length, contents).
     * Numeric values are re-checked against their type so a hand-built value
     * cannot leak out of its width.
     */
    public static toWire(value: SnmpValue): Buffer {
        const tag = TYPE_TAGS[value.type];

        switch (value.type) {
            case 'OctetString':
            case 'Opaque':
                return BerProtocol.encodeTlv(tag, value.value);

            case 'Integer':
            case 'Integer32':
            case 'Counter32':
            case 'Gauge32':
            case 'Unsigned32':
            case 'TimeTicks':
                return BerProtocol.encodeTlv(
                    tag,
                    BerProtocol.encodeInteger(checkRange(value.type, toBigInt(value.type, value.value)))
                );

            case 'Counter64':
                return BerProtocol.encodeTlv(tag, BerProtocol.encodeInteger(checkRange('Counter64', value.value)));

            case 'IpAddress':
                return BerProtocol.encodeTlv(tag, Buffer.from(toIpAddress(value.value).split('.').map(Number)));

            case 'ObjectIdentifier':
                return BerProtocol.encodeTlv(tag, BerProtocol.encodeOid(value.value));

            case 'Null':
                return BerProtocol.encodeTlv(
                    value.exception ? EXCEPTION_TAGS[value.exception] : BerTag.NULL,
                    Buffer.alloc(0)
                );
        }
    }

    /**
     * Decodes a single BER-encoded value.
     * @param wire Exactly one TLV.
     * @param type Expected type. When omitted the type is inferred from the tag
     *             (0x02 reads as Integer, 0x42 as Gauge32).
     */
    public static decode(wire: Buffer, type?: SnmpType): SnmpValue {
        const tlv = BerProtocol.readTlv(wire, 0);
        if (tlv.next !== wire.length) {
            throw new ValueFormatError(type ?? 'value', wire.toString('hex'), 'trailing bytes after the value');
        }
        return ValueCodec.decodeTlv(tlv, type);
    }

    /**
     * Decodes an already split TLV (used by the message decoder for varbinds).
     */
    public static decodeTlv(tlv: Tlv, expected?: SnmpType): SnmpValue {
        const inferred = TAG_TYPES[tlv.tag];
        const hex = tlv.contents.toString('hex');

        if (inferred === undefined) {
            throw new ValueFormatError(expected ?? 'value', hex, `unknown tag 0x${tlv.tag.toString(16)}`);
        }

        let type: SnmpType = inferred;
        if (expected !== undefined) {
            const tagMatches = expected === 'Null' ? inferred === 'Null' : TYPE_TAGS[expected] === tlv.tag;
            if (!tagMatches) {
                throw new ValueFormatError(expected, hex, `unexpected tag 0x${tlv.tag.toString(16)}`);
            }
            type = expected;
        }

        const contents = tlv.contents;

        switch (type) {
            case 'OctetString':
                return { type, value: Buffer.from(contents) };
            case 'Opaque':
                return { type, value: Buffer.from(contents) };

            case 'Integer':
                return { type, value: Number(checkRange(type, BerProtocol.decodeInteger(contents))) };
            case 'Integer32':
                return { type, value: Number(checkRange(type, BerProtocol.decodeInteger(contents))) };

            case 'Counter32':
                return { type, value: Number(checkRange(type, BerProtocol.decodeUnsigned(contents))) };
            case 'Gauge32':
                return { type, value: Number(checkRange(type, BerProtocol.decodeUnsigned(contents))) };
            case 'Unsigned32':
                return { type, value: Number(checkRange(type, BerProtocol.decodeUnsigned(contents))) };
            case 'TimeTicks':
                return { type, value: Number(checkRange(type, BerProtocol.decodeUnsigned(contents))) };
            case 'Counter64':
                return { type, value: checkRange(type, BerProtocol.decodeUnsigned(contents)) };

            case 'IpAddress':
                if (contents.length !== 4) {
                    throw new ValueFormatError(type, hex, 'an IpAddress is exactly 4 bytes');
                }
                return { type, value: Array.from(contents).join('.') };

            case 'ObjectIdentifier':
                return { type, value: BerProtocol.decodeOid(contents) };

            case 'Null': {
                const exception = TAG_EXCEPTIONS[tlv.tag];
                return exception ? { type, value: null, exception } : { type, value: null };
            }
        }
    }

    /**
     * Short human-oriented rendering, used in log lines.
     */
    public static describe(value: SnmpValue): string {
        switch (value.type) {
            case 'OctetString':
            case 'Opaque':
                return `${value.type}(0x${value.value.toString('hex')})`;
            case 'ObjectIdentifier':
                return `${value.type}(${oidToString(value.value)})`;
            case 'Null':
                return value.exception ?? 'Null';
            default:
                return `${value.type}(${value.value.toString()})`;
        }
    }

    private static required(type: SnmpType, raw: RawValue | undefined): RawValue {
        if (raw === undefined) {
            throw new ValueFormatError(type, 'undefined', 'a value is required');
        }
        return raw;
    }
}

/**
 * Tells a typed value apart from raw input.
 */
export function isSnmpValue(value: SnmpValue | RawValue): value is SnmpValue {
    if (typeof value !== 'object' || Buffer.isBuffer(value)) return false;
    return 'type' in value && 'value' in value;
}
