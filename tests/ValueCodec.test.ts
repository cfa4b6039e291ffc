import { describe, it, expect } from 'vitest';
import { Buffer } from 'buffer';
import {
    ValueCodec,
    SnmpValue,
    convertToCounter64,
    convertToGauge32,
    convertToIpAddress,
    convertToObjectIdentifier,
    convertToOctetString,
    isSnmpValue,
} from '../src/core/ValueCodec';
import { ValueFormatError, ValueRangeError } from '../src/core/SnmpError';

const wire = (value: SnmpValue) => ValueCodec.toWire(value).toString('hex');

describe('ValueCodec', () => {
    describe('encode', () => {
        it('accepts the Integer32 boundaries and rejects one past them', () => {
            expect(ValueCodec.encode('Integer32', 2147483647)).toEqual({ type: 'Integer32', value: 2147483647 });
            expect(ValueCodec.encode('Integer32', '-2147483648')).toEqual({ type: 'Integer32', value: -2147483648 });
            expect(() => ValueCodec.encode('Integer32', 2147483648)).toThrow(ValueRangeError);
            expect(() => ValueCodec.encode('Integer32', '-2147483649')).toThrow(ValueRangeError);
        });

        it.each(['Counter32', 'Gauge32', 'Unsigned32', 'TimeTicks', 'Counter64'] as const)(
            'rejects negative %s values',
            (type) => {
                expect(() => ValueCodec.encode(type, -1)).toThrow(ValueRangeError);
            }
        );

        it('rejects 2^32 for 32-bit unsigned types', () => {
            expect(() => ValueCodec.encode('Counter32', 4294967296)).toThrow(ValueRangeError);
            expect(ValueCodec.encode('Gauge32', '4294967295')).toEqual({ type: 'Gauge32', value: 4294967295 });
        });

        it('keeps Counter64 exact up to 2^64 - 1', () => {
            expect(convertToCounter64('18446744073709551615')).toEqual({ type: 'Counter64', value: 18446744073709551615n });
            expect(() => convertToCounter64('18446744073709551616')).toThrow(ValueRangeError);
        });

        it('reports the type and value in range errors', () => {
            expect(() => ValueCodec.encode('Integer32', 2147483648))
                .toThrow('Value 2147483648 is out of range for Integer32 (-2147483648..2147483647)');
        });

        it('parses numeric strings with surrounding space and a plus sign', () => {
            expect(convertToGauge32(' +200 ')).toEqual({ type: 'Gauge32', value: 200 });
        });

        it('raises a format error for input that is not a number at all', () => {
            expect(() => ValueCodec.encode('Counter64', 'abc')).toThrow(ValueFormatError);
            expect(() => ValueCodec.encode('Integer', '1.5')).toThrow(ValueFormatError);
            expect(() => ValueCodec.encode('Integer', 1.5)).toThrow(ValueFormatError);
            expect(() => ValueCodec.encode('Gauge32', Buffer.from([1]))).toThrow(ValueFormatError);
            expect(() => ValueCodec.encode('Integer')).toThrow('Cannot convert "undefined" to Integer: a value is required');
        });

        it('stores octet strings as UTF-8 bytes', () => {
            expect(convertToOctetString('Test').value).toEqual(Buffer.from('Test'));
            expect(convertToOctetString(Buffer.from([0, 1])).value).toEqual(Buffer.from([0, 1]));
        });

        it('validates IPv4 addresses', () => {
            expect(convertToIpAddress('192.0.2.1')).toEqual({ type: 'IpAddress', value: '192.0.2.1' });
            expect(convertToIpAddress(Buffer.from([10, 0, 0, 1]))).toEqual({ type: 'IpAddress', value: '10.0.0.1' });
            expect(() => convertToIpAddress('256.1.1.1')).toThrow(ValueFormatError);
            expect(() => convertToIpAddress('10.0.0')).toThrow(ValueFormatError);
        });

        it('parses object identifier values', () => {
            expect(convertToObjectIdentifier('.1.3.6.1.4.1.99999')).toEqual({
                type: 'ObjectIdentifier',
                value: [1, 3, 6, 1, 4, 1, 99999],
            });
            expect(convertToObjectIdentifier([1, 3, 6]).value).toEqual([1, 3, 6]);
            expect(() => convertToObjectIdentifier('1.3.x')).toThrow(ValueFormatError);
            expect(() => convertToObjectIdentifier('7.1')).toThrow(ValueFormatError);
        });
    });

    describe('toWire', () => {
        it('writes unsigned values with a leading zero when the top bit is set', () => {
            expect(wire({ type: 'Gauge32', value: 200 })).toBe('420200c8');
            expect(wire({ type: 'Counter32', value: 4294967295 })).toBe('410500ffffffff');
            expect(wire({ type: 'TimeTicks', value: 100 })).toBe('430164');
        });

        it('shares the wire tag between Gauge32 and Unsigned32', () => {
            expect(wire({ type: 'Unsigned32', value: 200 })).toBe(wire({ type: 'Gauge32', value: 200 }));
        });

        it('writes strings, addresses and OIDs', () => {
            expect(wire(convertToOctetString('Test'))).toBe('040454657374');
            expect(wire(convertToIpAddress('192.0.2.1'))).toBe('4004c0000201');
            expect(wire({ type: 'ObjectIdentifier', value: [1, 3, 6, 1] })).toBe('06032b0601');
            expect(wire({ type: 'Counter64', value: 1n })).toBe('460101');
        });

        it('writes null and its exceptions', () => {
            expect(wire({ type: 'Null', value: null })).toBe('0500');
            expect(wire({ type: 'Null', value: null, exception: 'noSuchObject' })).toBe('8000');
            expect(wire({ type: 'Null', value: null, exception: 'endOfMibView' })).toBe('8200');
        });

        it('refuses a hand-built value outside its type', () => {
            expect(() => ValueCodec.toWire({ type: 'Counter32', value: -5 })).toThrow(ValueRangeError);
        });
    });

    describe('decode', () => {
        it.each([
            ValueCodec.encode('Integer32', -2147483648),
            ValueCodec.encode('Counter32', 4294967295),
            ValueCodec.encode('Counter64', 18446744073709551615n),
            ValueCodec.encode('Unsigned32', 0),
            ValueCodec.encode('TimeTicks', 123456),
            ValueCodec.encode('IpAddress', '203.0.113.7'),
            ValueCodec.encode('ObjectIdentifier', '.1.3.6.1.4.1.99999.1'),
        ])('reads back $type $value', (value) => {
            expect(ValueCodec.decode(ValueCodec.toWire(value), value.type)).toEqual(value);
        });

        it('infers the type from the tag when none is given', () => {
            expect(ValueCodec.decode(Buffer.from('020101', 'hex'))).toEqual({ type: 'Integer', value: 1 });
            expect(ValueCodec.decode(Buffer.from('4201c8', 'hex'))).toEqual({ type: 'Gauge32', value: 200 });
            expect(ValueCodec.decode(Buffer.from('4201c8', 'hex'), 'Unsigned32')).toEqual({ type: 'Unsigned32', value: 200 });
        });

        it('keeps the exception of a v2c "no value" marker', () => {
            expect(ValueCodec.decode(Buffer.from('8100', 'hex'))).toEqual({
                type: 'Null',
                value: null,
                exception: 'noSuchInstance',
            });
            expect(ValueCodec.decode(Buffer.from('0500', 'hex'))).toEqual({ type: 'Null', value: null });
        });

        it('rejects a tag that does not match the expected type', () => {
            expect(() => ValueCodec.decode(Buffer.from('020101', 'hex'), 'Counter32')).toThrow(ValueFormatError);
        });

        it('rejects malformed values', () => {
            expect(() => ValueCodec.decode(Buffer.from('4003010203', 'hex'))).toThrow(ValueFormatError);
            expect(() => ValueCodec.decode(Buffer.from('02010100', 'hex'))).toThrow(ValueFormatError);
            expect(() => ValueCodec.decode(Buffer.from('470100', 'hex'))).toThrow(ValueFormatError);
        });
    });

    it('describes values for log lines', () => {
        expect(ValueCodec.describe({ type: 'Gauge32', value: 200 })).toBe('Gauge32(200)');
        expect(ValueCodec.describe(convertToOctetString('hi'))).toBe('OctetString(0x6869)');
        expect(ValueCodec.describe({ type: 'Null', value: null, exception: 'noSuchObject' })).toBe('noSuchObject');
    });

    it('tells typed values from raw input', () => {
        expect(isSnmpValue({ type: 'Gauge32', value: 1 })).toBe(true);
        expect(isSnmpValue('Test')).toBe(false);
        expect(isSnmpValue(Buffer.from('Test'))).toBe(false);
        expect(isSnmpValue([1, 3, 6])).toBe(false);
    });
});
