import { describe, it, expect } from 'vitest';
import { Buffer } from 'buffer';
import { SnmpMessage, SnmpMessageFields } from '../src/core/SnmpMessage';
import { MessageDecodeError } from '../src/core/SnmpError';
import { convertToOctetString } from '../src/core/ValueCodec';

const SYS_DESCR = [1, 3, 6, 1, 2, 1, 1, 1, 0];

const GET_SYS_DESCR =
    '3026' + '020101' + '0406' + '7075626c6963' +
    'a019' + '020101' + '020100' + '020100' +
    '300e' + '300c' + '06082b06010201010100' + '0500';

function response(overrides: Partial<SnmpMessageFields['pdu']> = {}): SnmpMessageFields {
    return {
        version: 'v2c',
        community: 'public',
        pdu: {
            type: 'GetResponse',
            requestId: 4242,
            errorStatus: 0,
            errorIndex: 0,
            varbinds: [{ oid: SYS_DESCR, value: convertToOctetString('Test agent') }],
            ...overrides,
        },
    };
}

describe('SnmpMessage', () => {
    it('encodes a v2c GetRequest byte for byte', () => {
        const request = SnmpMessage.request('GetRequest', 'v2c', 'public', 1, [
            { oid: SYS_DESCR, value: { type: 'Null', value: null } },
        ]);
        expect(request.toString('hex')).toBe(GET_SYS_DESCR);
    });

    it('decodes a request it encoded', () => {
        const decoded = SnmpMessage.decode(Buffer.from(GET_SYS_DESCR, 'hex'));
        expect(decoded).toEqual({
            version: 'v2c',
            community: 'public',
            pdu: {
                type: 'GetRequest',
                requestId: 1,
                errorStatus: 0,
                errorIndex: 0,
                varbinds: [{ oid: SYS_DESCR, value: { type: 'Null', value: null } }],
            },
        });
    });

    it('writes version 0 for v1', () => {
        const request = SnmpMessage.request('SetRequest', 'v1', 'private', 7, []);
        expect(SnmpMessage.decode(request)).toMatchObject({ version: 'v1', community: 'private', pdu: { type: 'SetRequest' } });
    });

    it('carries error-status and error-index in responses', () => {
        const decoded = SnmpMessage.decode(SnmpMessage.encode(response({ errorStatus: 17, errorIndex: 1 })));
        expect(decoded.pdu).toMatchObject({ type: 'GetResponse', requestId: 4242, errorStatus: 17, errorIndex: 1 });
        expect(decoded.pdu.varbinds[0].value).toEqual(convertToOctetString('Test agent'));
    });

    it('peeks the request-id without decoding varbinds', () => {
        expect(SnmpMessage.peekRequestId(SnmpMessage.encode(response()))).toBe(4242);
        expect(SnmpMessage.peekRequestId(Buffer.from('3003020101', 'hex'))).toBeNull();
        expect(SnmpMessage.peekRequestId(Buffer.from('ffff', 'hex'))).toBeNull();
    });

    it('rejects unsupported versions', () => {
        const datagram = Buffer.from(GET_SYS_DESCR, 'hex');
        datagram[4] = 3;
        expect(() => SnmpMessage.decode(datagram)).toThrow('Unsupported SNMP version 3');
    });

    it('rejects garbage', () => {
        expect(() => SnmpMessage.decode(Buffer.from('hello'))).toThrow(MessageDecodeError);
        expect(() => SnmpMessage.decode(Buffer.alloc(0))).toThrow(MessageDecodeError);
    });

    it('reports a malformed varbind value as a decode error', () => {
        const datagram = SnmpMessage.encode(response({
            varbinds: [{ oid: SYS_DESCR, value: convertToOctetString('abc') }],
        }));
        // Turn the OCTET STRING into a 3-byte IpAddress
        const at = datagram.indexOf(Buffer.from('0403616263', 'hex'));
        datagram[at] = 0x40;

        expect(() => SnmpMessage.decode(datagram)).toThrow(MessageDecodeError);
    });
});
