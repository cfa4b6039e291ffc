import { Buffer } from 'buffer';
import { SnmpValue } from '../core/ValueCodec';
import { oidToString } from '../utils/Helpers';

/**
 * ValueFormatter.ts
 * Renders SNMP values the way a person reads them in a log or a test report.
 * - OctetStrings become text when they are printable UTF-8, hex (`0x...`) otherwise.
 * - Numbers, counters and ticks print in decimal.
 * - OIDs print dotted, without a leading dot.
 */

// Control characters other than tab, LF and CR mark binary content.
const CONTROL_CHARS = /[\x00-\x08\x0b\x0c\x0e-\x1f\x7f]/;

/**
 * True when the bytes survive a UTF-8 round trip and hold no control characters.
 */
export function isPrintable(bytes: Buffer): boolean {
    const text = bytes.toString('utf8');
    return Buffer.from(text, 'utf8').equals(bytes) && !CONTROL_CHARS.test(text);
}

export function formatValue(value: SnmpValue): string {
    switch (value.type) {
        case 'OctetString':
            return isPrintable(value.value) ? value.value.toString('utf8') : `0x${value.value.toString('hex')}`;
        case 'Opaque':
            return `0x${value.value.toString('hex')}`;
        case 'ObjectIdentifier':
            return oidToString(value.value);
        case 'IpAddress':
            return value.value;
        case 'Null':
            return value.exception ?? 'null';
        default:
            return value.value.toString();
    }
}
