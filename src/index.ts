/**
 * snmp-commander
 * ==========================================
 * Promise-based SNMP GET/SET client for Node.js.
 *
 * Community-based SNMP (v1 / v2c) over UDP, with symbolic OIDs resolved through
 * pre-compiled MIB modules and strictly typed SNMP values.
 *
 * @packageDocumentation
 */

// ===============================================
// 1. MAIN CLIENT (Primary Entry Point)
// ===============================================

/**
 * The main client class.
 * Configure a host and community, then call `get()`, `set()` or a typed `set*()`.
 */
export { SnmpClient } from './client/SnmpClient';
export type { SnmpClientOptions } from './client/SnmpClient';

/**
 * Connection parameters and MIB context, owned by each client.
 */
export { SnmpSession, DEFAULT_PORT, DEFAULT_COMMUNITY, DEFAULT_TIMEOUT, DEFAULT_RETRIES } from './client/SnmpSession';
export type { SnmpSessionOptions, SessionTarget } from './client/SnmpSession';

/**
 * OID expression parsing and resolution.
 */
export { OidResolver, parseOid } from './client/OidResolver';
export type { ParsedOid } from './client/OidResolver';

export { formatValue, isPrintable } from './client/ValueFormatter';

// ===============================================
// 2. VALUES
// ===============================================

export {
    ValueCodec,
    SNMP_TYPES,
    isSnmpType,
    isSnmpValue,
    isNullValue,
    convertToOctetString,
    convertToInteger,
    convertToInteger32,
    convertToCounter32,
    convertToCounter64,
    convertToGauge32,
    convertToUnsigned32,
    convertToTimeTicks,
    convertToIpAddress,
    convertToObjectIdentifier,
    convertToOpaque,
} from './core/ValueCodec';
export type { SnmpType, SnmpValue, SnmpValueOf, SnmpValueMap, NullValue, NullException, RawValue } from './core/ValueCodec';

// ===============================================
// 3. MIBS
// ===============================================

export { MibStore, BUNDLED_MIB_DIR } from './features/MibStore';
export type { MibLookupService, MibSymbol, MibModule } from './features/MibStore';

// ===============================================
// 4. ERRORS
// ===============================================

export {
    SnmpError,
    NotConfiguredError,
    PathNotFoundError,
    UnknownSymbolError,
    ValueRangeError,
    ValueFormatError,
    TransportError,
    MessageDecodeError,
    AgentError,
    ObjectNotFoundError,
} from './core/SnmpError';
export type { SnmpErrorKind } from './core/SnmpError';
export { ErrorStatus, errorStatusName } from './core/ErrorStatus';

// ===============================================
// 5. LOW-LEVEL COMPONENTS
// ===============================================

export { UdpClient } from './core/UdpClient';
export type { SnmpTransport, TransportTarget } from './core/UdpClient';
export { SnmpMessage } from './core/SnmpMessage';
export type { Pdu, PduType, VarBind, SnmpMessageFields } from './core/SnmpMessage';
export { BerProtocol, BerTag } from './core/BerProtocol';
export type { Tlv } from './core/BerProtocol';

export * from './utils/Helpers';
export type { Logger, ObjectIdentifier, OidSegment, SnmpVersion } from './types';
