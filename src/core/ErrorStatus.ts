/**
 * core/ErrorStatus.ts
 *
 * The authoritative dictionary for SNMP PDU error-status values (RFC 3416).
 * Maps the numeric codes found in a Response PDU to their protocol names
 * and to human-readable descriptions.
 */

export enum ErrorStatus {
    // --- SNMPv1 ---
    NO_ERROR = 0,
    TOO_BIG = 1,                // Response would not fit in a single message
    NO_SUCH_NAME = 2,           // v1 agents: OID not served
    BAD_VALUE = 3,              // v1 agents: value rejected on SET
    READ_ONLY = 4,
    GEN_ERR = 5,

    // --- SNMPv2 (SET failures) ---
    NO_ACCESS = 6,
    WRONG_TYPE = 7,             // Value tag does not match the object's syntax
    WRONG_LENGTH = 8,
    WRONG_ENCODING = 9,
    WRONG_VALUE = 10,           // Value outside the object's range
    NO_CREATION = 11,
    INCONSISTENT_VALUE = 12,
    RESOURCE_UNAVAILABLE = 13,
    COMMIT_FAILED = 14,
    UNDO_FAILED = 15,
    AUTHORIZATION_ERROR = 16,
    NOT_WRITABLE = 17,          // Object exists but is read-only
    INCONSISTENT_NAME = 18,
}

/**
 * Protocol names, as an agent's documentation and most tools print them.
 */
export const ErrorStatusNames: Record<number, string> = {
    0: 'noError',
    1: 'tooBig',
    2: 'noSuchName',
    3: 'badValue',
    4: 'readOnly',
    5: 'genErr',
    6: 'noAccess',
    7: 'wrongType',
    8: 'wrongLength',
    9: 'wrongEncoding',
    10: 'wrongValue',
    11: 'noCreation',
    12: 'inconsistentValue',
    13: 'resourceUnavailable',
    14: 'commitFailed',
    15: 'undoFailed',
    16: 'authorizationError',
    17: 'notWritable',
    18: 'inconsistentName',
};

export const ErrorStatusMessages: Record<number, string> = {
    1: 'The response would exceed the maximum message size.',
    2: 'The agent does not implement the requested object.',
    3: 'The value is not valid for this object.',
    4: 'The object cannot be modified.',
    5: 'The agent failed for a reason not covered by another status.',
    6: 'The object is not accessible with this community.',
    7: 'The value type does not match the object syntax.',
    8: 'The value length is not valid for this object.',
    9: 'The value encoding is inconsistent with the object syntax.',
    10: 'The value is outside the range this object accepts.',
    11: 'The object does not exist and cannot be created.',
    12: 'The value is inconsistent with the state of other objects.',
    13: 'The agent lacks the resources to perform the assignment.',
    16: 'The community is not authorized for this operation.',
    17: 'The object is not writable.',
};

/**
 * Resolves a numeric status to its protocol name.
 * Unknown codes print as `errorStatus(<n>)`.
 */
export function errorStatusName(status: number): string {
    return ErrorStatusNames[status] ?? `errorStatus(${status})`;
}
