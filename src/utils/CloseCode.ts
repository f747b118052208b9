export enum CloseCode {
    NORMAL = 1000,
    GOING_AWAY = 1001,
    PROTOCOL_ERROR = 1002,
    UNSUPPORTED_DATA = 1003,
    NO_STATUS = 1005,
    ABNORMAL_CLOSURE = 1006,
    INVALID_PAYLOAD = 1007,
    POLICY_VIOLATION = 1008,
    MESSAGE_TOO_BIG = 1009,
    MANDATORY_EXTENSION = 1010,
    INTERNAL_ERROR = 1011,
    SERVICE_RESTART = 1012,
    TRY_AGAIN_LATER = 1013,
    BAD_GATEWAY = 1014,
    TLS_HANDSHAKE = 1015,
}

export type CloseCodeName = keyof typeof CloseCode;

//"RESERVED" covers unassigned ranges, "OTHER" the registered/private 3000-4999 space
export type CloseCodeClass = CloseCodeName | "RESERVED" | "OTHER";

//must never be put on the wire by an endpoint
const ReservedCode:readonly number[] = [1004, 1005, 1006, 1015];

const CloseCodeNames = new Map<number, CloseCodeName>([
    [CloseCode.NORMAL, "NORMAL"],
    [CloseCode.GOING_AWAY, "GOING_AWAY"],
    [CloseCode.PROTOCOL_ERROR, "PROTOCOL_ERROR"],
    [CloseCode.UNSUPPORTED_DATA, "UNSUPPORTED_DATA"],
    [CloseCode.NO_STATUS, "NO_STATUS"],
    [CloseCode.ABNORMAL_CLOSURE, "ABNORMAL_CLOSURE"],
    [CloseCode.INVALID_PAYLOAD, "INVALID_PAYLOAD"],
    [CloseCode.POLICY_VIOLATION, "POLICY_VIOLATION"],
    [CloseCode.MESSAGE_TOO_BIG, "MESSAGE_TOO_BIG"],
    [CloseCode.MANDATORY_EXTENSION, "MANDATORY_EXTENSION"],
    [CloseCode.INTERNAL_ERROR, "INTERNAL_ERROR"],
    [CloseCode.SERVICE_RESTART, "SERVICE_RESTART"],
    [CloseCode.TRY_AGAIN_LATER, "TRY_AGAIN_LATER"],
    [CloseCode.BAD_GATEWAY, "BAD_GATEWAY"],
    [CloseCode.TLS_HANDSHAKE, "TLS_HANDSHAKE"],
]);

export function isReservedCode(code:number){
    return ReservedCode.includes(code);
}

export function classifyCloseCode(code:number):CloseCodeClass {
    const name = CloseCodeNames.get(code);
    if(name !== undefined){
        return name;
    }
    if(code >= 3000 && code <= 4999){
        return "OTHER";
    }
    return "RESERVED";
}

/**
 * Whether a peer may send this code in a Close frame.
 */
export function isValidCloseCode(code:number){
    const codeClass = classifyCloseCode(code);
    return codeClass !== "RESERVED" && !isReservedCode(code);
}
