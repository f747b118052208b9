import { CloseCode } from "./utils/CloseCode.js";
import Opcode from "./utils/Opcode.js";

export type ProtocolErrorDetail =
| { type:"UnmaskedFrame" }
| { type:"MaskedFrame" }
| { type:"InvalidOpcode"; opcode:number }
| { type:"InvalidLength"; length:number|bigint }
| { type:"ReservedBits"; bits:number }
| { type:"BadOpCode" }
| { type:"Overflow" }
| { type:"ContinuationNotStarted" }
| { type:"ContinuationStarted" }
| { type:"ContinuationFragment"; opcode:Opcode }
| { type:"InvalidPayload" }
| { type:"InvalidClosePayload" }
| { type:"Io"; cause:Error }

function describe(detail:ProtocolErrorDetail){
    switch(detail.type){
        case "UnmaskedFrame":
            return "Received an unmasked frame from client";
        case "MaskedFrame":
            return "Received a masked frame from server";
        case "InvalidOpcode":
            return `Invalid opcode: ${detail.opcode}`;
        case "InvalidLength":
            return `Invalid frame length: ${detail.length}`;
        case "ReservedBits":
            return `Reserved bits must be zero, got ${detail.bits}`;
        case "BadOpCode":
            return "Bad opcode";
        case "Overflow":
            return "A payload reached size limit";
        case "ContinuationNotStarted":
            return "Continuation is not started";
        case "ContinuationStarted":
            return "Received new continuation but it is already started";
        case "ContinuationFragment":
            return `Unknown continuation fragment: ${Opcode[detail.opcode]}`;
        case "InvalidPayload":
            return "Payload is not valid UTF-8";
        case "InvalidClosePayload":
            return "Close frame payload is malformed";
        case "Io":
            return `I/O error: ${detail.cause.message}`;
    }
}

function closeCodeFor(detail:ProtocolErrorDetail){
    switch(detail.type){
        case "Overflow":
            return CloseCode.MESSAGE_TOO_BIG;
        case "InvalidPayload":
            return CloseCode.INVALID_PAYLOAD;
        case "Io":
            return CloseCode.ABNORMAL_CLOSURE;
        default:
            return CloseCode.PROTOCOL_ERROR;
    }
}

/**
 * A violation of the framing protocol by the peer, or a failure of the
 * transport underneath it. Fatal to the connection.
 */
class ProtocolError extends Error{

    readonly detail:ProtocolErrorDetail;
    //close code sent to the peer before the connection is torn down
    readonly code:CloseCode;

    constructor(detail:ProtocolErrorDetail){
        super(describe(detail), detail.type === "Io" ? {cause:detail.cause} : undefined);
        this.name = "ProtocolError";
        this.detail = detail;
        this.code = closeCodeFor(detail);
    }

    get reason(){
        return this.message;
    }

    static io(cause:Error){
        return new ProtocolError({type:"Io", cause});
    }
}

export default ProtocolError;
