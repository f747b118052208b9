import type { CloseReason } from "../Message.js";
import ProtocolError from "../ProtocolError.js";
import { isValidCloseCode } from "./CloseCode.js";
import decodeUtf8 from "./decodeUtf8.js";

const CLOSE_FRAME_CODE_SIZE = 2;
export const MAX_CLOSE_DESCRIPTION_SIZE = 125 - CLOSE_FRAME_CODE_SIZE;

/**
 * Decodes the body of a received Close frame. An empty body means the peer
 * gave no status code.
 */
export function parseClosePayload(payload:Buffer):CloseReason|null{

    if(payload.byteLength === 0){
        return null;
    }
    if(payload.byteLength === 1){
        throw new ProtocolError({type:"InvalidClosePayload"});
    }

    const code = payload.readUInt16BE(0);
    if(!isValidCloseCode(code)){
        throw new ProtocolError({type:"InvalidClosePayload"});
    }
    if(payload.byteLength === CLOSE_FRAME_CODE_SIZE){
        return {code};
    }

    const description = decodeUtf8(payload.subarray(CLOSE_FRAME_CODE_SIZE));
    return {code, description};
}

export function createClosePayload(reason?:CloseReason|null){

    if(reason == null){
        return Buffer.alloc(0);
    }

    const description = reason.description ?? "";
    const descriptionLength = Buffer.byteLength(description);
    const payload = Buffer.allocUnsafe(CLOSE_FRAME_CODE_SIZE + descriptionLength);
    payload.writeUInt16BE(reason.code, 0);
    payload.write(description, CLOSE_FRAME_CODE_SIZE, "utf8");

    return payload;
}

/**
 * Cuts a description down to what fits in a Close frame without splitting a
 * UTF-8 sequence.
 */
export function truncateDescription(description:string){

    const encoded = Buffer.from(description, "utf8");
    if(encoded.byteLength <= MAX_CLOSE_DESCRIPTION_SIZE){
        return description;
    }

    let end = MAX_CLOSE_DESCRIPTION_SIZE;
    //step back over continuation bytes (10xxxxxx)
    while(end > 0 && (encoded[end] & 0b11000000) === 0b10000000){
        end--;
    }
    return encoded.toString("utf8", 0, end);
}
