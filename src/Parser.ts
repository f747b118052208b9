import { constants } from "buffer";
import type { Frame } from "./Frame.js";
import ProtocolError from "./ProtocolError.js";
import applyMask from "./utils/applyMask.js";
import Opcode, { isOpcode } from "./utils/Opcode.js";
import parseFinAndOpcode from "./utils/parseFinAndOpcode.js";

export const MAX_CONTROL_FRAME_PAYLOAD_SIZE = 125;
export const DEFAULT_MAX_FRAME_SIZE = 1024**2;

const MASKING_KEY_SIZE = 4;
const MAX_16_BIT_LENGTH = 65535;
const HIGH_BIT_64 = 1n << 63n;

const CONTROL_OPCODES:readonly number[] = [Opcode.CLOSE, Opcode.PING, Opcode.PONG];

/**
 * Throws a RangeError unless `size` is a usable frame or message limit: at
 * least a full control frame, at most the largest Buffer.
 */
export function checkSizeLimit(name:string, size:number){
    if(!Number.isInteger(size) || size < MAX_CONTROL_FRAME_PAYLOAD_SIZE || size > constants.MAX_LENGTH){
        throw new RangeError(`${name} must be between ${MAX_CONTROL_FRAME_PAYLOAD_SIZE} and ${constants.MAX_LENGTH} bytes`);
    }
}

function isControlOpcode(opcode:Opcode){
    return CONTROL_OPCODES.includes(opcode);
}

//second header byte: mask bit and the 7-bit length, 126/127 announce 2/8 more length bytes
function readLengthByte(byte:number){
    const isMasked = (byte & 0b10000000) !== 0;
    const payloadLength = byte & 0b01111111;
    const extendedLengthSize = payloadLength === 127 ? 8 : payloadLength === 126 ? 2 : 0;
    return {isMasked, payloadLength, extendedLengthSize};
}

export type ParserOptions = {
    //true on the server side: every frame a client sends is masked
    mustBeMasked?:boolean;
    maxFrameSize?:number;
}

export type ParseResult =
| { status:"complete"; frame:Frame; consumed:number }
| { status:"incomplete"; needed:number }

/**
 * Parses one frame from the front of `buffer`.
 *
 * Returns `incomplete` with the buffer length worth retrying at when the
 * frame is not fully buffered yet; nothing is consumed in that case. Header
 * fields are validated as soon as they are available, so a hostile length is
 * rejected before its payload arrives.
 */
export function parseFrame(
    buffer:Buffer,
    {mustBeMasked = true, maxFrameSize = DEFAULT_MAX_FRAME_SIZE}:ParserOptions = {}
):ParseResult{

    if(buffer.byteLength < 2){
        return {status:"incomplete", needed:2};
    }

    const {isFinished, rsv, opcode} = parseFinAndOpcode(buffer[0]);
    if(rsv !== 0){
        throw new ProtocolError({type:"ReservedBits", bits:rsv});
    }
    if(!isOpcode(opcode)){
        throw new ProtocolError({type:"InvalidOpcode", opcode});
    }

    const {isMasked, payloadLength, extendedLengthSize} = readLengthByte(buffer[1]);
    const isControl = isControlOpcode(opcode);
    if(isControl && !isFinished){
        throw new ProtocolError({type:"InvalidLength", length:payloadLength});
    }
    if(mustBeMasked && !isMasked){
        throw new ProtocolError({type:"UnmaskedFrame"});
    }
    if(!mustBeMasked && isMasked){
        throw new ProtocolError({type:"MaskedFrame"});
    }
    if(isControl && payloadLength > MAX_CONTROL_FRAME_PAYLOAD_SIZE){
        throw new ProtocolError({type:"InvalidLength", length:payloadLength});
    }

    let offset = 2;
    let length = payloadLength;

    if(extendedLengthSize > 0){
        if(buffer.byteLength < offset + extendedLengthSize){
            return {status:"incomplete", needed:offset + extendedLengthSize};
        }

        if(extendedLengthSize === 2){
            length = buffer.readUInt16BE(offset);
        }else{
            const extendedLength = buffer.readBigUInt64BE(offset);
            if((extendedLength & HIGH_BIT_64) !== 0n){
                throw new ProtocolError({type:"InvalidLength", length:extendedLength});
            }
            if(extendedLength > BigInt(maxFrameSize)){
                throw new ProtocolError({type:"Overflow"});
            }
            length = Number(extendedLength);
        }
        offset += extendedLengthSize;
    }

    if(length > maxFrameSize){
        throw new ProtocolError({type:"Overflow"});
    }

    let maskingKey:Buffer|null = null;
    if(isMasked){
        if(buffer.byteLength < offset + MASKING_KEY_SIZE){
            return {status:"incomplete", needed:offset + MASKING_KEY_SIZE};
        }
        maskingKey = Buffer.from(buffer.subarray(offset, offset + MASKING_KEY_SIZE));
        offset += MASKING_KEY_SIZE;
    }

    if(buffer.byteLength < offset + length){
        return {status:"incomplete", needed:offset + length};
    }

    //copy so the frame does not pin the receive buffer
    const payload = Buffer.from(buffer.subarray(offset, offset + length));
    if(maskingKey !== null){
        applyMask(maskingKey, payload);
    }

    return {
        status:"complete",
        frame:{isFinished, opcode, maskingKey, payload},
        consumed:offset + length
    };
}

/**
 * Serializes a frame. When the frame carries a masking key the payload is
 * masked in the output buffer; `frame.payload` itself is left untouched.
 */
export function encodeFrame({isFinished, opcode, maskingKey, payload}:Frame):Buffer{

    const payloadSize = payload.byteLength;
    let payloadLength = 0;
    let headerSize = 2;
    let offset = 0;

    if(payloadSize > MAX_16_BIT_LENGTH){
        payloadLength = 127;
        headerSize += 8;
    }else if(payloadSize > MAX_CONTROL_FRAME_PAYLOAD_SIZE){
        payloadLength = 126;
        headerSize += 2;
    }else{
        payloadLength = payloadSize;
    }

    if(maskingKey !== null){
        headerSize += MASKING_KEY_SIZE;
    }

    const output = Buffer.alloc(headerSize + payloadSize);

    if(isFinished){
        output[offset] |= 0b10000000;
    }
    output[offset] |= opcode;
    offset += 1;

    if(maskingKey !== null){
        output[offset] |= 0b10000000;
    }
    output[offset] |= payloadLength;
    offset += 1;

    if(payloadLength === 127){
        output.writeBigUInt64BE(BigInt(payloadSize), offset);
        offset += 8;
    }else if(payloadLength === 126){
        output.writeUInt16BE(payloadSize, offset);
        offset += 2;
    }

    if(maskingKey !== null){
        maskingKey.copy(output, offset, 0, MASKING_KEY_SIZE);
        offset += MASKING_KEY_SIZE;
    }

    payload.copy(output, offset);
    if(maskingKey !== null){
        applyMask(maskingKey, output.subarray(offset));
    }

    return output;
}
