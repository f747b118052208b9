import type { Frame } from "../Frame.js";
import type Opcode from "./Opcode.js";

type CreateFrameOptions = {
    isFinished?:boolean;
    opcode:Opcode;
    maskingKey?:Buffer|null;
    payload?:Buffer;
}

function createFrame({isFinished = true, opcode, maskingKey = null, payload = Buffer.alloc(0)}:CreateFrameOptions):Frame{
    const frame:Frame = {
        isFinished,
        opcode,
        maskingKey,
        payload
    };
    return frame;
}

export default createFrame;
