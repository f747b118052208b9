import type Opcode from "./utils/Opcode.js";

export type Frame = {
    isFinished:boolean;
    opcode:Opcode;
    //present on every frame a client sends, absent on every frame a server sends
    maskingKey:Buffer|null;
    payload:Buffer;
}
