enum Opcode {
    CONTINUATION = 0x0,
    TEXT = 0x1,
    BINARY = 0x2,
    CLOSE = 0x8,
    PING = 0x9,
    PONG = 0xA,
}

export type DataOpcode = Opcode.TEXT | Opcode.BINARY;

const KNOWN_OPCODES:readonly number[] = [
    Opcode.CONTINUATION,
    Opcode.TEXT,
    Opcode.BINARY,
    Opcode.CLOSE,
    Opcode.PING,
    Opcode.PONG,
];

//0x3-0x7 are reserved non-control, 0xB-0xF reserved control
export function isOpcode(value:number):value is Opcode {
    return KNOWN_OPCODES.includes(value);
}

export default Opcode;
