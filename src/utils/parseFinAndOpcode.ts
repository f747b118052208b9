function parseFinAndOpcode(byte:number){

    const isFinished = (byte & 0b10000000) === 128;
    const rsv = (byte & 0b01110000) >> 4;
    const opcode = byte & 0b00001111;

    return {isFinished, rsv, opcode};
}

export default parseFinAndOpcode;
