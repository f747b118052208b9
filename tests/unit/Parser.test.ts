import { describe, expect, it } from "vitest";
import type { ParserOptions } from "../../src/Parser.js";
import { encodeFrame, parseFrame } from "../../src/Parser.js";
import ProtocolError from "../../src/ProtocolError.js";
import type { ProtocolErrorDetail } from "../../src/ProtocolError.js";
import createFrame from "../../src/utils/createFrame.js";
import Opcode from "../../src/utils/Opcode.js";

const key = Buffer.from([0x01, 0x02, 0x03, 0x04]);

function parseError(bytes:number[], options?:ParserOptions):ProtocolErrorDetail{
    try{
        parseFrame(Buffer.from(bytes), options);
    }catch(error){
        if(error instanceof ProtocolError){
            return error.detail;
        }
        throw error;
    }
    throw new Error("expected a protocol error");
}

describe("encodeFrame", () => {
    it("writes a short unmasked frame", () => {
        const bytes = encodeFrame(createFrame({opcode:Opcode.TEXT, payload:Buffer.from("hi")}));
        expect([...bytes]).toEqual([0x81, 0x02, 0x68, 0x69]);
    });

    it("writes the key and masks the payload without touching the input", () => {
        const payload = Buffer.from("hi");
        const bytes = encodeFrame(createFrame({opcode:Opcode.TEXT, maskingKey:key, payload}));

        expect([...bytes]).toEqual([0x81, 0x82, 0x01, 0x02, 0x03, 0x04, 0x69, 0x6b]);
        expect(payload.toString()).toBe("hi");
    });

    it("clears the fin bit on non-final fragments", () => {
        const bytes = encodeFrame(createFrame({isFinished:false, opcode:Opcode.BINARY}));
        expect([...bytes]).toEqual([0x02, 0x00]);
    });

    it("switches to 16-bit and 64-bit lengths past 125 and 65535 bytes", () => {
        const medium = encodeFrame(createFrame({opcode:Opcode.BINARY, payload:Buffer.alloc(126)}));
        expect([...medium.subarray(0, 4)]).toEqual([0x82, 126, 0x00, 126]);
        expect(medium.byteLength).toBe(4 + 126);

        const large = encodeFrame(createFrame({opcode:Opcode.BINARY, payload:Buffer.alloc(65536)}));
        expect([...large.subarray(0, 10)]).toEqual([0x82, 127, 0, 0, 0, 0, 0, 1, 0, 0]);
        expect(large.byteLength).toBe(10 + 65536);
    });
});

describe("parseFrame", () => {
    it("decodes what encodeFrame writes for every length class", () => {
        const lengths = [0, 5, 125, 126, 300, 65535, 65536, 70000];
        const shapes:Array<[Opcode, boolean]> = [
            [Opcode.TEXT, true],
            [Opcode.BINARY, false],
            [Opcode.CONTINUATION, true],
        ];

        for(const length of lengths){
            for(const [opcode, isFinished] of shapes){
                const payload = Buffer.alloc(length, length & 0xff);
                const frame = createFrame({isFinished, opcode, maskingKey:key, payload});
                const result = parseFrame(encodeFrame(frame));

                expect(result.status).toBe("complete");
                if(result.status === "complete"){
                    expect(result.frame.isFinished).toBe(isFinished);
                    expect(result.frame.opcode).toBe(opcode);
                    expect(result.frame.maskingKey?.equals(key)).toBe(true);
                    expect(result.frame.payload.equals(payload)).toBe(true);
                }
            }
        }
    });

    it("decodes unmasked frames on the client side", () => {
        const result = parseFrame(Buffer.from([0x8a, 0x01, 0x7a]), {mustBeMasked:false});
        expect(result).toEqual({
            status:"complete",
            frame:{isFinished:true, opcode:Opcode.PONG, maskingKey:null, payload:Buffer.from("z")},
            consumed:3,
        });
    });

    it("reports how many bytes it needs before a frame is complete", () => {
        expect(parseFrame(Buffer.alloc(0))).toEqual({status:"incomplete", needed:2});
        expect(parseFrame(Buffer.from([0x81]))).toEqual({status:"incomplete", needed:2});
        expect(parseFrame(Buffer.from([0x81, 0x85]))).toEqual({status:"incomplete", needed:6});
        expect(parseFrame(Buffer.from([0x81, 0x85, 1, 2, 3, 4, 0]))).toEqual({status:"incomplete", needed:11});
        expect(parseFrame(Buffer.from([0x82, 0x80 | 126, 0x01]))).toEqual({status:"incomplete", needed:4});
        expect(parseFrame(Buffer.from([0x82, 0x80 | 126, 0x01, 0x00]))).toEqual({status:"incomplete", needed:8});
        expect(parseFrame(Buffer.from([0x82, 0x80 | 127, 0, 0]))).toEqual({status:"incomplete", needed:10});
    });

    it("consumes only the first of several buffered frames", () => {
        const first = encodeFrame(createFrame({opcode:Opcode.TEXT, maskingKey:key, payload:Buffer.from("one")}));
        const second = encodeFrame(createFrame({opcode:Opcode.TEXT, maskingKey:key, payload:Buffer.from("two")}));
        const buffer = Buffer.concat([first, second]);

        const result = parseFrame(buffer);
        expect(result.status === "complete" && result.consumed).toBe(first.byteLength);
        expect(result.status === "complete" && result.frame.payload.toString()).toBe("one");

        const next = parseFrame(buffer.subarray(first.byteLength));
        expect(next.status === "complete" && next.frame.payload.toString()).toBe("two");
    });

    it("rejects reserved bits", () => {
        expect(parseError([0xc1, 0x80])).toEqual({type:"ReservedBits", bits:4});
        expect(parseError([0x91, 0x80])).toEqual({type:"ReservedBits", bits:1});
    });

    it("rejects reserved opcodes", () => {
        expect(parseError([0x83, 0x80])).toEqual({type:"InvalidOpcode", opcode:3});
        expect(parseError([0x87, 0x80])).toEqual({type:"InvalidOpcode", opcode:7});
        expect(parseError([0x8b, 0x80])).toEqual({type:"InvalidOpcode", opcode:11});
        expect(parseError([0x8f, 0x80])).toEqual({type:"InvalidOpcode", opcode:15});
    });

    it("rejects fragmented control frames", () => {
        expect(parseError([0x09, 0x80])).toEqual({type:"InvalidLength", length:0});
    });

    it("rejects control frames longer than 125 bytes", () => {
        expect(parseError([0x89, 0x80 | 126, 0x00, 126])).toEqual({type:"InvalidLength", length:126});
        expect(parseError([0x88, 0x80 | 126])).toEqual({type:"InvalidLength", length:126});
        expect(parseError([0x8a, 0x80 | 127])).toEqual({type:"InvalidLength", length:127});
    });

    it("enforces the masking direction", () => {
        expect(parseError([0x81, 0x00])).toEqual({type:"UnmaskedFrame"});
        expect(parseError([0x81, 0x80], {mustBeMasked:false})).toEqual({type:"MaskedFrame"});
    });

    it("rejects 64-bit lengths with the high bit set", () => {
        const detail = parseError([0x82, 0x80 | 127, 0x80, 0, 0, 0, 0, 0, 0, 0]);
        expect(detail).toEqual({type:"InvalidLength", length:1n << 63n});
    });

    it("rejects oversized frames before their payload arrives", () => {
        expect(parseError([0x82, 0x80 | 126, 0x01, 0x00], {maxFrameSize:200})).toEqual({type:"Overflow"});
        expect(parseError([0x82, 0x80 | 127, 0, 0, 0, 1, 0, 0, 0, 0])).toEqual({type:"Overflow"});
    });

    it("maps errors to close codes", () => {
        try{
            parseFrame(Buffer.from([0x82, 0x80 | 127, 0, 0, 0, 1, 0, 0, 0, 0]));
        }catch(error){
            expect(error).toBeInstanceOf(ProtocolError);
            expect(error instanceof ProtocolError && error.code).toBe(1009);
        }
        try{
            parseFrame(Buffer.from([0x81, 0x00]));
        }catch(error){
            expect(error instanceof ProtocolError && error.code).toBe(1002);
            expect(error instanceof ProtocolError && error.reason).toBe("Received an unmasked frame from client");
        }
        expect.assertions(4);
    });
});
