import { describe, expect, it } from "vitest";
import ProtocolError from "../../src/ProtocolError.js";
import { classifyCloseCode, CloseCode, isReservedCode, isValidCloseCode } from "../../src/utils/CloseCode.js";
import { createClosePayload, parseClosePayload, truncateDescription } from "../../src/utils/closePayload.js";

describe("close codes", () => {
    it("names the codes in the table", () => {
        expect(classifyCloseCode(1000)).toBe("NORMAL");
        expect(classifyCloseCode(1009)).toBe("MESSAGE_TOO_BIG");
        expect(classifyCloseCode(1014)).toBe("BAD_GATEWAY");
        expect(CloseCode.MANDATORY_EXTENSION).toBe(1010);
    });

    it("separates unassigned codes from application codes", () => {
        expect(classifyCloseCode(999)).toBe("RESERVED");
        expect(classifyCloseCode(1004)).toBe("RESERVED");
        expect(classifyCloseCode(2500)).toBe("RESERVED");
        expect(classifyCloseCode(3000)).toBe("OTHER");
        expect(classifyCloseCode(4999)).toBe("OTHER");
        expect(classifyCloseCode(5000)).toBe("RESERVED");
    });

    it("refuses codes that must not appear on the wire", () => {
        expect(isReservedCode(1005)).toBe(true);
        expect(isReservedCode(1006)).toBe(true);
        expect(isReservedCode(1015)).toBe(true);
        expect(isValidCloseCode(1005)).toBe(false);
        expect(isValidCloseCode(1000)).toBe(true);
        expect(isValidCloseCode(4000)).toBe(true);
        expect(isValidCloseCode(2000)).toBe(false);
    });
});

describe("close payload", () => {
    it("writes the code big-endian followed by the description", () => {
        expect([...createClosePayload({code:1000, description:"bye"})]).toEqual([0x03, 0xe8, 0x62, 0x79, 0x65]);
        expect([...createClosePayload({code:1001})]).toEqual([0x03, 0xe9]);
        expect(createClosePayload(null).byteLength).toBe(0);
    });

    it("reads what it writes", () => {
        expect(parseClosePayload(createClosePayload({code:4001, description:"gone fishing"})))
            .toEqual({code:4001, description:"gone fishing"});
        expect(parseClosePayload(Buffer.from([0x03, 0xe8]))).toEqual({code:1000});
        expect(parseClosePayload(Buffer.alloc(0))).toBeNull();
    });

    it("rejects a lone byte and reserved codes", () => {
        expect(() => parseClosePayload(Buffer.from([0x03]))).toThrow(ProtocolError);
        expect(() => parseClosePayload(Buffer.from([0x03, 0xed]))).toThrow("Close frame payload is malformed");
    });

    it("rejects a description that is not UTF-8", () => {
        let error:unknown;
        try{
            parseClosePayload(Buffer.from([0x03, 0xe8, 0xc3, 0x28]));
        }catch(caught){
            error = caught;
        }
        expect(error).toBeInstanceOf(ProtocolError);
        expect(error instanceof ProtocolError && error.code).toBe(CloseCode.INVALID_PAYLOAD);
    });

    it("truncates descriptions on a character boundary", () => {
        expect(truncateDescription("short")).toBe("short");
        //"é" is two bytes; 62 of them are 124 bytes, one too many
        const truncated = truncateDescription("é".repeat(62));
        expect(truncated).toBe("é".repeat(61));
        expect(Buffer.byteLength(truncated)).toBe(122);
    });
});
