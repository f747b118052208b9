import { describe, expect, it } from "vitest";
import applyMask from "../../src/utils/applyMask.js";

describe("applyMask", () => {
    it("xors each byte with the key byte at index mod 4", () => {
        const key = Buffer.from([0x01, 0x02, 0x03, 0x04]);
        const payload = Buffer.from([0x10, 0x10, 0x10, 0x10, 0x10, 0xff]);

        applyMask(key, payload);

        expect([...payload]).toEqual([0x11, 0x12, 0x13, 0x14, 0x11, 0xfd]);
    });

    it("restores the payload when applied twice with the same key", () => {
        const keys = [
            Buffer.from([0, 0, 0, 0]),
            Buffer.from([0xff, 0xff, 0xff, 0xff]),
            Buffer.from([0x37, 0xfa, 0x21, 0x3d]),
        ];
        const payloads = [
            Buffer.alloc(0),
            Buffer.from("a"),
            Buffer.from("masking is its own inverse"),
            Buffer.from(Array.from({length:1031}, (_, i) => (i * 7) & 0xff)),
        ];

        for(const key of keys){
            for(const original of payloads){
                const payload = Buffer.from(original);
                applyMask(key, payload);
                applyMask(key, payload);
                expect(payload.equals(original)).toBe(true);
            }
        }
    });

    it("leaves an empty payload untouched", () => {
        const payload = Buffer.alloc(0);
        applyMask(Buffer.from([1, 2, 3, 4]), payload);
        expect(payload.byteLength).toBe(0);
    });
});
