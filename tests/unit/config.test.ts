import { describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config.js";

describe("loadConfig", () => {
    it("falls back to defaults", () => {
        expect(loadConfig({})).toEqual({
            port:8081,
            path:"/",
            maxConnections:undefined,
            maxFrameSize:1024**2,
            maxMessageSize:1024**2*10,
            closeTimeout:1000,
            logLevel:"info",
        });
    });

    it("reads every variable", () => {
        const config = loadConfig({
            PORT:"9000",
            WS_PATH:"/chat",
            WS_MAX_CONNECTIONS:"50",
            WS_MAX_FRAME_SIZE:"4096",
            WS_MAX_MESSAGE_SIZE:"65536",
            WS_CLOSE_TIMEOUT:"250",
            WS_LOG_LEVEL:"DEBUG",
        });

        expect(config).toEqual({
            port:9000,
            path:"/chat",
            maxConnections:50,
            maxFrameSize:4096,
            maxMessageSize:65536,
            closeTimeout:250,
            logLevel:"debug",
        });
    });

    it("treats blank values as unset", () => {
        expect(loadConfig({PORT:" ", WS_MAX_CONNECTIONS:""}).port).toBe(8081);
        expect(loadConfig({WS_MAX_CONNECTIONS:""}).maxConnections).toBeUndefined();
    });

    it("names the variable that is out of range", () => {
        expect(() => loadConfig({PORT:"70000"})).toThrow('PORT must be an integer between 0 and 65535, got "70000"');
        expect(() => loadConfig({WS_MAX_FRAME_SIZE:"100"})).toThrow(/^WS_MAX_FRAME_SIZE must be an integer between 125 and/);
        expect(() => loadConfig({WS_CLOSE_TIMEOUT:"1.5"})).toThrow(RangeError);
        expect(() => loadConfig({WS_MAX_CONNECTIONS:"0"})).toThrow(RangeError);
    });

    it("rejects a relative path and an unknown log level", () => {
        expect(() => loadConfig({WS_PATH:"chat"})).toThrow('WS_PATH must start with "/", got "chat"');
        expect(() => loadConfig({WS_LOG_LEVEL:"loud"})).toThrow(RangeError);
    });
});
