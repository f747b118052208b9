import { constants } from "buffer";
import { DEFAULT_MAX_MESSAGE_SIZE } from "./ContinuationAssembler.js";
import { DEFAULT_MAX_FRAME_SIZE, MAX_CONTROL_FRAME_PAYLOAD_SIZE } from "./Parser.js";
import { isLogLevel } from "./utils/logger.js";
import type { LogLevel } from "./utils/logger.js";

export type ServerConfig = {
    port:number;
    path:string;
    maxConnections:number|undefined;
    maxFrameSize:number;
    maxMessageSize:number;
    closeTimeout:number;
    logLevel:LogLevel;
};

type Env = {[k:string]:string|undefined};

function readInteger(env:Env, name:string, fallback:number, min:number, max:number){
    const raw = env[name]?.trim();
    if(raw === undefined || raw === ""){
        return fallback;
    }
    const value = Number(raw);
    if(!Number.isInteger(value) || value < min || value > max){
        throw new RangeError(`${name} must be an integer between ${min} and ${max}, got "${raw}"`);
    }
    return value;
}

/**
 * Reads the demo server's settings from environment variables.
 */
export function loadConfig(env:Env = process.env):ServerConfig {

    const path = env.WS_PATH?.trim() || "/";
    if(!path.startsWith("/")){
        throw new RangeError(`WS_PATH must start with "/", got "${path}"`);
    }

    const logLevel = env.WS_LOG_LEVEL?.trim().toLowerCase() || "info";
    if(!isLogLevel(logLevel)){
        throw new RangeError(`WS_LOG_LEVEL must be one of debug, info, warn, error, silent, got "${logLevel}"`);
    }

    const maxConnections = env.WS_MAX_CONNECTIONS?.trim()
        ? readInteger(env, "WS_MAX_CONNECTIONS", 0, 1, Number.MAX_SAFE_INTEGER)
        : undefined;

    return {
        port:readInteger(env, "PORT", 8081, 0, 65535),
        path,
        maxConnections,
        maxFrameSize:readInteger(env, "WS_MAX_FRAME_SIZE", DEFAULT_MAX_FRAME_SIZE, MAX_CONTROL_FRAME_PAYLOAD_SIZE, constants.MAX_LENGTH),
        maxMessageSize:readInteger(env, "WS_MAX_MESSAGE_SIZE", DEFAULT_MAX_MESSAGE_SIZE, MAX_CONTROL_FRAME_PAYLOAD_SIZE, constants.MAX_LENGTH),
        closeTimeout:readInteger(env, "WS_CLOSE_TIMEOUT", 1000, 0, 2**31 - 1),
        logLevel,
    };
}
