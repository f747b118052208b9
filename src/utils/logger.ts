export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVELS:Record<LogLevel, number> = {
    debug:0,
    info:1,
    warn:2,
    error:3,
    silent:4,
};

export function isLogLevel(value:string):value is LogLevel {
    return Object.hasOwn(LEVELS, value);
}

function initialLevel():LogLevel {
    const fromEnv = process.env.WS_LOG_LEVEL?.toLowerCase();
    return fromEnv !== undefined && isLogLevel(fromEnv) ? fromEnv : "info";
}

let currentLevel:LogLevel = initialLevel();

export function setLogLevel(level:LogLevel){
    currentLevel = level;
}

export function getLogLevel(){
    return currentLevel;
}

export type Logger = {
    debug(...args:unknown[]):void;
    info(...args:unknown[]):void;
    warn(...args:unknown[]):void;
    error(...args:unknown[]):void;
}

/**
 * Console logger with the "[LEVEL] [scope]" prefix used throughout the
 * package. The level is process-wide.
 */
export function createLogger(scope:string):Logger {

    const write = (level:Exclude<LogLevel, "silent">, sink:(...args:unknown[]) => void) =>
        (...args:unknown[]) => {
            if(LEVELS[level] < LEVELS[currentLevel]){
                return;
            }
            sink(`[${level.toUpperCase()}]`, `[${scope}]`, ...args);
        };

    return {
        debug:write("debug", (...args) => console.debug(...args)),
        info:write("info", (...args) => console.log(...args)),
        warn:write("warn", (...args) => console.warn(...args)),
        error:write("error", (...args) => console.error(...args)),
    };
}
