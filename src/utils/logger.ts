export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVEL_ORDER: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

let threshold: LogLevel = parseLevel(process.env.LOG_LEVEL) ?? "info";

export function parseLevel(raw: string | undefined): LogLevel | undefined {
    if (raw === "error" || raw === "warn" || raw === "info" || raw === "debug") return raw;
    return undefined;
}

export function setLogLevel(level: LogLevel) {
    threshold = level;
}

function write(level: LogLevel, from: string, message: string, extra: unknown[]) {
    if (LEVEL_ORDER[level] > LEVEL_ORDER[threshold]) return;
    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] [${from}] ${message}`;
    switch (level) {
        case "error":
            console.error(line, ...extra);
            break;
        case "warn":
            console.warn(line, ...extra);
            break;
        case "info":
            console.info(line, ...extra);
            break;
        case "debug":
            console.debug(line, ...extra);
            break;
    }
}

export interface Logger {
    error(message: string, ...extra: unknown[]): void;
    warn(message: string, ...extra: unknown[]): void;
    info(message: string, ...extra: unknown[]): void;
    debug(message: string, ...extra: unknown[]): void;
}

/**
 * Console logger tagged with its source, e.g. `createLogger("reconciler").warn("...")`.
 */
export function createLogger(from: string): Logger {
    return {
        error: (message, ...extra) => write("error", from, message, extra),
        warn: (message, ...extra) => write("warn", from, message, extra),
        info: (message, ...extra) => write("info", from, message, extra),
        debug: (message, ...extra) => write("debug", from, message, extra),
    };
}
