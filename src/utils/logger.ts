export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogFormat = "text" | "json";
export type LogContext = Record<string, unknown>;

type EmitLevel = Exclude<LogLevel, "silent">;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    child: (scope: string) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

const CONSOLE_METHODS: Record<EmitLevel, (...data: unknown[]) => void> = {
    debug: (...data) => console.debug(...data),
    info: (...data) => console.info(...data),
    warn: (...data) => console.warn(...data),
    error: (...data) => console.error(...data),
};

const REDACTED = "[redacted]";
const MAX_REDACT_DEPTH = 4;

// Context keys whose values never reach the console
const SECRET_KEY_PATTERN = /token|secret|authorization|api[_-]?key|password/i;
// Credentials that can end up inside free text, e.g. an error message
const SECRET_TEXT_PATTERN = /\b(Bearer|Basic)\s+[A-Za-z0-9._~+/=-]+/g;

function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVELS;
}

function resolveLogLevel(): LogLevel {
    const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
    if (!configured) {
        return process.env.NODE_ENV === "test" ? "silent" : "info";
    }
    return isLogLevel(configured) ? configured : "silent";
}

function resolveLogFormat(): LogFormat {
    return process.env.LOG_FORMAT?.trim().toLowerCase() === "json" ? "json" : "text";
}

const currentLevel = resolveLogLevel();
const currentFormat = resolveLogFormat();

export function redactText(text: string): string {
    return text.replace(SECRET_TEXT_PATTERN, (_match, scheme: string) => `${scheme} ${REDACTED}`);
}

function isPlainObject(value: unknown): value is LogContext {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

/**
 * Errors shrink to name/message/stack: an axios error carries its request
 * config, Authorization header included.
 */
function sanitize(value: unknown, depth: number): unknown {
    if (value instanceof Error) {
        return {
            name: value.name,
            message: redactText(value.message),
            stack: value.stack ? redactText(value.stack) : undefined,
        };
    }
    if (typeof value === "string") {
        return redactText(value);
    }
    if (Array.isArray(value)) {
        return depth >= MAX_REDACT_DEPTH ? "[array]" : value.map((item) => sanitize(item, depth + 1));
    }
    if (isPlainObject(value)) {
        return depth >= MAX_REDACT_DEPTH ? "[object]" : redactContext(value, depth + 1);
    }
    return value;
}

export function redactContext(context: LogContext, depth = 0): LogContext {
    const output: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
        output[key] = SECRET_KEY_PATTERN.test(key) ? REDACTED : sanitize(value, depth);
    }
    return output;
}

function emit(level: EmitLevel, scope: string | null, message: string, args: unknown[]): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
        return;
    }

    const [first, ...rest] = args;
    const context = isPlainObject(first) ? redactContext(first) : null;
    const extras = (context ? rest : args).map((arg) => sanitize(arg, 0));
    const text = redactText(message);
    const write = CONSOLE_METHODS[level];

    if (currentFormat === "json") {
        write(
            JSON.stringify({
                time: new Date().toISOString(),
                level,
                ...(scope ? { scope } : {}),
                msg: text,
                ...(context ?? {}),
                ...(extras.length > 0 ? { extra: extras } : {}),
            })
        );
        return;
    }

    const prefix = scope ? `[${level.toUpperCase()}] [${scope}] ${text}` : `[${level.toUpperCase()}] ${text}`;
    if (context) {
        write(prefix, context, ...extras);
    } else {
        write(prefix, ...extras);
    }
}

export function createLogger(scope?: string): Logger {
    const scoped = scope?.trim() || null;

    return {
        debug: (message, ...args) => emit("debug", scoped, message, args),
        info: (message, ...args) => emit("info", scoped, message, args),
        warn: (message, ...args) => emit("warn", scoped, message, args),
        error: (message, ...args) => emit("error", scoped, message, args),
        child: (childScope) => {
            const trimmed = childScope.trim();
            return createLogger(scoped ? `${scoped}.${trimmed}` : trimmed);
        },
    };
}

/**
 * Runs one pipeline step and logs how long it took. A failure is logged at
 * warn and rethrown; the caller decides what it means for the run.
 */
export async function withLogTiming<T>(
    log: Logger,
    step: string,
    run: () => Promise<T> | T,
    context: LogContext = {}
): Promise<T> {
    const startedAt = Date.now();
    log.debug(`${step} started`, context);

    try {
        const result = await run();
        log.debug(`${step} completed`, { ...context, durationMs: Date.now() - startedAt });
        return result;
    } catch (error) {
        log.warn(`${step} failed`, { ...context, durationMs: Date.now() - startedAt, error });
        throw error;
    }
}

export const logger = createLogger("weekly-discovery");
