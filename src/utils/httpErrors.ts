/**
 * Duck-typed accessors for HTTP client errors. Axios rejects with an error
 * whose `response` holds the status and headers; socket failures carry a
 * Node error `code` instead.
 */

function readResponse(error: unknown): object | null {
    if (typeof error !== "object" || error === null || !("response" in error)) {
        return null;
    }
    const { response } = error;
    if (typeof response !== "object" || response === null) {
        return null;
    }
    return response;
}

function readResponseField(error: unknown, field: string): unknown {
    const response = readResponse(error);
    return response ? Reflect.get(response, field) : undefined;
}

export function getHttpStatus(error: unknown): number | undefined {
    const status = readResponseField(error, "status");
    return typeof status === "number" ? status : undefined;
}

export function getErrorCode(error: unknown): string | undefined {
    if (typeof error !== "object" || error === null || !("code" in error)) {
        return undefined;
    }
    return typeof error.code === "string" ? error.code : undefined;
}

/**
 * Retry-After in milliseconds, when the server sent a numeric value.
 */
export function getRetryAfterMs(error: unknown): number | undefined {
    const headers = readResponseField(error, "headers");
    if (typeof headers !== "object" || headers === null) {
        return undefined;
    }
    const raw: unknown = Reflect.get(headers, "retry-after");
    if (typeof raw !== "string" && typeof raw !== "number") {
        return undefined;
    }
    const seconds = Number.parseInt(String(raw), 10);
    return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

/**
 * Spotify and OpenAI both answer errors with a small JSON body; pull out a
 * short, secret-free reason.
 */
export function getApiErrorReason(error: unknown): string | undefined {
    const data = readResponseField(error, "data");
    if (typeof data !== "object" || data === null) {
        return undefined;
    }

    const payload: unknown = Reflect.get(data, "error");
    if (typeof payload === "string") {
        return payload;
    }
    if (typeof payload === "object" && payload !== null) {
        const message: unknown = Reflect.get(payload, "message");
        if (typeof message === "string") {
            return message;
        }
    }
    return undefined;
}

export function isRateLimitError(error: unknown): boolean {
    if (getHttpStatus(error) === 429) {
        return true;
    }
    const message =
        error instanceof Error ? error.message.toLowerCase() : "";
    return message.includes("rate limit");
}

const TRANSIENT_CODES = new Set([
    "ECONNRESET",
    "ECONNABORTED",
    "ETIMEDOUT",
    "EAI_AGAIN",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "ERR_SOCKET_CLOSED",
]);

export function isTransientHttpError(error: unknown): boolean {
    const code = getErrorCode(error);
    if (code && TRANSIENT_CODES.has(code)) {
        return true;
    }

    const status = getHttpStatus(error);
    if (typeof status === "number" && status >= 500 && status <= 599) {
        return true;
    }

    const message =
        error instanceof Error ? error.message.toLowerCase() : "";
    return (
        message.includes("socket hang up") ||
        message.includes("network error") ||
        message.includes("timeout")
    );
}

export function describeHttpFailure(error: unknown): string {
    const status = getHttpStatus(error);
    const reason = getApiErrorReason(error);
    if (status !== undefined && reason) {
        return `HTTP ${status}: ${reason}`;
    }
    if (status !== undefined) {
        return `HTTP ${status}`;
    }
    return getErrorCode(error) ?? (error instanceof Error ? error.message : "unknown error");
}
