/**
 * Provider Rate Limiter
 *
 * Every outbound Spotify/OpenAI request goes through a per-provider queue and
 * is retried here, at the call site that issued it, with exponential backoff.
 * A 429 that survives the last attempt becomes a RateLimitError.
 */

import PQueue from "p-queue";
import { logger } from "../utils/logger";
import { sleep } from "../utils/async";
import { AppError, RateLimitError, throwIfAborted } from "../utils/errors";
import {
    getRetryAfterMs,
    isRateLimitError,
    isTransientHttpError,
} from "../utils/httpErrors";

interface RateLimitConfig {
    /** Requests per interval */
    intervalCap: number;
    /** Interval in milliseconds */
    interval: number;
    /** Maximum concurrent requests */
    concurrency: number;
    /** Attempts per request, first try included */
    maxAttempts: number;
    /** Base delay for exponential backoff (ms) */
    baseDelay: number;
    /** Ceiling for any single wait, Retry-After included (ms) */
    maxDelay: number;
}

interface ServiceConfig {
    spotify: RateLimitConfig;
    openai: RateLimitConfig;
}

const SERVICE_CONFIGS: ServiceConfig = {
    spotify: {
        intervalCap: 10,
        interval: 1000,
        concurrency: 2,
        maxAttempts: 3,
        baseDelay: 1000,
        maxDelay: 60000,
    },
    openai: {
        intervalCap: 1,
        interval: 1000,
        concurrency: 1,
        maxAttempts: 3,
        baseDelay: 2000,
        maxDelay: 60000,
    },
};

type ServiceName = keyof ServiceConfig;

const SERVICES: ServiceName[] = ["spotify", "openai"];

const SERVICE_LABELS: Record<ServiceName, string> = {
    spotify: "Spotify",
    openai: "OpenAI",
};

interface ExecuteOptions {
    signal?: AbortSignal;
    /** Short label used in retry logs, e.g. "search" */
    operation?: string;
    /**
     * Retry timeouts and 5xx responses. Off for writes the server may have
     * applied before the failure; a 429 is retried either way.
     */
    retryTransient?: boolean;
}

class ProviderRateLimiter {
    private queues = new Map<ServiceName, PQueue>();

    constructor() {
        for (const service of SERVICES) {
            const config = SERVICE_CONFIGS[service];
            this.queues.set(
                service,
                new PQueue({
                    concurrency: config.concurrency,
                    intervalCap: config.intervalCap,
                    interval: config.interval,
                    carryoverConcurrencyCount: true,
                })
            );
        }
    }

    /**
     * Execute a request with rate limiting and automatic retry
     */
    async execute<T>(
        service: ServiceName,
        requestFn: () => Promise<T>,
        options: ExecuteOptions = {}
    ): Promise<T> {
        const queue = this.queues.get(service);
        const config = SERVICE_CONFIGS[service];

        if (!queue) {
            throw new Error(`Unknown service: ${service}`);
        }

        const label = options.operation
            ? `${SERVICE_LABELS[service]} ${options.operation}`
            : SERVICE_LABELS[service];

        for (let attempt = 1; ; attempt++) {
            throwIfAborted(options.signal);

            try {
                return await queue.add(() => requestFn());
            } catch (error) {
                throwIfAborted(options.signal);

                // Already classified further down the stack
                if (error instanceof AppError) {
                    throw error;
                }

                const rateLimited = isRateLimitError(error);
                const retryable =
                    rateLimited ||
                    (options.retryTransient !== false && isTransientHttpError(error));
                if (!retryable) {
                    throw error;
                }

                if (attempt >= config.maxAttempts) {
                    if (rateLimited) {
                        throw new RateLimitError(SERVICE_LABELS[service], attempt, {
                            operation: options.operation,
                        });
                    }
                    throw error;
                }

                const delay = this.calculateBackoff(attempt, config, error);
                logger.warn(
                    `${rateLimited ? "Rate limited by" : "Transient failure from"} ${label} ` +
                        `(attempt ${attempt}/${config.maxAttempts}) - retrying in ${delay}ms`
                );
                await this.sleep(delay, options.signal);
            }
        }
    }

    /**
     * Retry-After wins when present; otherwise exponential backoff with jitter.
     */
    private calculateBackoff(
        attempt: number,
        config: RateLimitConfig,
        error: unknown
    ): number {
        const retryAfter = getRetryAfterMs(error);
        if (retryAfter !== undefined) {
            return Math.min(retryAfter, config.maxDelay);
        }

        const exponentialDelay = config.baseDelay * Math.pow(2, attempt - 1);
        const jitter = Math.floor(Math.random() * 500);
        return Math.min(exponentialDelay + jitter, config.maxDelay);
    }

    private sleep(ms: number, signal?: AbortSignal): Promise<void> {
        return sleep(ms, signal);
    }
}

export const rateLimiter = new ProviderRateLimiter();

export type { ServiceName, RateLimitConfig, ExecuteOptions };
