import { z } from "zod";
import { createLogger } from "../../utils/logger";
import { GenerationError } from "../../utils/errors";
import type { AIProvider, StructuredRequest } from "../openai";

const log = createLogger("weekly-discovery.structured-output");

/** Maximum model calls for one payload: the first try plus one regeneration. */
export const MAX_GENERATION_ATTEMPTS = 2;

export const queriesPayloadSchema = z
    .object({
        queries: z.array(z.string()),
    })
    .strict();

export const descriptionPayloadSchema = z
    .object({
        description: z.string().trim().min(1),
    })
    .strict();

export type QueriesPayload = z.infer<typeof queriesPayloadSchema>;
export type DescriptionPayload = z.infer<typeof descriptionPayloadSchema>;

type AttemptResult<T> = { ok: true; data: T } | { ok: false; error: GenerationError };

async function attemptOnce<T>(
    provider: AIProvider,
    request: StructuredRequest,
    schema: z.ZodType<T>,
    signal?: AbortSignal
): Promise<AttemptResult<T>> {
    let payload: unknown;
    try {
        payload = await provider.completeStructured(request, signal);
    } catch (error) {
        if (error instanceof GenerationError && error.malformed) {
            return { ok: false, error };
        }
        throw error;
    }

    const parsed = schema.safeParse(payload);
    if (parsed.success) {
        return { ok: true, data: parsed.data };
    }

    const issues = parsed.error.errors
        .map((issue) => `${issue.path.join(".") || "(root)"} ${issue.message}`)
        .join("; ");
    return {
        ok: false,
        error: new GenerationError(`Malformed ${request.label} payload: ${issues}`, true),
    };
}

/**
 * Asks the provider for a JSON payload and validates it. Malformed output is
 * regenerated once with the same request; anything else surfaces immediately.
 */
export async function generateStructured<T>(
    provider: AIProvider,
    request: StructuredRequest,
    schema: z.ZodType<T>,
    signal?: AbortSignal
): Promise<T> {
    let result = await attemptOnce(provider, request, schema, signal);

    for (let attempt = 2; !result.ok && attempt <= MAX_GENERATION_ATTEMPTS; attempt++) {
        log.warn(
            `${result.error.message}; regenerating (attempt ${attempt}/${MAX_GENERATION_ATTEMPTS})`
        );
        result = await attemptOnce(provider, request, schema, signal);
    }

    if (!result.ok) {
        throw result.error;
    }
    return result.data;
}
