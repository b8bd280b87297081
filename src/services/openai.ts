import axios, { AxiosInstance } from "axios";
import { logger } from "../utils/logger";
import { rateLimiter } from "./rateLimiter";
import { AppError, GenerationError } from "../utils/errors";
import { describeHttpFailure } from "../utils/httpErrors";
import type { AppConfig } from "../config";

export interface StructuredRequest {
    system: string;
    prompt: string;
    temperature: number;
    /** Used in logs and error messages, e.g. "queries" */
    label: string;
}

export interface ImageRequest {
    prompt: string;
}

/**
 * The two model capabilities the pipeline needs. Anything OpenAI-compatible
 * can sit behind it.
 */
export interface AIProvider {
    /** Returns the parsed JSON payload; shape validation is the caller's job. */
    completeStructured(request: StructuredRequest, signal?: AbortSignal): Promise<unknown>;
    /** Returns raw image bytes in whatever format the model produced. */
    generateImage(request: ImageRequest, signal?: AbortSignal): Promise<Buffer>;
}

interface ChatCompletionResponse {
    choices?: Array<{ message?: { content?: string | null } }>;
}

interface ImageGenerationResponse {
    data?: Array<{ b64_json?: string; url?: string }>;
}

type OpenAISettings = AppConfig["openai"];

function stripCodeFences(content: string): string {
    if (content.startsWith("```json")) {
        return content.replace(/```json\n?/g, "").replace(/```\n?/g, "").trim();
    }
    if (content.startsWith("```")) {
        return content.replace(/```\n?/g, "").trim();
    }
    return content;
}

export class OpenAIProvider implements AIProvider {
    private client: AxiosInstance;

    constructor(private settings: OpenAISettings) {
        this.client = axios.create({
            baseURL: settings.baseUrl,
            timeout: settings.timeoutMs,
            headers: {
                Authorization: `Bearer ${settings.apiKey}`,
                "Content-Type": "application/json",
            },
        });
    }

    async completeStructured(
        request: StructuredRequest,
        signal?: AbortSignal
    ): Promise<unknown> {
        // json_object mode is rejected unless the messages mention JSON
        const system = /json/i.test(request.system)
            ? request.system
            : `${request.system}\nRespond in JSON format.`;

        let response: ChatCompletionResponse;
        try {
            const result = await rateLimiter.execute(
                "openai",
                () =>
                    this.client.post<ChatCompletionResponse>(
                        "/chat/completions",
                        {
                            model: this.settings.textModel,
                            messages: [
                                { role: "system", content: system },
                                { role: "user", content: request.prompt },
                            ],
                            temperature: request.temperature,
                            response_format: { type: "json_object" },
                        },
                        { signal }
                    ),
                { signal, operation: request.label }
            );
            response = result.data;
        } catch (error) {
            throw this.toGenerationError(error, request.label);
        }

        const content = response.choices?.[0]?.message?.content?.trim();
        if (!content) {
            throw new GenerationError(`OpenAI returned no content for ${request.label}`, true);
        }

        try {
            const payload: unknown = JSON.parse(stripCodeFences(content));
            return payload;
        } catch {
            logger.warn(`OpenAI returned invalid JSON for ${request.label}`);
            throw new GenerationError(`OpenAI returned invalid JSON for ${request.label}`, true);
        }
    }

    async generateImage(request: ImageRequest, signal?: AbortSignal): Promise<Buffer> {
        let response: ImageGenerationResponse;
        try {
            const result = await rateLimiter.execute(
                "openai",
                () =>
                    this.client.post<ImageGenerationResponse>(
                        "/images/generations",
                        {
                            model: this.settings.imageModel,
                            prompt: request.prompt,
                            size: this.settings.imageSize,
                            quality: this.settings.imageQuality,
                            n: 1,
                        },
                        { signal }
                    ),
                { signal, operation: "image" }
            );
            response = result.data;
        } catch (error) {
            throw this.toGenerationError(error, "image");
        }

        const image = response.data?.[0];
        if (image?.b64_json) {
            return Buffer.from(image.b64_json, "base64");
        }

        const url = image?.url;
        if (!url) {
            throw new GenerationError("OpenAI image response contained no image", true);
        }

        try {
            const download = await rateLimiter.execute(
                "openai",
                () =>
                    axios.get<ArrayBuffer>(url, {
                        responseType: "arraybuffer",
                        timeout: this.settings.timeoutMs,
                        signal,
                    }),
                { signal, operation: "image download" }
            );
            return Buffer.from(download.data);
        } catch (error) {
            throw this.toGenerationError(error, "image download");
        }
    }

    private toGenerationError(error: unknown, label: string): AppError {
        if (error instanceof AppError) {
            return error;
        }
        const reason = describeHttpFailure(error);
        logger.error(`OpenAI ${label} request failed: ${reason}`);
        return new GenerationError(`OpenAI ${label} request failed: ${reason}`, false);
    }
}
