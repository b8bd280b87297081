import dotenv from "dotenv";
import * as path from "path";
import { z } from "zod";
import { ConfigurationError } from "./utils/errors";
import {
    EnvNamespace,
    isEnvFlagEnabled,
    parseEnvFloat,
    parseEnvInt,
    readEnvString,
} from "./utils/envParsers";

dotenv.config();

export const SPOTIFY_ACCOUNTS_BASE = "https://accounts.spotify.com";
export const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
export const SPOTIFY_PLAYLIST_DESCRIPTION_MAX = 300;
export const OPENAI_API_BASE_URL = "https://api.openai.com/v1";

const PROMPTS_DIR = path.resolve(__dirname, "..", "prompts");

const positiveInt = (name: string) =>
    z
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .positive(`${name} must be positive`);

const temperature = (name: string) =>
    z
        .number({ invalid_type_error: `${name} must be a number` })
        .min(0, `${name} must be between 0 and 2`)
        .max(2, `${name} must be between 0 and 2`);

const configSchema = z.object({
    openai: z.object({
        apiKey: z
            .string({ required_error: "OPENAI_API_KEY is required" })
            .min(1, "OPENAI_API_KEY is required"),
        baseUrl: z.string().url("OPENAI_BASE_URL must be a URL"),
        textModel: z.string().min(1),
        imageModel: z.string().min(1),
        imageSize: z
            .string()
            .regex(/^\d+x\d+$/, "OPENAI_IMAGE_SIZE must look like 1024 or 1024x1024"),
        imageQuality: z.string().min(1),
        recommendationsTemperature: temperature("OPENAI_TEMPERATURE_RECOMMENDATIONS"),
        descriptionTemperature: temperature("OPENAI_TEMPERATURE_DESCRIPTION"),
        timeoutMs: positiveInt("OPENAI_TIMEOUT_MS"),
    }),
    spotify: z.object({
        market: z
            .string()
            .regex(/^[A-Z]{2}$/, "SPOTIFY_MARKET must be an ISO 3166-1 alpha-2 code")
            .optional(),
        playlistPublic: z.boolean(),
        timeoutMs: positiveInt("REQUEST_TIMEOUT_MS"),
    }),
    discovery: z.object({
        maxQueries: positiveInt("DISCOVERY_MAX_QUERIES").max(
            50,
            "DISCOVERY_MAX_QUERIES must be at most 50"
        ),
        targetTracks: positiveInt("DISCOVERY_TARGET_TRACKS").max(
            10000,
            "DISCOVERY_TARGET_TRACKS must be at most 10000"
        ),
        minTracks: positiveInt("DISCOVERY_MIN_TRACKS"),
        resultsPerQuery: positiveInt("DISCOVERY_RESULTS_PER_QUERY").max(
            50,
            "DISCOVERY_RESULTS_PER_QUERY must be at most 50"
        ),
        windowDays: positiveInt("LISTENING_WINDOW_DAYS"),
        artworkEnabled: z.boolean(),
    }),
    prompts: z.object({
        recommendationsFile: z.string().min(1),
        descriptionFile: z.string().min(1),
        artworkFile: z.string().min(1),
    }),
    userConcurrency: positiveInt("USER_CONCURRENCY"),
});

/** Runtime configuration for one weekly run. */
export type AppConfig = z.infer<typeof configSchema>;

function normalizeImageSize(value: string): string {
    return value.includes("x") ? value : `${value}x${value}`;
}

/**
 * Builds and validates the run configuration from an environment namespace.
 * Throws ConfigurationError listing every invalid setting; nothing else in
 * the run starts before this succeeds.
 */
export function loadConfig(env: EnvNamespace = process.env): AppConfig {
    const requestTimeoutMs = parseEnvInt(env.REQUEST_TIMEOUT_MS, 30000);

    const candidate = {
        openai: {
            apiKey: readEnvString(env.OPENAI_API_KEY),
            baseUrl: (readEnvString(env.OPENAI_BASE_URL) ?? OPENAI_API_BASE_URL).replace(/\/+$/, ""),
            textModel: readEnvString(env.OPENAI_TEXT_MODEL) ?? "gpt-5.2",
            imageModel: readEnvString(env.OPENAI_IMAGE_MODEL) ?? "chatgpt-image-latest",
            imageSize: normalizeImageSize(readEnvString(env.OPENAI_IMAGE_SIZE) ?? "1024"),
            imageQuality: readEnvString(env.OPENAI_IMAGE_QUALITY) ?? "auto",
            recommendationsTemperature: parseEnvFloat(
                env.OPENAI_TEMPERATURE_RECOMMENDATIONS,
                0.8
            ),
            descriptionTemperature: parseEnvFloat(env.OPENAI_TEMPERATURE_DESCRIPTION, 1.2),
            timeoutMs: parseEnvInt(env.OPENAI_TIMEOUT_MS, 120000),
        },
        spotify: {
            market: readEnvString(env.SPOTIFY_MARKET)?.toUpperCase(),
            playlistPublic: isEnvFlagEnabled(env.SPOTIFY_PLAYLIST_PUBLIC),
            timeoutMs: requestTimeoutMs,
        },
        discovery: {
            maxQueries: parseEnvInt(env.DISCOVERY_MAX_QUERIES, 30),
            targetTracks: parseEnvInt(env.DISCOVERY_TARGET_TRACKS, 50),
            minTracks: parseEnvInt(env.DISCOVERY_MIN_TRACKS, 10),
            resultsPerQuery: parseEnvInt(env.DISCOVERY_RESULTS_PER_QUERY, 10),
            windowDays: parseEnvInt(env.LISTENING_WINDOW_DAYS, 7),
            artworkEnabled: !isEnvFlagEnabled(env.SKIP_ARTWORK),
        },
        prompts: {
            recommendationsFile:
                readEnvString(env.RECOMMENDATIONS_PROMPT_FILE) ??
                path.join(PROMPTS_DIR, "recommendations_prompt.md"),
            descriptionFile:
                readEnvString(env.PLAYLIST_DESCRIPTION_PROMPT_FILE) ??
                path.join(PROMPTS_DIR, "playlist_description_prompt.md"),
            artworkFile:
                readEnvString(env.PLAYLIST_ARTWORK_PROMPT_FILE) ??
                path.join(PROMPTS_DIR, "playlist_artwork_prompt.md"),
        },
        userConcurrency: parseEnvInt(env.USER_CONCURRENCY, 1),
    };

    const parsed = configSchema.safeParse(candidate);
    if (!parsed.success) {
        const issues = parsed.error.errors.map((issue) => issue.message);
        throw new ConfigurationError(
            `Invalid configuration: ${issues.join("; ")}`,
            { issues }
        );
    }

    return parsed.data;
}
