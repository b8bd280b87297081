import * as fs from "fs/promises";
import { logger } from "../utils/logger";

export type PromptName = "recommendations" | "description" | "artwork";

export type TemplateValues = Record<string, string | number>;

const DEFAULT_TEMPLATES: Record<PromptName, string> = {
    recommendations: [
        "You curate a weekly discovery playlist for the week {target_week}.",
        "Listening during {source_week}:",
        "Top artists: {top_artists}",
        "Top tracks: {top_tracks}",
        "Genres: {genres}",
        "",
        "Write at most {max_queries} Spotify search queries for music this listener has not heard:",
        "{similar_count} for similar artists, {adjacent_count} bridging adjacent genres,",
        "{style_count} for deep cuts in the same style and {left_field_count} left-field picks.",
        "Never name an artist or track from the lists above.",
        'Respond with JSON: {"queries": ["..."]}',
    ].join("\n"),
    description: [
        "Write a short playlist description (under 300 characters) for a discovery playlist",
        "made for {target_week}, based on listening during {source_week}.",
        "Top artists: {top_artists}",
        "Genres: {genres}",
        'Respond with JSON: {"description": "..."}',
    ].join("\n"),
    artwork: [
        "Square abstract album cover for a weekly discovery playlist ({target_week}).",
        "Mood drawn from these genres: {genres}. No text, no logos, no faces.",
    ].join("\n"),
};

const PLACEHOLDER_PATTERN = /\{([a-z_]+)\}/g;

/**
 * Replaces `{name}` placeholders. Unknown placeholders are left as written so
 * literal braces in a template survive.
 */
export function renderTemplate(template: string, values: TemplateValues): string {
    return template.replace(PLACEHOLDER_PATTERN, (match, name: string) => {
        const value = values[name];
        return value === undefined ? match : String(value);
    });
}

/**
 * Reads a template file, falling back to the built-in text when the file is
 * missing or empty. Other read errors propagate.
 */
export async function loadPromptTemplate(
    name: PromptName,
    filePath: string
): Promise<string> {
    try {
        const content = await fs.readFile(filePath, "utf8");
        if (content.trim().length > 0) {
            return content;
        }
        logger.warn(`Prompt file ${filePath} is empty, using built-in ${name} prompt`);
    } catch (error) {
        if (!isMissingFile(error)) {
            throw error;
        }
        logger.warn(`Prompt file ${filePath} not found, using built-in ${name} prompt`);
    }
    return DEFAULT_TEMPLATES[name];
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && Reflect.get(error, "code") === "ENOENT";
}

export { DEFAULT_TEMPLATES };
