import { createLogger } from "../../utils/logger";
import { CancelledError, errorMessage } from "../../utils/errors";
import { toSpotifyCover } from "../../utils/imageCompression";
import type { WeekLabels } from "../../utils/isoWeek";
import { SPOTIFY_PLAYLIST_DESCRIPTION_MAX } from "../../config";
import type { AIProvider } from "../openai";
import type { ListeningSnapshot } from "../spotify";
import { renderTemplate, TemplateValues } from "../prompts";
import { descriptionPayloadSchema, generateStructured } from "./structuredOutput";

const log = createLogger("weekly-discovery.narrative");

const DESCRIPTION_SYSTEM_PROMPT =
    "You write short, vivid playlist descriptions. You always respond with valid JSON.";

export interface NarrativeTemplates {
    description: string;
    artwork: string;
}

export interface NarrativeGeneratorOptions {
    provider: AIProvider;
    templates: NarrativeTemplates;
    temperature: number;
    artworkEnabled: boolean;
    signal?: AbortSignal;
}

/**
 * Collapses whitespace and trims to Spotify's description limit, cutting at
 * a word boundary where one exists.
 */
export function clampDescription(
    text: string,
    maxLength: number = SPOTIFY_PLAYLIST_DESCRIPTION_MAX
): string {
    const collapsed = text.replace(/\s+/g, " ").trim();
    if (collapsed.length <= maxLength) {
        return collapsed;
    }

    const cut = collapsed.slice(0, maxLength - 1);
    const lastSpace = cut.lastIndexOf(" ");
    const head = lastSpace > maxLength / 2 ? cut.slice(0, lastSpace) : cut;
    return `${head.trimEnd()}…`;
}

function templateValues(snapshot: ListeningSnapshot, weeks: WeekLabels): TemplateValues {
    return {
        source_week: weeks.sourceWeek,
        target_week: weeks.targetWeek,
        top_artists: snapshot.topArtists.slice(0, 10).join(", ") || "none",
        top_tracks:
            snapshot.topTracks
                .slice(0, 10)
                .map((track) => `${track.artist} - ${track.title}`)
                .join(", ") || "none",
        genres: snapshot.genres.slice(0, 10).join(", ") || "eclectic",
    };
}

export class NarrativeGenerator {
    constructor(private options: NarrativeGeneratorOptions) {}

    async describe(snapshot: ListeningSnapshot, weeks: WeekLabels): Promise<string> {
        const payload = await generateStructured(
            this.options.provider,
            {
                system: DESCRIPTION_SYSTEM_PROMPT,
                prompt: renderTemplate(this.options.templates.description, templateValues(snapshot, weeks)),
                temperature: this.options.temperature,
                label: "description",
            },
            descriptionPayloadSchema,
            this.options.signal
        );
        return clampDescription(payload.description);
    }

    /**
     * Best effort: any failure other than cancellation is logged and gives
     * null, and the playlist is published without a cover.
     */
    async createArtwork(snapshot: ListeningSnapshot, weeks: WeekLabels): Promise<Buffer | null> {
        if (!this.options.artworkEnabled) {
            log.debug("Artwork disabled");
            return null;
        }

        try {
            const image = await this.options.provider.generateImage(
                {
                    prompt: renderTemplate(this.options.templates.artwork, templateValues(snapshot, weeks)),
                },
                this.options.signal
            );
            return await toSpotifyCover(image);
        } catch (error) {
            if (error instanceof CancelledError) {
                throw error;
            }
            log.warn(`Artwork generation failed, publishing without a cover: ${errorMessage(error)}`);
            return null;
        }
    }
}
