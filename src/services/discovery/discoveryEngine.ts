import { createLogger, withLogTiming } from "../../utils/logger";
import { CancelledError, RateLimitError, throwIfAborted, errorMessage } from "../../utils/errors";
import { separateArtists } from "../../utils/separateArtists";
import type { WeekLabels } from "../../utils/isoWeek";
import type { AIProvider } from "../openai";
import type { ListeningSnapshot, TrackCandidate, UserSession } from "../spotify";
import { renderTemplate } from "../prompts";
import { generateStructured, queriesPayloadSchema } from "./structuredOutput";

const log = createLogger("weekly-discovery.engine");

export const MAX_QUERY_LENGTH = 120;
const PROFILE_LIST_LIMIT = 20;
const FALLBACK_GENRE_COUNT = 8;

const RECOMMENDATIONS_SYSTEM_PROMPT =
    "You are a music discovery curator. You write Spotify search queries and always respond with valid JSON.";

export interface DiscoveryEngineOptions {
    provider: AIProvider;
    /** Recommendations prompt template */
    template: string;
    temperature: number;
    resultsPerQuery: number;
    minTracks: number;
    signal?: AbortSignal;
}

export interface QueryMix {
    similar: number;
    adjacent: number;
    style: number;
    leftField: number;
}

/**
 * Splits the query budget 40/30/20/10 across similar, adjacent, style and
 * left-field picks. Rounding slack goes to left-field.
 */
export function queryMix(maxQueries: number): QueryMix {
    const similar = Math.round(maxQueries * 0.4);
    const adjacent = Math.round(maxQueries * 0.3);
    const style = Math.round(maxQueries * 0.2);
    return {
        similar,
        adjacent,
        style,
        leftField: Math.max(0, maxQueries - similar - adjacent - style),
    };
}

function normalizeName(value: string): string {
    return value.trim().replace(/\s+/g, " ").toLowerCase();
}

function pairKey(artist: string, title: string): string {
    return `${normalizeName(artist)}\u0000${normalizeName(title)}`;
}

export function isSnapshotEmpty(snapshot: ListeningSnapshot): boolean {
    return (
        snapshot.topArtists.length === 0 &&
        snapshot.topTracks.length === 0 &&
        snapshot.genres.length === 0
    );
}

const QUALIFIER_PATTERN = /\b(artist|track):\s*(?:"([^"]*)"|(\S+))/gi;

/** Bare text of a query: quotes and ` - ` separators removed. */
function bareQueryText(query: string): string {
    return normalizeName(query.replace(/"/g, " ").replace(/\s-\s/g, " "));
}

/**
 * Drops queries that name something the listener already played, either as
 * the whole query (quoted or not, or as an "artist title" pair) or as an
 * `artist:`/`track:` value, then dedupes
 * case-insensitively and caps the count.
 */
export function filterQueries(
    queries: readonly string[],
    snapshot: ListeningSnapshot,
    maxQueries: number
): string[] {
    const known = new Set<string>();
    for (const artist of snapshot.topArtists) known.add(normalizeName(artist));
    for (const track of snapshot.topTracks) {
        known.add(normalizeName(track.artist));
        known.add(normalizeName(track.title));
        known.add(normalizeName(`${track.artist} ${track.title}`));
        known.add(normalizeName(`${track.title} ${track.artist}`));
    }
    known.delete("");

    const seen = new Set<string>();
    const result: string[] = [];

    for (const raw of queries) {
        if (result.length >= maxQueries) break;

        const query = raw.trim().replace(/\s+/g, " ");
        const key = query.toLowerCase();
        if (!query || query.length > MAX_QUERY_LENGTH || seen.has(key)) continue;
        if (known.has(key) || known.has(bareQueryText(query))) continue;

        const namesKnown = Array.from(query.matchAll(QUALIFIER_PATTERN)).some((match) =>
            known.has(normalizeName(match[2] ?? match[3] ?? ""))
        );
        if (namesKnown) continue;

        seen.add(key);
        result.push(query);
    }

    return result;
}

export class DiscoveryEngine {
    constructor(private options: DiscoveryEngineOptions) {}

    /**
     * Asks the model for search queries grounded in the snapshot. An empty
     * snapshot gives the model nothing to work from, so no call is made.
     */
    async buildQueries(
        snapshot: ListeningSnapshot,
        weeks: WeekLabels,
        maxQueries: number
    ): Promise<string[]> {
        if (isSnapshotEmpty(snapshot)) {
            log.info(`No listening data for ${weeks.sourceWeek}, skipping query generation`);
            return [];
        }

        const mix = queryMix(maxQueries);
        const prompt = renderTemplate(this.options.template, {
            source_week: weeks.sourceWeek,
            target_week: weeks.targetWeek,
            top_artists: snapshot.topArtists.slice(0, PROFILE_LIST_LIMIT).join(", ") || "none",
            top_tracks:
                snapshot.topTracks
                    .slice(0, PROFILE_LIST_LIMIT)
                    .map((track) => `${track.artist} - ${track.title}`)
                    .join(", ") || "none",
            genres: snapshot.genres.join(", ") || "none",
            max_queries: maxQueries,
            similar_count: mix.similar,
            adjacent_count: mix.adjacent,
            style_count: mix.style,
            left_field_count: mix.leftField,
        });

        const payload = await generateStructured(
            this.options.provider,
            {
                system: RECOMMENDATIONS_SYSTEM_PROMPT,
                prompt,
                temperature: this.options.temperature,
                label: "queries",
            },
            queriesPayloadSchema,
            this.options.signal
        );

        const queries = filterQueries(payload.queries, snapshot, maxQueries);
        log.debug(`Model returned ${payload.queries.length} queries, kept ${queries.length}`);
        return queries;
    }

    /**
     * Searches each query in order and keeps new tracks until `targetCount`.
     * Genre searches fill any gap. Nothing already in the snapshot, by id or
     * by artist and title, is kept.
     */
    async resolveTracks(
        session: UserSession,
        queries: readonly string[],
        snapshot: ListeningSnapshot,
        targetCount: number
    ): Promise<TrackCandidate[]> {
        const knownIds = new Set(snapshot.topTracks.map((track) => track.id));
        const knownPairs = new Set(
            snapshot.topTracks.map((track) => pairKey(track.artist, track.title))
        );
        const seenIds = new Set<string>();
        const selected: TrackCandidate[] = [];

        const runSearches = async (list: readonly string[]) => {
            for (const query of list) {
                if (selected.length >= targetCount) return;
                throwIfAborted(this.options.signal);

                let results: TrackCandidate[];
                try {
                    results = await session.searchTracks(query, this.options.resultsPerQuery);
                } catch (error) {
                    if (error instanceof RateLimitError || error instanceof CancelledError) {
                        throw error;
                    }
                    log.warn(`Search failed for "${query}": ${errorMessage(error)}`);
                    continue;
                }

                for (const candidate of results) {
                    if (selected.length >= targetCount) return;
                    if (seenIds.has(candidate.id) || knownIds.has(candidate.id)) continue;
                    if (knownPairs.has(pairKey(candidate.artist, candidate.title))) continue;
                    seenIds.add(candidate.id);
                    selected.push(candidate);
                }
            }
        };

        await withLogTiming(log, "query searches", () => runSearches(queries), {
            queries: queries.length,
        });

        if (selected.length < targetCount && snapshot.genres.length > 0) {
            const searched = new Set(queries.map((query) => query.toLowerCase()));
            const genreQueries = snapshot.genres
                .slice(0, FALLBACK_GENRE_COUNT)
                .map((genre) => `genre:"${genre}"`)
                .filter((query) => !searched.has(query.toLowerCase()));
            await withLogTiming(log, "genre searches", () => runSearches(genreQueries), {
                queries: genreQueries.length,
            });
        }

        if (selected.length < this.options.minTracks) {
            log.warn(
                `Only ${selected.length} new track(s) found (minimum ${this.options.minTracks}); publishing what was found`
            );
        }

        return separateArtists(selected, (track) => track.artist);
    }
}
