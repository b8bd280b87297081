import pLimit from "p-limit";
import { AppConfig, loadConfig } from "../config";
import { logger, Logger, withLogTiming } from "../utils/logger";
import {
    ConfigurationError,
    ErrorCode,
    errorKind,
    errorMessage,
    throwIfAborted,
} from "../utils/errors";
import type { EnvNamespace } from "../utils/envParsers";
import { formatRunWeeks, resolveRunWeeks, WeekLabels } from "../utils/isoWeek";
import { AIProvider, OpenAIProvider } from "../services/openai";
import { SessionOptions, SpotifyUserSession, UserSession } from "../services/spotify";
import { loadPromptTemplate } from "../services/prompts";
import {
    CredentialBundle,
    CredentialWarning,
    discoverCredentials,
    DiscoveryEngine,
    NarrativeGenerator,
    NarrativeTemplates,
    PublishedPlaylist,
    publishPlaylist,
} from "../services/discovery";

/**
 * Weekly Discovery Worker
 *
 * Runs every configured user through
 * auth → snapshot → queries → tracks → narrative → publish.
 * A failure ends that user's pipeline only; the run always moves on.
 */

export type PipelineState =
    | "pending"
    | "authenticated"
    | "snapshot_fetched"
    | "queries_built"
    | "tracks_resolved"
    | "narrative_ready"
    | "published";

export type UserRunStatus = "success" | "skipped" | "failed";

export interface UserFailure {
    /** The state that could not be reached */
    stage: PipelineState;
    kind: ErrorCode;
    message: string;
}

export interface UserRunResult {
    username: string;
    status: UserRunStatus;
    /** Last state reached */
    state: PipelineState;
    playlist?: PublishedPlaylist;
    failure?: UserFailure;
    warnings: string[];
}

export interface RunSummary extends WeekLabels {
    users: string[];
    results: UserRunResult[];
    warnings: CredentialWarning[];
    cancelled: boolean;
}

export interface RunDependencies {
    createSession(bundle: CredentialBundle, options: SessionOptions): Promise<UserSession>;
    createProvider(settings: AppConfig["openai"]): AIProvider;
}

export interface RunOptions {
    namespace?: EnvNamespace;
    now?: Date;
    signal?: AbortSignal;
    deps?: Partial<RunDependencies>;
}

const defaultDependencies: RunDependencies = {
    createSession: (bundle, options) => SpotifyUserSession.authenticate(bundle, options),
    createProvider: (settings) => new OpenAIProvider(settings),
};

interface RunTemplates extends NarrativeTemplates {
    recommendations: string;
}

interface UserContext {
    config: AppConfig;
    templates: RunTemplates;
    weeks: WeekLabels;
    now: Date;
    provider: AIProvider;
    deps: RunDependencies;
    signal?: AbortSignal;
}

async function loadTemplates(config: AppConfig): Promise<RunTemplates> {
    try {
        const [recommendations, description, artwork] = await Promise.all([
            loadPromptTemplate("recommendations", config.prompts.recommendationsFile),
            loadPromptTemplate("description", config.prompts.descriptionFile),
            loadPromptTemplate("artwork", config.prompts.artworkFile),
        ]);
        return { recommendations, description, artwork };
    } catch (error) {
        throw new ConfigurationError(`Could not read prompt templates: ${errorMessage(error)}`);
    }
}

async function runUser(bundle: CredentialBundle, context: UserContext): Promise<UserRunResult> {
    const { config, weeks, signal } = context;
    const log: Logger = logger.child(bundle.username);
    const warnings: string[] = [];

    let state: PipelineState = "pending";
    let attempting: PipelineState = "pending";

    const advance = async <T>(next: PipelineState, step: () => Promise<T>): Promise<T> => {
        attempting = next;
        throwIfAborted(signal);
        const value = await withLogTiming(log, next, step);
        state = next;
        return value;
    };

    const engine = new DiscoveryEngine({
        provider: context.provider,
        template: context.templates.recommendations,
        temperature: config.openai.recommendationsTemperature,
        resultsPerQuery: config.discovery.resultsPerQuery,
        minTracks: config.discovery.minTracks,
        signal,
    });
    const narrative = new NarrativeGenerator({
        provider: context.provider,
        templates: context.templates,
        temperature: config.openai.descriptionTemperature,
        artworkEnabled: config.discovery.artworkEnabled,
        signal,
    });

    try {
        const session = await advance("authenticated", () =>
            context.deps.createSession(bundle, {
                timeoutMs: config.spotify.timeoutMs,
                market: config.spotify.market,
                playlistPublic: config.spotify.playlistPublic,
                signal,
            })
        );

        const snapshot = await advance("snapshot_fetched", () =>
            session.fetchListeningSnapshot({
                now: context.now,
                windowDays: config.discovery.windowDays,
                sourceWeek: weeks.sourceWeek,
            })
        );

        const queries = await advance("queries_built", () =>
            engine.buildQueries(snapshot, weeks, config.discovery.maxQueries)
        );

        const tracks = await advance("tracks_resolved", () =>
            engine.resolveTracks(session, queries, snapshot, config.discovery.targetTracks)
        );
        if (tracks.length < config.discovery.minTracks) {
            warnings.push(`only ${tracks.length} new track(s) found`);
        }

        const story = await advance("narrative_ready", async () => {
            const description = await narrative.describe(snapshot, weeks);
            const artwork = await narrative.createArtwork(snapshot, weeks);
            return { description, artwork };
        });
        if (config.discovery.artworkEnabled && !story.artwork) {
            warnings.push("artwork unavailable");
        }

        const playlist = await advance("published", () =>
            publishPlaylist(
                session,
                weeks.targetWeek,
                tracks.map((track) => track.id),
                story.description,
                story.artwork
            )
        );
        if (story.artwork && !playlist.artworkUploaded) {
            warnings.push("cover upload failed");
        }

        return { username: bundle.username, status: "success", state, playlist, warnings };
    } catch (error) {
        const failure: UserFailure = {
            stage: attempting,
            kind: errorKind(error),
            message: errorMessage(error),
        };
        log.error(`Failed at ${failure.stage} (${failure.kind}): ${failure.message}`);
        return { username: bundle.username, status: "failed", state, failure, warnings };
    }
}

/**
 * One weekly run over every user found in `namespace`. Throws only for
 * configuration problems; per-user failures are part of the summary.
 */
export async function runWeeklyDiscovery(options: RunOptions = {}): Promise<RunSummary> {
    const namespace = options.namespace ?? process.env;
    const now = options.now ?? new Date();
    const { signal } = options;
    const deps: RunDependencies = { ...defaultDependencies, ...options.deps };

    const config = loadConfig(namespace);
    const templates = await loadTemplates(config);
    const weeks = formatRunWeeks(resolveRunWeeks(now));

    const { bundles, warnings } = discoverCredentials(namespace);
    for (const warning of warnings) {
        logger.warn(warning.message);
    }
    if (bundles.length === 0) {
        logger.warn("No complete SPOTIFY_USER_* credentials found");
    }
    logger.debug(
        `Weekly discovery ${weeks.sourceWeek} -> ${weeks.targetWeek} for ${bundles.length} user(s)`
    );

    const context: UserContext = {
        config,
        templates,
        weeks,
        now,
        provider: deps.createProvider(config.openai),
        deps,
        signal,
    };

    const limit = pLimit(config.userConcurrency);
    const results = await Promise.all(
        bundles.map((bundle) =>
            limit(async (): Promise<UserRunResult> => {
                if (signal?.aborted) {
                    return { username: bundle.username, status: "skipped", state: "pending", warnings: [] };
                }
                return runUser(bundle, context);
            })
        )
    );

    return {
        ...weeks,
        users: bundles.map((bundle) => bundle.username),
        results,
        warnings,
        cancelled: signal?.aborted ?? false,
    };
}

function describeResult(result: UserRunResult): string {
    const suffix = result.warnings.length > 0 ? ` [${result.warnings.join("; ")}]` : "";

    if (result.status === "success" && result.playlist) {
        const { action, name, trackCount } = result.playlist;
        return `${result.username}: ${action} "${name}" (${trackCount} tracks)${suffix}`;
    }
    if (result.status === "failed" && result.failure) {
        const { stage, kind, message } = result.failure;
        return `${result.username}: failed at ${stage} (${kind}): ${message}${suffix}`;
    }
    return `${result.username}: skipped (run cancelled)`;
}

/**
 * Human-readable run report. Contains usernames, playlist names and error
 * messages only.
 */
export function formatRunSummary(summary: RunSummary): string {
    const lines: string[] = [];

    lines.push(
        summary.users.length > 0
            ? `Found ${summary.users.length} user(s): ${summary.users.join(", ")}`
            : "Found 0 user(s)"
    );
    for (const result of summary.results) {
        lines.push(describeResult(result));
    }
    for (const warning of summary.warnings) {
        lines.push(`Warning: ${warning.message}`);
    }

    const count = (status: UserRunStatus) =>
        summary.results.filter((result) => result.status === status).length;
    lines.push(
        `Done${summary.cancelled ? " (cancelled)" : ""}: ${count("success")} succeeded, ` +
            `${count("failed")} failed, ${count("skipped")} skipped`
    );

    return lines.join("\n");
}
