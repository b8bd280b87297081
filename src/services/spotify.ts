import axios, { AxiosInstance, AxiosResponse } from "axios";
import { logger } from "../utils/logger";
import { ExecuteOptions, rateLimiter } from "./rateLimiter";
import { chunkArray } from "../utils/async";
import {
    AppError,
    AuthError,
    CancelledError,
    DataFetchError,
    PublishError,
} from "../utils/errors";
import { describeHttpFailure, isTransientHttpError } from "../utils/httpErrors";
import { base64Length, SPOTIFY_COVER_MAX_BYTES } from "../utils/imageCompression";
import { SPOTIFY_ACCOUNTS_BASE, SPOTIFY_API_BASE } from "../config";
import type { CredentialBundle } from "./discovery/credentialRegistry";

/**
 * Spotify Service
 *
 * One authenticated session per user and run. The access token lives only on
 * the session's axios instance and is dropped with it.
 */

export const REQUIRED_SCOPES = [
    "playlist-modify-private",
    "playlist-modify-public",
    "playlist-read-private",
    "ugc-image-upload",
    "user-read-recently-played",
    "user-top-read",
] as const;

const RECENTLY_PLAYED_LIMIT = 50;
// Spotify keeps a short play history; this bounds the walk back through it
const RECENTLY_PLAYED_MAX_PAGES = 10;
const TOP_ARTISTS_LIMIT = 20;
const PLAYLIST_PAGE_SIZE = 50;
const TRACKS_PER_REQUEST = 100;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface SnapshotTrack {
    id: string;
    artist: string;
    title: string;
}

export interface ListeningSnapshot {
    /** Most played first */
    topArtists: string[];
    topTracks: SnapshotTrack[];
    genres: string[];
    sourceWeek: string;
}

export interface TrackCandidate {
    id: string;
    uri: string;
    artist: string;
    title: string;
}

export interface SnapshotOptions {
    now: Date;
    windowDays: number;
    sourceWeek: string;
}

export interface PlaylistWrite {
    name: string;
    trackIds: string[];
    description: string;
    /** JPEG already sized for upload */
    artwork: Buffer | null;
}

export interface PlaylistWriteResult {
    playlistId: string;
    action: "created" | "updated";
    artworkUploaded: boolean;
}

export interface SessionOptions {
    timeoutMs: number;
    market?: string;
    playlistPublic: boolean;
    signal?: AbortSignal;
}

/**
 * What the pipeline needs from an authenticated Spotify account.
 */
export interface UserSession {
    readonly username: string;
    readonly userId: string;
    fetchListeningSnapshot(options: SnapshotOptions): Promise<ListeningSnapshot>;
    searchTracks(query: string, limit: number): Promise<TrackCandidate[]>;
    findPlaylistByName(name: string): Promise<string | null>;
    createOrUpdatePlaylist(write: PlaylistWrite): Promise<PlaylistWriteResult>;
}

interface TokenResponse {
    access_token?: string;
    scope?: string;
}

interface SpotifyArtist {
    name?: string;
    genres?: string[];
}

interface SpotifyTrackObject {
    id?: string | null;
    uri?: string;
    name?: string;
    artists?: SpotifyArtist[];
}

interface RecentlyPlayedResponse {
    items?: Array<{ track?: SpotifyTrackObject | null; played_at?: string }>;
    next?: string | null;
    cursors?: { before?: string | null } | null;
}

interface TopArtistsResponse {
    items?: SpotifyArtist[];
}

interface SearchResponse {
    tracks?: { items?: Array<SpotifyTrackObject | null> };
}

interface PlaylistPage {
    items?: Array<{ id?: string; name?: string; owner?: { id?: string } } | null>;
    next?: string | null;
}

function primaryArtist(track: SpotifyTrackObject): string {
    return track.artists?.[0]?.name?.trim() ?? "";
}

function rankByCount(counts: Map<string, number>): string[] {
    // Map iteration keeps first-seen order, and sort is stable
    return Array.from(counts.entries())
        .sort((a, b) => b[1] - a[1])
        .map(([key]) => key);
}

function passThrough(error: unknown): error is AppError {
    return error instanceof AppError;
}

export class SpotifyUserSession implements UserSession {
    private constructor(
        readonly username: string,
        readonly userId: string,
        private client: AxiosInstance,
        private options: SessionOptions
    ) {}

    /**
     * Exchanges the refresh token, checks granted scopes and resolves the
     * Spotify user id.
     */
    static async authenticate(
        bundle: CredentialBundle,
        options: SessionOptions
    ): Promise<SpotifyUserSession> {
        const { signal, timeoutMs } = options;
        const basic = Buffer.from(`${bundle.clientId}:${bundle.clientSecret}`).toString("base64");
        const body = new URLSearchParams({
            grant_type: "refresh_token",
            refresh_token: bundle.refreshToken,
        });

        let token: TokenResponse;
        try {
            const response = await rateLimiter.execute(
                "spotify",
                () =>
                    axios.post<TokenResponse>(
                        `${SPOTIFY_ACCOUNTS_BASE}/api/token`,
                        body.toString(),
                        {
                            headers: {
                                Authorization: `Basic ${basic}`,
                                "Content-Type": "application/x-www-form-urlencoded",
                            },
                            timeout: timeoutMs,
                            signal,
                        }
                    ),
                { signal, operation: "token refresh" }
            );
            token = response.data;
        } catch (error) {
            if (passThrough(error)) throw error;
            throw new AuthError(
                `Spotify token refresh failed: ${describeHttpFailure(error)}`
            );
        }

        if (!token.access_token) {
            throw new AuthError("Spotify token response contained no access token");
        }

        const granted = new Set((token.scope ?? "").split(/\s+/).filter(Boolean));
        const missing = REQUIRED_SCOPES.filter((scope) => !granted.has(scope));
        if (missing.length > 0) {
            throw new AuthError(
                `Token is missing required scope(s): ${missing.join(", ")}`,
                { missingScopes: missing }
            );
        }

        const client = axios.create({
            baseURL: SPOTIFY_API_BASE,
            timeout: timeoutMs,
            headers: {
                Authorization: `Bearer ${token.access_token}`,
                "Content-Type": "application/json",
            },
        });

        let userId: string | undefined;
        try {
            const me = await rateLimiter.execute(
                "spotify",
                () => client.get<{ id?: string }>("/me", { signal }),
                { signal, operation: "profile" }
            );
            userId = me.data.id;
        } catch (error) {
            if (passThrough(error)) throw error;
            throw new AuthError(`Spotify profile lookup failed: ${describeHttpFailure(error)}`);
        }

        if (!userId) {
            throw new AuthError("Spotify profile response contained no user id");
        }

        logger.debug(`Spotify: authenticated ${bundle.username} as ${userId}`);
        return new SpotifyUserSession(bundle.username, userId, client, options);
    }

    /**
     * Plays inside the window, ranked by play count. Short-term top artists
     * are appended after the played ones and supply the genres.
     */
    async fetchListeningSnapshot(options: SnapshotOptions): Promise<ListeningSnapshot> {
        const windowStart = options.now.getTime() - options.windowDays * DAY_MS;

        try {
            const plays = await this.fetchRecentPlays(options.now.getTime(), windowStart);

            if (plays.length === 0) {
                logger.info(`Spotify: no plays for ${this.username} in the last ${options.windowDays} day(s)`);
                return { topArtists: [], topTracks: [], genres: [], sourceWeek: options.sourceWeek };
            }

            const trackCounts = new Map<string, number>();
            const tracksById = new Map<string, SnapshotTrack>();
            const artistCounts = new Map<string, number>();

            for (const track of plays) {
                const id = track.id ?? "";
                trackCounts.set(id, (trackCounts.get(id) ?? 0) + 1);
                if (!tracksById.has(id)) {
                    tracksById.set(id, {
                        id,
                        artist: primaryArtist(track),
                        title: track.name?.trim() ?? "",
                    });
                }
                for (const artist of track.artists ?? []) {
                    const name = artist.name?.trim();
                    if (name) {
                        artistCounts.set(name, (artistCounts.get(name) ?? 0) + 1);
                    }
                }
            }

            const top = await this.call<TopArtistsResponse>("top artists", (signal) =>
                this.client.get("/me/top/artists", {
                    params: { time_range: "short_term", limit: TOP_ARTISTS_LIMIT },
                    signal,
                })
            );

            const topArtists = rankByCount(artistCounts);
            const seenArtists = new Set(topArtists.map((name) => name.toLowerCase()));
            const genres: string[] = [];
            for (const artist of top.items ?? []) {
                const name = artist.name?.trim();
                if (name && !seenArtists.has(name.toLowerCase())) {
                    seenArtists.add(name.toLowerCase());
                    topArtists.push(name);
                }
                for (const genre of artist.genres ?? []) {
                    if (!genres.includes(genre)) {
                        genres.push(genre);
                    }
                }
            }

            const topTracks: SnapshotTrack[] = [];
            for (const id of rankByCount(trackCounts)) {
                const track = tracksById.get(id);
                if (track) topTracks.push(track);
            }

            return { topArtists, topTracks, genres, sourceWeek: options.sourceWeek };
        } catch (error) {
            if (passThrough(error)) throw error;
            throw new DataFetchError(
                `Spotify listening history unavailable: ${describeHttpFailure(error)}`
            );
        }
    }

    /**
     * Walks the play history backwards from `now` with the `before` cursor
     * until a play falls outside the window or the history runs out.
     */
    private async fetchRecentPlays(now: number, windowStart: number): Promise<SpotifyTrackObject[]> {
        const plays: SpotifyTrackObject[] = [];
        let before: number | undefined = now;

        for (let page = 0; page < RECENTLY_PLAYED_MAX_PAGES && before !== undefined; page++) {
            const cursor: number = before;
            const response = await this.call<RecentlyPlayedResponse>("recently played", (signal) =>
                this.client.get("/me/player/recently-played", {
                    params: { limit: RECENTLY_PLAYED_LIMIT, before: cursor },
                    signal,
                })
            );

            const items = response.items ?? [];
            for (const item of items) {
                const playedAt = item.played_at ? Date.parse(item.played_at) : Number.NaN;
                if (playedAt < windowStart) {
                    return plays;
                }
                if (item.track?.id) {
                    plays.push(item.track);
                }
            }

            const next = Number(response.cursors?.before);
            before =
                response.next && items.length > 0 && Number.isFinite(next) && next < cursor
                    ? next
                    : undefined;
        }

        return plays;
    }

    async searchTracks(query: string, limit: number): Promise<TrackCandidate[]> {
        try {
            const result = await this.call<SearchResponse>("search", (signal) =>
                this.client.get("/search", {
                    params: {
                        q: query,
                        type: "track",
                        limit,
                        ...(this.options.market ? { market: this.options.market } : {}),
                    },
                    signal,
                })
            );

            const candidates: TrackCandidate[] = [];
            for (const track of result.tracks?.items ?? []) {
                if (!track?.id) continue;
                candidates.push({
                    id: track.id,
                    uri: track.uri ?? `spotify:track:${track.id}`,
                    artist: primaryArtist(track),
                    title: track.name?.trim() ?? "",
                });
            }
            return candidates;
        } catch (error) {
            if (passThrough(error)) throw error;
            throw new DataFetchError(`Spotify search failed: ${describeHttpFailure(error)}`, {
                query,
            });
        }
    }

    /**
     * Exact-name match among playlists owned by this user.
     */
    async findPlaylistByName(name: string): Promise<string | null> {
        try {
            for (let offset = 0; ; offset += PLAYLIST_PAGE_SIZE) {
                const page = await this.call<PlaylistPage>("playlists", (signal) =>
                    this.client.get("/me/playlists", {
                        params: { limit: PLAYLIST_PAGE_SIZE, offset },
                        signal,
                    })
                );

                const match = (page.items ?? []).find(
                    (item) => item?.name === name && item.owner?.id === this.userId
                );
                if (match?.id) {
                    return match.id;
                }
                if (!page.next || (page.items ?? []).length === 0) {
                    return null;
                }
            }
        } catch (error) {
            if (passThrough(error)) throw error;
            throw new PublishError(`Spotify playlist lookup failed: ${describeHttpFailure(error)}`);
        }
    }

    /**
     * Replaces the tracks and description of the playlist called `name`, or
     * creates it. Artwork upload is best effort.
     */
    async createOrUpdatePlaylist(write: PlaylistWrite): Promise<PlaylistWriteResult> {
        const uris = write.trackIds.map((id) => `spotify:track:${id}`);
        const existingId = await this.findPlaylistByName(write.name);

        let playlistId: string;
        let action: PlaylistWriteResult["action"];

        try {
            if (existingId) {
                playlistId = existingId;
                action = "updated";
                await this.call("update details", (signal) =>
                    this.client.put(`/playlists/${playlistId}`, { description: write.description }, { signal })
                );
                const [first = [], ...rest] = chunkArray(uris, TRACKS_PER_REQUEST);
                await this.call("replace tracks", (signal) =>
                    this.client.put(`/playlists/${playlistId}/tracks`, { uris: first }, { signal })
                );
                await this.appendTracks(playlistId, rest);
            } else {
                playlistId = await this.createPlaylist(write);
                action = "created";
                await this.appendTracks(playlistId, chunkArray(uris, TRACKS_PER_REQUEST));
            }
        } catch (error) {
            if (passThrough(error)) throw error;
            throw new PublishError(`Spotify playlist write failed: ${describeHttpFailure(error)}`, {
                playlist: write.name,
            });
        }

        const artworkUploaded = write.artwork
            ? await this.uploadArtwork(playlistId, write.artwork)
            : false;

        logger.info(
            `Spotify: ${action} "${write.name}" for ${this.username} (${uris.length} tracks)`
        );
        return { playlistId, action, artworkUploaded };
    }

    /**
     * A create that timed out may still have landed; look for it before
     * failing so a retry never leaves two playlists with the same name.
     */
    private async createPlaylist(write: PlaylistWrite): Promise<string> {
        let created: { id?: string };
        try {
            created = await this.call<{ id?: string }>(
                "create playlist",
                (signal) =>
                    this.client.post(
                        `/users/${encodeURIComponent(this.userId)}/playlists`,
                        {
                            name: write.name,
                            description: write.description,
                            public: this.options.playlistPublic,
                        },
                        { signal }
                    ),
                { retryTransient: false }
            );
        } catch (error) {
            if (passThrough(error) || !isTransientHttpError(error)) throw error;
            const landed = await this.findPlaylistByName(write.name);
            if (!landed) throw error;
            logger.warn(`Spotify: create of "${write.name}" failed in transit but the playlist exists`);
            return landed;
        }

        if (!created.id) {
            throw new PublishError("Spotify did not return an id for the new playlist");
        }
        return created.id;
    }

    // Appending is not idempotent: only a 429 is retried
    private async appendTracks(playlistId: string, chunks: string[][]): Promise<void> {
        for (const chunk of chunks) {
            await this.call(
                "add tracks",
                (signal) =>
                    this.client.post(`/playlists/${playlistId}/tracks`, { uris: chunk }, { signal }),
                { retryTransient: false }
            );
        }
    }

    private async uploadArtwork(playlistId: string, jpeg: Buffer): Promise<boolean> {
        if (base64Length(jpeg.length) > SPOTIFY_COVER_MAX_BYTES) {
            logger.warn(`Spotify: cover for ${this.username} exceeds upload limit, skipping`);
            return false;
        }

        try {
            await this.call("upload cover", (signal) =>
                this.client.put(`/playlists/${playlistId}/images`, jpeg.toString("base64"), {
                    headers: { "Content-Type": "image/jpeg" },
                    signal,
                })
            );
            return true;
        } catch (error) {
            if (error instanceof CancelledError) throw error;
            logger.warn(`Spotify: cover upload failed for ${this.username}`, { error });
            return false;
        }
    }

    private async call<T>(
        operation: string,
        send: (signal?: AbortSignal) => Promise<AxiosResponse<T>>,
        options: Pick<ExecuteOptions, "retryTransient"> = {}
    ): Promise<T> {
        const { signal } = this.options;
        const response = await rateLimiter.execute("spotify", () => send(signal), {
            ...options,
            signal,
            operation,
        });
        return response.data;
    }
}
