import {
    CancelledError,
    DataFetchError,
    GenerationError,
    RateLimitError,
} from "../../../utils/errors";
import type { ListeningSnapshot, TrackCandidate, UserSession } from "../../spotify";
import { FakeAIProvider } from "../../__tests__/helpers/fakeAIProvider";
import { DiscoveryEngine, filterQueries, queryMix } from "../discoveryEngine";

const weeks = { sourceWeek: "2026-42", targetWeek: "2026-43" };

const snapshot: ListeningSnapshot = {
    topArtists: ["Mogwai", "Low"],
    topTracks: [{ id: "t1", artist: "Low", title: "Lullaby" }],
    genres: ["post-rock"],
    sourceWeek: "2026-42",
};

const emptySnapshot: ListeningSnapshot = {
    topArtists: [],
    topTracks: [],
    genres: [],
    sourceWeek: "2026-42",
};

function candidate(id: string, artist: string, title: string): TrackCandidate {
    return { id, uri: `spotify:track:${id}`, artist, title };
}

function fakeSession(
    results: Record<string, TrackCandidate[]>,
    failures: Record<string, Error> = {}
): UserSession & { searchTracks: jest.Mock } {
    return {
        username: "henry",
        userId: "spotify-henry",
        fetchListeningSnapshot: jest.fn(),
        findPlaylistByName: jest.fn(),
        createOrUpdatePlaylist: jest.fn(),
        searchTracks: jest.fn(async (query: string) => {
            const failure = failures[query];
            if (failure) throw failure;
            return results[query] ?? [];
        }),
    };
}

function engineWith(provider: FakeAIProvider, overrides: { template?: string; signal?: AbortSignal } = {}) {
    return new DiscoveryEngine({
        provider,
        template: overrides.template ?? "Queries for {target_week}",
        temperature: 0.8,
        resultsPerQuery: 10,
        minTracks: 10,
        signal: overrides.signal,
    });
}

describe("queryMix", () => {
    it("splits the budget 40/30/20/10", () => {
        expect(queryMix(30)).toEqual({ similar: 12, adjacent: 9, style: 6, leftField: 3 });
        expect(queryMix(10)).toEqual({ similar: 4, adjacent: 3, style: 2, leftField: 1 });
        expect(queryMix(1)).toEqual({ similar: 0, adjacent: 0, style: 0, leftField: 1 });
    });
});

describe("filterQueries", () => {
    it("drops queries naming known artists or tracks, duplicates and overlong text", () => {
        const queries = [
            "Mogwai",
            'artist:"low" year:1995',
            "track:Lullaby",
            "post-rock like mogwai",
            'Genre:"slowcore"',
            'genre:"slowcore"',
            "",
            "x".repeat(121),
            "  dream   pop  ",
        ];

        expect(filterQueries(queries, snapshot, 30)).toEqual([
            "post-rock like mogwai",
            'Genre:"slowcore"',
            "dream pop",
        ]);
        expect(filterQueries(queries, snapshot, 2)).toEqual([
            "post-rock like mogwai",
            'Genre:"slowcore"',
        ]);
    });

    it("drops quoted names and artist-title pairs from the snapshot", () => {
        const queries = ['"Mogwai"', '"Lullaby"', "Low Lullaby", '"Low" - "Lullaby"', "lullaby low", 'genre:"post-rock"'];

        expect(filterQueries(queries, snapshot, 10)).toEqual(['genre:"post-rock"']);
    });
});

describe("DiscoveryEngine.buildQueries", () => {
    it("renders the recommendations template and filters the model's queries", async () => {
        const provider = new FakeAIProvider().script("queries", {
            queries: ["Low", 'genre:"slowcore" year:1990-1999', "artist:Mogwai"],
        });
        const engine = engineWith(provider, {
            template:
                "{source_week}|{target_week}|{top_artists}|{top_tracks}|{genres}|{max_queries}|" +
                "{similar_count}|{adjacent_count}|{style_count}|{left_field_count}",
        });

        const queries = await engine.buildQueries(snapshot, weeks, 10);

        expect(queries).toEqual(['genre:"slowcore" year:1990-1999']);
        const [call] = provider.callsFor("queries");
        expect(call?.prompt).toBe("2026-42|2026-43|Mogwai, Low|Low - Lullaby|post-rock|10|4|3|2|1");
        expect(call?.temperature).toBe(0.8);
    });

    it("skips the model for an empty snapshot", async () => {
        const provider = new FakeAIProvider();

        await expect(engineWith(provider).buildQueries(emptySnapshot, weeks, 30)).resolves.toEqual([]);
        expect(provider.structuredCalls).toHaveLength(0);
    });

    it("fails with GenerationError after one regeneration of a malformed payload", async () => {
        const provider = new FakeAIProvider().always("queries", { tracks: [] });

        await expect(engineWith(provider).buildQueries(snapshot, weeks, 30)).rejects.toBeInstanceOf(
            GenerationError
        );
        expect(provider.callsFor("queries")).toHaveLength(2);
    });
});

describe("DiscoveryEngine.resolveTracks", () => {
    it("dedupes, excludes the snapshot, stops at the target and spreads artists", async () => {
        const session = fakeSession({
            q1: [
                candidate("a1", "Alpha", "One"),
                candidate("t1", "Low", "Lullaby"),
                candidate("x1", "LOW ", "lullaby"),
                candidate("a2", "Alpha", "Two"),
            ],
            q2: [
                candidate("a1", "Alpha", "One"),
                candidate("b1", "Beta", "One"),
                candidate("a3", "Alpha", "Three"),
                candidate("b2", "Beta", "Two"),
            ],
        });

        const tracks = await engineWith(new FakeAIProvider()).resolveTracks(
            session,
            ["q1", "q2"],
            snapshot,
            4
        );

        expect(tracks.map((track) => track.id)).toEqual(["a1", "b1", "a2", "a3"]);
        expect(session.searchTracks).toHaveBeenCalledWith("q1", 10);
    });

    it("fills the gap with searches for the first eight genres", async () => {
        const genres = Array.from({ length: 10 }, (_, i) => `g${i + 1}`);
        const session = fakeSession({
            q1: [candidate("n1", "Nova", "First")],
            'genre:"g1"': [candidate("n2", "Orbit", "Second")],
        });

        const tracks = await engineWith(new FakeAIProvider()).resolveTracks(
            session,
            ["q1", 'GENRE:"g2"'],
            { ...snapshot, genres },
            50
        );

        expect(tracks.map((track) => track.id)).toEqual(["n1", "n2"]);
        expect(session.searchTracks.mock.calls.map(([query]) => query)).toEqual([
            "q1",
            'GENRE:"g2"',
            'genre:"g1"',
            'genre:"g3"',
            'genre:"g4"',
            'genre:"g5"',
            'genre:"g6"',
            'genre:"g7"',
            'genre:"g8"',
        ]);
    });

    it("returns an empty list when nothing can be searched", async () => {
        const session = fakeSession({});

        await expect(
            engineWith(new FakeAIProvider()).resolveTracks(session, [], emptySnapshot, 50)
        ).resolves.toEqual([]);
        expect(session.searchTracks).not.toHaveBeenCalled();
    });

    it("skips failed searches but lets rate limits through", async () => {
        const skipped = fakeSession(
            { q2: [candidate("n1", "Nova", "First")] },
            { q1: new DataFetchError("Spotify search failed: HTTP 400") }
        );
        await expect(
            engineWith(new FakeAIProvider()).resolveTracks(skipped, ["q1", "q2"], emptySnapshot, 50)
        ).resolves.toEqual([candidate("n1", "Nova", "First")]);

        const limited = fakeSession({}, { q1: new RateLimitError("Spotify", 3) });
        await expect(
            engineWith(new FakeAIProvider()).resolveTracks(limited, ["q1", "q2"], emptySnapshot, 50)
        ).rejects.toBeInstanceOf(RateLimitError);
        expect(limited.searchTracks).toHaveBeenCalledTimes(1);
    });

    it("stops when the run is cancelled", async () => {
        const controller = new AbortController();
        controller.abort();
        const session = fakeSession({ q1: [candidate("n1", "Nova", "First")] });

        await expect(
            engineWith(new FakeAIProvider(), { signal: controller.signal }).resolveTracks(
                session,
                ["q1"],
                snapshot,
                50
            )
        ).rejects.toBeInstanceOf(CancelledError);
        expect(session.searchTracks).not.toHaveBeenCalled();
    });
});
