import { CancelledError, PublishError, RateLimitError } from "../../../utils/errors";
import type { PlaylistWrite, PlaylistWriteResult, UserSession } from "../../spotify";
import { playlistNameForWeek, publishPlaylist } from "../playlistPublisher";

function sessionWith(
    write: (playlist: PlaylistWrite) => Promise<PlaylistWriteResult>
): UserSession & { createOrUpdatePlaylist: jest.Mock } {
    return {
        username: "henry",
        userId: "spotify-henry",
        fetchListeningSnapshot: jest.fn(),
        searchTracks: jest.fn(),
        findPlaylistByName: jest.fn(),
        createOrUpdatePlaylist: jest.fn(write),
    };
}

describe("playlistNameForWeek", () => {
    it("names the playlist after the target week", () => {
        expect(playlistNameForWeek("2026-43")).toBe("Weekly Discovery — 2026-43");
    });
});

describe("publishPlaylist", () => {
    it("writes the named playlist and reports what happened", async () => {
        const session = sessionWith(async () => ({
            playlistId: "pl-1",
            action: "updated",
            artworkUploaded: true,
        }));
        const artwork = Buffer.from("jpeg");

        const published = await publishPlaylist(session, "2026-43", ["a", "b"], "Fresh finds", artwork);

        expect(published).toEqual({
            playlistId: "pl-1",
            action: "updated",
            artworkUploaded: true,
            name: "Weekly Discovery — 2026-43",
            trackCount: 2,
        });
        expect(session.createOrUpdatePlaylist).toHaveBeenCalledWith({
            name: "Weekly Discovery — 2026-43",
            trackIds: ["a", "b"],
            description: "Fresh finds",
            artwork,
        });
    });

    it("publishes an empty discovery week", async () => {
        const session = sessionWith(async () => ({
            playlistId: "pl-2",
            action: "created",
            artworkUploaded: false,
        }));

        await expect(publishPlaylist(session, "2026-43", [], "Quiet week", null)).resolves.toMatchObject({
            action: "created",
            trackCount: 0,
        });
    });

    it("wraps unexpected failures as PublishError", async () => {
        const session = sessionWith(async () => {
            throw new TypeError("boom");
        });

        const error = await publishPlaylist(session, "2026-43", [], "x", null).catch(
            (caught: unknown) => caught
        );

        expect(error).toBeInstanceOf(PublishError);
        expect(error instanceof PublishError && error.message).toBe(
            'Could not write "Weekly Discovery — 2026-43": boom'
        );
    });

    it("keeps rate limit and cancellation kinds", async () => {
        const limited = new RateLimitError("Spotify", 3);
        const cancelled = new CancelledError();

        await expect(
            publishPlaylist(sessionWith(async () => Promise.reject(limited)), "2026-43", [], "x", null)
        ).rejects.toBe(limited);
        await expect(
            publishPlaylist(sessionWith(async () => Promise.reject(cancelled)), "2026-43", [], "x", null)
        ).rejects.toBe(cancelled);
    });
});
