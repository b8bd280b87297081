import { separateArtists } from "../separateArtists";

type Track = { artist: string; title: string };

const track = (artist: string, title: string): Track => ({ artist, title });

describe("separateArtists", () => {
    it("interleaves artists round-robin, largest bucket first", () => {
        const input = [
            track("A", "a1"),
            track("A", "a2"),
            track("B", "b1"),
            track("A", "a3"),
            track("C", "c1"),
            track("B", "b2"),
        ];

        const titles = separateArtists(input, (t) => t.artist).map((t) => t.title);

        expect(titles).toEqual(["a1", "b1", "c1", "a2", "b2", "a3"]);
    });

    it("groups artist keys case-insensitively", () => {
        const input = [track("Low", "1"), track("low ", "2"), track("Mogwai", "3")];

        const titles = separateArtists(input, (t) => t.artist).map((t) => t.title);

        expect(titles).toEqual(["1", "3", "2"]);
    });

    it("returns a copy and keeps every item", () => {
        const input = [track("A", "1")];
        const result = separateArtists(input, (t) => t.artist);

        expect(result).toEqual(input);
        expect(result).not.toBe(input);
        expect(separateArtists([], (t: Track) => t.artist)).toEqual([]);
    });
});
