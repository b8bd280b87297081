import { formatIsoWeek, formatRunWeeks, isoWeekOf, nextIsoWeek, resolveRunWeeks } from "../isoWeek";

describe("isoWeek", () => {
    it("formats weeks zero-padded", () => {
        expect(formatIsoWeek(isoWeekOf(new Date(2026, 1, 12)))).toBe("2026-07");
    });

    it("uses the ISO week-numbering year around new year", () => {
        // Fri 1 Jan 2027 still belongs to 2026-W53
        expect(formatIsoWeek(isoWeekOf(new Date(2027, 0, 1)))).toBe("2026-53");
        expect(formatIsoWeek(nextIsoWeek(isoWeekOf(new Date(2027, 0, 1))))).toBe("2027-01");
    });

    it("targets the current week from the previous week's listening", () => {
        const weeks = formatRunWeeks(resolveRunWeeks(new Date(2026, 9, 19, 9, 30)));

        expect(weeks).toEqual({ sourceWeek: "2026-42", targetWeek: "2026-43" });
    });

    it("resolves the same weeks for any run inside one ISO week", () => {
        const monday = formatRunWeeks(resolveRunWeeks(new Date(2026, 9, 19, 0, 5)));
        const sunday = formatRunWeeks(resolveRunWeeks(new Date(2026, 9, 25, 23, 55)));

        expect(sunday).toEqual(monday);
    });

    it("crosses the year boundary", () => {
        const weeks = formatRunWeeks(resolveRunWeeks(new Date(2027, 0, 5)));

        expect(weeks).toEqual({ sourceWeek: "2026-53", targetWeek: "2027-01" });
    });
});
