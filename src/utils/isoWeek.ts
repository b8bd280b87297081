import {
    addWeeks,
    getISOWeek,
    getISOWeekYear,
    startOfISOWeek,
    subWeeks,
} from "date-fns";

export interface IsoWeek {
    year: number;
    week: number;
    /** Monday 00:00 local time */
    start: Date;
}

export interface RunWeeks {
    sourceWeek: IsoWeek;
    targetWeek: IsoWeek;
}

export function isoWeekOf(date: Date): IsoWeek {
    return {
        year: getISOWeekYear(date),
        week: getISOWeek(date),
        start: startOfISOWeek(date),
    };
}

/** `YYYY-WW`, e.g. `2026-07` */
export function formatIsoWeek(week: IsoWeek): string {
    return `${week.year}-${String(week.week).padStart(2, "0")}`;
}

export function nextIsoWeek(week: IsoWeek): IsoWeek {
    return isoWeekOf(addWeeks(week.start, 1));
}

/**
 * The source week is the ISO week before the one containing `now`; the
 * playlist is for the week after the source week. Any run inside one ISO week
 * resolves the same pair, so the playlist name is stable across re-runs.
 */
export function resolveRunWeeks(now: Date): RunWeeks {
    const sourceWeek = isoWeekOf(subWeeks(now, 1));
    return {
        sourceWeek,
        targetWeek: nextIsoWeek(sourceWeek),
    };
}

/** Formatted week pair carried through the per-user pipeline. */
export interface WeekLabels {
    sourceWeek: string;
    targetWeek: string;
}

export function formatRunWeeks(weeks: RunWeeks): WeekLabels {
    return {
        sourceWeek: formatIsoWeek(weeks.sourceWeek),
        targetWeek: formatIsoWeek(weeks.targetWeek),
    };
}
