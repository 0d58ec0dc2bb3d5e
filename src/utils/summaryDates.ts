/**
 * Calendar helpers for summary periods.
 *
 * All computations use the process-local wall clock: a "day" is the local
 * calendar date, weeks follow ISO-8601 (Monday start, week-year of the
 * Thursday) and months are calendar months.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

const pad2 = (value: number): string => String(value).padStart(2, '0');

export function startOfDay(date: Date): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function endOfDay(date: Date): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate(), 23, 59, 59, 999);
}

export function isSameDay(a: Date, b: Date): boolean {
    return (
        a.getFullYear() === b.getFullYear() &&
        a.getMonth() === b.getMonth() &&
        a.getDate() === b.getDate()
    );
}

/**
 * Whole calendar days from `from` to `to` (negative when `to` is earlier).
 * Immune to DST shifts because both ends are reduced to UTC midnights.
 */
export function calendarDaysBetween(from: Date, to: Date): number {
    const fromUtc = Date.UTC(from.getFullYear(), from.getMonth(), from.getDate());
    const toUtc = Date.UTC(to.getFullYear(), to.getMonth(), to.getDate());
    return Math.round((toUtc - fromUtc) / DAY_MS);
}

/** Projects the wall-clock time of `time` onto the calendar day of `day`. */
export function atTimeOfDay(day: Date, time: Date): Date {
    return new Date(
        day.getFullYear(),
        day.getMonth(),
        day.getDate(),
        time.getHours(),
        time.getMinutes(),
    );
}

export function formatDayId(date: Date): string {
    return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function formatMonthId(date: Date): string {
    return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}`;
}

export function startOfIsoWeek(date: Date): Date {
    const mondayOffset = (date.getDay() + 6) % 7;
    return new Date(date.getFullYear(), date.getMonth(), date.getDate() - mondayOffset);
}

export function endOfIsoWeek(date: Date): Date {
    const monday = startOfIsoWeek(date);
    return endOfDay(new Date(monday.getFullYear(), monday.getMonth(), monday.getDate() + 6));
}

/** ISO-8601 week id, e.g. `2025-W40`. */
export function formatWeekId(date: Date): string {
    const monday = startOfIsoWeek(date);
    const thursday = new Date(monday.getFullYear(), monday.getMonth(), monday.getDate() + 3);
    const weekYear = thursday.getFullYear();
    const firstWeekMonday = startOfIsoWeek(new Date(weekYear, 0, 4));
    const week = 1 + Math.floor(calendarDaysBetween(firstWeekMonday, monday) / 7);
    return `${weekYear}-W${pad2(week)}`;
}

export function startOfMonth(date: Date): Date {
    return new Date(date.getFullYear(), date.getMonth(), 1);
}

export function endOfMonth(date: Date): Date {
    return endOfDay(new Date(date.getFullYear(), date.getMonth() + 1, 0));
}

export function daysInMonth(date: Date): number {
    return new Date(date.getFullYear(), date.getMonth() + 1, 0).getDate();
}

export interface SummaryPeriodIds {
    dayId: string;
    weekId: string;
    monthId: string;
}

export function summaryPeriodIds(date: Date): SummaryPeriodIds {
    return {
        dayId: formatDayId(date),
        weekId: formatWeekId(date),
        monthId: formatMonthId(date),
    };
}
