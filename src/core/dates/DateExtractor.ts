import type { CalendarDate, DateFormat, ExtractedDate, TimeStats } from '../../types/index.js';

type DateLayout = {
	pattern: RegExp;
	order: 'ymd' | 'mdy';
};

/**
 * Embedded date layouts in priority order. The first layout whose first match
 * forms a real calendar date wins.
 */
const DATE_LAYOUTS: readonly DateLayout[] = [
	{ pattern: /(\d{4})-(\d{2})-(\d{2})/, order: 'ymd' }, // 2024-01-15
	{ pattern: /(\d{4})_(\d{2})_(\d{2})/, order: 'ymd' }, // 2024_01_15
	{ pattern: /(\d{4})(\d{2})(\d{2})/, order: 'ymd' }, // 20240115
	{ pattern: /(\d{2})-(\d{2})-(\d{4})/, order: 'mdy' }, // 01-15-2024
	{ pattern: /(\d{2})_(\d{2})_(\d{4})/, order: 'mdy' }, // 01_15_2024
];

const PREFIX_PATTERNS: readonly RegExp[] = DATE_LAYOUTS.map(
	(layout) => new RegExp(`^${layout.pattern.source}[-_\\s]*`),
);

const SEPARATOR_RUN = /^[-_\s]+/;
const TRAILING_SEPARATOR = /[-_\s]$/;

export const DATE_FORMATS: readonly DateFormat[] = ['full', 'year-month', 'year'];

function pad(n: number, digits: number): string {
	return String(n).padStart(digits, '0');
}

function isLeapYear(year: number): boolean {
	return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
	if (month === 2) return isLeapYear(year) ? 29 : 28;
	return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function isValidCalendarDate({ year, month, day }: CalendarDate): boolean {
	if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
	if (year < 1 || year > 9999) return false;
	if (month < 1 || month > 12) return false;
	return day >= 1 && day <= daysInMonth(year, month);
}

function toCalendarDate(first: string, second: string, third: string, order: DateLayout['order']): CalendarDate {
	const a = Number.parseInt(first, 10);
	const b = Number.parseInt(second, 10);
	const c = Number.parseInt(third, 10);
	return order === 'ymd' ? { year: a, month: b, day: c } : { year: c, month: a, day: b };
}

/**
 * Find the first embedded date in a stem. Each layout gets one attempt at its
 * first match; a match that is not a real date (month 13, Feb 30) moves on to
 * the next layout.
 */
export function extractDate(stem: string): ExtractedDate | null {
	for (const layout of DATE_LAYOUTS) {
		const match = layout.pattern.exec(stem);
		if (!match) continue;
		const [token, g1, g2, g3] = match;
		if (g1 === undefined || g2 === undefined || g3 === undefined) continue;
		const date = toCalendarDate(g1, g2, g3, layout.order);
		if (!isValidCalendarDate(date)) continue;
		return { ...date, token, index: match.index };
	}
	return null;
}

/**
 * Remove a leading date prefix and the separators that follow it. Each layout
 * is applied once, in priority order. Dates further into the stem are left alone.
 */
export function stripDatePrefix(stem: string): string {
	let result = stem;
	for (const pattern of PREFIX_PATTERNS) {
		result = result.replace(pattern, '');
	}
	return result;
}

/**
 * Remove exactly the token `extractDate` matched, plus the separator run right
 * after it. Text left on both sides is rejoined with a hyphen when it would
 * otherwise run together.
 */
export function stripDateToken(stem: string, extracted: Pick<ExtractedDate, 'token' | 'index'>): string {
	const head = stem.slice(0, extracted.index);
	const tail = stem.slice(extracted.index + extracted.token.length).replace(SEPARATOR_RUN, '');
	if (head.length > 0 && tail.length > 0 && !TRAILING_SEPARATOR.test(head)) {
		return `${head}-${tail}`;
	}
	return head + tail;
}

/**
 * Birth time when the filesystem records one; otherwise the earlier of the
 * metadata-change and modification times.
 */
export function creationDate(stats: TimeStats): Date {
	if (Number.isFinite(stats.birthtimeMs) && stats.birthtimeMs > 0) {
		return new Date(stats.birthtimeMs);
	}
	return new Date(Math.min(stats.ctimeMs, stats.mtimeMs));
}

export function parseDateFormat(value: string | undefined | null): DateFormat | null {
	const v = value?.trim().toLowerCase();
	return DATE_FORMATS.find((f) => f === v) ?? null;
}

/**
 * Format a calendar date (or a `Date`, read in local time). Unknown formats
 * fall back to `full`.
 */
export function formatDate(date: CalendarDate | Date, format: string = 'full'): string {
	const { year, month, day } =
		date instanceof Date
			? { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() }
			: date;
	const yyyy = pad(year, 4);
	const mm = pad(month, 2);
	const dd = pad(day, 2);
	switch (format) {
		case 'year':
			return yyyy;
		case 'year-month':
			return `${yyyy}-${mm}`;
		default:
			return `${yyyy}-${mm}-${dd}`;
	}
}
