// Shared types and interfaces

/** Output granularity of a date prefix. Never affects how dates are parsed. */
export type DateFormat = 'full' | 'year-month' | 'year';

export interface CalendarDate {
	year: number;
	/** 1-12 */
	month: number;
	day: number;
}

/** A date found inside a stem, along with the token it was read from. */
export interface ExtractedDate extends CalendarDate {
	token: string;
	index: number;
}

export interface NormalizeNameOptions {
	addDatePrefix?: boolean;
	/** Pre-formatted creation date, used only when no date is embedded in the name. */
	creationDate?: string | null;
	dateFormat?: DateFormat;
}

export interface NormalizeFileOptions {
	addDatePrefix: boolean;
	dryRun: boolean;
	dateFormat: DateFormat;
}

export interface NormalizeDirectoryOptions {
	dryRun: boolean;
}

export type NormalizationResult = {
	from: string;
	to: string;
};

export interface IConfig {
	recursive: boolean;
	dryRun: boolean;
	addDate: boolean;
	dateFormat: DateFormat;
	/** Lowercased, dot-prefixed. Empty means every extension. */
	extensions: string[];
	exclude: string[];
	dirs: boolean;
	includeHidden: boolean;
	verbose: boolean;
}

export interface ILogger {
	info(msg: string, meta?: Record<string, unknown>): void;
	warn(msg: string, meta?: Record<string, unknown>): void;
	error(msg: string | Error, meta?: Record<string, unknown>): void;
	debug?(msg: string, meta?: Record<string, unknown>): void;
}

export interface IRenameService {
	normalizeFile(filePath: string, options: NormalizeFileOptions): Promise<NormalizationResult | null>;
	normalizeDirectory(
		dirPath: string,
		options: NormalizeDirectoryOptions,
	): Promise<NormalizationResult | null>;
}

/** Minimal stat shape needed to derive a creation instant. */
export type TimeStats = {
	birthtimeMs: number;
	ctimeMs: number;
	mtimeMs: number;
};
