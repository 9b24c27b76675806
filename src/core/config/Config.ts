import type { DateFormat, IConfig } from '../../types/index.js';
import { parseDateFormat } from '../dates/DateExtractor.js';
import { normalizeExtensions } from '../rename/Matcher.js';

export const DEFAULT_CONFIG: IConfig = {
	recursive: false,
	dryRun: false,
	addDate: false,
	dateFormat: 'full',
	extensions: [],
	exclude: [],
	dirs: false,
	includeHidden: false,
	verbose: false,
};

function isStringArray(v: unknown): v is string[] {
	return Array.isArray(v) && v.every((x) => typeof x === 'string');
}

function bool(value: unknown, fallback: boolean): boolean {
	return typeof value === 'boolean' ? value : fallback;
}

/** Fill every field from `input`, falling back to the default for anything invalid. */
export function validateConfig(input: Partial<Record<keyof IConfig, unknown>>): IConfig {
	const dateFormat: DateFormat =
		typeof input.dateFormat === 'string'
			? (parseDateFormat(input.dateFormat) ?? DEFAULT_CONFIG.dateFormat)
			: DEFAULT_CONFIG.dateFormat;
	return {
		recursive: bool(input.recursive, DEFAULT_CONFIG.recursive),
		dryRun: bool(input.dryRun, DEFAULT_CONFIG.dryRun),
		addDate: bool(input.addDate, DEFAULT_CONFIG.addDate),
		dateFormat,
		extensions: isStringArray(input.extensions) ? [...normalizeExtensions(input.extensions)] : [],
		exclude: isStringArray(input.exclude) ? input.exclude.filter((g) => g.trim().length > 0) : [],
		dirs: bool(input.dirs, DEFAULT_CONFIG.dirs),
		includeHidden: bool(input.includeHidden, DEFAULT_CONFIG.includeHidden),
		verbose: bool(input.verbose, DEFAULT_CONFIG.verbose),
	};
}

/**
 * Defaults, then environment, then explicit overrides. Nothing is read from or
 * written to disk.
 *
 * Environment: `TIDYNAME_DATE_FORMAT` (full | year-month | year).
 */
export function resolveConfig(overrides: Partial<IConfig> = {}, env: NodeJS.ProcessEnv = process.env): IConfig {
	const fromEnv: Partial<IConfig> = {};
	const envFormat = parseDateFormat(env.TIDYNAME_DATE_FORMAT);
	if (envFormat) fromEnv.dateFormat = envFormat;
	return validateConfig({ ...DEFAULT_CONFIG, ...fromEnv, ...overrides });
}
