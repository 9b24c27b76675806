import type { NormalizeNameOptions } from '../../types/index.js';
import { extractDate, formatDate, stripDatePrefix, stripDateToken } from '../dates/DateExtractor.js';
import { joinNameAndExtension, sanitizeName, splitNameAndExtension } from './NameSanitizer.js';

function withPrefix(prefix: string | null, stem: string): string {
	if (!prefix) return stem;
	return stem ? `${prefix}-${stem}` : prefix;
}

/**
 * Compute the normalized form of a filename. Pure: never touches the filesystem.
 *
 * Prefix precedence:
 * - a date already embedded in the name, reformatted per `dateFormat`
 * - `creationDate`, when `addDatePrefix` is set
 * - nothing
 *
 * A name that sanitizes down to nothing keeps its stem as-is; only the
 * extension is lowercased.
 */
export function normalizeFilename(filename: string, options: NormalizeNameOptions = {}): string {
	const { addDatePrefix = false, creationDate = null, dateFormat = 'full' } = options;
	const { stem, ext } = splitNameAndExtension(filename);

	const embedded = extractDate(stem);
	// A confirmed date is cut out wherever it sits; otherwise only a leading
	// date-shaped prefix is dropped.
	const remainder = embedded ? stripDateToken(stem, embedded) : stripDatePrefix(stem);
	const clean = sanitizeName(remainder);

	let prefix: string | null = null;
	if (embedded) prefix = formatDate(embedded, dateFormat);
	else if (addDatePrefix && creationDate) prefix = creationDate;

	const finalStem = withPrefix(prefix, clean);
	return joinNameAndExtension(finalStem || stem, ext.toLowerCase());
}

/** Directories have no extension and never get a date prefix. */
export function normalizeDirectoryName(name: string): string {
	const clean = sanitizeName(name);
	return clean || name;
}
