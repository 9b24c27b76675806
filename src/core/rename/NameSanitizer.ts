import path from 'node:path';

export function toLowercase(name: string): string {
	return name.toLowerCase();
}

/** Spaces and underscores become hyphens. */
export function replaceSeparators(name: string): string {
	return name.replace(/[ _]/g, '-');
}

export function collapseHyphens(name: string): string {
	return name.replace(/-{2,}/g, '-');
}

export function stripEdgeHyphens(name: string): string {
	return name.replace(/^-+|-+$/g, '');
}

/**
 * Canonical form of a stem. Order matters: separators are replaced before
 * hyphen runs are collapsed, and collapsing happens before edges are trimmed.
 * Everything other than case, spaces and underscores passes through.
 */
export function sanitizeName(name: string): string {
	let result = toLowercase(name);
	result = replaceSeparators(result);
	result = collapseHyphens(result);
	return stripEdgeHyphens(result);
}

/**
 * Split a filename into stem and extension (with its dot). A name whose only
 * dot is leading, like `.bashrc`, has no extension.
 */
export function splitNameAndExtension(filename: string): { stem: string; ext: string } {
	const ext = path.extname(filename);
	const stem = ext ? filename.slice(0, -ext.length) : filename;
	return { stem, ext };
}

export function joinNameAndExtension(stem: string, ext: string): string {
	if (!ext) return stem;
	return `${stem}${ext.startsWith('.') ? ext : `.${ext}`}`;
}
