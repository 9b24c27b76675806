import path from 'node:path';
import picomatch from 'picomatch';

/** `['TXT', '.pdf']` -> `{'.txt', '.pdf'}` */
export function normalizeExtensions(extensions: readonly string[]): Set<string> {
	const out = new Set<string>();
	for (const raw of extensions) {
		const ext = raw.trim().toLowerCase();
		if (!ext || ext === '.') continue;
		out.add(ext.startsWith('.') ? ext : `.${ext}`);
	}
	return out;
}

/**
 * Decides which entries a run looks at. Exclude globs are matched against the
 * basename; the extension filter only applies to files.
 */
export class Matcher {
	private readonly excludeMatchers: ((s: string) => boolean)[];
	private readonly extensions: Set<string>;
	private readonly includeHidden: boolean;

	constructor(options: { extensions?: readonly string[]; exclude?: readonly string[]; includeHidden?: boolean } = {}) {
		this.includeHidden = options.includeHidden ?? false;
		this.extensions = normalizeExtensions(options.extensions ?? []);
		this.excludeMatchers = (options.exclude ?? []).map((g) => picomatch(g, { dot: true, nocase: true }));
	}

	/** Whether a directory should be visited (and, when collecting directories, listed). */
	acceptsEntry(basename: string): boolean {
		if (!basename) return false;
		if (!this.includeHidden && basename.startsWith('.')) return false;
		return !this.excludeMatchers.some((m) => m(basename));
	}

	matchesExtension(basename: string): boolean {
		if (this.extensions.size === 0) return true;
		return this.extensions.has(path.extname(basename).toLowerCase());
	}

	acceptsFile(basename: string): boolean {
		return this.acceptsEntry(basename) && this.matchesExtension(basename);
	}
}
