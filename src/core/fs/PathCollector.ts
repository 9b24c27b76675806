import type { Dirent } from 'node:fs';
import path from 'node:path';
import { Matcher } from '../rename/Matcher.js';
import { FsSafe, isPermissionError } from './FsSafe.js';

export type CollectOptions = {
	recursive: boolean;
	matcher?: Matcher;
	fsSafe?: FsSafe;
	/** Called for each subdirectory that cannot be listed. Its subtree is skipped. */
	onUnreadable?: (dir: string, err: NodeJS.ErrnoException) => void;
};

type Walk = {
	root: string;
	recursive: boolean;
	matcher: Matcher;
	fsSafe: FsSafe;
	onUnreadable?: (dir: string, err: NodeJS.ErrnoException) => void;
	visit: (full: string, kind: 'file' | 'directory') => void;
};

function byPath(a: string, b: string): number {
	if (a === b) return 0;
	return a < b ? -1 : 1;
}

export function pathDepth(p: string): number {
	return path.resolve(p).split(path.sep).filter(Boolean).length;
}

/** Deepest first, so a child is renamed before any of its ancestors move. */
export function sortDeepestFirst(dirs: readonly string[]): string[] {
	return [...dirs].sort((a, b) => pathDepth(b) - pathDepth(a) || byPath(a, b));
}

// An unreadable root is an error; below it, permission failures skip the subtree.
async function walk(dir: string, w: Walk): Promise<void> {
	let entries: Dirent[];
	try {
		entries = await w.fsSafe.readDir(dir);
	} catch (err) {
		if (dir === w.root || !isPermissionError(err)) throw err;
		w.onUnreadable?.(dir, err);
		return;
	}
	for (const entry of entries) {
		const full = path.join(dir, entry.name);
		if (entry.isDirectory()) {
			if (!w.matcher.acceptsEntry(entry.name)) continue;
			w.visit(full, 'directory');
			if (w.recursive) await walk(full, w);
		} else if (entry.isFile()) {
			if (w.matcher.acceptsFile(entry.name)) w.visit(full, 'file');
		}
	}
}

function start(root: string, options: CollectOptions, visit: Walk['visit']): Walk {
	return {
		root,
		recursive: options.recursive,
		matcher: options.matcher ?? new Matcher(),
		fsSafe: options.fsSafe ?? new FsSafe(),
		onUnreadable: options.onUnreadable,
		visit,
	};
}

/**
 * Files to process, sorted by path. A file given as the root is only checked
 * against the extension filter. Symlinks are not followed.
 */
export async function collectFiles(root: string, options: CollectOptions): Promise<string[]> {
	const resolved = path.resolve(root);
	const files: string[] = [];
	const w = start(resolved, options, (full, kind) => {
		if (kind === 'file') files.push(full);
	});
	if ((await w.fsSafe.entryType(resolved)) === 'file') {
		return w.matcher.matchesExtension(path.basename(resolved)) ? [resolved] : [];
	}

	await walk(resolved, w);
	return files.sort(byPath);
}

/** Directories below `root` (never `root` itself), deepest first. */
export async function collectDirectories(root: string, options: CollectOptions): Promise<string[]> {
	const resolved = path.resolve(root);
	const dirs: string[] = [];
	const w = start(resolved, options, (full, kind) => {
		if (kind === 'directory') dirs.push(full);
	});
	if ((await w.fsSafe.entryType(resolved)) !== 'directory') return [];

	await walk(resolved, w);
	return sortDeepestFirst(dirs);
}
