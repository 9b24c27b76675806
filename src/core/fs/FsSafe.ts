import fs from 'node:fs/promises';
import type { Dirent, Stats } from 'node:fs';
import path from 'node:path';

export type EntryType = 'file' | 'directory' | 'other';

export class FsSafe {
	/** Stats for a path, or null when nothing is there. Other failures propagate. */
	async statOrNull(p: string): Promise<Stats | null> {
		try {
			return await fs.stat(p);
		} catch (err) {
			if (isMissingError(err)) return null;
			throw err;
		}
	}

	async exists(p: string): Promise<boolean> {
		return (await this.statOrNull(p)) !== null;
	}

	async entryType(p: string): Promise<EntryType | null> {
		const st = await this.statOrNull(p);
		if (!st) return null;
		if (st.isFile()) return 'file';
		if (st.isDirectory()) return 'directory';
		return 'other';
	}

	async readDir(dir: string): Promise<Dirent[]> {
		return await fs.readdir(dir, { withFileTypes: true });
	}

	/** True when both paths resolve to the same inode, hard links included. */
	async isSameEntry(a: string, b: string): Promise<boolean> {
		const [sa, sb] = [await this.statOrNull(a), await this.statOrNull(b)];
		if (!sa || !sb) return false;
		return sa.dev === sb.dev && sa.ino === sb.ino;
	}

	/**
	 * True when `b` is only another spelling of `a` on a case-insensitive
	 * volume: same inode, and no directory entry named exactly `b`. A hard
	 * link under the other name is a separate entry and does not count.
	 */
	async isCaseVariant(a: string, b: string): Promise<boolean> {
		if (a === b || a.toLowerCase() !== b.toLowerCase()) return false;
		if (!(await this.isSameEntry(a, b))) return false;
		const name = path.basename(b);
		const entries = await this.readDir(path.dirname(b));
		return !entries.some((entry) => entry.name === name);
	}

	/**
	 * Rename without replacing an entry that appeared at `to` after the caller
	 * checked it. Files go through link + unlink so an occupied target fails
	 * with EEXIST; directories are re-checked right before the rename. Errors
	 * are not retried.
	 */
	async renameNoClobber(from: string, to: string): Promise<void> {
		if (await this.isCaseVariant(from, to)) {
			await fs.rename(from, to);
			return;
		}

		const st = await fs.stat(from);
		if (st.isFile()) {
			try {
				await fs.link(from, to);
			} catch (err) {
				if (!isLinkUnsupportedError(err)) throw err;
				await this.guardedRename(from, to);
				return;
			}
			await fs.unlink(from);
			return;
		}

		await this.guardedRename(from, to);
	}

	private async guardedRename(from: string, to: string): Promise<void> {
		if (await this.exists(to)) {
			throw existsError(to);
		}
		await fs.rename(from, to);
	}
}

export function isMissingError(err: unknown): err is NodeJS.ErrnoException {
	return hasCode(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

export function isPermissionError(err: unknown): err is NodeJS.ErrnoException {
	return hasCode(err) && (err.code === 'EACCES' || err.code === 'EPERM');
}

function isLinkUnsupportedError(err: unknown): err is NodeJS.ErrnoException {
	return hasCode(err) && (err.code === 'EPERM' || err.code === 'ENOTSUP' || err.code === 'EOPNOTSUPP');
}

function hasCode(err: unknown): err is NodeJS.ErrnoException {
	return typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string';
}

function existsError(p: string): NodeJS.ErrnoException {
	const err: NodeJS.ErrnoException = new Error(`EEXIST: file already exists, rename '${p}'`);
	err.code = 'EEXIST';
	err.path = p;
	return err;
}
