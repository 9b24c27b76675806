import path from 'node:path';
import type {
	IRenameService,
	NormalizationResult,
	NormalizeDirectoryOptions,
	NormalizeFileOptions,
} from '../../types/index.js';
import { creationDate, formatDate } from '../dates/DateExtractor.js';
import { FsSafe } from '../fs/FsSafe.js';
import { normalizeDirectoryName, normalizeFilename } from './FilenameNormalizer.js';
import { splitNameAndExtension } from './NameSanitizer.js';

/**
 * Normalizes single entries and picks collision-free destinations.
 *
 * Dry runs leave the filesystem alone, so the service keeps its own view of the
 * namespace instead: targets handed out earlier count as taken and sources
 * already moved away count as free. A dry run over a batch therefore reports
 * the same names a real run would. Use one instance per run.
 */
export class RenameService implements IRenameService {
	private readonly claimedTargets = new Set<string>();
	private readonly vacatedSources = new Set<string>();

	constructor(private readonly fsSafe: FsSafe = new FsSafe()) {}

	async normalizeFile(filePath: string, options: NormalizeFileOptions): Promise<NormalizationResult | null> {
		const from = path.resolve(filePath);
		const st = await this.fsSafe.statOrNull(from);
		if (!st?.isFile()) return null;

		const created = options.addDatePrefix ? formatDate(creationDate(st), options.dateFormat) : null;
		const name = path.basename(from);
		const target = normalizeFilename(name, {
			addDatePrefix: options.addDatePrefix,
			creationDate: created,
			dateFormat: options.dateFormat,
		});
		if (target === name) return null;

		return await this.apply(from, path.join(path.dirname(from), target), options.dryRun);
	}

	async normalizeDirectory(
		dirPath: string,
		options: NormalizeDirectoryOptions,
	): Promise<NormalizationResult | null> {
		const from = path.resolve(dirPath);
		const st = await this.fsSafe.statOrNull(from);
		if (!st?.isDirectory()) return null;

		const name = path.basename(from);
		const target = normalizeDirectoryName(name);
		if (target === name) return null;

		return await this.apply(from, path.join(path.dirname(from), target), options.dryRun);
	}

	/**
	 * Return `desired` when it is free (or is `original` itself, including a
	 * case-only respelling of it); otherwise the first free `<stem>-N<ext>`,
	 * counting from 1.
	 *
	 * Check-then-use: another process can still take the name before the rename
	 * happens. `FsSafe.renameNoClobber` turns that into an EEXIST.
	 */
	async resolveConflict(desired: string, original: string): Promise<string> {
		if (!(await this.isTaken(desired, original))) return desired;

		const dir = path.dirname(desired);
		const { stem, ext } = splitNameAndExtension(path.basename(desired));
		let n = 1;
		while (true) {
			const candidate = path.join(dir, `${stem}-${n}${ext}`);
			if (!(await this.isTaken(candidate, original))) return candidate;
			n++;
		}
	}

	private async apply(from: string, desired: string, dryRun: boolean): Promise<NormalizationResult> {
		const to = await this.resolveConflict(desired, from);
		if (dryRun) {
			this.claimedTargets.add(to);
			this.vacatedSources.add(from);
			this.claimedTargets.delete(from);
		} else {
			await this.fsSafe.renameNoClobber(from, to);
		}
		return { from, to };
	}

	private async isTaken(candidate: string, original: string): Promise<boolean> {
		if (candidate === original) return false;
		if (this.claimedTargets.has(candidate)) return true;
		if (this.vacatedSources.has(candidate)) return false;
		if (!(await this.fsSafe.exists(candidate))) return false;
		return !(await this.fsSafe.isCaseVariant(original, candidate));
	}
}
