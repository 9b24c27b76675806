import path from 'node:path';
import type { IConfig, ILogger, IRenameService, NormalizationResult } from '../types/index.js';
import type { EntryKind, RunSummary, ServiceEventMap } from '../types/service.js';
import { TypedEmitter } from '../utils/TypedEmitter.js';
import { FsSafe } from './fs/FsSafe.js';
import { collectDirectories, collectFiles } from './fs/PathCollector.js';
import { Matcher } from './rename/Matcher.js';
import { RenameService } from './rename/RenameService.js';

export class PathNotFoundError extends Error {
	constructor(readonly path: string) {
		super(`${path} does not exist`);
		this.name = 'PathNotFoundError';
	}
}

const silentLogger: ILogger = {
	info: () => {},
	warn: () => {},
	error: () => {},
};

/**
 * Runs a whole tree through the rename pipeline: files first, then (optionally)
 * directories deepest-first. Items are handled one at a time; a failure is
 * reported and the run moves on. Subdirectories that cannot be listed are
 * reported the same way and skipped.
 *
 * Emits typed events (`ServiceEventMap`) for front-ends to render.
 */
export class NormalizeService {
	private emitter = new TypedEmitter<ServiceEventMap>();
	private readonly logger: ILogger;
	private readonly fsSafe: FsSafe;
	private readonly createRenamer: (fsSafe: FsSafe) => IRenameService;

	constructor(
		deps: {
			logger?: ILogger;
			fsSafe?: FsSafe;
			renamerFactory?: (fsSafe: FsSafe) => IRenameService;
		} = {},
	) {
		this.logger = deps.logger ?? silentLogger;
		this.fsSafe = deps.fsSafe ?? new FsSafe();
		this.createRenamer = deps.renamerFactory ?? ((fsSafe) => new RenameService(fsSafe));
	}

	on<K extends keyof ServiceEventMap & string>(
		event: K,
		listener: (payload: ServiceEventMap[K]) => void,
	): () => void {
		return this.emitter.on(event, listener);
	}

	async run(root: string, config: IConfig): Promise<RunSummary> {
		const resolved = path.resolve(root);
		const rootType = await this.fsSafe.entryType(resolved);
		if (!rootType) throw new PathNotFoundError(resolved);

		// One renamer per run: its dry-run bookkeeping must not leak across runs.
		const renamer = this.createRenamer(this.fsSafe);
		const matcher = new Matcher({
			extensions: config.extensions,
			exclude: config.exclude,
			includeHidden: config.includeHidden,
		});
		this.logger.info('run started', { root: resolved, dryRun: config.dryRun, dateFormat: config.dateFormat });

		const summary: RunSummary = {
			dryRun: config.dryRun,
			files: 0,
			directories: 0,
			failures: 0,
			dirsProcessed: config.dirs,
		};

		// Both passes walk the tree; report each unreadable directory once.
		const unreadable = new Set<string>();
		const collect = {
			recursive: config.recursive,
			matcher,
			fsSafe: this.fsSafe,
			onUnreadable: (dir: string, err: NodeJS.ErrnoException) => {
				if (unreadable.has(dir)) return;
				unreadable.add(dir);
				summary.failures++;
				this.logger.warn('skipped unreadable directory', { path: dir, code: err.code });
				this.emitter.emit('item', { kind: 'error', entry: 'directory', from: dir, message: err.message });
			},
		};

		const files = await collectFiles(resolved, collect);
		for (const file of files) {
			const ok = await this.processItem('file', file, config.dryRun, () =>
				renamer.normalizeFile(file, {
					addDatePrefix: config.addDate,
					dryRun: config.dryRun,
					dateFormat: config.dateFormat,
				}),
			);
			if (ok === null) summary.failures++;
			else if (ok) summary.files++;
		}

		if (config.dirs && rootType === 'directory') {
			const dirs = await collectDirectories(resolved, collect);
			for (const dir of dirs) {
				const ok = await this.processItem('directory', dir, config.dryRun, () =>
					renamer.normalizeDirectory(dir, { dryRun: config.dryRun }),
				);
				if (ok === null) summary.failures++;
				else if (ok) summary.directories++;
			}
		}

		this.logger.info('run finished', { ...summary });
		this.emitter.emit('summary', summary);
		return summary;
	}

	/** true: renamed, false: already normalized, null: failed. */
	private async processItem(
		entry: EntryKind,
		from: string,
		dryRun: boolean,
		work: () => Promise<NormalizationResult | null>,
	): Promise<boolean | null> {
		let result: NormalizationResult | null;
		try {
			result = await work();
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			this.logger.error(err instanceof Error ? err : message, { entry, path: from });
			this.emitter.emit('item', { kind: 'error', entry, from, message });
			return null;
		}

		if (!result) {
			this.logger.debug?.('unchanged', { entry, path: from });
			return false;
		}

		const kind = dryRun ? 'preview' : 'applied';
		this.logger.info(kind, { entry, from: result.from, to: result.to });
		this.emitter.emit('item', { kind, entry, from: result.from, to: result.to });
		return true;
	}
}
