import { Command, CommanderError } from 'commander';
import { createRequire } from 'node:module';
import path from 'node:path';
import type { DateFormat, IConfig, ILogger } from '../types/index.js';
import { resolveConfig } from '../core/config/Config.js';
import { Logger } from '../core/log/Logger.js';
import { NormalizeService, PathNotFoundError } from '../core/NormalizeService.js';
import { explanation } from './explain.js';
import { formatItem, formatSummary } from './format.js';

export type CliIO = {
	out: (line: string) => void;
	err: (line: string) => void;
};

const defaultIO: CliIO = {
	out: (line) => process.stdout.write(`${line}\n`),
	err: (line) => process.stderr.write(`${line}\n`),
};

type CliOptions = {
	recursive?: boolean;
	dryRun?: boolean;
	addDate?: boolean;
	yearMonth?: boolean;
	yearOnly?: boolean;
	ext: string[];
	exclude: string[];
	dirs?: boolean;
	hidden?: boolean;
	verbose?: boolean;
	explain?: boolean;
};

function collect(value: string, previous: string[]): string[] {
	return [...previous, value];
}

/** `--year-only` wins when both granularity flags are given. */
export function dateFormatFromFlags(yearMonth: boolean, yearOnly: boolean): DateFormat | undefined {
	if (yearOnly) return 'year';
	if (yearMonth) return 'year-month';
	return undefined;
}

function readVersion(): string {
	const require = createRequire(import.meta.url);
	const pkg: unknown = require('../../package.json');
	if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
		return pkg.version;
	}
	return '0.0.0';
}

export function createProgram(io: CliIO = defaultIO): Command {
	const program = new Command();
	program
		.name('tidyname')
		.description('Rename files to lowercase, hyphenated names with a standard date prefix')
		.argument('[path]', 'File or directory to process', '.')
		.option('-r, --recursive', 'Process directories recursively')
		.option('-n, --dry-run', 'Show what would be renamed without doing it')
		.option('-d, --add-date', 'Add file creation date as prefix (YYYY-MM-DD)')
		.option('--year-month', 'Use YYYY-MM format for dates')
		.option('--year-only', 'Use YYYY format for dates')
		.option('-e, --ext <ext>', 'Only process files with this extension (repeatable)', collect, [])
		.option('-x, --exclude <glob>', 'Skip entries whose name matches this glob (repeatable)', collect, [])
		.option('--dirs', 'Also normalize directory names')
		.option('--hidden', 'Include entries whose name starts with a dot (skipped by default)')
		.option('--verbose', 'Echo log lines to stderr')
		.option('--explain', 'Describe the renaming rules and exit')
		.version(readVersion(), '-V, --version')
		.allowUnknownOption(false)
		.exitOverride()
		.configureOutput({
			writeOut: (str) => io.out(str.replace(/\n$/, '')),
			writeErr: (str) => io.err(str.replace(/\n$/, '')),
		});
	return program;
}

export function toConfig(opts: CliOptions): Partial<IConfig> {
	const overrides: Partial<IConfig> = {
		recursive: opts.recursive ?? false,
		dryRun: opts.dryRun ?? false,
		addDate: opts.addDate ?? false,
		extensions: opts.ext,
		exclude: opts.exclude,
		dirs: opts.dirs ?? false,
		includeHidden: opts.hidden ?? false,
		verbose: opts.verbose ?? false,
	};
	const dateFormat = dateFormatFromFlags(opts.yearMonth ?? false, opts.yearOnly ?? false);
	if (dateFormat) overrides.dateFormat = dateFormat;
	return overrides;
}

/**
 * Parse `argv`, run the batch and print results. Resolves to the exit code:
 * 0 on success, 1 when the path does not exist or any item failed.
 */
export async function run(
	argv: string[] = process.argv.slice(2),
	io: CliIO = defaultIO,
	deps: { logger?: ILogger & { close?: () => Promise<void> } } = {},
): Promise<number> {
	const program = createProgram(io);
	try {
		program.parse(argv, { from: 'user' });
	} catch (err) {
		if (err instanceof CommanderError) return err.exitCode;
		throw err;
	}

	const opts = program.opts<CliOptions>();
	if (opts.explain) {
		io.out(explanation.trim());
		return 0;
	}

	const config = resolveConfig(toConfig(opts));
	const [rawPath] = program.args;
	const target = path.resolve(rawPath ?? '.');
	const logger = deps.logger ?? new Logger({ echo: config.verbose });
	const service = new NormalizeService({ logger });
	service.on('item', (event) => {
		const { stream, line } = formatItem(event);
		io[stream](line);
	});

	try {
		const summary = await service.run(target, config);
		for (const line of formatSummary(summary)) io.out(line);
		return summary.failures > 0 ? 1 : 0;
	} catch (err) {
		if (err instanceof PathNotFoundError) {
			io.err(`Error: ${err.message}`);
			return 1;
		}
		throw err;
	} finally {
		await logger.close?.();
	}
}
