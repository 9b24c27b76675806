import fs from 'node:fs';
import path from 'node:path';
import type { ILogger } from '../../types/index.js';
import { logsDir } from '../../utils/paths.js';

type Level = 'info' | 'warn' | 'error' | 'debug';

export type LoggerOptions = {
	/** Log file path. `undefined` uses `<logsDir>/session.log`; `null` disables the file. */
	file?: string | null;
	/** Echo human-readable lines. Goes to stderr: stdout carries rename output. */
	echo?: boolean;
	echoStream?: NodeJS.WritableStream;
	ringSize?: number;
};

export class Logger implements ILogger {
	private stream: fs.WriteStream | null = null;
	private ring: string[] = [];
	private readonly max: number;
	private readonly echo: boolean;
	private readonly echoStream: NodeJS.WritableStream;
	readonly logFile: string | null;

	constructor(options: LoggerOptions = {}) {
		this.max = options.ringSize ?? 500;
		this.echo = options.echo ?? false;
		this.echoStream = options.echoStream ?? process.stderr;
		this.logFile = options.file === undefined ? path.join(logsDir(), 'session.log') : options.file;
		if (this.logFile) this.open(this.logFile);
	}

	private open(file: string) {
		try {
			fs.mkdirSync(path.dirname(file), { recursive: true });
			const stream = fs.createWriteStream(file, { flags: 'a', encoding: 'utf8' });
			stream.on('error', (err) => {
				this.stream = null;
				this.warn('log file unavailable', { file, error: err.message });
			});
			this.stream = stream;
		} catch (err) {
			this.stream = null;
			this.warn('log file unavailable', { file, error: err instanceof Error ? err.message : String(err) });
		}
	}

	private pushRing(line: string) {
		this.ring.push(line);
		if (this.ring.length > this.max) this.ring.shift();
	}

	private write(level: Level, msg: string, meta?: Record<string, unknown>) {
		const ts = new Date().toISOString();
		const rec = { ts, level, msg, ...(meta ? { meta } : {}) };
		const line = JSON.stringify(rec);
		this.pushRing(line);
		this.stream?.write(`${line}\n`);
		if (this.echo) {
			this.echoStream.write(`[${ts}] ${level.toUpperCase()} ${msg}\n`);
		}
	}

	info(msg: string, meta?: Record<string, unknown>): void {
		this.write('info', msg, meta);
	}
	warn(msg: string, meta?: Record<string, unknown>): void {
		this.write('warn', msg, meta);
	}
	error(msg: string | Error, meta?: Record<string, unknown>): void {
		if (msg instanceof Error) this.write('error', msg.message, { stack: msg.stack, ...meta });
		else this.write('error', msg, meta);
	}
	debug(msg: string, meta?: Record<string, unknown>): void {
		this.write('debug', msg, meta);
	}

	getRing(): string[] {
		return [...this.ring];
	}

	/** Flush and release the log file. */
	close(): Promise<void> {
		const stream = this.stream;
		this.stream = null;
		if (!stream) return Promise.resolve();
		return new Promise((resolve) => {
			stream.end(() => resolve());
		});
	}
}
