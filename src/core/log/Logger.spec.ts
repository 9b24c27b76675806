import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Logger } from './Logger.js';

let tempRoot: string;

beforeEach(async () => {
  tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'tidyname-logger-'));
});

afterEach(async () => {
  await fs.rm(tempRoot, { recursive: true, force: true });
});

describe('Logger', () => {
  it('appends structured lines to the log file', async () => {
    const file = path.join(tempRoot, 'nested', 'session.log');
    const logger = new Logger({ file });
    logger.info('renamed', { from: 'A.txt', to: 'a.txt' });
    logger.error(new Error('boom'));
    await logger.close();

    const lines = (await fs.readFile(file, 'utf8')).trim().split('\n');
    expect(lines).toHaveLength(2);
    const first = JSON.parse(lines[0] ?? '{}');
    expect(first.level).toBe('info');
    expect(first.msg).toBe('renamed');
    expect(first.meta).toEqual({ from: 'A.txt', to: 'a.txt' });
    const second = JSON.parse(lines[1] ?? '{}');
    expect(second.level).toBe('error');
    expect(second.msg).toBe('boom');
    expect(typeof second.meta.stack).toBe('string');
  });

  it('keeps a bounded ring of recent lines', async () => {
    const logger = new Logger({ file: null, ringSize: 2 });
    logger.info('one');
    logger.info('two');
    logger.warn('three');
    const ring = logger.getRing().map((l) => JSON.parse(l).msg);
    expect(ring).toEqual(['two', 'three']);
    await logger.close();
  });

  it('echoes human-readable lines only when asked', async () => {
    const chunks: string[] = [];
    const sink = new Writable({
      write(chunk: Buffer, _enc, cb) {
        chunks.push(chunk.toString('utf8'));
        cb();
      }
    });

    const quiet = new Logger({ file: null, echoStream: sink });
    quiet.info('hidden');
    const loud = new Logger({ file: null, echo: true, echoStream: sink });
    loud.warn('shown');

    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toMatch(/^\[.+\] WARN shown\n$/);
  });
});
