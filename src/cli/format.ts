import path from 'node:path';
import type { RunSummary, ServiceItemEvent } from '../types/service.js';

export const DRY_RUN_MARKER = '[DRY RUN] ';

function display(p: string, entry: ServiceItemEvent['entry']): string {
	const name = path.basename(p);
	return entry === 'directory' ? `${name}/` : name;
}

/** `old -> new` for renames (stdout), `error: name: message` for failures (stderr). */
export function formatItem(event: ServiceItemEvent): { stream: 'out' | 'err'; line: string } {
	if (event.kind === 'error') {
		return { stream: 'err', line: `error: ${display(event.from, event.entry)}: ${event.message}` };
	}
	const marker = event.kind === 'preview' ? DRY_RUN_MARKER : '';
	return { stream: 'out', line: `${marker}${display(event.from, event.entry)} -> ${display(event.to, event.entry)}` };
}

export function formatSummary(summary: RunSummary): string[] {
	const action = summary.dryRun ? 'Would rename' : 'Renamed';
	const lines = ['', `${action} ${summary.files} file(s)`];
	if (summary.dirsProcessed) lines.push(`${action} ${summary.directories} directory(ies)`);
	if (summary.failures > 0) lines.push(`Failed ${summary.failures} item(s)`);
	return lines;
}
