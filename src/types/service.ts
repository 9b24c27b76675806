export type EntryKind = 'file' | 'directory';

export type ServiceItemEvent =
	| { kind: 'preview'; entry: EntryKind; from: string; to: string }
	| { kind: 'applied'; entry: EntryKind; from: string; to: string }
	| { kind: 'error'; entry: EntryKind; from: string; message: string };

export type RunSummary = {
	dryRun: boolean;
	files: number;
	directories: number;
	failures: number;
	dirsProcessed: boolean;
};

export type ServiceEventMap = {
	item: ServiceItemEvent;
	summary: RunSummary;
};
