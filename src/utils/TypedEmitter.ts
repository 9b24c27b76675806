import { EventEmitter } from 'node:events';

type Listener<T> = (payload: T) => void;

/** EventEmitter keyed by an event map. `on` hands back its own unsubscribe. */
export class TypedEmitter<Events extends Record<string, unknown>> {
	private emitter = new EventEmitter();

	on<K extends keyof Events & string>(event: K, listener: Listener<Events[K]>): () => void {
		this.emitter.on(event, listener as (...args: unknown[]) => void);
		return () => {
			this.emitter.off(event, listener as (...args: unknown[]) => void);
		};
	}

	emit<K extends keyof Events & string>(event: K, payload: Events[K]): void {
		this.emitter.emit(event, payload);
	}
}
