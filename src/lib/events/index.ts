import { EventEmitter } from "eventemitter3";

/**
 * Typed event map -- keys are channel names, values are handler signatures.
 * Example: { record: (r: PoolRecord) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/**
 * Type-safe emitter over eventemitter3. Handlers run synchronously, in
 * registration order, on the emitting call stack.
 *
 * @example
 * ```ts
 * type Events = { record: (r: PoolRecord) => void };
 * const emitter = new TypedEmitter<Events>();
 * const off = emitter.on("record", (r) => audit(r));
 * emitter.emit("record", record);
 * off();
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	/** Registers a handler and returns a function that removes it. */
	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): () => void {
		this.ee.on(event, handler as (...args: unknown[]) => void);
		return () => {
			this.ee.off(event, handler as (...args: unknown[]) => void);
		};
	}

	/** Registers a handler that is removed after its first call. */
	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): () => void {
		this.ee.once(event, handler as (...args: unknown[]) => void);
		return () => {
			this.ee.off(event, handler as (...args: unknown[]) => void);
		};
	}

	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	removeAllListeners(): void {
		this.ee.removeAllListeners();
	}
}
