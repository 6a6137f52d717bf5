import { EventEmitter } from "eventemitter3";

/**
 * Generic typed event map -- keys are event names, values are handler signatures.
 * Example: { tick: (tick: PriceTick) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

/** Call to detach a handler registered with {@link TypedEmitter.on}. */
export type Unsubscribe = () => void;

/**
 * Type-safe event emitter wrapping eventemitter3 with compile-time handler validation.
 *
 * Used for in-process notifications (feed ticks) that are not part of the
 * domain event stream.
 *
 * @example
 * ```ts
 * type Events = { tick: (t: PriceTick) => void };
 * const emitter = new TypedEmitter<Events>();
 * const off = emitter.on("tick", (t) => keeper.onTick(t));
 * emitter.emit("tick", tick);
 * off();
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	/** Registers a handler and returns a function that removes it. */
	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): Unsubscribe {
		this.ee.on(event, handler);
		return () => {
			this.ee.off(event, handler);
		};
	}

	/** Emits an event, invoking all registered handlers in registration order. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		return this.ee.emit(event, ...args);
	}

	/** Returns the number of listeners registered for an event. */
	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}

	/** Removes every handler for every event. */
	clear(): void {
		this.ee.removeAllListeners();
	}
}
