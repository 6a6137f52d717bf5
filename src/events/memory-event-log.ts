/**
 * MemoryEventLog — in-memory, append-only sink for domain events.
 *
 * Subscribes to every event on a dispatcher. Used by tests and the example
 * walkthrough; not persisted across restarts.
 */

import type { DomainEvent, DomainEventOf, DomainEventType } from "./domain-events.js";
import type { EventDispatcher } from "./event-dispatcher.js";

export class MemoryEventLog {
	private readonly store: DomainEvent[] = [];
	private readonly detach: () => void;

	constructor(dispatcher: EventDispatcher) {
		this.detach = dispatcher.on("*", (event) => {
			this.store.push(event);
		});
	}

	/** Returns a shallow copy of every recorded event. */
	entries(): DomainEvent[] {
		return [...this.store];
	}

	ofType<T extends DomainEventType>(type: T): DomainEventOf<T>[] {
		return this.store.filter((e): e is DomainEventOf<T> => e.type === type);
	}

	types(): DomainEventType[] {
		return this.store.map((e) => e.type);
	}

	clear(): void {
		this.store.length = 0;
	}

	/** Stop recording. */
	close(): void {
		this.detach();
	}

	get size(): number {
		return this.store.length;
	}
}
