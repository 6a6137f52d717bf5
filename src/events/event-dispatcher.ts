/**
 * EventDispatcher — typed pub/sub for domain events.
 *
 * Synchronous dispatch; handlers run in registration order after the
 * mutation that produced the event has committed. A throwing handler is
 * reported to the error callback and never reaches the publisher.
 */

import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { DomainEvent, DomainEventDraft, DomainEventType } from "./domain-events.js";

type DomainEventHandler = (event: DomainEvent) => void;

/** Callback invoked when a handler throws during dispatch. */
export type HandlerErrorCallback = (error: unknown, event: DomainEvent) => void;

export interface EventDispatcherOptions {
	readonly logger?: Logger | undefined;
	/** Defaults to logging the error at `error` level */
	readonly onHandlerError?: HandlerErrorCallback | undefined;
}

export class EventDispatcher {
	private readonly handlers = new Map<DomainEventType | "*", DomainEventHandler[]>();
	private readonly onHandlerError: HandlerErrorCallback;
	private nextId = 1;

	constructor(options: EventDispatcherOptions = {}) {
		const logger = options.logger ?? silentLogger();
		this.onHandlerError =
			options.onHandlerError ??
			((error, event) => {
				logger.error({ err: error, eventType: event.type, eventId: event.eventId }, "event handler threw");
			});
	}

	/** Subscribe to a specific domain event type, or "*" for all */
	on(type: DomainEventType | "*", handler: DomainEventHandler): () => void {
		const handlers = this.handlers.get(type) ?? [];
		handlers.push(handler);
		this.handlers.set(type, handlers);

		return () => {
			const list = this.handlers.get(type);
			if (list) {
				const idx = list.indexOf(handler);
				if (idx !== -1) list.splice(idx, 1);
			}
		};
	}

	/** Assign the next event id and deliver to matching handlers. */
	publish(draft: DomainEventDraft): DomainEvent {
		const event: DomainEvent = { ...draft, eventId: this.nextId++ };
		this.dispatchAll(this.handlers.get(event.type), event);
		this.dispatchAll(this.handlers.get("*"), event);
		return event;
	}

	/** Publish drafts in order; used to flush what a committed mutation produced. */
	publishAll(drafts: readonly DomainEventDraft[]): void {
		for (const draft of drafts) {
			this.publish(draft);
		}
	}

	/** Remove all handlers */
	clear(): void {
		this.handlers.clear();
	}

	// ── Internal ──────────────────────────────────────────────────

	private dispatchAll(handlers: DomainEventHandler[] | undefined, event: DomainEvent): void {
		if (!handlers) return;
		for (const handler of [...handlers]) {
			try {
				handler(event);
			} catch (error: unknown) {
				this.onHandlerError(error, event);
			}
		}
	}
}
