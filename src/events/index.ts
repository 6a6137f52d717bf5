export type {
	AccountPaused,
	AccountResumed,
	CollateralDeposited,
	CollateralReleased,
	CollateralReserved,
	CollateralWithdrawn,
	DailyLossBreached,
	DomainEvent,
	DomainEventDraft,
	DomainEventOf,
	DomainEventType,
	EvaluationFailed,
	EvaluationPassed,
	EvaluationStarted,
	ExposureUpdated,
	FeedHalted,
	FeedRegistered,
	FeedRemoved,
	FeedResumed,
	FeedUpdated,
	FundedAccountCreated,
	PayoutExecuted,
	PoolRatiosUpdated,
	PositionClosed,
	PositionOpened,
	PriceRejected,
	RulesUpdated,
} from "./domain-events.js";

export { EventDispatcher } from "./event-dispatcher.js";
export type { EventDispatcherOptions, HandlerErrorCallback } from "./event-dispatcher.js";
export { MemoryEventLog } from "./memory-event-log.js";
