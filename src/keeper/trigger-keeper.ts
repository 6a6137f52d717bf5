/**
 * TriggerKeeper — closes triggered positions as prices arrive.
 *
 * Subscribes to the registry's tick stream. On each accepted tick it runs
 * the permissionless trigger check on every watched open position of that
 * symbol. The feed has already committed the tick by the time the handler
 * runs, so a close always prices off the tick that caused it.
 */

import type { FeedRegistry } from "../feeds/feed-registry.js";
import type { FundedAccountEngine } from "../funded/funded-account-engine.js";
import { TypedEmitter, type Unsubscribe } from "../lib/events/index.js";
import { type Logger, silentLogger } from "../lib/logger/index.js";
import type { ClosedPosition, OpenPosition } from "../position/types.js";
import type { QualificationEngine } from "../qualification/qualification-engine.js";
import { EvaluationStatus } from "../qualification/types.js";
import { AlreadyExistsError, type RiskEngineError } from "../shared/errors.js";
import type { FeedSymbol, PositionId, PrincipalId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

/** Something the keeper can sweep: a funded account or one evaluation. */
interface Target {
	readonly key: string;
	openPositions(): readonly OpenPosition[];
	check(positionId: PositionId): Result<ClosedPosition | null, RiskEngineError>;
}

export interface KeeperClose {
	readonly target: string;
	readonly position: ClosedPosition;
}

export interface KeeperFailure {
	readonly target: string;
	readonly positionId: PositionId;
	readonly error: RiskEngineError;
}

export interface SweepReport {
	readonly symbol: FeedSymbol;
	readonly closed: readonly KeeperClose[];
	readonly failed: readonly KeeperFailure[];
}

type KeeperEvents = {
	sweep: (report: SweepReport) => void;
};

export interface TriggerKeeperOptions {
	readonly registry: FeedRegistry;
	readonly logger?: Logger | undefined;
}

export class TriggerKeeper {
	private readonly registry: FeedRegistry;
	private readonly logger: Logger;
	private readonly targets = new Map<string, Target>();
	private readonly emitter = new TypedEmitter<KeeperEvents>();
	private detach: Unsubscribe | null = null;

	constructor(options: TriggerKeeperOptions) {
		this.registry = options.registry;
		this.logger = (options.logger ?? silentLogger()).child({ component: "keeper" });
	}

	// ── Watch list ──────────────────────────────────────────────────

	watchAccount(engine: FundedAccountEngine): Result<string, AlreadyExistsError> {
		return this.add({
			key: `funded:${engine.accountId}`,
			openPositions: () => engine.openPositions(),
			check: (id) => {
				const outcome = engine.checkStopLoss(id);
				if (!outcome.ok) return outcome;
				return ok(outcome.value === null ? null : outcome.value.position);
			},
		});
	}

	watchEvaluation(engine: QualificationEngine, owner: PrincipalId): Result<string, AlreadyExistsError> {
		return this.add({
			key: `evaluation:${owner}`,
			openPositions: () => {
				const evaluation = engine.getEvaluation(owner);
				return evaluation.ok && evaluation.value.status === EvaluationStatus.Active ? engine.openPositions(owner) : [];
			},
			check: (id) => {
				const outcome = engine.checkTriggers(owner, id);
				if (!outcome.ok) return outcome;
				return ok(outcome.value === null ? null : outcome.value.position);
			},
		});
	}

	unwatch(key: string): boolean {
		return this.targets.delete(key);
	}

	watched(): string[] {
		return [...this.targets.keys()];
	}

	// ── Lifecycle ───────────────────────────────────────────────────

	start(): void {
		if (this.detach !== null) return;
		this.detach = this.registry.onTick((symbol) => {
			this.sweep(symbol);
		});
		this.logger.info({ targets: this.targets.size }, "keeper started");
	}

	stop(): void {
		if (this.detach === null) return;
		this.detach();
		this.detach = null;
		this.logger.info("keeper stopped");
	}

	get running(): boolean {
		return this.detach !== null;
	}

	onSweep(handler: KeeperEvents["sweep"]): Unsubscribe {
		return this.emitter.on("sweep", handler);
	}

	/**
	 * Check every watched open position on `symbol`. Rejections are collected
	 * in the report; fatal errors propagate.
	 */
	sweep(symbol: FeedSymbol): SweepReport {
		const closed: KeeperClose[] = [];
		const failed: KeeperFailure[] = [];

		for (const target of this.targets.values()) {
			const pending = target
				.openPositions()
				.filter((p) => p.symbol === symbol)
				.map((p) => p.id);
			for (const positionId of pending) {
				// an earlier close may have ended the evaluation
				if (!target.openPositions().some((p) => p.id === positionId)) continue;
				const result = target.check(positionId);
				if (!result.ok) {
					this.logger.warn({ target: target.key, positionId, code: result.error.code }, "trigger check failed");
					failed.push({ target: target.key, positionId, error: result.error });
				} else if (result.value !== null) {
					this.logger.info({ target: target.key, positionId, reason: result.value.closeReason }, "position closed by keeper");
					closed.push({ target: target.key, position: result.value });
				}
			}
		}

		const report: SweepReport = { symbol, closed, failed };
		if (closed.length > 0 || failed.length > 0) {
			this.emitter.emit("sweep", report);
		}
		return report;
	}

	// ── Internal ────────────────────────────────────────────────────

	private add(target: Target): Result<string, AlreadyExistsError> {
		if (this.targets.has(target.key)) {
			return err(new AlreadyExistsError("Target is already watched", { target: target.key }));
		}
		this.targets.set(target.key, target);
		return ok(target.key);
	}
}
