/**
 * Capital ledger — firm-level capital bookkeeping lives outside the core.
 *
 * The core only asks: allocate capital to a new funded account, and accept
 * the pool's share of a payout.
 */

import { AlreadyExistsError, LimitBreachError, type RiskEngineError, ValidationError } from "../shared/errors.js";
import { checkedAdd } from "../shared/fixed-point.js";
import type { AccountId } from "../shared/identifiers.js";
import { type Result, err, ok } from "../shared/result.js";

export interface CapitalLedger {
	allocate(accountId: AccountId, amount: bigint): Result<void, RiskEngineError>;
	receiveShare(accountId: AccountId, amount: bigint): Result<void, RiskEngineError>;
}

// ── In-memory implementation ─────────────────────────────────────────

export interface MemoryCapitalLedgerConfig {
	/** Capital available for allocation; unbounded when omitted */
	readonly capacity?: bigint | undefined;
}

export interface ShareReceipt {
	readonly accountId: AccountId;
	readonly amount: bigint;
}

export class MemoryCapitalLedger implements CapitalLedger {
	private readonly allocations = new Map<AccountId, bigint>();
	private readonly receipts: ShareReceipt[] = [];
	private readonly capacity: bigint | null;
	private allocated = 0n;

	constructor(config?: MemoryCapitalLedgerConfig) {
		this.capacity = config?.capacity ?? null;
	}

	allocate(accountId: AccountId, amount: bigint): Result<void, RiskEngineError> {
		if (amount <= 0n) return err(new ValidationError("Allocation must be positive", { accountId, amount }));
		if (this.allocations.has(accountId)) {
			return err(new AlreadyExistsError("Account already has an allocation", { accountId }));
		}
		const next = checkedAdd(this.allocated, amount);
		if (this.capacity !== null && next > this.capacity) {
			return err(
				new LimitBreachError("Allocation exceeds ledger capacity", "capital", {
					accountId,
					amount,
					remaining: this.capacity - this.allocated,
				}),
			);
		}
		this.allocations.set(accountId, amount);
		this.allocated = next;
		return ok(undefined);
	}

	receiveShare(accountId: AccountId, amount: bigint): Result<void, ValidationError> {
		if (amount < 0n) return err(new ValidationError("Share cannot be negative", { accountId, amount }));
		this.receipts.push({ accountId, amount });
		return ok(undefined);
	}

	allocationOf(accountId: AccountId): bigint {
		return this.allocations.get(accountId) ?? 0n;
	}

	totalAllocated(): bigint {
		return this.allocated;
	}

	totalReceived(): bigint {
		return this.receipts.reduce((sum, r) => sum + r.amount, 0n);
	}

	receiptsOf(accountId: AccountId): ShareReceipt[] {
		return this.receipts.filter((r) => r.accountId === accountId);
	}
}
