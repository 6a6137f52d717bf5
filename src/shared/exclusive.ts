/**
 * ExclusiveSection — per-resource single-writer guard.
 *
 * Core operations are synchronous, so interleaving can only happen through
 * re-entry (a subscriber or collaborator calling back into the resource
 * mid-mutation). Entering a busy section throws instead of interleaving.
 */

import { ReentrancyError } from "./errors.js";

export class ExclusiveSection {
	private readonly resource: string;
	private busy = false;

	constructor(resource: string) {
		this.resource = resource;
	}

	/** Run `fn` holding the section. Throws ReentrancyError if it is already held. */
	run<T>(fn: () => T): T {
		if (this.busy) {
			throw new ReentrancyError(`${this.resource} re-entered during a mutation`, {
				resource: this.resource,
			});
		}
		this.busy = true;
		try {
			return fn();
		} finally {
			this.busy = false;
		}
	}

	isHeld(): boolean {
		return this.busy;
	}
}
