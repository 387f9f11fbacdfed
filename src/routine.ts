/**
 * Routine - one steppable sub-computation of a scope (its body or a job)
 */

import type { Operable, Parked } from "./types.js";

export type StepResult<T> =
	| { readonly done: false }
	| { readonly done: true; readonly value: T };

/**
 * Wraps an operation's iterator and tracks whether it can make progress.
 *
 * A routine is ready when created and again whenever the point it is parked
 * on settles. It is only ever resumed through `step()`; abandoning it drops
 * the iterator without calling `return()` or `throw()`, so no code inside
 * the operation (not even a `finally` block) runs afterwards.
 */
export class Routine<T> {
	private iterator: Iterator<Parked, T, unknown> | undefined;
	private parked: Parked | undefined;
	private ready = true;
	private closed = false;
	private stepCount = 0;
	private readonly start: () => Operable<T>;
	private readonly onReady: () => void;

	constructor(start: () => Operable<T>, onReady: () => void) {
		this.start = start;
		this.onReady = onReady;
	}

	get isReady(): boolean {
		return this.ready && !this.closed;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	get steps(): number {
		return this.stepCount;
	}

	/**
	 * Resume the operation until its next suspension point or its return.
	 * An exception thrown by the operation closes the routine and propagates.
	 */
	step(): StepResult<T> {
		if (this.closed) {
			throw new Error("Cannot step a closed routine");
		}
		this.ready = false;
		this.parked = undefined;
		this.stepCount++;

		let next: IteratorResult<Parked, T>;
		try {
			this.iterator ??= this.start()[Symbol.iterator]();
			next = this.iterator.next();
		} catch (error) {
			this.close();
			throw error;
		}

		if (next.done) {
			this.close();
			return { done: true, value: next.value };
		}

		const parked = next.value;
		this.parked = parked;
		parked.subscribe(() => {
			if (this.closed || this.parked !== parked) return;
			this.ready = true;
			this.onReady();
		});
		return { done: false };
	}

	/**
	 * Drop the operation without resuming it again.
	 */
	abandon(): void {
		if (this.closed) return;
		const parked = this.parked;
		this.close();
		parked?.abandon();
	}

	private close(): void {
		this.closed = true;
		this.ready = false;
		this.parked = undefined;
		this.iterator = undefined;
	}
}
