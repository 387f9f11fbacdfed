/**
 * Job records and handles for scopeline
 */

import createDebug from "debug";
import { HandleConsumedError } from "./errors.js";
import { Routine } from "./routine.js";
import { Suspension } from "./suspension.js";
import type { JobState, Operable, Operation, Span } from "./types.js";

const debugJob = createDebug("scopeline:job");

type ResultSlot<T> =
	| { readonly status: "pending" }
	| { readonly status: "done"; readonly value: T }
	| { readonly status: "empty" };

/**
 * The view of a job the driver and the job table work with.
 */
export interface ActiveJob {
	readonly seq: number;
	readonly name: string;
	readonly state: JobState;
	readonly steps: number;
	readonly isReady: boolean;
	readonly span: Span | undefined;
	/**
	 * Advance the job by one step. Returns true once the job is done.
	 */
	step(): boolean;
	discard(): void;
}

/**
 * Per-job state: the job's routine and its completion slot.
 *
 * Only the driver steps or discards a record. Handles read the slot; they
 * never drive execution.
 */
export class JobRecord<T> implements ActiveJob {
	readonly seq: number;
	readonly name: string;
	readonly span: Span | undefined;
	private readonly routine: Routine<T>;
	private lifecycle: JobState = "spawned";
	private slot: ResultSlot<T> = { status: "pending" };
	private waiter: Suspension<T> | undefined;
	private interested = true;

	constructor(
		seq: number,
		name: string,
		operation: Operable<T>,
		onReady: () => void,
		span?: Span,
	) {
		this.seq = seq;
		this.name = name;
		this.span = span;
		this.routine = new Routine(() => operation, onReady);
	}

	get state(): JobState {
		return this.lifecycle;
	}

	get steps(): number {
		return this.routine.steps;
	}

	get isReady(): boolean {
		return this.routine.isReady;
	}

	get hasHandle(): boolean {
		return this.interested;
	}

	step(): boolean {
		if (this.lifecycle === "done" || this.lifecycle === "discarded") {
			throw new Error(`Cannot step ${this.lifecycle} job "${this.name}"`);
		}
		this.lifecycle = "running";
		const result = this.routine.step();
		if (!result.done) return false;

		this.lifecycle = "done";
		this.deliver(result.value);
		return true;
	}

	/**
	 * Drop the job without stepping it again. A pending join on its handle
	 * never resumes.
	 */
	discard(): void {
		if (this.lifecycle === "done" || this.lifecycle === "discarded") return;
		this.lifecycle = "discarded";
		this.routine.abandon();
		if (debugJob.enabled) {
			debugJob("[%s] discarded after %d steps", this.name, this.steps);
		}
	}

	/**
	 * The value if the job is done and it has not been taken yet.
	 */
	takeIfDone(): { readonly value: T } | undefined {
		const slot = this.slot;
		if (slot.status !== "done") return undefined;
		this.slot = { status: "empty" };
		return { value: slot.value };
	}

	/**
	 * A parked point that settles with the value once the job is done.
	 */
	awaitResult(): Suspension<T> {
		const waiter = new Suspension<T>();
		const ready = this.takeIfDone();
		if (ready) {
			waiter.resolve(ready.value);
		} else if (this.lifecycle !== "discarded") {
			this.waiter = waiter;
		}
		return waiter;
	}

	/**
	 * Drop interest in the result. The job keeps running.
	 */
	detach(): void {
		this.interested = false;
		this.waiter = undefined;
		if (this.slot.status === "done") {
			this.slot = { status: "empty" };
		}
	}

	private deliver(value: T): void {
		if (!this.interested) {
			this.slot = { status: "empty" };
			if (debugJob.enabled) {
				debugJob("[%s] done, result dropped (handle detached)", this.name);
			}
			return;
		}
		const waiter = this.waiter;
		if (waiter) {
			this.waiter = undefined;
			this.slot = { status: "empty" };
			waiter.resolve(value);
		} else {
			this.slot = { status: "done", value };
		}
		if (debugJob.enabled) {
			debugJob("[%s] done after %d steps", this.name, this.steps);
		}
	}
}

/**
 * A caller-visible reference to a job's eventual value.
 *
 * `yield*` the handle (or `handle.join()`) inside the body or another job to
 * wait for the value. The value can be read once.
 *
 * @example
 * ```typescript
 * const result = await scope(function* (s) {
 *   const a = s.spawn(fetchA())
 *   const b = s.spawn(fetchB())
 *   return (yield* a) + (yield* b)
 * })
 * ```
 */
export class JobHandle<T> implements Operable<T>, Disposable {
	private claim: "free" | "joined" | "detached" = "free";
	private readonly record: JobRecord<T>;

	constructor(record: JobRecord<T>) {
		this.record = record;
	}

	get id(): number {
		return this.record.seq;
	}

	get name(): string {
		return this.record.name;
	}

	get state(): JobState {
		return this.record.state;
	}

	/**
	 * Wait for the job and return its value by move.
	 * Throws HandleConsumedError if the value was already taken.
	 */
	*join(): Operation<T> {
		if (this.claim !== "free") {
			throw new HandleConsumedError(this.record.name);
		}
		this.claim = "joined";

		const ready = this.record.takeIfDone();
		if (ready) return ready.value;

		const waiter = this.record.awaitResult();
		yield waiter;
		return waiter.take();
	}

	[Symbol.iterator](): Operation<T> {
		return this.join();
	}

	/**
	 * Drop interest in the result without affecting the job.
	 *
	 * A no-op once `join()` has started: the joining routine still receives
	 * the value.
	 */
	detach(): void {
		if (this.claim !== "free") return;
		this.claim = "detached";
		this.record.detach();
	}

	[Symbol.dispose](): void {
		this.detach();
	}
}
