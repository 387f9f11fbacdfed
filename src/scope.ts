/**
 * Scope handle for scopeline - the capability passed to a scope's body
 */

import type { JobHandle } from "./job.js";
import type { JobOptions, Operable } from "./types.js";

/**
 * What a Scope handle needs from its driver.
 * @internal
 */
export interface ScopeCore<C> {
	readonly name: string;
	cancelled(): boolean;
	spawn<U>(operation: Operable<U>, options?: JobOptions): JobHandle<U>;
	cancel(payload: C): void;
}

/**
 * The handle a scope body receives. Its only operations are spawning jobs
 * and requesting cancellation.
 *
 * Jobs may capture anything the body can see, including data owned by the
 * caller of `scope()`: none of them runs once the scope has stopped being
 * advanced.
 *
 * @example
 * ```typescript
 * const inputs = [1, 2, 10]
 * const result = await scope<number, string>(function* (s) {
 *   const jobs = inputs.map((n) =>
 *     s.spawn(function* () {
 *       if (n < 0) s.cancel(`input out of range: ${n}`)
 *       return n * 2
 *     }()),
 *   )
 *   let total = 0
 *   for (const job of jobs) total += yield* job
 *   return total
 * })
 * ```
 */
export class Scope<C = never> {
	private readonly core: ScopeCore<C>;

	constructor(core: ScopeCore<C>) {
		this.core = core;
	}

	get name(): string {
		return this.core.name;
	}

	/**
	 * Whether cancellation has been requested. The scope stops at the start of
	 * the next advance cycle.
	 */
	get isCancelled(): boolean {
		return this.core.cancelled();
	}

	/**
	 * Spawn a job that runs concurrently with the body and the other jobs.
	 *
	 * The job is not started here; its first step happens in the next advance
	 * cycle. Spawning after cancellation was requested returns a handle to a
	 * job that is already discarded.
	 *
	 * @throws ScopeUsageError if called while the scope is not advancing
	 * @throws ScopeClosedError if the scope already terminated
	 */
	spawn<U>(operation: Operable<U>, options?: JobOptions): JobHandle<U> {
		return this.core.spawn(operation, options);
	}

	/**
	 * Request cancellation with `payload`. The first payload wins; later calls
	 * are ignored. The current step runs on until its next suspension point.
	 */
	cancel(payload: C): void {
		this.core.cancel(payload);
	}
}
