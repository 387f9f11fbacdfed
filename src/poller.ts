/**
 * Reference poller for scopeline
 *
 * Any cooperative scheduler that calls `advance()` after a wake (or at will)
 * and stops once it sees `Ready` can drive a scope. This one schedules each
 * advance with `setImmediate` and coalesces wakes, so timers and I/O
 * callbacks run between advances even while some job keeps yielding.
 */

import createDebug from "debug";
import { UnexpectedCancellationError } from "./errors.js";
import type { Pollable, ScopeResult } from "./types.js";

const debugPoller = createDebug("scopeline:poller");

const defaultSchedule = (callback: () => void): void => {
	setImmediate(callback);
};

/**
 * Options for driving a pollable.
 */
export interface DriveOptions {
	/**
	 * How to schedule the next advance after a wake. Defaults to
	 * `setImmediate`. A microtask scheduler such as `queueMicrotask` starves
	 * timers and I/O for as long as a job keeps yielding.
	 */
	schedule?: (callback: () => void) => void;
}

/**
 * Drive `target` to completion.
 *
 * Advances once on the next turn of the event loop, then once per wake.
 * Resolves with the result, or rejects with the fault the target threw.
 * A target that is discarded while being driven never settles.
 *
 * @example
 * ```typescript
 * const result = await drive(createScope(function* (s) {
 *   const job = s.spawn(work())
 *   return yield* job
 * }))
 * ```
 */
export function drive<R>(
	target: Pollable<R>,
	options?: DriveOptions,
): Promise<R> {
	const schedule = options?.schedule ?? defaultSchedule;

	return new Promise<R>((resolve, reject) => {
		let scheduled = false;
		let settled = false;
		let polls = 0;

		const tick = () => {
			scheduled = false;
			if (settled) return;
			polls++;
			try {
				const poll = target.advance(wake);
				if (poll._tag === "Ready") {
					settled = true;
					if (debugPoller.enabled) {
						debugPoller("[%s] ready after %d polls", target.name, polls);
					}
					resolve(poll.result);
				}
			} catch (error) {
				settled = true;
				if (debugPoller.enabled) {
					debugPoller("[%s] faulted after %d polls", target.name, polls);
				}
				reject(error);
			}
		};

		const wake = () => {
			if (settled || scheduled) return;
			scheduled = true;
			schedule(tick);
		};

		wake();
	});
}

/**
 * Return the body's value, or throw UnexpectedCancellationError if the
 * result is a cancellation.
 */
export function unwrapCompleted<T>(
	scopeName: string,
	result: ScopeResult<T, unknown>,
): T {
	if (result._tag === "Completed") {
		return result.value;
	}
	throw new UnexpectedCancellationError(scopeName, result.payload);
}
