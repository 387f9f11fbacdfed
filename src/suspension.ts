/**
 * Suspension points for scopeline operations
 *
 * An operation suspends by yielding a parked point. Whoever settles the point
 * (a promise callback, a timer, a finished job) only flags it ready; the
 * operation resumes the next time its driver steps it.
 */

import type { Operation, Parked } from "./types.js";

type SuspensionState<T> =
	| { readonly status: "pending" }
	| { readonly status: "resolved"; readonly value: T }
	| { readonly status: "rejected"; readonly error: unknown }
	| { readonly status: "taken" }
	| { readonly status: "abandoned" };

/**
 * Settles a suspension from the outside.
 */
export interface Resume<T> {
	resolve(value: T): void;
	reject(error: unknown): void;
}

/**
 * A one-shot parked point that carries the value the operation resumes with.
 */
export class Suspension<T> implements Parked {
	private state: SuspensionState<T> = { status: "pending" };
	private listener: (() => void) | undefined;
	private release: (() => void) | undefined;

	get isReady(): boolean {
		return this.state.status === "resolved" || this.state.status === "rejected";
	}

	get isPending(): boolean {
		return this.state.status === "pending";
	}

	resolve(value: T): void {
		if (this.state.status !== "pending") return;
		this.state = { status: "resolved", value };
		this.notify();
	}

	reject(error: unknown): void {
		if (this.state.status !== "pending") return;
		this.state = { status: "rejected", error };
		this.notify();
	}

	/**
	 * Register cleanup for when the point is abandoned before its value is
	 * taken.
	 */
	onAbandon(release: () => void): void {
		if (this.state.status === "taken" || this.state.status === "abandoned") {
			return;
		}
		this.release = release;
	}

	subscribe(listener: () => void): void {
		if (this.isReady) {
			listener();
			return;
		}
		this.listener = listener;
	}

	abandon(): void {
		if (this.state.status === "taken" || this.state.status === "abandoned") {
			return;
		}
		this.state = { status: "abandoned" };
		this.listener = undefined;
		const release = this.release;
		this.release = undefined;
		release?.();
	}

	/**
	 * Read the settled value. A rejection is thrown here, at the suspension
	 * point of the operation that reads it.
	 */
	take(): T {
		const state = this.state;
		switch (state.status) {
			case "resolved":
				this.state = { status: "taken" };
				this.release = undefined;
				return state.value;
			case "rejected":
				this.state = { status: "taken" };
				this.release = undefined;
				throw state.error;
			default:
				throw new Error(`Suspension read while ${state.status}`);
		}
	}

	private notify(): void {
		const listener = this.listener;
		this.listener = undefined;
		listener?.();
	}
}

/**
 * Suspend the current operation until `setup`'s resume callbacks fire.
 *
 * `setup` runs inside the current step. It may return a release callback,
 * which runs if the operation is discarded before it resumes.
 *
 * @example
 * ```typescript
 * function* nextTick(): Operation<void> {
 *   return yield* suspend<void>((resume) => {
 *     const id = setImmediate(() => resume.resolve())
 *     return () => clearImmediate(id)
 *   })
 * }
 * ```
 */
export function* suspend<T>(
	setup: (resume: Resume<T>) => (() => void) | undefined | void,
): Operation<T> {
	const suspension = new Suspension<T>();
	const release = setup({
		resolve: (value) => suspension.resolve(value),
		reject: (error) => suspension.reject(error),
	});
	if (release) {
		suspension.onAbandon(release);
	}
	yield suspension;
	return suspension.take();
}

/**
 * Wait for a promise from outside the scope.
 * A rejection is thrown at this suspension point.
 */
export function until<T>(promise: PromiseLike<T>): Operation<T> {
	return suspend<T>((resume) => {
		void promise.then(
			(value) => resume.resolve(value),
			(error: unknown) => resume.reject(error),
		);
	});
}

/**
 * Let every other ready routine run before continuing.
 */
export function yieldNow(): Operation<void> {
	return suspend<void>((resume) => {
		resume.resolve();
	});
}

/**
 * Suspend for `ms` milliseconds. The timer is cleared if the operation is
 * discarded first.
 */
export function sleep(ms: number): Operation<void> {
	return suspend<void>((resume) => {
		const timeoutId = setTimeout(() => resume.resolve(), ms);
		return () => clearTimeout(timeoutId);
	});
}

/**
 * Suspend forever.
 */
export function never(): Operation<never> {
	return suspend<never>(() => undefined);
}
