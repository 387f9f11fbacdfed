/**
 * Built-in error classes for scopeline
 *
 * Every class here marks a caller defect. Cancellation is never an error:
 * it is reported as a `Cancelled` result.
 */

/**
 * ScopeCompletedError - `advance()` was called on a driver that already
 * reported a result, faulted, or was discarded.
 */
export class ScopeCompletedError extends Error {
	readonly _tag = "ScopeCompletedError" as const;
	readonly scopeName: string;
	readonly phase: string;

	constructor(scopeName: string, phase: string) {
		super(`Cannot advance scope "${scopeName}": already ${phase}`);
		this.name = "ScopeCompletedError";
		this.scopeName = scopeName;
		this.phase = phase;
	}
}

/**
 * ScopeClosedError - a job was spawned against a terminated scope.
 */
export class ScopeClosedError extends Error {
	readonly _tag = "ScopeClosedError" as const;
	readonly scopeName: string;

	constructor(scopeName: string, phase: string) {
		super(`Cannot spawn job on ${phase} scope "${scopeName}"`);
		this.name = "ScopeClosedError";
		this.scopeName = scopeName;
	}
}

/**
 * ScopeUsageError - the scope was used from the wrong place: a spawn from
 * outside the scope's own body and jobs, or a re-entrant advance.
 */
export class ScopeUsageError extends Error {
	readonly _tag = "ScopeUsageError" as const;

	constructor(message: string) {
		super(message);
		this.name = "ScopeUsageError";
	}
}

/**
 * HandleConsumedError - a job handle's result was read twice.
 */
export class HandleConsumedError extends Error {
	readonly _tag = "HandleConsumedError" as const;
	readonly jobName: string;

	constructor(jobName: string) {
		super(`Result of job "${jobName}" was already taken`);
		this.name = "HandleConsumedError";
		this.jobName = jobName;
	}
}

/**
 * UnexpectedCancellationError - an infallible scope was cancelled.
 */
export class UnexpectedCancellationError extends Error {
	readonly _tag = "UnexpectedCancellationError" as const;
	readonly payload: unknown;

	constructor(scopeName: string, payload: unknown) {
		super(`Scope "${scopeName}" was cancelled: ${String(payload)}`);
		this.name = "UnexpectedCancellationError";
		this.payload = payload;
	}
}
