/**
 * scopeline - Structured concurrency with borrow-safe, cooperatively driven scopes
 *
 * A scope's body spawns jobs that run interleaved with it. Every job is done
 * or discarded before the scope reports a result, and nothing inside a scope
 * runs unless the scope is being advanced, so jobs may reference data owned
 * by the caller.
 */

export { SpanStatusCode } from "@opentelemetry/api";
export { CancellationState, onAbort, whenAborted } from "./cancellation.js";
export { type ScopeBody, ScopeDriver } from "./driver.js";
export {
	HandleConsumedError,
	ScopeClosedError,
	ScopeCompletedError,
	ScopeUsageError,
	UnexpectedCancellationError,
} from "./errors.js";
export { createScope, run, scope } from "./factory.js";
export { type ActiveJob, JobHandle, JobRecord } from "./job.js";
export { type JobKey, JobTable } from "./job-table.js";
export { ConsoleLogger, createLogger, type LogSink, NoOpLogger } from "./logger.js";
export { type DriveOptions, drive, unwrapCompleted } from "./poller.js";
export { Routine, type StepResult } from "./routine.js";
export { Scope, type ScopeCore } from "./scope.js";
export {
	never,
	type Resume,
	Suspension,
	sleep,
	suspend,
	until,
	yieldNow,
} from "./suspension.js";
export type {
	AttributeValue,
	CancelOn,
	Cancelled,
	Completed,
	Context,
	JobOptions,
	JobOutcome,
	JobState,
	Logger,
	LogLevel,
	Operable,
	Operation,
	Parked,
	Pending,
	Poll,
	Pollable,
	Ready,
	ScopeHooks,
	ScopeMetrics,
	ScopeOptions,
	ScopePhase,
	ScopeResult,
	Span,
	SpanOptions,
	Tracer,
	Waker,
} from "./types.js";
