/**
 * Type definitions and interfaces for scopeline
 */

import type {
	AttributeValue,
	Context,
	Span,
	SpanOptions,
	Tracer,
} from "@opentelemetry/api";

// Re-export OpenTelemetry types for users
export type { AttributeValue, Context, Span, SpanOptions, Tracer };

/**
 * A point at which an operation has suspended.
 *
 * The driver subscribes to it and steps the owning routine again once it
 * reports ready. Settling a parked point never runs user code.
 */
export interface Parked {
	readonly isReady: boolean;
	/**
	 * Register the single listener to call once this point becomes ready.
	 * Called synchronously when already ready.
	 */
	subscribe(listener: () => void): void;
	/**
	 * Release whatever the point holds (timers, listeners) without resuming
	 * the operation.
	 */
	abandon(): void;
}

/**
 * A suspending computation. Its only suspension points are `yield*`
 * expressions; it makes progress only while a driver steps it.
 */
export type Operation<T> = Generator<Parked, T, unknown>;

/**
 * Anything that can be `yield*`-ed inside an operation.
 */
export interface Operable<T> {
	[Symbol.iterator](): Iterator<Parked, T, unknown>;
}

/**
 * Wake notification passed to `advance()`.
 */
export type Waker = () => void;

export type Pending = { readonly _tag: "Pending" };
export type Ready<R> = { readonly _tag: "Ready"; readonly result: R };
export type Poll<R> = Pending | Ready<R>;

/**
 * Outcome of a scope: the body's value, or the cancellation payload.
 */
export type Completed<T> = { readonly _tag: "Completed"; readonly value: T };
export type Cancelled<C> = { readonly _tag: "Cancelled"; readonly payload: C };
export type ScopeResult<T, C> = Completed<T> | Cancelled<C>;

/**
 * Something an external poller can drive to completion.
 */
export interface Pollable<R> {
	readonly name: string;
	readonly isTerminated: boolean;
	advance(waker?: Waker): Poll<R>;
}

export type ScopePhase =
	| "idle"
	| "running"
	| "completed"
	| "cancelled"
	| "faulted"
	| "discarded";

export type JobState = "spawned" | "running" | "done" | "discarded";

export type JobOutcome = "done" | "discarded";

/**
 * Options for spawning a job.
 */
export interface JobOptions {
	/**
	 * Name used by logs, hooks and spans. Defaults to `job-<seq>`.
	 */
	name?: string;
	/**
	 * Additional attributes for the job span.
	 */
	attributes?: Record<string, AttributeValue>;
}

/**
 * Lifecycle hooks for scope events
 */
export interface ScopeHooks {
	/**
	 * Called when a job is admitted into the scope
	 */
	beforeJob?: (jobName: string, seq: number) => void;
	/**
	 * Called once per job, when it is done or discarded
	 */
	afterJob?: (jobName: string, outcome: JobOutcome, steps: number) => void;
	/**
	 * Called when the driver observes cancellation
	 */
	onCancel?: (payload: unknown) => void;
	/**
	 * Called when the scope reports a result
	 */
	onComplete?: (result: ScopeResult<unknown, unknown>) => void;
}

/**
 * Metrics collected by a scope
 */
export interface ScopeMetrics {
	/** Number of spawn calls */
	jobsSpawned: number;
	/** Number of jobs that reached Done */
	jobsCompleted: number;
	/** Number of jobs that were discarded */
	jobsDiscarded: number;
	/** Number of advance() calls */
	advances: number;
	/** Number of body steps */
	bodySteps: number;
	/** Number of job steps */
	jobSteps: number;
	/** Largest number of jobs in the table at once */
	peakPendingJobs: number;
	/** Scope duration in milliseconds (only available once terminated) */
	scopeDuration?: number;
}

/**
 * Logger interface for structured logging integration
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Links an AbortSignal to scope cancellation.
 */
export interface CancelOn<C> {
	signal: AbortSignal;
	/** Maps the abort reason to the cancellation payload. */
	payload: (reason: unknown) => C;
}

/**
 * Options for creating a scope
 */
export interface ScopeOptions<C = never> {
	/**
	 * Optional name for logs and the scope span. Defaults to `scope-<id>`.
	 */
	name?: string;
	/** Logger instance */
	logger?: Logger;
	/** Minimum log level for the built-in console logger */
	logLevel?: LogLevel;
	/**
	 * Optional OpenTelemetry tracer for automatic tracing.
	 * When provided, the scope and each job get a span.
	 */
	tracer?: Tracer;
	/**
	 * Optional lifecycle hooks for scope events.
	 */
	hooks?: ScopeHooks;
	/**
	 * Enable metrics collection (default: false)
	 */
	metrics?: boolean;
	/**
	 * Cancel the scope when the signal aborts.
	 */
	cancelOn?: CancelOn<C>;
}
