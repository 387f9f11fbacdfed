/**
 * ScopeDriver - the advance/poll state machine of a scope
 */

import {
	SpanStatusCode,
	context as otelContext,
	trace,
} from "@opentelemetry/api";
import createDebug from "debug";
import { CancellationState, onAbort } from "./cancellation.js";
import {
	ScopeClosedError,
	ScopeCompletedError,
	ScopeUsageError,
} from "./errors.js";
import { type ActiveJob, JobHandle, JobRecord } from "./job.js";
import { type JobKey, JobTable } from "./job-table.js";
import { createLogger } from "./logger.js";
import { drive, unwrapCompleted } from "./poller.js";
import { Routine } from "./routine.js";
import { Scope } from "./scope.js";
import { Suspension } from "./suspension.js";
import type {
	Context,
	JobOptions,
	JobOutcome,
	Logger,
	Operable,
	Operation,
	Poll,
	Pollable,
	ScopeHooks,
	ScopeMetrics,
	ScopeOptions,
	ScopePhase,
	ScopeResult,
	Span,
	Tracer,
	Waker,
} from "./types.js";

const debugDriver = createDebug("scopeline:driver");

const PENDING = { _tag: "Pending" } as const;

let scopeIdCounter = 0;

/**
 * Produces the body of a scope from its handle.
 */
export type ScopeBody<T, C> = (scope: Scope<C>) => Operable<T>;

/**
 * Drives one scope: its body, its jobs and its cancellation state.
 *
 * Nothing inside the scope runs except during `advance()`. A driver that is
 * never advanced again, or is discarded, freezes every job where it stands,
 * so jobs may safely reference data owned by the caller of `scope()`.
 *
 * The driver is also awaitable (it starts the reference poller on first
 * `then`) and can be `yield*`-ed from another scope's body or job, in which
 * case it advances only while that outer routine is stepped.
 */
export class ScopeDriver<T, C = never>
	implements
		Pollable<ScopeResult<T, C>>,
		PromiseLike<ScopeResult<T, C>>,
		Operable<ScopeResult<T, C>>,
		Disposable
{
	readonly id: number;
	readonly name: string;
	private state: ScopePhase = "idle";
	private readonly body: Routine<T>;
	private bodyResult: { readonly value: T } | undefined;
	private readonly table = new JobTable<ActiveJob>();
	private readonly cancellation = new CancellationState<C>();
	private waker: Waker | undefined;
	private advancing = false;
	private jobSeq = 0;
	private promise: Promise<ScopeResult<T, C>> | undefined;
	private abortRegistration: Disposable | undefined;
	private readonly logger: Logger;
	private readonly hooks?: ScopeHooks;
	private readonly tracer?: Tracer;
	private readonly span?: Span;
	private readonly context?: Context;
	private readonly startTime: number;
	private readonly enableMetrics: boolean;
	private readonly metricsData: Omit<ScopeMetrics, "scopeDuration"> & {
		scopeEndTime?: number;
	};

	constructor(body: ScopeBody<T, C>, options?: ScopeOptions<C>) {
		this.id = ++scopeIdCounter;
		this.name = options?.name ?? `scope-${this.id}`;
		this.logger = createLogger(this.name, options?.logger, options?.logLevel);
		this.hooks = options?.hooks;
		this.tracer = options?.tracer;
		this.enableMetrics = options?.metrics ?? false;
		this.startTime = performance.now();
		this.metricsData = {
			jobsSpawned: 0,
			jobsCompleted: 0,
			jobsDiscarded: 0,
			advances: 0,
			bodySteps: 0,
			jobSteps: 0,
			peakPendingJobs: 0,
		};

		const handle = new Scope<C>({
			name: this.name,
			cancelled: () => this.cancellation.isRequested,
			spawn: <U>(operation: Operable<U>, jobOptions?: JobOptions) =>
				this.spawnJob(operation, jobOptions),
			cancel: (payload: C) => this.cancel(payload),
		});
		this.body = new Routine(
			() => body(handle),
			() => this.wake(),
		);

		if (this.tracer) {
			const parentContext = otelContext.active();
			this.span = this.tracer.startSpan(
				options?.name ?? "scope",
				{ attributes: { "scope.id": this.id } },
				parentContext,
			);
			this.context = trace.setSpan(parentContext, this.span);
		}

		if (debugDriver.enabled) {
			debugDriver(
				"[%s] creating scope (tracer: %s, metrics: %s, cancelOn: %s)",
				this.name,
				this.tracer ? "yes" : "no",
				this.enableMetrics ? "yes" : "no",
				options?.cancelOn ? "yes" : "no",
			);
		}

		const cancelOn = options?.cancelOn;
		if (cancelOn) {
			this.abortRegistration = onAbort(cancelOn.signal, (reason) => {
				if (debugDriver.enabled) {
					debugDriver("[%s] cancelling due to abort signal", this.name);
				}
				this.cancel(cancelOn.payload(reason));
			});
		}
	}

	get phase(): ScopePhase {
		return this.state;
	}

	/**
	 * True once the driver reported a result, faulted, or was discarded.
	 */
	get isTerminated(): boolean {
		return (
			this.state === "completed" ||
			this.state === "cancelled" ||
			this.state === "faulted" ||
			this.state === "discarded"
		);
	}

	get isCancelled(): boolean {
		return this.cancellation.isRequested;
	}

	/**
	 * Number of jobs in the table (spawned and neither done nor discarded).
	 */
	get pendingJobs(): number {
		return this.table.size;
	}

	/**
	 * Get current metrics for this scope.
	 * @returns Current metrics or undefined if metrics not enabled
	 */
	metrics(): ScopeMetrics | undefined {
		if (!this.enableMetrics) return undefined;
		const { scopeEndTime, ...counters } = this.metricsData;
		return {
			...counters,
			scopeDuration:
				scopeEndTime !== undefined ? scopeEndTime - this.startTime : undefined,
		};
	}

	/**
	 * Perform one bounded unit of work.
	 *
	 * 1. If cancellation was requested, discard every job and report
	 *    `Cancelled`.
	 * 2. Step the body if it is unfinished and ready.
	 * 3. Step every job that was ready when the cycle began.
	 * 4. Report `Completed` once the body has a value and no job is left.
	 *
	 * A cycle ends early, reporting Pending, when a step requests
	 * cancellation. A step that throws discards everything and the error is
	 * rethrown here.
	 *
	 * @param waker - called whenever some routine of this scope becomes ready
	 * @throws ScopeCompletedError if the driver already terminated
	 * @throws ScopeUsageError if called from inside its own advance
	 */
	advance(waker?: Waker): Poll<ScopeResult<T, C>> {
		if (this.isTerminated) {
			throw new ScopeCompletedError(this.name, this.state);
		}
		if (this.advancing) {
			throw new ScopeUsageError(
				`Scope "${this.name}" cannot be advanced from inside its own advance`,
			);
		}
		this.waker = waker;
		this.state = "running";
		if (this.enableMetrics) {
			this.metricsData.advances++;
		}

		const cancelled = this.cancellation.peek();
		if (cancelled) {
			return this.finishCancelled(cancelled.payload);
		}

		this.advancing = true;
		try {
			return this.runCycle();
		} catch (error) {
			this.fault(error);
			throw error;
		} finally {
			this.advancing = false;
		}
	}

	/**
	 * Request cancellation from outside the scope. Same semantics as
	 * `Scope.cancel`; a no-op once the driver has terminated.
	 */
	cancel(payload: C): void {
		if (this.isTerminated) {
			if (debugDriver.enabled) {
				debugDriver("[%s] cancel after termination ignored", this.name);
			}
			return;
		}
		if (!this.cancellation.request(payload)) {
			this.logger.warn("cancel called again, keeping the first payload");
			return;
		}
		this.logger.debug("cancellation requested");
		if (!this.advancing) {
			this.wake();
		}
	}

	/**
	 * Forget the scope: every job is discarded without being stepped again
	 * and no code inside the body or any job runs afterwards, not even
	 * `finally` blocks. A no-op once the driver has terminated.
	 */
	discard(): void {
		if (this.isTerminated) return;
		if (this.advancing) {
			throw new ScopeUsageError(
				`Scope "${this.name}" cannot be discarded from inside its own advance`,
			);
		}
		this.state = "discarded";
		const discarded = this.discardAll();
		this.terminate("discarded");
		this.span?.end();
		this.logger.debug("scope discarded (%d jobs dropped)", discarded);
		if (debugDriver.enabled) {
			debugDriver("[%s] discarded, %d jobs dropped", this.name, discarded);
		}
	}

	[Symbol.dispose](): void {
		this.discard();
	}

	// biome-ignore lint/suspicious/noThenProperty: Intentionally implementing PromiseLike
	then<TResult1 = ScopeResult<T, C>, TResult2 = never>(
		onfulfilled?:
			| ((value: ScopeResult<T, C>) => TResult1 | PromiseLike<TResult1>)
			| null
			| undefined,
		onrejected?:
			| ((reason: unknown) => TResult2 | PromiseLike<TResult2>)
			| null
			| undefined,
	): Promise<TResult1 | TResult2> {
		this.promise ??= drive(this);
		return this.promise.then(onfulfilled, onrejected);
	}

	/**
	 * Drive the scope and resolve with the body's value.
	 * Rejects with UnexpectedCancellationError if the scope was cancelled.
	 */
	infallible(): Promise<T> {
		return this.then((result) => unwrapCompleted(this.name, result));
	}

	/**
	 * Drive this scope from inside another scope's routine. The inner scope
	 * advances only while the outer routine is stepped and is discarded if
	 * the outer routine is dropped.
	 */
	*[Symbol.iterator](): Operation<ScopeResult<T, C>> {
		while (true) {
			const wakeup = new Suspension<void>();
			const poll = this.advance(() => wakeup.resolve());
			if (poll._tag === "Ready") {
				return poll.result;
			}
			wakeup.onAbandon(() => this.discard());
			yield wakeup;
			wakeup.take();
		}
	}

	private runCycle(): Poll<ScopeResult<T, C>> {
		const batch = this.table.takeReady();

		if (!this.bodyResult && this.body.isReady) {
			if (this.enableMetrics) {
				this.metricsData.bodySteps++;
			}
			const step = this.body.step();
			if (step.done) {
				this.bodyResult = { value: step.value };
				if (debugDriver.enabled) {
					debugDriver(
						"[%s] body finished (%d jobs pending)",
						this.name,
						this.table.size,
					);
				}
			}
			if (this.cancellation.isRequested) {
				return this.endCycleForCancellation();
			}
		}

		for (const key of batch) {
			const job = this.table.get(key);
			if (!job?.isReady) continue;
			if (this.enableMetrics) {
				this.metricsData.jobSteps++;
			}
			if (job.step()) {
				this.table.remove(key);
				this.settleJob(job, "done");
			}
			if (this.cancellation.isRequested) {
				return this.endCycleForCancellation();
			}
		}

		if (this.bodyResult && this.table.isEmpty) {
			return this.finishCompleted(this.bodyResult.value);
		}
		return PENDING;
	}

	private endCycleForCancellation(): Poll<ScopeResult<T, C>> {
		if (debugDriver.enabled) {
			debugDriver("[%s] cancellation requested, ending cycle", this.name);
		}
		this.wake();
		return PENDING;
	}

	private spawnJob<U>(
		operation: Operable<U>,
		options?: JobOptions,
	): JobHandle<U> {
		if (this.isTerminated) {
			throw new ScopeClosedError(this.name, this.state);
		}
		if (!this.advancing) {
			throw new ScopeUsageError(
				`Cannot spawn on scope "${this.name}" while it is not advancing`,
			);
		}

		const seq = ++this.jobSeq;
		const jobName = options?.name ?? `job-${seq}`;
		if (this.enableMetrics) {
			this.metricsData.jobsSpawned++;
		}

		const jobSpan = this.tracer?.startSpan(
			jobName,
			{ attributes: { "job.seq": seq, ...options?.attributes } },
			this.context ?? otelContext.active(),
		);

		let key: JobKey | undefined;
		const record = new JobRecord<U>(
			seq,
			jobName,
			operation,
			() => {
				if (key && this.table.markReady(key)) {
					this.wake();
				}
			},
			jobSpan,
		);
		const handle = new JobHandle(record);
		this.hooks?.beforeJob?.(jobName, seq);

		if (this.cancellation.isRequested) {
			if (debugDriver.enabled) {
				debugDriver(
					'[%s] job #%d "%s" spawned after cancellation, discarding',
					this.name,
					seq,
					jobName,
				);
			}
			record.discard();
			this.settleJob(record, "discarded");
			return handle;
		}

		key = this.table.insert(record);
		if (this.enableMetrics) {
			this.metricsData.peakPendingJobs = Math.max(
				this.metricsData.peakPendingJobs,
				this.table.size,
			);
		}
		this.logger.debug('spawned job #%d "%s"', seq, jobName);
		if (debugDriver.enabled) {
			debugDriver(
				'[%s] spawned job #%d "%s" (pending: %d)',
				this.name,
				seq,
				jobName,
				this.table.size,
			);
		}

		this.table.markReady(key);
		this.wake();
		return handle;
	}

	private settleJob(job: ActiveJob, outcome: JobOutcome): void {
		if (this.enableMetrics) {
			if (outcome === "done") {
				this.metricsData.jobsCompleted++;
			} else {
				this.metricsData.jobsDiscarded++;
			}
		}
		job.span?.setAttributes({
			"job.outcome": outcome,
			"job.steps": job.steps,
		});
		if (outcome === "done") {
			job.span?.setStatus({ code: SpanStatusCode.OK });
		}
		job.span?.end();
		this.hooks?.afterJob?.(job.name, outcome, job.steps);
		this.logger.debug('job #%d "%s" %s', job.seq, job.name, outcome);
	}

	/**
	 * Discard every job in the table and the body, then report each job as
	 * discarded. Returns the number of jobs dropped.
	 */
	private discardAll(): number {
		const jobs = this.table.drain();
		for (const job of jobs) {
			job.discard();
		}
		this.body.abandon();
		for (const job of jobs) {
			this.settleJob(job, "discarded");
		}
		return jobs.length;
	}

	private finishCompleted(value: T): Poll<ScopeResult<T, C>> {
		this.state = "completed";
		this.terminate("completed");
		const result: ScopeResult<T, C> = { _tag: "Completed", value };
		this.span?.setStatus({ code: SpanStatusCode.OK });
		this.span?.end();
		this.hooks?.onComplete?.(result);
		if (debugDriver.enabled) {
			debugDriver("[%s] completed", this.name);
		}
		return { _tag: "Ready", result };
	}

	private finishCancelled(payload: C): Poll<ScopeResult<T, C>> {
		this.state = "cancelled";
		const discarded = this.discardAll();
		this.terminate("cancelled");
		const result: ScopeResult<T, C> = { _tag: "Cancelled", payload };
		this.span?.end();
		this.logger.info("scope cancelled (%d jobs discarded)", discarded);
		this.hooks?.onCancel?.(payload);
		this.hooks?.onComplete?.(result);
		if (debugDriver.enabled) {
			debugDriver("[%s] cancelled, %d jobs discarded", this.name, discarded);
		}
		return { _tag: "Ready", result };
	}

	private fault(error: unknown): void {
		this.state = "faulted";
		const discarded = this.discardAll();
		this.terminate("faulted");
		this.span?.recordException(
			error instanceof Error ? error : new Error(String(error)),
		);
		this.span?.setStatus({
			code: SpanStatusCode.ERROR,
			message: error instanceof Error ? error.message : String(error),
		});
		this.span?.end();
		this.logger.error("scope faulted (%d jobs discarded): %s", discarded, error);
		if (debugDriver.enabled) {
			debugDriver("[%s] faulted: %s", this.name, error);
		}
	}

	/**
	 * Common bookkeeping once the driver stops for good.
	 */
	private terminate(outcome: ScopePhase): void {
		this.waker = undefined;
		this.abortRegistration?.[Symbol.dispose]();
		this.abortRegistration = undefined;
		this.span?.setAttributes({
			"scope.outcome": outcome,
			"scope.jobs": this.jobSeq,
			"scope.duration_ms": performance.now() - this.startTime,
		});
		if (this.enableMetrics) {
			this.metricsData.scopeEndTime = performance.now();
		}
	}

	private wake(): void {
		if (this.isTerminated) return;
		this.waker?.();
	}
}
