import {
	type Attributes,
	type AttributeValue,
	type Context,
	type Exception,
	type SpanContext,
	type SpanOptions,
	type SpanStatus,
	trace,
} from "@opentelemetry/api";
import { afterEach, describe, expect, test, vi } from "vitest";
import {
	ConsoleLogger,
	createLogger,
	type Logger,
	type LogLevel,
	type LogSink,
	NoOpLogger,
	never,
	type ScopeResult,
	sleep,
	SpanStatusCode,
	scope,
	type Span,
	type Tracer,
	yieldNow,
} from "../src/index.js";
import { createTrigger, ManualPoller } from "../src/testing/index.js";

describe("ConsoleLogger", () => {
	function recordingSink(): { sink: LogSink; lines: unknown[][] } {
		const lines: unknown[][] = [];
		const record =
			(level: LogLevel) =>
			(...args: unknown[]) => {
				lines.push([level, ...args]);
			};
		return {
			sink: {
				debug: record("debug"),
				info: record("info"),
				warn: record("warn"),
				error: record("error"),
			},
			lines,
		};
	}

	test("prefixes lines with the scope name and drops lower levels", () => {
		const { sink, lines } = recordingSink();
		const logger = new ConsoleLogger("jobs", "warn", sink);

		logger.debug("hidden");
		logger.info("hidden too");
		logger.warn("careful %d", 3);
		logger.error("broken");

		expect(lines).toEqual([
			["warn", "[jobs] careful %d", 3],
			["error", "[jobs] broken"],
		]);
	});

	test("defaults to the info level", () => {
		const logger = new ConsoleLogger("s");
		expect(logger.isLevelEnabled("debug")).toBe(false);
		expect(logger.isLevelEnabled("info")).toBe(true);
	});
});

describe("createLogger", () => {
	test("prefers an explicit logger", () => {
		const logger = new NoOpLogger();
		expect(createLogger("s", logger, "debug")).toBe(logger);
	});

	test("uses the console logger when only a level is given", () => {
		expect(createLogger("s", undefined, "debug")).toBeInstanceOf(ConsoleLogger);
	});

	test("is silent by default", () => {
		expect(createLogger("s")).toBeInstanceOf(NoOpLogger);
	});
});

class RecordingLogger implements Logger {
	readonly entries: { level: LogLevel; message: string; args: unknown[] }[] =
		[];

	debug(message: string, ...args: unknown[]): void {
		this.entries.push({ level: "debug", message, args });
	}

	info(message: string, ...args: unknown[]): void {
		this.entries.push({ level: "info", message, args });
	}

	warn(message: string, ...args: unknown[]): void {
		this.entries.push({ level: "warn", message, args });
	}

	error(message: string, ...args: unknown[]): void {
		this.entries.push({ level: "error", message, args });
	}

	at(level: LogLevel) {
		return this.entries.filter((entry) => entry.level === level);
	}
}

describe("scope logging", () => {
	test("logs job lifecycle at debug level", () => {
		const logger = new RecordingLogger();
		const driver = scope(
			function* (s) {
				return yield* s.spawn(
					(function* () {
						return 1;
					})(),
					{ name: "worker" },
				);
			},
			{ logger },
		);

		new ManualPoller(driver).pollUntilReady();

		expect(logger.at("debug")).toEqual([
			{ level: "debug", message: 'spawned job #%d "%s"', args: [1, "worker"] },
			{
				level: "debug",
				message: 'job #%d "%s" %s',
				args: [1, "worker", "done"],
			},
		]);
	});

	test("warns on a second cancel and reports the cancellation", () => {
		const logger = new RecordingLogger();
		const driver = scope<void, string>(
			function* (s) {
				s.spawn(never());
				yield* yieldNow();
				s.cancel("first");
				s.cancel("second");
			},
			{ logger },
		);

		new ManualPoller(driver).pollUntilReady();

		expect(logger.at("warn")).toEqual([
			{
				level: "warn",
				message: "cancel called again, keeping the first payload",
				args: [],
			},
		]);
		expect(logger.at("info")).toEqual([
			{
				level: "info",
				message: "scope cancelled (%d jobs discarded)",
				args: [1],
			},
		]);
	});

	test("logs a fault at error level", () => {
		const logger = new RecordingLogger();
		const failure = new Error("kaput");
		const driver = scope(
			function* () {
				yield* yieldNow();
				throw failure;
			},
			{ logger },
		);

		expect(() => new ManualPoller(driver).pollUntilReady()).toThrow(failure);
		expect(logger.at("error")).toEqual([
			{
				level: "error",
				message: "scope faulted (%d jobs discarded): %s",
				args: [0, failure],
			},
		]);
	});
});

describe("hooks", () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	test("observe each job exactly once", () => {
		const events: unknown[][] = [];
		const driver = scope<number, string>(
			function* (s) {
				const handles = [1, 2, -3, 10].map((n) =>
					s.spawn(
						(function* () {
							if (n < 0) s.cancel("negative");
							return n;
						})(),
					),
				);
				let total = 0;
				for (const handle of handles) total += yield* handle;
				return total;
			},
			{
				hooks: {
					beforeJob: (name, seq) => events.push(["before", name, seq]),
					afterJob: (name, outcome, steps) =>
						events.push(["after", name, outcome, steps]),
					onCancel: (payload) => events.push(["cancel", payload]),
					onComplete: (result) => events.push(["complete", result._tag]),
				},
			},
		);

		new ManualPoller(driver).pollUntilReady();

		expect(events).toEqual([
			["before", "job-1", 1],
			["before", "job-2", 2],
			["before", "job-3", 3],
			["before", "job-4", 4],
			["after", "job-1", "done", 1],
			["after", "job-2", "done", 1],
			["after", "job-3", "done", 1],
			["after", "job-4", "discarded", 0],
			["cancel", "negative"],
			["complete", "Cancelled"],
		]);
	});

	test("pair beforeJob and afterJob for a job spawned after cancel", () => {
		const events: string[] = [];
		const driver = scope<number, string>(
			function* (s) {
				s.cancel("stop");
				s.spawn(
					(function* () {
						return 1;
					})(),
					{ name: "late" },
				);
				return 0;
			},
			{
				hooks: {
					beforeJob: (name) => events.push(`before ${name}`),
					afterJob: (name, outcome) => events.push(`after ${name} ${outcome}`),
				},
			},
		);

		new ManualPoller(driver).pollUntilReady();

		expect(events).toEqual(["before late", "after late discarded"]);
	});

	test("a throwing afterJob still leaves every job discarded", () => {
		vi.useFakeTimers();
		const driver = scope(
			function* (s) {
				s.spawn(sleep(1000));
				s.spawn(sleep(1000));
				yield* never();
			},
			{
				hooks: {
					afterJob: () => {
						throw new Error("hook failed");
					},
				},
			},
		);
		new ManualPoller(driver).pollWhileWoken();
		expect(vi.getTimerCount()).toBe(2);

		expect(() => driver.discard()).toThrow("hook failed");

		expect(vi.getTimerCount()).toBe(0);
		expect(driver.phase).toBe("discarded");
		expect(driver.pendingJobs).toBe(0);
	});

	test("onComplete receives the completed result", () => {
		const results: ScopeResult<unknown, unknown>[] = [];
		const driver = scope(
			function* () {
				return "ok";
			},
			{ hooks: { onComplete: (result) => results.push(result) } },
		);

		new ManualPoller(driver).poll();

		expect(results).toEqual([{ _tag: "Completed", value: "ok" }]);
	});
});

describe("metrics", () => {
	test("are undefined unless enabled", () => {
		const driver = scope(function* () {
			return 1;
		});
		expect(driver.metrics()).toBeUndefined();
	});

	test("count advances, steps and jobs", () => {
		const driver = scope(
			function* (s) {
				const job = s.spawn(
					(function* () {
						return 5;
					})(),
				);
				return (yield* job) * 2;
			},
			{ metrics: true },
		);
		const poller = new ManualPoller(driver);

		poller.poll();
		expect(driver.metrics()?.scopeDuration).toBeUndefined();
		poller.pollUntilReady();

		const metrics = driver.metrics();
		expect(metrics).toMatchObject({
			jobsSpawned: 1,
			jobsCompleted: 1,
			jobsDiscarded: 0,
			advances: 3,
			bodySteps: 2,
			jobSteps: 1,
			peakPendingJobs: 1,
		});
		expect(metrics?.scopeDuration).toBeGreaterThanOrEqual(0);
	});

	test("count discarded jobs", () => {
		const gate = createTrigger<void>();
		const driver = scope(
			function* (s) {
				s.spawn(gate.wait());
				s.spawn(gate.wait());
				yield* never();
			},
			{ metrics: true },
		);
		new ManualPoller(driver).pollWhileWoken();

		driver.discard();

		expect(driver.metrics()).toMatchObject({
			jobsSpawned: 2,
			jobsCompleted: 0,
			jobsDiscarded: 2,
			peakPendingJobs: 2,
		});
	});
});

let spanIdCounter = 0;

class RecordingSpan implements Span {
	readonly name: string;
	readonly attributes: Record<string, AttributeValue | undefined>;
	readonly parent: Context | undefined;
	readonly exceptions: Exception[] = [];
	status: SpanStatus | undefined;
	ended = false;
	private readonly spanId = `${++spanIdCounter}`.padStart(16, "0");

	constructor(name: string, attributes?: Attributes, parent?: Context) {
		this.name = name;
		this.attributes = { ...attributes };
		this.parent = parent;
	}

	spanContext(): SpanContext {
		return {
			traceId: "0af7651916cd43dd8448eb211c80319c",
			spanId: this.spanId,
			traceFlags: 1,
		};
	}

	setAttribute(key: string, value: AttributeValue): this {
		this.attributes[key] = value;
		return this;
	}

	setAttributes(attributes: Attributes): this {
		Object.assign(this.attributes, attributes);
		return this;
	}

	addEvent(): this {
		return this;
	}

	addLink(): this {
		return this;
	}

	addLinks(): this {
		return this;
	}

	setStatus(status: SpanStatus): this {
		this.status = status;
		return this;
	}

	updateName(): this {
		return this;
	}

	end(): void {
		this.ended = true;
	}

	isRecording(): boolean {
		return !this.ended;
	}

	recordException(exception: Exception): void {
		this.exceptions.push(exception);
	}
}

class RecordingTracer implements Tracer {
	readonly spans: RecordingSpan[] = [];

	startSpan(name: string, options?: SpanOptions, context?: Context): Span {
		const span = new RecordingSpan(name, options?.attributes, context);
		this.spans.push(span);
		return span;
	}

	startActiveSpan(): never {
		throw new Error("scopes start spans explicitly");
	}

	find(name: string): RecordingSpan | undefined {
		return this.spans.find((span) => span.name === name);
	}
}

describe("tracing", () => {
	test("creates a scope span and a child span per job", () => {
		const tracer = new RecordingTracer();
		const driver = scope(
			function* (s) {
				const job = s.spawn(
					(function* () {
						yield* yieldNow();
						return 1;
					})(),
					{ name: "fetch", attributes: { "job.kind": "io" } },
				);
				return yield* job;
			},
			{ name: "pipeline", tracer },
		);

		new ManualPoller(driver).pollUntilReady();

		expect(tracer.spans.map((span) => span.name)).toEqual([
			"pipeline",
			"fetch",
		]);
		const scopeSpan = tracer.find("pipeline");
		const jobSpan = tracer.find("fetch");
		expect(jobSpan?.attributes).toMatchObject({
			"job.seq": 1,
			"job.kind": "io",
			"job.outcome": "done",
			"job.steps": 2,
		});
		expect(jobSpan?.status).toEqual({ code: SpanStatusCode.OK });
		expect(jobSpan?.ended).toBe(true);
		expect(jobSpan?.parent && trace.getSpan(jobSpan.parent)).toBe(scopeSpan);

		expect(scopeSpan?.attributes).toMatchObject({
			"scope.id": driver.id,
			"scope.outcome": "completed",
			"scope.jobs": 1,
		});
		expect(scopeSpan?.status).toEqual({ code: SpanStatusCode.OK });
		expect(scopeSpan?.ended).toBe(true);
	});

	test("marks discarded jobs and a cancelled scope", () => {
		const tracer = new RecordingTracer();
		const driver = scope<void, string>(
			function* (s) {
				s.spawn(never(), { name: "idle" });
				s.cancel("stop");
			},
			{ name: "cancelling", tracer },
		);

		new ManualPoller(driver).pollUntilReady();

		expect(tracer.find("idle")?.attributes).toMatchObject({
			"job.outcome": "discarded",
			"job.steps": 0,
		});
		expect(tracer.find("idle")?.status).toBeUndefined();
		expect(tracer.find("cancelling")?.attributes["scope.outcome"]).toBe(
			"cancelled",
		);
		expect(tracer.find("cancelling")?.ended).toBe(true);
	});

	test("records the fault on the scope span", () => {
		const tracer = new RecordingTracer();
		const failure = new Error("boom");
		const driver = scope(
			function* () {
				throw failure;
			},
			{ name: "failing", tracer },
		);

		expect(() => driver.advance()).toThrow(failure);

		const span = tracer.find("failing");
		expect(span?.exceptions).toEqual([failure]);
		expect(span?.status).toEqual({
			code: SpanStatusCode.ERROR,
			message: "boom",
		});
		expect(span?.attributes["scope.outcome"]).toBe("faulted");
	});
});
