/**
 * Scope factory functions
 */

import { type ScopeBody, ScopeDriver } from "./driver.js";
import { type DriveOptions, drive } from "./poller.js";
import type { ScopeOptions, ScopeResult } from "./types.js";

/**
 * Create a new scope for structured concurrency.
 *
 * The body receives the scope handle and is started on the first advance.
 * The returned driver does nothing until it is advanced, awaited, or
 * `yield*`-ed from another scope.
 *
 * @param body - Function that receives the scope handle and returns the body operation
 * @param options - Optional configuration for the scope
 * @returns A new ScopeDriver
 *
 * @example
 * ```typescript
 * const value = 22
 * const result = await scope(function* (s) {
 *   const a = s.spawn(function* () {
 *     const b = s.spawn(function* () { return value }())
 *     return (yield* b) * 2
 *   }())
 *   return (yield* a) * 2
 * }).infallible()
 * // result === 88
 * ```
 *
 * @example With OpenTelemetry tracing
 * ```typescript
 * import { trace } from "@opentelemetry/api"
 *
 * const driver = scope(body, { tracer: trace.getTracer("my-app") })
 * // Creates a "scope" span plus one span per job
 * ```
 */
export function createScope<T, C = never>(
	body: ScopeBody<T, C>,
	options?: ScopeOptions<C>,
): ScopeDriver<T, C> {
	return new ScopeDriver<T, C>(body, options);
}

export { createScope as scope };

/**
 * Create a scope and drive it to completion with the reference poller.
 */
export function run<T, C = never>(
	body: ScopeBody<T, C>,
	options?: ScopeOptions<C> & DriveOptions,
): Promise<ScopeResult<T, C>> {
	return drive(createScope(body, options), options);
}
