/**
 * Cancellation state and AbortSignal helpers
 */

import createDebug from "debug";
import { suspend } from "./suspension.js";
import type { Operation } from "./types.js";

const debugCancel = createDebug("scopeline:cancellation");

/**
 * Write-once holder of a scope's cancellation payload.
 *
 * Once set it is never cleared; the driver reads it at the start of every
 * advance cycle.
 */
export class CancellationState<C> {
	private cell: { readonly payload: C } | undefined;

	get isRequested(): boolean {
		return this.cell !== undefined;
	}

	/**
	 * Record the payload. Returns false, leaving the first payload in place,
	 * if cancellation was already requested.
	 */
	request(payload: C): boolean {
		if (this.cell) {
			if (debugCancel.enabled) {
				debugCancel("cancellation already requested, ignoring payload");
			}
			return false;
		}
		this.cell = { payload };
		if (debugCancel.enabled) {
			debugCancel("cancellation requested");
		}
		return true;
	}

	/**
	 * The recorded payload, boxed so that `undefined` payloads stay
	 * distinguishable from "not requested".
	 */
	peek(): { readonly payload: C } | undefined {
		return this.cell;
	}
}

/**
 * Registers a callback to be invoked when the signal is aborted.
 * Returns a disposable that can be used to unregister the callback.
 *
 * The callback runs at most once, synchronously if the signal is already
 * aborted.
 */
export function onAbort(
	signal: AbortSignal,
	callback: (reason: unknown) => void,
): Disposable {
	if (signal.aborted) {
		if (debugCancel.enabled) {
			debugCancel("signal already aborted, calling callback immediately");
		}
		callback(signal.reason);
		return {
			[Symbol.dispose]: () => {},
		};
	}

	let disposed = false;

	const handler = () => {
		if (disposed) return;
		disposed = true;
		if (debugCancel.enabled) {
			debugCancel("abort callback invoked with reason: %o", signal.reason);
		}
		callback(signal.reason);
	};

	signal.addEventListener("abort", handler, { once: true });

	return {
		[Symbol.dispose]: () => {
			if (!disposed) {
				disposed = true;
				signal.removeEventListener("abort", handler);
				if (debugCancel.enabled) {
					debugCancel("abort callback unregistered");
				}
			}
		},
	};
}

/**
 * Suspend until the signal aborts and return its reason.
 * Returns immediately if already aborted.
 *
 * @example
 * ```typescript
 * const driver = scope<void, string>(function* (s) {
 *   s.spawn(function* () {
 *     yield* whenAborted(controller.signal)
 *     s.cancel("stopped by caller")
 *   }())
 *   yield* work()
 * })
 * ```
 */
export function* whenAborted(signal: AbortSignal): Operation<unknown> {
	if (signal.aborted) {
		return signal.reason;
	}
	return yield* suspend<unknown>((resume) => {
		const registration = onAbort(signal, (reason) => resume.resolve(reason));
		return () => registration[Symbol.dispose]();
	});
}
