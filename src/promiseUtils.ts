"use strict";

import type { TimeProvider } from "./TimeProvider";

export type PromiseFunction<T> = () => Promise<T>;

export class TimeoutError extends Error {
	constructor(readonly ms: number) {
		super(`timed out after ${ms}ms`);
		this.name = "TimeoutError";
	}
}

/**
 * Coalesces concurrent callers onto one in-flight promise. Once it settles the
 * next `getPromise()` starts a fresh call.
 */
export class SharedPromise<T> {
	private currentPromise: Promise<T> | null = null;
	private promiseFunction: PromiseFunction<T>;

	constructor(promiseFunction: PromiseFunction<T>) {
		this.promiseFunction = promiseFunction;
	}

	get pending(): boolean {
		return this.currentPromise !== null;
	}

	public getPromise(): Promise<T> {
		if (!this.currentPromise) {
			this.currentPromise = new Promise<T>((resolve, reject) => {
				this.promiseFunction().then(
					(result) => {
						this.currentPromise = null;
						resolve(result);
					},
					(error: unknown) => {
						this.currentPromise = null;
						reject(error);
					},
				);
			});
		}
		return this.currentPromise;
	}

	public destroy(): void {
		this.currentPromise = null;
	}
}

/**
 * Reject with `TimeoutError` if `promise` has not settled within `ms`.
 * A non-positive `ms` disables the timeout.
 */
export function withTimeout<T>(
	promise: Promise<T>,
	ms: number,
	timeProvider: TimeProvider,
): Promise<T> {
	if (ms <= 0) {
		return promise;
	}
	return new Promise<T>((resolve, reject) => {
		const timeoutId = timeProvider.setTimeout(() => {
			reject(new TimeoutError(ms));
		}, ms);

		promise.then(
			(result) => {
				timeProvider.clearTimeout(timeoutId);
				resolve(result);
			},
			(error: unknown) => {
				timeProvider.clearTimeout(timeoutId);
				reject(error);
			},
		);
	});
}
