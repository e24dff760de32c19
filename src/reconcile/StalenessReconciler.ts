/**
 * StalenessReconciler: finds out whether the durable store holds content this
 * replica has never seen, and merges it in without discarding local work.
 *
 * The check never mutates the live replica. It merges the store's snapshot
 * into a throwaway document seeded with the local state and compares what
 * the text looks like before and after.
 */

import * as Y from "yjs";
import type { StalenessComparison } from "../CollabSettings";
import { HasLogging } from "../debug";
import type { ErrorChannel } from "../ErrorChannel";
import {
	DecodeError,
	StalenessCheckError,
	describeError,
} from "../Exceptions";
import { bytesEqual, generateHash, isBytes } from "../hashing";
import { TimeoutError, withTimeout } from "../promiseUtils";
import {
	fingerprintText,
	type DocumentReplica,
} from "../replica/DocumentReplica";
import { validateUpdate } from "../replica/validation";
import { DefaultTimeProvider, type TimeProvider } from "../TimeProvider";

export type FetchSnapshot = () => Promise<Uint8Array>;

export interface StalenessResult {
	stale: boolean;
	freshSnapshot?: Uint8Array;
}

export interface StalenessStats {
	checks: number;
	/** Store snapshot was byte-identical to the local one. */
	fastPathHits: number;
	trialMerges: number;
	/** Fetch, decode or timeout failures resolved as not stale. */
	failures: number;
}

export interface StalenessReconcilerOptions {
	/** 0 waits forever. */
	timeoutMs?: number;
	comparison?: StalenessComparison;
	timeProvider?: TimeProvider;
	errors?: ErrorChannel;
}

const NOT_STALE: StalenessResult = Object.freeze({ stale: false });

export class StalenessReconciler extends HasLogging {
	private readonly timeoutMs: number;
	private readonly comparison: StalenessComparison;
	private readonly timeProvider: TimeProvider;
	private readonly ownsTimeProvider: boolean;
	private readonly errors: ErrorChannel | null;
	private readonly _stats: StalenessStats = {
		checks: 0,
		fastPathHits: 0,
		trialMerges: 0,
		failures: 0,
	};
	private _destroyed = false;

	constructor(
		private readonly replica: DocumentReplica,
		options: StalenessReconcilerOptions = {},
	) {
		super(`StalenessReconciler:${replica.sessionId}`);
		this.timeoutMs = options.timeoutMs ?? 0;
		this.comparison = options.comparison ?? "content";
		this.ownsTimeProvider = options.timeProvider === undefined;
		this.timeProvider = options.timeProvider ?? new DefaultTimeProvider();
		this.errors = options.errors ?? null;
	}

	get stats(): Readonly<StalenessStats> {
		return { ...this._stats };
	}

	/**
	 * Resolve `{stale: true, freshSnapshot}` when `fetchSnapshot` returns
	 * content the replica lacks. Never rejects: failures and timeouts resolve
	 * `{stale: false}` and are reported on the error channel.
	 */
	async checkForStaleness(
		fetchSnapshot: FetchSnapshot,
	): Promise<StalenessResult> {
		this._stats.checks++;

		let remote: Uint8Array;
		try {
			remote = await withTimeout(
				Promise.resolve().then(fetchSnapshot),
				this.timeoutMs,
				this.timeProvider,
			);
		} catch (e) {
			const timedOut = e instanceof TimeoutError;
			return this.failOpen(
				new StalenessCheckError(
					timedOut
						? `snapshot fetch timed out after ${this.timeoutMs}ms`
						: `snapshot fetch failed: ${describeError(e)}`,
					timedOut,
					{ cause: e },
				),
			);
		}

		if (this.replica.destroyed) {
			this.debug("replica destroyed during check");
			return NOT_STALE;
		}
		if (!isBytes(remote)) {
			return this.failOpen(
				new StalenessCheckError(
					`store snapshot is not binary: ${Object.prototype.toString.call(remote)}`,
					false,
				),
			);
		}
		if (remote.length === 0) {
			// the store has never been written
			return NOT_STALE;
		}

		const local = this.replica.snapshot();
		if (bytesEqual(remote, local)) {
			this._stats.fastPathHits++;
			return NOT_STALE;
		}

		const invalid = validateUpdate(remote);
		if (invalid) {
			return this.failOpen(
				new StalenessCheckError(
					`store snapshot could not be decoded: ${invalid.message}`,
					false,
					{ cause: new DecodeError(invalid.message, remote.length) },
				),
			);
		}

		this._stats.trialMerges++;
		let stale: boolean;
		try {
			stale = this.trialMerge(local, remote);
		} catch (e) {
			return this.failOpen(
				new StalenessCheckError(`trial merge failed: ${describeError(e)}`, false, {
					cause: e,
				}),
			);
		}
		this.debug(`trial merge: ${stale ? "stale" : "up to date"}`);
		return stale ? { stale: true, freshSnapshot: remote } : NOT_STALE;
	}

	/**
	 * Merge the store's snapshot into the live replica as a remote update. It
	 * is not published or recorded for undo, and concurrent local edits survive.
	 *
	 * @throws DecodeError when the snapshot is malformed.
	 */
	applyFreshState(freshSnapshot: Uint8Array): void {
		if (freshSnapshot.length === 0) return;
		if (this.replica.destroyed) {
			this.warn("applyFreshState called after the replica was destroyed");
			return;
		}
		this.replica.applyRemoteUpdate(freshSnapshot);
		this.log("applied fresh state", `${freshSnapshot.length} bytes`);
	}

	destroy(): void {
		if (this._destroyed) {
			this.warn("destroy called twice");
			return;
		}
		this._destroyed = true;
		if (this.ownsTimeProvider) {
			this.timeProvider.destroy();
		}
	}

	private trialMerge(local: Uint8Array, remote: Uint8Array): boolean {
		const trial = new Y.Doc();
		try {
			const text = trial.getText(this.replica.rootName);
			Y.applyUpdate(trial, local);
			const before = this.materialize(text);
			Y.applyUpdate(trial, remote);
			const after = this.materialize(text);
			return before !== after;
		} finally {
			trial.destroy();
		}
	}

	private materialize(text: Y.Text): string {
		const content = fingerprintText(text);
		return this.comparison === "digest" ? generateHash(content) : content;
	}

	private failOpen(error: StalenessCheckError): StalenessResult {
		this._stats.failures++;
		if (this.errors) {
			this.errors.report(error);
		} else {
			this.warn(describeError(error));
		}
		return NOT_STALE;
	}
}
