/**
 * TransportBridge: moves bytes between one session and its Transport.
 *
 * - publishes every outbound replica update and every local presence change
 * - applies inbound updates and presence; bad payloads are reported, not thrown
 * - tracks local edits not yet written to the store and persists them,
 *   debounced, through `requestPersist`
 */

import type { AwarenessRegistrar, PresenceDiff } from "../awareness/AwarenessRegistrar";
import { HasLogging } from "../debug";
import type { ErrorChannel } from "../ErrorChannel";
import {
	CollabException,
	DecodeError,
	TransportError,
	describeError,
	type TransportOperation,
} from "../Exceptions";
import { describeOrigin, type Origin } from "../origins";
import type { DocumentReplica } from "../replica/DocumentReplica";
import {
	DefaultTimeProvider,
	type Debounced,
	type TimeProvider,
} from "../TimeProvider";
import type { SubscriptionId, Unsubscriber } from "../types";
import type { Transport } from "./Transport";

export interface TransportBridgeOptions {
	/** 0 disables automatic persistence; call `persist()` instead. */
	persistDebounceMs?: number;
	timeProvider?: TimeProvider;
	errors?: ErrorChannel;
	enableDeltaLogging?: boolean;
}

export class TransportBridge extends HasLogging {
	readonly sessionId: string;
	private readonly timeProvider: TimeProvider;
	private readonly ownsTimeProvider: boolean;
	private readonly errors: ErrorChannel | null;
	private readonly enableDeltaLogging: boolean;
	private readonly persistLater: Debounced<[]> | null;
	private replicaSubscription: SubscriptionId | null = null;
	private awarenessSubscription: SubscriptionId | null = null;
	private unsubscribeRemoteUpdate: Unsubscriber | null = null;
	private unsubscribeRemoteAwareness: Unsubscriber | null = null;
	private _pendingEdits = 0;
	private _destroyed = false;

	constructor(
		private readonly replica: DocumentReplica,
		private readonly awareness: AwarenessRegistrar,
		private readonly transport: Transport,
		options: TransportBridgeOptions = {},
	) {
		super(`TransportBridge:${replica.sessionId}`);
		this.sessionId = replica.sessionId;
		this.ownsTimeProvider = options.timeProvider === undefined;
		this.timeProvider = options.timeProvider ?? new DefaultTimeProvider();
		this.errors = options.errors ?? null;
		this.enableDeltaLogging = options.enableDeltaLogging ?? false;

		const persistDebounceMs = options.persistDebounceMs ?? 0;
		this.persistLater =
			persistDebounceMs > 0
				? this.timeProvider.debounce(() => {
						this.persist().catch((e: unknown) => {
							this.error("persist failed", e);
						});
					}, persistDebounceMs)
				: null;

		try {
			this.unsubscribeRemoteUpdate = transport.onRemoteUpdate((update) =>
				this.handleRemoteUpdate(update),
			);
			this.unsubscribeRemoteAwareness = transport.onRemoteAwareness(
				(update) => this.handleRemoteAwareness(update),
			);
		} catch (e) {
			this.unsubscribeRemoteUpdate?.();
			throw new TransportError("subscribe", describeError(e), { cause: e });
		}
		this.replicaSubscription = replica.subscribeLocal(this.handleLocalUpdate);
		this.awarenessSubscription = awareness.subscribe(this.handleLocalPresence);
	}

	get destroyed(): boolean {
		return this._destroyed;
	}

	/** Local updates published since the last successful persist. */
	get pendingEdits(): number {
		return this._pendingEdits;
	}

	hasPendingEdits(): boolean {
		return this._pendingEdits > 0;
	}

	/**
	 * Write the full snapshot and materialized text to the store. Resolves
	 * false (and reports a TransportError) if the write failed.
	 */
	async persist(): Promise<boolean> {
		if (this.warnIfDestroyed("persist")) return false;
		this.persistLater?.cancel();
		const covered = this._pendingEdits;
		const snapshot = this.replica.snapshot();
		const content = this.replica.text();
		try {
			await this.transport.requestPersist(snapshot, content);
		} catch (e) {
			this.report("requestPersist", e);
			return false;
		}
		this._pendingEdits = Math.max(0, this._pendingEdits - covered);
		this.debug(`persisted ${snapshot.length} bytes`);
		return true;
	}

	/** Send the whole replica state so peers that missed updates converge. */
	publishSnapshot(): void {
		if (this.warnIfDestroyed("publishSnapshot")) return;
		const snapshot = this.replica.snapshot();
		this.send("publishUpdate", () =>
			this.transport.publishUpdate(this.sessionId, snapshot),
		);
	}

	/** Publish this session's full presence, e.g. after reconnecting. */
	publishPresence(): void {
		if (this.warnIfDestroyed("publishPresence")) return;
		const update = this.awareness.encodeLocal();
		this.send("publishAwareness", () =>
			this.transport.publishAwareness(this.sessionId, update),
		);
	}

	/**
	 * Stop forwarding. Pending edits get one last persist attempt and peers are
	 * told this session has left.
	 */
	destroy(): void {
		if (this._destroyed) {
			this.warn("destroy called twice");
			return;
		}
		try {
			if (this._pendingEdits > 0) {
				this.persist().catch((e: unknown) => {
					this.error("final persist failed", e);
				});
			}
			this.persistLater?.cancel();
			if (this.awarenessSubscription !== null) {
				this.awareness.unsubscribe(this.awarenessSubscription);
				this.awarenessSubscription = null;
			}
			if (!this.awareness.destroyed) {
				const departure = this.awareness.leave();
				this.send("publishAwareness", () =>
					this.transport.publishAwareness(this.sessionId, departure),
				);
			}
			this._destroyed = true;
			this.unsubscribeRemoteUpdate?.();
			this.unsubscribeRemoteUpdate = null;
			this.unsubscribeRemoteAwareness?.();
			this.unsubscribeRemoteAwareness = null;
			if (this.replicaSubscription !== null) {
				this.replica.unsubscribe(this.replicaSubscription);
				this.replicaSubscription = null;
			}
			if (this.ownsTimeProvider) {
				this.timeProvider.destroy();
			}
		} catch (e) {
			this._destroyed = true;
			this.error("error during destroy", e);
		}
	}

	private readonly handleLocalUpdate = (update: Uint8Array, origin: Origin) => {
		if (this.enableDeltaLogging) {
			this.debug(`publishing ${update.length} bytes from ${describeOrigin(origin)}`);
		}
		this._pendingEdits++;
		this.send("publishUpdate", () =>
			this.transport.publishUpdate(this.sessionId, update),
		);
		this.persistLater?.();
	};

	private readonly handleLocalPresence = (diff: PresenceDiff) => {
		if (diff.source !== "local") return;
		const update = this.awareness.encodeDiff([
			...diff.added,
			...diff.updated,
			...diff.removed,
		]);
		this.send("publishAwareness", () =>
			this.transport.publishAwareness(this.sessionId, update),
		);
	};

	private handleRemoteUpdate(update: Uint8Array) {
		if (this._destroyed) return;
		try {
			this.replica.applyRemoteUpdate(update);
		} catch (e) {
			this.reportDecode("remote update", update.length, e);
		}
	}

	private handleRemoteAwareness(update: Uint8Array) {
		if (this._destroyed) return;
		try {
			this.awareness.applyRemoteUpdate(update);
		} catch (e) {
			this.reportDecode("remote presence", update.length, e);
		}
	}

	private send(operation: TransportOperation, publish: () => void | Promise<void>) {
		try {
			const result = publish();
			if (result instanceof Promise) {
				result.catch((e: unknown) => this.report(operation, e));
			}
		} catch (e) {
			this.report(operation, e);
		}
	}

	private report(operation: TransportOperation, cause: unknown) {
		const error = new TransportError(operation, describeError(cause), { cause });
		if (this.errors) {
			this.errors.report(error);
		} else {
			this.error(error.message);
		}
	}

	private reportDecode(what: string, length: number, cause: unknown) {
		const error =
			cause instanceof CollabException
				? cause
				: new DecodeError(`${what}: ${describeError(cause)}`, length, { cause });
		if (this.errors) {
			this.errors.report(error);
		} else {
			this.error(`rejected ${what}:`, error.message);
		}
	}

	private warnIfDestroyed(operation: string): boolean {
		if (this._destroyed) {
			this.warn(`${operation} called after destroy`);
			return true;
		}
		return false;
	}
}
