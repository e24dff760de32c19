/**
 * CollabSession: one editing session, from mount to unmount.
 *
 * Creates and owns the replica, presence registrar, binding, undo scope,
 * staleness reconciler and transport bridge, and tears them down in reverse.
 * `reconcile()` carries the policy for merging content found in the store.
 */

import { v4 as uuidv4 } from "uuid";
import {
	AwarenessRegistrar,
	type PresenceIdentity,
} from "../awareness/AwarenessRegistrar";
import type { EditingSurface } from "../binding/EditingSurface";
import { EditingSurfaceBinding } from "../binding/EditingSurfaceBinding";
import { resolveSettings, type CollabSettings } from "../CollabSettings";
import { HasLogging } from "../debug";
import { ErrorChannel } from "../ErrorChannel";
import {
	CollabException,
	DecodeError,
	ReplicaSeedError,
	describeError,
} from "../Exceptions";
import { SharedPromise } from "../promiseUtils";
import { StalenessReconciler } from "../reconcile/StalenessReconciler";
import { DocumentReplica } from "../replica/DocumentReplica";
import { DefaultTimeProvider, type TimeProvider } from "../TimeProvider";
import type { Transport } from "../transport/Transport";
import { TransportBridge } from "../transport/TransportBridge";
import { UndoScope } from "../undo/UndoScope";

export interface SessionIdentity extends Omit<PresenceIdentity, "sessionId"> {
	sessionId?: string;
}

export interface CollabSessionOptions {
	surface: EditingSurface;
	transport: Transport;
	identity: SessionIdentity;
	initialSnapshot?: Uint8Array;
	settings?: Partial<CollabSettings>;
	timeProvider?: TimeProvider;
	errors?: ErrorChannel;
}

export interface ReconcileOutcome {
	stale: boolean;
	/** The store's snapshot was merged into the replica. */
	merged: boolean;
	/** Local edits were pending, so the merged state was written back. */
	persisted: boolean;
	/** The merged snapshot was sent to peers. */
	published: boolean;
}

export class CollabSession extends HasLogging {
	readonly sessionId: string;
	readonly settings: CollabSettings;
	readonly errors: ErrorChannel;
	readonly replica: DocumentReplica;
	readonly awareness: AwarenessRegistrar;
	readonly binding: EditingSurfaceBinding;
	readonly undoScope: UndoScope;
	readonly reconciler: StalenessReconciler;
	readonly bridge: TransportBridge;
	private readonly transport: Transport;
	private readonly timeProvider: TimeProvider;
	private readonly ownsTimeProvider: boolean;
	private readonly ownsErrors: boolean;
	private readonly reconciliation: SharedPromise<ReconcileOutcome>;
	private _destroyed = false;

	/**
	 * @throws ConfigurationError for invalid settings.
	 * @throws BindingConflictError if the surface binding cannot be created.
	 * A malformed `initialSnapshot` is reported on `errors`; the session opens
	 * empty.
	 */
	static open(options: CollabSessionOptions): CollabSession {
		return new CollabSession(options);
	}

	private constructor(options: CollabSessionOptions) {
		const sessionId = options.identity.sessionId ?? uuidv4();
		super(`CollabSession:${sessionId.slice(0, 8)}`);
		this.sessionId = sessionId;
		this.settings = resolveSettings(options.settings);
		this.transport = options.transport;
		this.ownsErrors = options.errors === undefined;
		this.errors = options.errors ?? new ErrorChannel();
		this.ownsTimeProvider = options.timeProvider === undefined;
		this.timeProvider = options.timeProvider ?? new DefaultTimeProvider();
		const { settings, timeProvider, errors } = this;

		this.replica = this.createReplica(options.initialSnapshot);
		this.awareness = AwarenessRegistrar.create(
			this.replica,
			{ ...options.identity, sessionId },
			{
				idleTimeoutMs: settings.presenceIdleTimeoutMs,
				sweepIntervalMs: settings.presenceSweepIntervalMs,
				timeProvider,
			},
		);
		this.binding = EditingSurfaceBinding.attach(
			options.surface,
			this.replica,
			this.awareness,
			sessionId,
			{
				driftCheckIntervalMs: settings.driftCheckIntervalMs,
				enableDeltaLogging: settings.enableDeltaLogging,
				timeProvider,
			},
		);
		this.undoScope = UndoScope.create(
			this.replica,
			this.binding,
			settings.captureTimeoutMs,
			{ timeProvider },
		);
		this.reconciler = new StalenessReconciler(this.replica, {
			timeoutMs: settings.stalenessTimeoutMs,
			comparison: settings.stalenessComparison,
			timeProvider,
			errors,
		});
		this.bridge = new TransportBridge(
			this.replica,
			this.awareness,
			this.transport,
			{
				persistDebounceMs: settings.persistDebounceMs,
				enableDeltaLogging: settings.enableDeltaLogging,
				timeProvider,
				errors,
			},
		);
		this.reconciliation = new SharedPromise(() => this.runReconcile());
		this.bridge.publishPresence();
		this.log("opened");
	}

	get destroyed(): boolean {
		return this._destroyed;
	}

	text(): string {
		return this.replica.text();
	}

	undo(): boolean {
		return this.undoScope.undo();
	}

	redo(): boolean {
		return this.undoScope.redo();
	}

	/**
	 * Check the store for content this replica lacks and merge it. If local
	 * edits had not been persisted yet, the merged state is persisted and
	 * published so peers converge. Concurrent calls share one check.
	 */
	reconcile(): Promise<ReconcileOutcome> {
		if (this._destroyed) {
			this.warn("reconcile called after destroy");
			return Promise.resolve({
				stale: false,
				merged: false,
				persisted: false,
				published: false,
			});
		}
		return this.reconciliation.getPromise();
	}

	destroy(): void {
		if (this._destroyed) {
			this.warn("destroy called twice");
			return;
		}
		this._destroyed = true;
		this.undoScope.destroy();
		this.binding.destroy();
		this.bridge.destroy();
		this.awareness.destroy();
		this.reconciler.destroy();
		this.replica.destroy();
		this.reconciliation.destroy();
		if (this.ownsTimeProvider) {
			this.timeProvider.destroy();
		}
		if (this.ownsErrors) {
			this.errors.destroy();
		}
		this.log("closed");
	}

	private createReplica(initialSnapshot: Uint8Array | undefined) {
		const replicaOptions = {
			sessionId: this.sessionId,
			rootName: this.settings.rootName,
			initialSnapshot,
			enableDeltaLogging: this.settings.enableDeltaLogging,
		};
		try {
			return DocumentReplica.create(replicaOptions);
		} catch (e) {
			if (e instanceof ReplicaSeedError && e.replica instanceof DocumentReplica) {
				this.errors.report(e);
				return e.replica;
			}
			throw e;
		}
	}

	private async runReconcile(): Promise<ReconcileOutcome> {
		const outcome: ReconcileOutcome = {
			stale: false,
			merged: false,
			persisted: false,
			published: false,
		};
		const result = await this.reconciler.checkForStaleness(() =>
			this.transport.fetchCurrentSnapshot(),
		);
		outcome.stale = result.stale;
		if (!result.stale || !result.freshSnapshot || this._destroyed) {
			return outcome;
		}

		const hadPendingEdits = this.bridge.hasPendingEdits();
		try {
			this.reconciler.applyFreshState(result.freshSnapshot);
			outcome.merged = true;
		} catch (e) {
			this.errors.report(
				e instanceof CollabException
					? e
					: new DecodeError(describeError(e), result.freshSnapshot.length, {
							cause: e,
						}),
			);
			return outcome;
		}
		this.log(`merged fresh state (pending local edits: ${hadPendingEdits})`);

		if (hadPendingEdits && !this._destroyed) {
			outcome.persisted = await this.bridge.persist();
			if (!this._destroyed) {
				this.bridge.publishSnapshot();
				outcome.published = true;
			}
		}
		return outcome;
	}
}
