import { v4 as uuidv4 } from "uuid";
import { HasLogging } from "../debug";
import { describeError } from "../Exceptions";
import { isBoundTo, type BindingId } from "../origins";
import type {
	AwarenessRegistrar,
	AwarenessState,
	PresenceSelection,
} from "../awareness/AwarenessRegistrar";
import type {
	ContentChanged,
	DocumentReplica,
	ReplicaWriter,
} from "../replica/DocumentReplica";
import { DefaultTimeProvider, type TimeProvider } from "../TimeProvider";
import {
	clampOffset,
	clampSelection,
	type SubscriptionId,
	type TextChange,
	type Unsubscriber,
} from "../types";
import { selectionTint } from "../awareness/colors";
import { diffToChanges } from "./diffMatchPatch";
import type {
	EditingSurface,
	PresenceDecoration,
	SurfaceUpdate,
} from "./EditingSurface";
import { fromRelativeJSON, toRelativeJSON } from "./SelectionRange";

export interface BindingOptions {
	bindingId?: BindingId;
	/** Periodically compare surface and replica and repair divergence. 0 = off. */
	driftCheckIntervalMs?: number;
	timeProvider?: TimeProvider;
	enableDeltaLogging?: boolean;
}

/**
 * Connects one editing surface to a replica and its presence registrar.
 *
 * The binding is the replica's only writer. Replica changes it did not author
 * are rendered into the surface tagged with `syncTag`; surface updates carrying
 * that tag are ignored when they come back, so nothing loops.
 */
export class EditingSurfaceBinding extends HasLogging {
	readonly bindingId: BindingId;
	readonly syncTag: string;
	private readonly _writer: ReplicaWriter;
	private readonly enableDeltaLogging: boolean;
	private readonly timeProvider: TimeProvider | null;
	private readonly ownsTimeProvider: boolean;
	private contentSubscription: SubscriptionId | null = null;
	private presenceSubscription: SubscriptionId | null = null;
	private unsubscribeSurface: Unsubscriber | null = null;
	private driftCheckTimer: number | null = null;
	private _destroyed = false;

	static attach(
		surface: EditingSurface,
		replica: DocumentReplica,
		awareness: AwarenessRegistrar,
		localSessionId: string,
		options: BindingOptions = {},
	): EditingSurfaceBinding {
		return new EditingSurfaceBinding(
			surface,
			replica,
			awareness,
			localSessionId,
			options,
		);
	}

	private constructor(
		readonly surface: EditingSurface,
		private readonly replica: DocumentReplica,
		private readonly awareness: AwarenessRegistrar,
		readonly localSessionId: string,
		options: BindingOptions,
	) {
		const bindingId = options.bindingId ?? uuidv4();
		super(`EditingSurfaceBinding:${bindingId.slice(0, 8)}`);
		this.bindingId = bindingId;
		this.syncTag = `sync:${bindingId}`;
		this.enableDeltaLogging = options.enableDeltaLogging ?? false;
		// throws BindingConflictError before anything is registered
		this._writer = replica.claimWriter(bindingId);

		const driftCheckIntervalMs = options.driftCheckIntervalMs ?? 0;
		this.ownsTimeProvider =
			driftCheckIntervalMs > 0 && options.timeProvider === undefined;
		this.timeProvider =
			options.timeProvider ??
			(this.ownsTimeProvider ? new DefaultTimeProvider() : null);

		this.resync();

		this.contentSubscription = replica.onContentChanged(this.onReplicaContent);
		this.presenceSubscription = awareness.subscribe(() => {
			this.renderPresence();
		});
		this.unsubscribeSurface = surface.onUpdate(this.onSurfaceUpdate);

		if (driftCheckIntervalMs > 0 && this.timeProvider) {
			this.driftCheckTimer = this.timeProvider.setInterval(() => {
				this.checkAndCorrectDrift();
			}, driftCheckIntervalMs);
		}

		this.publishSelection();
		this.renderPresence();
	}

	get destroyed(): boolean {
		return this._destroyed;
	}

	/** Write capability for this binding's origin; used by the undo scope. */
	get writer(): ReplicaWriter {
		return this._writer;
	}

	/**
	 * Bring the surface to the replica's content with a minimal change set.
	 * The replica wins. Returns whether anything changed.
	 */
	resync(): boolean {
		if (this.warnIfDestroyed("resync")) return false;
		const changes = diffToChanges(
			this.surface.text(),
			this.replica.text(),
			this.enableDeltaLogging,
		);
		if (changes.length === 0) {
			return false;
		}
		this.surface.dispatch({ changes, tag: this.syncTag });
		return true;
	}

	/**
	 * Repair a surface that no longer matches the replica. Returns whether
	 * drift was found.
	 */
	checkAndCorrectDrift(): boolean {
		if (this._destroyed) return false;
		if (this.surface.text() === this.replica.text()) {
			return false;
		}
		this.warn(
			"surface drifted from replica; a change reached the surface without passing through the binding",
		);
		this.resync();
		this.renderPresence();
		return true;
	}

	/** Redraw every remote session's presence. */
	renderPresence(): void {
		if (this._destroyed) return;
		this.surface.renderPresence(this.decorations());
	}

	/** Decorations for every known session except this one. */
	decorations(): PresenceDecoration[] {
		const length = this.surface.text().length;
		const decorations: PresenceDecoration[] = [];
		for (const [sessionId, state] of this.awareness.allStates()) {
			if (sessionId === this.localSessionId) continue;
			decorations.push(this.toDecoration(state, length));
		}
		return decorations.sort((a, b) => a.sessionId.localeCompare(b.sessionId));
	}

	destroy(): void {
		if (this._destroyed) {
			this.warn("destroy called twice");
			return;
		}
		this._destroyed = true;
		try {
			if (this.driftCheckTimer !== null && this.timeProvider) {
				this.timeProvider.clearInterval(this.driftCheckTimer);
				this.driftCheckTimer = null;
			}
			if (this.ownsTimeProvider) {
				this.timeProvider?.destroy();
			}
			this.unsubscribeSurface?.();
			this.unsubscribeSurface = null;
			if (this.contentSubscription !== null) {
				this.replica.unsubscribe(this.contentSubscription);
				this.contentSubscription = null;
			}
			if (this.presenceSubscription !== null) {
				this.awareness.unsubscribe(this.presenceSubscription);
				this.presenceSubscription = null;
			}
			this._writer.release();
		} catch (e) {
			this.error("error during destroy", e);
		}
	}

	private readonly onReplicaContent = ({ origin, changes }: ContentChanged) => {
		if (isBoundTo(origin, this.bindingId)) return;
		if (this.enableDeltaLogging) {
			this.debug("rendering", changes);
		}
		try {
			this.surface.dispatch({ changes, tag: this.syncTag });
		} catch (e) {
			this.warn("could not render change set, resyncing:", describeError(e));
			this.resync();
		}
		this.renderPresence();
	};

	private readonly onSurfaceUpdate = (update: SurfaceUpdate) => {
		if (this._destroyed || update.tag === this.syncTag) return;
		if (update.docChanged) {
			this.writeLocalChanges(update.changes);
		}
		if (update.docChanged || update.selectionSet) {
			this.publishSelection();
		}
	};

	private writeLocalChanges(changes: TextChange[]) {
		if (this.enableDeltaLogging) {
			this.debug("local changes", changes);
		}
		try {
			this._writer.transact((content) => {
				// positions refer to the text before the batch; track the shift
				let adj = 0;
				for (const change of changes) {
					const deleted = change.to - change.from;
					if (deleted > 0) {
						content.delete(change.from + adj, deleted);
					}
					if (change.insert.length > 0) {
						content.insert(change.from + adj, change.insert);
					}
					adj += change.insert.length - deleted;
				}
			});
		} catch (e) {
			this.error("failed to apply local edit, resyncing:", e);
			this.resync();
		}
	}

	private publishSelection() {
		if (this._destroyed) return;
		const content = this.replica.content;
		const reported = this.surface.selection();
		const { anchor, head } = clampSelection(reported, content.length);
		if (anchor !== reported.anchor || head !== reported.head) {
			this.debug("clamped selection", reported, "to", { anchor, head });
		}
		const selection: PresenceSelection = {
			anchor,
			head,
			relative: {
				anchor: toRelativeJSON(content, anchor),
				head: toRelativeJSON(content, head),
			},
		};
		this.awareness.setLocalField("selection", selection);
	}

	private toDecoration(
		state: AwarenessState,
		length: number,
	): PresenceDecoration {
		const { selection } = state;
		const base = {
			sessionId: state.sessionId,
			userId: state.userId,
			displayName: state.displayName,
			color: state.color,
			selectionColor: selectionTint(state.color),
		};
		if (!selection) {
			return { ...base, anchor: 0, head: 0, placeholder: true };
		}
		const anchor = this.resolvePosition(
			selection.relative?.anchor,
			selection.anchor,
		);
		const head = this.resolvePosition(selection.relative?.head, selection.head);
		return {
			...base,
			anchor: clampOffset(anchor, length),
			head: clampOffset(head, length),
			placeholder: false,
		};
	}

	private resolvePosition(
		relative: Record<string, unknown> | undefined,
		fallback: number,
	): number {
		if (!relative) return fallback;
		const resolved = fromRelativeJSON(this.replica.content, relative);
		return resolved ?? fallback;
	}

	private warnIfDestroyed(operation: string): boolean {
		if (this._destroyed) {
			this.warn(`${operation} called after destroy`);
			return true;
		}
		return false;
	}
}
