/**
 * UndoScope: undo/redo limited to what this session typed.
 *
 * Wraps Y.UndoManager, tracking only the binding's origin. Grouping is decided
 * here rather than by the manager's wall clock: each bound transaction is
 * timed with the injected TimeProvider, and any other transaction that
 * changes the tracked text closes the current group.
 */

import * as Y from "yjs";
import { HasLogging } from "../debug";
import type { EditingSurfaceBinding } from "../binding/EditingSurfaceBinding";
import { Observable } from "../observable/Observable";
import type { DocumentReplica, ReplicaWriter } from "../replica/DocumentReplica";
import { DefaultTimeProvider, type TimeProvider } from "../TimeProvider";
import type { SubscriptionId } from "../types";

export interface UndoStackState {
	undoDepth: number;
	redoDepth: number;
}

export interface UndoScopeOptions {
	timeProvider?: TimeProvider;
}

export class UndoScope extends HasLogging {
	private readonly manager: Y.UndoManager;
	private readonly writer: ReplicaWriter;
	private readonly doc: Y.Doc;
	private readonly content: Y.Text;
	private readonly stack = new Observable<UndoStackState>("undo-stack");
	private readonly timeProvider: TimeProvider;
	private readonly ownsTimeProvider: boolean;
	private lastLocalChange: number | null = null;
	private _destroyed = false;

	static create(
		replica: DocumentReplica,
		binding: EditingSurfaceBinding,
		captureTimeoutMs: number,
		options: UndoScopeOptions = {},
	): UndoScope {
		return new UndoScope(replica, binding, captureTimeoutMs, options);
	}

	private constructor(
		replica: DocumentReplica,
		binding: EditingSurfaceBinding,
		readonly captureTimeoutMs: number,
		options: UndoScopeOptions,
	) {
		super(`UndoScope:${binding.bindingId.slice(0, 8)}`);
		this.writer = binding.writer;
		this.doc = replica.doc;
		this.content = replica.content;
		this.ownsTimeProvider = options.timeProvider === undefined;
		this.timeProvider = options.timeProvider ?? new DefaultTimeProvider();
		this.manager = new Y.UndoManager(replica.content, {
			trackedOrigins: new Set([this.writer.origin]),
			// grouping is driven by the doc transaction hooks below
			captureTimeout: Number.MAX_SAFE_INTEGER,
		});
		// replays run with the manager as origin; they count as Local
		this.writer.adopt(this.manager);
		this.doc.on("beforeTransaction", this.onBeforeTransaction);
		this.doc.on("afterTransaction", this.onAfterTransaction);
		this.manager.on("stack-item-added", this.onStackChange);
		this.manager.on("stack-item-popped", this.onStackChange);
		this.manager.on("stack-cleared", this.onStackChange);
	}

	get destroyed(): boolean {
		return this._destroyed;
	}

	canUndo(): boolean {
		return !this._destroyed && this.manager.canUndo();
	}

	canRedo(): boolean {
		return !this._destroyed && this.manager.canRedo();
	}

	/** Revert the most recent local group. Returns false if there was none. */
	undo(): boolean {
		if (this.warnIfDestroyed("undo") || !this.manager.canUndo()) {
			return false;
		}
		this.manager.undo();
		this.stopCapturing();
		return true;
	}

	redo(): boolean {
		if (this.warnIfDestroyed("redo") || !this.manager.canRedo()) {
			return false;
		}
		this.manager.redo();
		this.stopCapturing();
		return true;
	}

	/** The next local edit starts a new group. */
	stopCapturing(): void {
		this.lastLocalChange = null;
		this.manager.stopCapturing();
	}

	clear(): void {
		if (this.warnIfDestroyed("clear")) return;
		this.manager.clear();
		this.lastLocalChange = null;
	}

	depth(): UndoStackState {
		return {
			undoDepth: this.manager.undoStack.length,
			redoDepth: this.manager.redoStack.length,
		};
	}

	subscribe(onChange: (state: UndoStackState) => void): SubscriptionId {
		return this.stack.subscribe(onChange);
	}

	unsubscribe(id: SubscriptionId): boolean {
		return this.stack.unsubscribe(id);
	}

	destroy(): void {
		if (this._destroyed) {
			this.warn("destroy called twice");
			return;
		}
		this._destroyed = true;
		try {
			this.doc.off("beforeTransaction", this.onBeforeTransaction);
			this.doc.off("afterTransaction", this.onAfterTransaction);
			this.manager.off("stack-item-added", this.onStackChange);
			this.manager.off("stack-item-popped", this.onStackChange);
			this.manager.off("stack-cleared", this.onStackChange);
			this.writer.disown(this.manager);
			this.manager.destroy();
			this.stack.destroy();
			if (this.ownsTimeProvider) {
				this.timeProvider.destroy();
			}
		} catch (e) {
			this.error("error during destroy", e);
		}
	}

	private readonly onBeforeTransaction = (tr: Y.Transaction) => {
		if (tr.origin !== this.writer.origin) return;
		const now = this.timeProvider.getTime();
		if (
			this.lastLocalChange !== null &&
			now - this.lastLocalChange >= this.captureTimeoutMs
		) {
			this.manager.stopCapturing();
		}
		this.lastLocalChange = now;
	};

	// Observers may open nested transactions that touch nothing; only a real
	// change from elsewhere separates the groups on either side of it.
	private readonly onAfterTransaction = (tr: Y.Transaction) => {
		if (tr.origin === this.manager || tr.origin === this.writer.origin) return;
		if (tr.changed.has(this.content)) {
			this.stopCapturing();
		}
	};

	private readonly onStackChange = () => {
		this.stack.notifyListeners(this.depth());
	};

	private warnIfDestroyed(operation: string): boolean {
		if (this._destroyed) {
			this.warn(`${operation} called after destroy`);
			return true;
		}
		return false;
	}
}
