/**
 * DocumentReplica: one session's Yjs replica of the shared document.
 *
 * Emits two independent events:
 * - binary updates with their origin tag (for transport and persistence)
 * - content changes as text deltas (for the editing surface)
 */

import * as Y from "yjs";
import { HasLogging } from "../debug";
import {
	BindingConflictError,
	CollabException,
	DecodeError,
	ReplicaSeedError,
	describeError,
} from "../Exceptions";
import { Observable } from "../observable/Observable";
import {
	LOCAL_ORIGIN,
	REMOTE_ORIGIN,
	boundTo,
	describeOrigin,
	isOrigin,
	isOutbound,
	type BindingId,
	type Origin,
} from "../origins";
import type { SubscriptionId, TextChange } from "../types";
import { validateUpdate } from "./validation";

export interface ReplicaOptions {
	sessionId: string;
	rootName?: string;
	initialSnapshot?: Uint8Array;
	enableDeltaLogging?: boolean;
}

export interface ReplicaUpdate {
	update: Uint8Array;
	origin: Origin;
}

export interface ContentChanged {
	origin: Origin;
	changes: TextChange[];
}

export type UpdateListener = (update: Uint8Array, origin: Origin) => void;

/**
 * Materialize a document's root in a form that changes whenever the visible
 * content (text or formatting) changes.
 */
export function fingerprintText(text: Y.Text): string {
	return JSON.stringify(text.toDelta());
}

/**
 * Convert a Y.Text delta into changes relative to the pre-change text.
 * Embeds are not representable as text and are skipped.
 */
export function deltaToChanges(delta: Y.YTextEvent["delta"]): TextChange[] {
	const changes: TextChange[] = [];
	let pos = 0;
	for (const d of delta) {
		if (d.insert != null) {
			if (typeof d.insert === "string") {
				changes.push({ from: pos, to: pos, insert: d.insert });
			}
		} else if (d.delete != null) {
			changes.push({ from: pos, to: pos + d.delete, insert: "" });
			pos += d.delete;
		} else if (d.retain != null) {
			pos += d.retain;
		}
	}
	return changes;
}

/**
 * The single write capability for a replica. Held by exactly one binding.
 */
export class ReplicaWriter {
	readonly origin: Origin;
	private released = false;

	constructor(
		private readonly replica: DocumentReplica,
		readonly bindingId: BindingId,
	) {
		this.origin = boundTo(bindingId);
	}

	get active(): boolean {
		return !this.released && !this.replica.destroyed;
	}

	/** Run `fn` in one Yjs transaction tagged `BoundTo(bindingId)`. */
	transact(fn: (content: Y.Text) => void): void {
		if (!this.active) {
			throw new CollabException(
				`writer for ${this.bindingId} was released`,
			);
		}
		const content = this.replica.content;
		this.replica.doc.transact(() => fn(content), this.origin);
	}

	/**
	 * Mark a helper object (such as an undo manager) used as a raw Yjs origin as
	 * acting on behalf of this binding. Its transactions resolve to `Local`.
	 */
	adopt(alias: object): void {
		this.replica.registerAlias(this, alias);
	}

	disown(alias: object): void {
		this.replica.unregisterAlias(this, alias);
	}

	release(): void {
		if (this.released) return;
		this.released = true;
		this.replica.releaseWriter(this);
	}
}

export class DocumentReplica extends HasLogging {
	readonly sessionId: string;
	readonly rootName: string;
	private readonly ydoc: Y.Doc;
	private readonly ytext: Y.Text;
	private readonly updates = new Observable<ReplicaUpdate>("replica-updates");
	private readonly contentChanges = new Observable<ContentChanged>(
		"replica-content",
	);
	private readonly aliases = new Map<object, ReplicaWriter>();
	private writer: ReplicaWriter | null = null;
	private enableDeltaLogging: boolean;
	private warnedUnknownOrigin = false;
	private _destroyed = false;

	private readonly onDocUpdate = (update: Uint8Array, rawOrigin: unknown) => {
		const origin = this.resolveOrigin(rawOrigin);
		if (this.enableDeltaLogging) {
			this.debug(`update (${update.length} bytes) from ${describeOrigin(origin)}`);
		}
		this.updates.notifyListeners({ update, origin });
	};

	private readonly onTextEvent = (event: Y.YTextEvent, tr: Y.Transaction) => {
		const changes = deltaToChanges(event.delta);
		if (changes.length === 0) return;
		this.contentChanges.notifyListeners({
			origin: this.resolveOrigin(tr.origin),
			changes,
		});
	};

	/**
	 * Construct a replica, optionally seeded from a snapshot.
	 *
	 * @throws ReplicaSeedError when `initialSnapshot` is malformed; the error
	 *   carries the (empty, usable) replica.
	 */
	static create(options: ReplicaOptions): DocumentReplica {
		const replica = new DocumentReplica(options);
		if (options.initialSnapshot && options.initialSnapshot.length > 0) {
			const invalid = validateUpdate(options.initialSnapshot);
			if (invalid) {
				replica.warn("initial snapshot rejected:", describeError(invalid));
				throw new ReplicaSeedError(replica, options.initialSnapshot.length, {
					cause: invalid,
				});
			}
			Y.applyUpdate(replica.ydoc, options.initialSnapshot, REMOTE_ORIGIN);
		}
		return replica;
	}

	constructor(options: ReplicaOptions) {
		super(`DocumentReplica:${options.sessionId}`);
		this.sessionId = options.sessionId;
		this.rootName = options.rootName ?? "contents";
		this.enableDeltaLogging = options.enableDeltaLogging ?? false;
		this.ydoc = new Y.Doc();
		this.ytext = this.ydoc.getText(this.rootName);
		this.ydoc.on("update", this.onDocUpdate);
		this.ytext.observe(this.onTextEvent);
	}

	get destroyed(): boolean {
		return this._destroyed;
	}

	/** The underlying Yjs document, for collaborators inside this package. */
	get doc(): Y.Doc {
		return this.ydoc;
	}

	get content(): Y.Text {
		return this.ytext;
	}

	get clientId(): number {
		return this.ydoc.clientID;
	}

	/** Id of the binding currently holding the writer, if any. */
	get boundBindingId(): BindingId | null {
		return this.writer?.bindingId ?? null;
	}

	/**
	 * Merge an update from another session or the store, tagged `Remote`.
	 *
	 * @throws DecodeError when the bytes are malformed; the replica is untouched.
	 */
	applyRemoteUpdate(update: Uint8Array): void {
		if (this.warnIfDestroyed("applyRemoteUpdate")) return;
		const invalid = validateUpdate(update);
		if (invalid) {
			this.warn(`rejected remote update (${update.length} bytes):`, invalid);
			throw new DecodeError(
				`Malformed update: ${invalid.message}`,
				update.length,
				{ cause: invalid },
			);
		}
		Y.applyUpdate(this.ydoc, update, REMOTE_ORIGIN);
	}

	/** Full causal state; always succeeds. */
	snapshot(): Uint8Array {
		return Y.encodeStateAsUpdate(this.ydoc);
	}

	stateVector(): Uint8Array {
		return Y.encodeStateVector(this.ydoc);
	}

	/**
	 * Everything this replica has that a peer with `stateVector` lacks.
	 *
	 * @throws DecodeError when the state vector is malformed.
	 */
	diffSince(stateVector: Uint8Array): Uint8Array {
		try {
			return Y.encodeStateAsUpdate(this.ydoc, stateVector);
		} catch (e) {
			throw new DecodeError(
				`Malformed state vector: ${describeError(e)}`,
				stateVector.length,
				{ cause: e },
			);
		}
	}

	text(): string {
		return this.ytext.toString();
	}

	fingerprint(): string {
		return fingerprintText(this.ytext);
	}

	subscribe(onUpdate: UpdateListener): SubscriptionId {
		return this.updates.subscribe(({ update, origin }) =>
			onUpdate(update, origin),
		);
	}

	/** Like `subscribe`, but only for updates that must be published. */
	subscribeLocal(onUpdate: UpdateListener): SubscriptionId {
		return this.updates.subscribe(({ update, origin }) => {
			if (isOutbound(origin)) {
				onUpdate(update, origin);
			}
		});
	}

	onContentChanged(listener: (change: ContentChanged) => void): SubscriptionId {
		return this.contentChanges.subscribe(listener);
	}

	unsubscribe(id: SubscriptionId): boolean {
		return this.updates.unsubscribe(id) || this.contentChanges.unsubscribe(id);
	}

	/**
	 * Obtain the write capability for `bindingId`.
	 *
	 * @throws BindingConflictError if another binding holds it.
	 */
	claimWriter(bindingId: BindingId): ReplicaWriter {
		if (this.writer && this.writer.bindingId !== bindingId) {
			throw new BindingConflictError(this.writer.bindingId, bindingId);
		}
		if (!this.writer) {
			this.writer = new ReplicaWriter(this, bindingId);
		}
		return this.writer;
	}

	/** @internal */
	registerAlias(writer: ReplicaWriter, alias: object): void {
		if (this.writer !== writer) {
			throw new BindingConflictError(
				this.writer?.bindingId ?? "none",
				writer.bindingId,
			);
		}
		this.aliases.set(alias, writer);
	}

	/** @internal */
	unregisterAlias(writer: ReplicaWriter, alias: object): void {
		if (this.aliases.get(alias) === writer) {
			this.aliases.delete(alias);
		}
	}

	/** @internal */
	releaseWriter(writer: ReplicaWriter): void {
		if (this.writer !== writer) return;
		this.writer = null;
		for (const [alias, owner] of [...this.aliases]) {
			if (owner === writer) this.aliases.delete(alias);
		}
	}

	/** Map a raw Yjs transaction origin onto the tagged union. */
	resolveOrigin(raw: unknown): Origin {
		if (isOrigin(raw)) {
			return raw;
		}
		if (typeof raw === "object" && raw !== null && this.aliases.has(raw)) {
			return LOCAL_ORIGIN;
		}
		if (!this.warnedUnknownOrigin) {
			this.warnedUnknownOrigin = true;
			this.warn("transaction outside the bound writer; treating it as local");
		}
		return LOCAL_ORIGIN;
	}

	setDeltaLogging(enabled: boolean): void {
		this.enableDeltaLogging = enabled;
	}

	destroy(): void {
		if (this._destroyed) {
			this.warn("destroy called twice");
			return;
		}
		this._destroyed = true;
		try {
			this.writer?.release();
			this.ytext.unobserve(this.onTextEvent);
			this.ydoc.off("update", this.onDocUpdate);
			this.updates.destroy();
			this.contentChanges.destroy();
			this.ydoc.destroy();
		} catch (e) {
			this.error("error during destroy", e);
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
