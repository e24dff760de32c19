import {
	Awareness,
	applyAwarenessUpdate,
	encodeAwarenessUpdate,
	removeAwarenessStates,
} from "y-protocols/awareness";
import { HasLogging } from "../debug";
import { Observable } from "../observable/Observable";
import { DefaultTimeProvider, type TimeProvider } from "../TimeProvider";
import type { DocumentReplica } from "../replica/DocumentReplica";
import type { SelectionOffsets, SubscriptionId } from "../types";
import { colorForUser } from "./colors";
import { readAwarenessUpdate } from "./encoding";

/** JSON form of a Yjs relative position, as produced by `relativePositionToJSON`. */
export type RelativePositionJSON = Record<string, unknown>;

export interface PresenceSelection extends SelectionOffsets {
	relative?: { anchor: RelativePositionJSON; head: RelativePositionJSON };
}

export interface PresenceIdentity {
	sessionId: string;
	userId: string;
	displayName: string;
	color?: string;
}

export interface AwarenessState {
	sessionId: string;
	userId: string;
	displayName: string;
	color: string;
	selection: PresenceSelection | null;
	/** ms since epoch of the last update received for this session. */
	lastSeen: number;
}

/** Fields a session may change about itself. */
export interface LocalPresenceFields {
	userId: string;
	displayName: string;
	color: string;
	selection: PresenceSelection | null;
}

export type PresenceSource = "local" | "remote" | "timeout";

export interface PresenceDiff {
	added: string[];
	updated: string[];
	removed: string[];
	source: PresenceSource;
}

export interface AwarenessRegistrarOptions {
	/** Remote sessions silent for longer than this are removed. 0 disables. */
	idleTimeoutMs?: number;
	sweepIntervalMs?: number;
	timeProvider?: TimeProvider;
}

interface AwarenessChange {
	added: number[];
	updated: number[];
	removed: number[];
}

const REMOTE_PRESENCE = Symbol.for("coedit:remote-presence");
const TIMEOUT_PRESENCE = "timeout";

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSelection(value: unknown): PresenceSelection | null {
	if (!isRecord(value)) return null;
	const { anchor, head, relative } = value;
	if (typeof anchor !== "number" || typeof head !== "number") return null;
	const selection: PresenceSelection = { anchor, head };
	if (
		isRecord(relative) &&
		isRecord(relative.anchor) &&
		isRecord(relative.head)
	) {
		selection.relative = { anchor: relative.anchor, head: relative.head };
	}
	return selection;
}

/**
 * Ephemeral per-session presence over the y-protocols awareness CRDT.
 *
 * States are keyed by Yjs client id on the wire and by session id here.
 * The registrar never filters its own session out of remote payloads;
 * consumers decide which sessions count as peers.
 */
export class AwarenessRegistrar extends HasLogging {
	readonly sessionId: string;
	private readonly awareness: Awareness;
	private readonly diffs = new Observable<PresenceDiff>("presence");
	// a removed client stays resolvable until its removal has been announced
	private readonly sessionsByClient = new Map<number, string>();
	private readonly timeProvider: TimeProvider;
	private readonly ownsTimeProvider: boolean;
	private readonly idleTimeoutMs: number;
	private readonly identityFields: LocalPresenceFields & { sessionId: string };
	private sweepTimer: number | null = null;
	private _destroyed = false;

	private readonly onChange = (change: AwarenessChange, origin: unknown) => {
		this.rememberSessions(change.added.concat(change.updated));
		const source: PresenceSource =
			origin === "local"
				? "local"
				: origin === TIMEOUT_PRESENCE
					? "timeout"
					: "remote";
		const diff: PresenceDiff = {
			added: this.toSessionIds(change.added),
			updated: this.toSessionIds(change.updated),
			removed: this.toSessionIds(change.removed),
			source,
		};
		this.diffs.notifyListeners(diff);
		this.forgetSessions(change.removed);
	};

	static create(
		replica: DocumentReplica,
		identity: PresenceIdentity,
		options: AwarenessRegistrarOptions = {},
	): AwarenessRegistrar {
		return new AwarenessRegistrar(replica, identity, options);
	}

	constructor(
		replica: DocumentReplica,
		identity: PresenceIdentity,
		options: AwarenessRegistrarOptions = {},
	) {
		super(`AwarenessRegistrar:${identity.sessionId}`);
		this.sessionId = identity.sessionId;
		this.awareness = new Awareness(replica.doc);
		this.ownsTimeProvider = options.timeProvider === undefined;
		this.timeProvider = options.timeProvider ?? new DefaultTimeProvider();
		this.idleTimeoutMs = options.idleTimeoutMs ?? 0;

		this.identityFields = {
			sessionId: identity.sessionId,
			userId: identity.userId,
			displayName: identity.displayName,
			color: identity.color ?? colorForUser(identity.userId),
			selection: null,
		};
		this.sessionsByClient.set(this.awareness.clientID, identity.sessionId);
		this.awareness.setLocalState({ ...this.identityFields });
		this.awareness.on("change", this.onChange);

		if (this.idleTimeoutMs > 0) {
			this.sweepTimer = this.timeProvider.setInterval(() => {
				this.pruneInactive();
			}, options.sweepIntervalMs ?? Math.max(1, this.idleTimeoutMs / 6));
		}
	}

	get destroyed(): boolean {
		return this._destroyed;
	}

	get clientId(): number {
		return this.awareness.clientID;
	}

	/** Client ids currently mapped to a session, this one included. */
	get knownClientCount(): number {
		return this.sessionsByClient.size;
	}

	setLocalField<K extends keyof LocalPresenceFields>(
		key: K,
		value: LocalPresenceFields[K],
	): void {
		if (this.warnIfDestroyed("setLocalField")) return;
		if (this.awareness.getLocalState() === null) {
			this.awareness.setLocalState({ ...this.identityFields });
		}
		this.awareness.setLocalStateField(key, value);
	}

	localState(): AwarenessState | null {
		return this.toAwarenessState(
			this.awareness.clientID,
			this.awareness.getLocalState(),
		);
	}

	/** Every known session, including this one. */
	allStates(): Map<string, AwarenessState> {
		const states = new Map<string, AwarenessState>();
		this.awareness.getStates().forEach((raw, clientId) => {
			const state = this.toAwarenessState(clientId, raw);
			if (!state) {
				return;
			}
			const existing = states.get(state.sessionId);
			if (!existing || existing.lastSeen <= state.lastSeen) {
				states.set(state.sessionId, state);
			}
		});
		return states;
	}

	/**
	 * Merge presence received from another session.
	 *
	 * @throws DecodeError when the payload is malformed; nothing is applied.
	 */
	applyRemoteUpdate(update: Uint8Array): void {
		if (this.warnIfDestroyed("applyRemoteUpdate")) return;
		const entries = readAwarenessUpdate(update);
		for (const entry of entries) {
			if (isRecord(entry.state) && typeof entry.state.sessionId === "string") {
				this.sessionsByClient.set(entry.clientId, entry.state.sessionId);
			}
		}
		applyAwarenessUpdate(this.awareness, update, REMOTE_PRESENCE);
	}

	/** Encode the current (or removed) state of the given sessions. */
	encodeDiff(changedSessionIds: Iterable<string>): Uint8Array {
		const wanted = new Set(changedSessionIds);
		const clients: number[] = [];
		for (const [clientId, sessionId] of this.sessionsByClient) {
			if (wanted.has(sessionId) && this.awareness.meta.has(clientId)) {
				clients.push(clientId);
			}
		}
		return encodeAwarenessUpdate(this.awareness, clients);
	}

	encodeLocal(): Uint8Array {
		return encodeAwarenessUpdate(this.awareness, [this.awareness.clientID]);
	}

	subscribe(onChange: (diff: PresenceDiff) => void): SubscriptionId {
		return this.diffs.subscribe(onChange);
	}

	unsubscribe(id: SubscriptionId): boolean {
		return this.diffs.unsubscribe(id);
	}

	/**
	 * Remove remote sessions not heard from within the idle timeout.
	 * Returns the removed session ids.
	 */
	pruneInactive(now: number = this.timeProvider.getTime()): string[] {
		if (this._destroyed || this.idleTimeoutMs <= 0) return [];
		const stale: number[] = [];
		this.awareness.meta.forEach((meta, clientId) => {
			if (
				clientId !== this.awareness.clientID &&
				this.awareness.states.has(clientId) &&
				now - meta.lastUpdated >= this.idleTimeoutMs
			) {
				stale.push(clientId);
			}
		});
		if (stale.length === 0) return [];
		const removed = this.toSessionIds(stale);
		this.debug("pruning idle sessions", removed);
		removeAwarenessStates(this.awareness, stale, TIMEOUT_PRESENCE);
		return removed;
	}

	/**
	 * Clear the local state and return the update that tells peers this
	 * session has gone. Subsequent `setLocalField` calls restore presence.
	 */
	leave(): Uint8Array {
		if (this.awareness.getLocalState() !== null) {
			this.awareness.setLocalState(null);
		}
		return this.encodeLocal();
	}

	destroy(): void {
		if (this._destroyed) {
			this.warn("destroy called twice");
			return;
		}
		try {
			if (this.sweepTimer !== null) {
				this.timeProvider.clearInterval(this.sweepTimer);
				this.sweepTimer = null;
			}
			if (this.awareness.getLocalState() !== null) {
				this.awareness.setLocalState(null);
			}
			this._destroyed = true;
			this.awareness.off("change", this.onChange);
			this.awareness.destroy();
			this.diffs.destroy();
			if (this.ownsTimeProvider) {
				this.timeProvider.destroy();
			}
		} catch (e) {
			this._destroyed = true;
			this.error("error during destroy", e);
		}
	}

	private toAwarenessState(
		clientId: number,
		raw: unknown,
	): AwarenessState | null {
		if (!isRecord(raw) || typeof raw.sessionId !== "string") {
			return null;
		}
		const userId = typeof raw.userId === "string" ? raw.userId : raw.sessionId;
		return {
			sessionId: raw.sessionId,
			userId,
			displayName:
				typeof raw.displayName === "string" ? raw.displayName : userId,
			color: typeof raw.color === "string" ? raw.color : colorForUser(userId),
			selection: readSelection(raw.selection),
			lastSeen: this.awareness.meta.get(clientId)?.lastUpdated ?? 0,
		};
	}

	private rememberSessions(clientIds: number[]): void {
		for (const clientId of clientIds) {
			const raw = this.awareness.states.get(clientId);
			if (isRecord(raw) && typeof raw.sessionId === "string") {
				this.sessionsByClient.set(clientId, raw.sessionId);
			}
		}
	}

	private forgetSessions(clientIds: number[]): void {
		for (const clientId of clientIds) {
			if (clientId !== this.awareness.clientID) {
				this.sessionsByClient.delete(clientId);
			}
		}
	}

	private toSessionIds(clientIds: number[]): string[] {
		const sessionIds: string[] = [];
		for (const clientId of clientIds) {
			const sessionId = this.sessionsByClient.get(clientId);
			if (sessionId !== undefined && !sessionIds.includes(sessionId)) {
				sessionIds.push(sessionId);
			}
		}
		return sessionIds;
	}

	private warnIfDestroyed(operation: string): boolean {
		if (this._destroyed) {
			this.warn(`${operation} called after destroy`);
			return true;
		}
		return false;
	}
}
