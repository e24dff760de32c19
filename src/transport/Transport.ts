import type { Unsubscriber } from "../types";

/**
 * What a session needs from the network and the durable store. Payloads are
 * opaque bytes; the bridge never looks inside them.
 */
export interface Transport {
	publishUpdate(sessionId: string, update: Uint8Array): void | Promise<void>;
	publishAwareness(sessionId: string, update: Uint8Array): void | Promise<void>;
	/** Deliver other sessions' document updates. */
	onRemoteUpdate(handler: (update: Uint8Array) => void): Unsubscriber;
	/** Deliver other sessions' presence updates. */
	onRemoteAwareness(handler: (update: Uint8Array) => void): Unsubscriber;
	/** Authoritative snapshot from the durable store. */
	fetchCurrentSnapshot(): Promise<Uint8Array>;
	/** Best-effort durable write. */
	requestPersist(snapshot: Uint8Array, content: string): Promise<void>;
}
