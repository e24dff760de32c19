export class CollabException extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "CollabException";
	}
}

/** Malformed bytes (update, snapshot, presence payload) or transport text. */
export class DecodeError extends CollabException {
	constructor(
		message: string,
		readonly payloadLength: number,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "DecodeError";
	}
}

/**
 * Raised when a replica could not be seeded from its initial snapshot. The
 * replica was still created and is empty and usable.
 */
export class ReplicaSeedError<R = unknown> extends DecodeError {
	constructor(
		readonly replica: R,
		payloadLength: number,
		options?: { cause?: unknown },
	) {
		super("Initial snapshot could not be decoded", payloadLength, options);
		this.name = "ReplicaSeedError";
	}
}

export type TransportOperation =
	| "publishUpdate"
	| "publishAwareness"
	| "subscribe"
	| "requestPersist"
	| "fetchCurrentSnapshot";

export class TransportError extends CollabException {
	constructor(
		readonly operation: TransportOperation,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`${operation}: ${message}`, options);
		this.name = "TransportError";
	}
}

export class StalenessCheckError extends CollabException {
	constructor(
		message: string,
		readonly timedOut: boolean,
		options?: { cause?: unknown },
	) {
		super(message, options);
		this.name = "StalenessCheckError";
	}
}

export class BindingConflictError extends CollabException {
	constructor(
		readonly ownerId: string,
		readonly requesterId: string,
	) {
		super(`Replica is already bound to ${ownerId}; ${requesterId} cannot bind`);
		this.name = "BindingConflictError";
	}
}

export class ConfigurationError extends CollabException {
	constructor(
		readonly setting: string,
		message: string,
	) {
		super(`${setting}: ${message}`);
		this.name = "ConfigurationError";
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
