/**
 * Origin tags for replica updates.
 *
 * Yjs compares transaction origins by reference. Components here compare the
 * tag structurally instead, so a binding is identified by its id rather than by
 * whichever object happened to be passed to `transact`.
 */

export type BindingId = string;

export type Origin =
	| { readonly kind: "local" }
	| { readonly kind: "remote" }
	| { readonly kind: "bound"; readonly bindingId: BindingId };

/** Authored in this session, but not through the editing surface (undo/redo replay). */
export const LOCAL_ORIGIN: Origin = Object.freeze({ kind: "local" });

/** Received from another session or from the authoritative store. */
export const REMOTE_ORIGIN: Origin = Object.freeze({ kind: "remote" });

export function boundTo(bindingId: BindingId): Origin {
	return Object.freeze({ kind: "bound", bindingId });
}

export function isOrigin(value: unknown): value is Origin {
	if (typeof value !== "object" || value === null || !("kind" in value)) {
		return false;
	}
	const kind = value.kind;
	if (kind === "local" || kind === "remote") return true;
	return (
		kind === "bound" &&
		"bindingId" in value &&
		typeof value.bindingId === "string"
	);
}

export function isRemote(origin: Origin): boolean {
	return origin.kind === "remote";
}

export function isBoundTo(origin: Origin, bindingId: BindingId): boolean {
	return origin.kind === "bound" && origin.bindingId === bindingId;
}

/** Anything not received from elsewhere must be published. */
export function isOutbound(origin: Origin): boolean {
	return origin.kind !== "remote";
}

export function sameOrigin(a: Origin, b: Origin): boolean {
	if (a.kind === "bound" && b.kind === "bound") {
		return a.bindingId === b.bindingId;
	}
	return a.kind === b.kind;
}

export function describeOrigin(origin: Origin): string {
	return origin.kind === "bound" ? `bound:${origin.bindingId}` : origin.kind;
}
