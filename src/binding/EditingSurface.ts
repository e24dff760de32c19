import type { SelectionOffsets, TextChange, Unsubscriber } from "../types";

export interface SurfaceDispatch {
	/** Positions refer to the surface text before the dispatch. */
	changes?: TextChange[];
	selection?: SelectionOffsets;
	/** Opaque metadata returned unchanged on the resulting `SurfaceUpdate`. */
	tag?: string;
}

export interface SurfaceUpdate {
	changes: TextChange[];
	docChanged: boolean;
	selectionSet: boolean;
	tag: string | null;
}

/** How a peer's presence is drawn. */
export interface PresenceDecoration {
	sessionId: string;
	userId: string;
	displayName: string;
	color: string;
	/** Translucent `color` for the selected range. */
	selectionColor: string;
	anchor: number;
	head: number;
	/** The peer has not placed a cursor yet; draw a label only. */
	placeholder: boolean;
}

/**
 * What a binding needs from an editor. Implementations must deliver an
 * update for every dispatch, tagged or not, including the binding's own.
 */
export interface EditingSurface {
	text(): string;
	selection(): SelectionOffsets;
	dispatch(spec: SurfaceDispatch): void;
	onUpdate(listener: (update: SurfaceUpdate) => void): Unsubscriber;
	renderPresence(decorations: PresenceDecoration[]): void;
}
