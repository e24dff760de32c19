import * as Y from "yjs";
import { applyChanges } from "../binding/diffMatchPatch";
import type {
	EditingSurface,
	PresenceDecoration,
	SurfaceDispatch,
	SurfaceUpdate,
} from "../binding/EditingSurface";
import type { SelectionOffsets, TextChange, Unsubscriber } from "../types";

/** Not a decodable update: the leading varint never terminates. */
export const MALFORMED = new Uint8Array([0xff, 0xff, 0xff]);

/** Full-state update of a fresh document holding `text`. */
export function textUpdate(text: string, rootName = "contents"): Uint8Array {
	const doc = new Y.Doc();
	doc.getText(rootName).insert(0, text);
	const update = Y.encodeStateAsUpdate(doc);
	doc.destroy();
	return update;
}

/**
 * Update produced by a peer that starts from `base` and runs `edit` on the
 * root text.
 */
export function peerEdit(
	base: Uint8Array,
	edit: (text: Y.Text) => void,
	rootName = "contents",
): Uint8Array {
	const doc = new Y.Doc();
	Y.applyUpdate(doc, base);
	const before = Y.encodeStateVector(doc);
	edit(doc.getText(rootName));
	const update = Y.encodeStateAsUpdate(doc, before);
	doc.destroy();
	return update;
}

export function flushPromises(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Minimal editing surface that reports whatever selection it is told to,
 * including offsets a real editor would refuse.
 */
export class FakeSurface implements EditingSurface {
	content: string;
	reportedSelection: SelectionOffsets = { anchor: 0, head: 0 };
	decorations: PresenceDecoration[] = [];
	readonly dispatched: SurfaceDispatch[] = [];
	private readonly listeners = new Set<(update: SurfaceUpdate) => void>();

	constructor(content = "") {
		this.content = content;
	}

	text(): string {
		return this.content;
	}

	selection(): SelectionOffsets {
		return this.reportedSelection;
	}

	dispatch(spec: SurfaceDispatch): void {
		this.dispatched.push(spec);
		const changes = spec.changes ?? [];
		this.content = applyChanges(this.content, changes);
		if (spec.selection) {
			this.reportedSelection = spec.selection;
		}
		this.emit({
			changes,
			docChanged: changes.length > 0,
			selectionSet: spec.selection !== undefined,
			tag: spec.tag ?? null,
		});
	}

	type(changes: TextChange[]) {
		this.content = applyChanges(this.content, changes);
		this.emit({ changes, docChanged: true, selectionSet: false, tag: null });
	}

	moveSelection(anchor: number, head: number) {
		this.reportedSelection = { anchor, head };
		this.emit({ changes: [], docChanged: false, selectionSet: true, tag: null });
	}

	onUpdate(listener: (update: SurfaceUpdate) => void): Unsubscriber {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	renderPresence(decorations: PresenceDecoration[]): void {
		this.decorations = decorations;
	}

	private emit(update: SurfaceUpdate) {
		for (const listener of [...this.listeners]) {
			listener(update);
		}
	}
}
