import { EditorSelection, EditorState, Transaction } from "@codemirror/state";
import { Observable } from "../observable/Observable";
import type { SelectionOffsets, TextChange, Unsubscriber } from "../types";
import { surfaceTagAnnotation } from "./annotations";
import type {
	EditingSurface,
	PresenceDecoration,
	SurfaceDispatch,
	SurfaceUpdate,
} from "./EditingSurface";

/**
 * Headless editing surface over a CodeMirror `EditorState`.
 *
 * Holds the state itself instead of an `EditorView`, so it runs without a DOM.
 * `userEdit` and `select` stand in for keyboard and mouse input.
 */
export class CodeMirrorSurface implements EditingSurface {
	private _state: EditorState;
	private readonly updates = new Observable<SurfaceUpdate>("surface");
	decorations: PresenceDecoration[] = [];
	presenceRenders = 0;

	constructor(doc = "", selection?: SelectionOffsets) {
		this._state = EditorState.create({
			doc,
			selection: selection
				? EditorSelection.single(selection.anchor, selection.head)
				: undefined,
		});
	}

	get state(): EditorState {
		return this._state;
	}

	text(): string {
		return this._state.doc.toString();
	}

	selection(): SelectionOffsets {
		const { anchor, head } = this._state.selection.main;
		return { anchor, head };
	}

	dispatch(spec: SurfaceDispatch): void {
		this.apply(spec);
	}

	/** Simulate typing: an untagged change, optionally moving the cursor. */
	userEdit(changes: TextChange | TextChange[], selection?: SelectionOffsets) {
		this.apply({
			changes: Array.isArray(changes) ? changes : [changes],
			selection,
		});
	}

	/** Simulate the user moving the cursor or selecting text. */
	select(anchor: number, head: number = anchor) {
		this.apply({ selection: { anchor, head } });
	}

	onUpdate(listener: (update: SurfaceUpdate) => void): Unsubscriber {
		return this.updates.on(listener);
	}

	renderPresence(decorations: PresenceDecoration[]): void {
		this.decorations = decorations;
		this.presenceRenders++;
	}

	destroy() {
		this.updates.destroy();
	}

	private apply(spec: SurfaceDispatch) {
		const annotations = [Transaction.userEvent.of(spec.tag ? "sync" : "input")];
		if (spec.tag) {
			annotations.push(surfaceTagAnnotation.of(spec.tag));
		}
		const tr = this._state.update({
			changes: spec.changes?.map(({ from, to, insert }) => ({
				from,
				to,
				insert,
			})),
			selection: spec.selection
				? EditorSelection.single(spec.selection.anchor, spec.selection.head)
				: undefined,
			annotations,
		});
		this._state = tr.state;

		const changes: TextChange[] = [];
		tr.changes.iterChanges((fromA, toA, _fromB, _toB, inserted) => {
			changes.push({ from: fromA, to: toA, insert: inserted.toString() });
		});
		this.updates.notifyListeners({
			changes,
			docChanged: tr.docChanged,
			selectionSet: tr.selection !== undefined,
			tag: tr.annotation(surfaceTagAnnotation) ?? null,
		});
	}
}
