import * as Y from "yjs";
import type { RelativePositionJSON } from "../awareness/AwarenessRegistrar";

/**
 * Encode an offset in `text` as a Yjs relative position, which keeps pointing
 * at the same character while concurrent edits shift absolute offsets.
 * (https://docs.yjs.dev/api/relative-positions)
 */
export function toRelativeJSON(text: Y.Text, index: number): RelativePositionJSON {
	const relative = Y.createRelativePositionFromTypeIndex(text, index);
	const json: RelativePositionJSON = Y.relativePositionToJSON(relative);
	return json;
}

/**
 * Resolve a relative position produced by `toRelativeJSON` against the
 * current state of `text`. Returns null when it cannot be resolved here, for
 * example because the referenced content has not arrived yet.
 */
export function fromRelativeJSON(
	text: Y.Text,
	json: RelativePositionJSON,
): number | null {
	const doc = text.doc;
	if (!doc) return null;
	try {
		const relative = Y.createRelativePositionFromJSON(json);
		const absolute = Y.createAbsolutePositionFromRelativePosition(
			relative,
			doc,
		);
		if (!absolute || absolute.type !== text) {
			return null;
		}
		return absolute.index;
	} catch {
		return null;
	}
}
