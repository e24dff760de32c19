import { diff_match_patch, type Diff } from "diff-match-patch";
import { curryLog } from "../debug";
import type { TextChange } from "../types";

const DIFF_DELETE = -1;
const DIFF_INSERT = 1;
const DIFF_EQUAL = 0;

/**
 * Compute a change set that turns `current` into `target`.
 *
 * Changes are ascending and positioned against `current`, so they can be
 * handed straight to `EditingSurface.dispatch`.
 */
export function diffToChanges(
	current: string,
	target: string,
	enableDeltaLogging = false,
): TextChange[] {
	if (current === target) {
		return [];
	}
	const log = enableDeltaLogging
		? curryLog("[diffMatchPatch]", "debug")
		: () => {};

	const dmp = new diff_match_patch();
	const diffs: Diff[] = dmp.diff_main(current, target);
	dmp.diff_cleanupSemantic(diffs);

	log("current length:", current.length, "target length:", target.length);

	const changes: TextChange[] = [];
	let cursor = 0;
	for (const [operation, text] of diffs) {
		switch (operation) {
			case DIFF_INSERT: {
				const last = changes[changes.length - 1];
				if (last && last.to === cursor && last.insert === "") {
					// replace: fold the insert into the preceding delete
					last.insert = text;
				} else {
					changes.push({ from: cursor, to: cursor, insert: text });
				}
				log(`insert "${text}" at ${cursor}`);
				break;
			}
			case DIFF_EQUAL:
				cursor += text.length;
				break;
			case DIFF_DELETE:
				changes.push({ from: cursor, to: cursor + text.length, insert: "" });
				log(`delete "${text}" at ${cursor}`);
				cursor += text.length;
				break;
		}
	}
	return changes;
}

/** Apply an ascending, non-overlapping change set to a string. */
export function applyChanges(text: string, changes: TextChange[]): string {
	let result = "";
	let pos = 0;
	for (const change of changes) {
		result += text.slice(pos, change.from) + change.insert;
		pos = change.to;
	}
	return result + text.slice(pos);
}
