import { describe, expect, test } from "@jest/globals";
import type { SurfaceUpdate } from "../EditingSurface";
import { CodeMirrorSurface } from "../CodeMirrorSurface";

describe("CodeMirrorSurface", () => {
	test("reports user edits untagged, with pre-change positions", () => {
		const surface = new CodeMirrorSurface("hello");
		const updates: SurfaceUpdate[] = [];
		surface.onUpdate((update) => updates.push(update));

		surface.userEdit({ from: 5, to: 5, insert: "!" });

		expect(surface.text()).toBe("hello!");
		expect(updates).toEqual([
			{
				changes: [{ from: 5, to: 5, insert: "!" }],
				docChanged: true,
				selectionSet: false,
				tag: null,
			},
		]);
	});

	test("carries dispatch tags through to the update", () => {
		const surface = new CodeMirrorSurface("abc");
		const tags: Array<string | null> = [];
		surface.onUpdate((update) => tags.push(update.tag));

		surface.dispatch({ changes: [{ from: 0, to: 1, insert: "" }], tag: "sync:test" });

		expect(surface.text()).toBe("bc");
		expect(tags).toEqual(["sync:test"]);
	});

	test("select moves the main selection", () => {
		const surface = new CodeMirrorSurface("abcdef");
		const updates: SurfaceUpdate[] = [];
		surface.onUpdate((update) => updates.push(update));

		surface.select(4, 1);

		expect(surface.selection()).toEqual({ anchor: 4, head: 1 });
		expect(updates[0]).toMatchObject({ docChanged: false, selectionSet: true });
	});

	test("the selection is mapped through tagged changes", () => {
		const surface = new CodeMirrorSurface("world", { anchor: 2, head: 2 });
		surface.dispatch({ changes: [{ from: 0, to: 0, insert: "hi " }], tag: "sync" });
		expect(surface.selection()).toEqual({ anchor: 5, head: 5 });
	});

	test("unsubscribing stops updates", () => {
		const surface = new CodeMirrorSurface();
		const tags: Array<string | null> = [];
		const unsubscribe = surface.onUpdate((update) => tags.push(update.tag));
		unsubscribe();

		surface.userEdit({ from: 0, to: 0, insert: "x" });
		expect(tags).toEqual([]);
	});
});
