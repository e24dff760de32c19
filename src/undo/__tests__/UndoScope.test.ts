import { afterEach, beforeEach, describe, expect, jest, test } from "@jest/globals";
import { MockTimeProvider } from "../../../__tests__/mocks/MockTimeProvider";
import { AwarenessRegistrar } from "../../awareness/AwarenessRegistrar";
import { CodeMirrorSurface } from "../../binding/CodeMirrorSurface";
import { EditingSurfaceBinding } from "../../binding/EditingSurfaceBinding";
import { LOCAL_ORIGIN, type Origin } from "../../origins";
import { DocumentReplica } from "../../replica/DocumentReplica";
import { peerEdit } from "../../testing/fixtures";
import { UndoScope } from "../UndoScope";

describe("UndoScope", () => {
	let timeProvider: MockTimeProvider;
	let replica: DocumentReplica;
	let awareness: AwarenessRegistrar;
	let surface: CodeMirrorSurface;
	let binding: EditingSurfaceBinding;
	let undo: UndoScope;

	const type = (at: number, text: string) =>
		surface.userEdit({ from: at, to: at, insert: text });

	const remoteAppend = (text: string) =>
		replica.applyRemoteUpdate(
			peerEdit(replica.snapshot(), (content) =>
				content.insert(content.length, text),
			),
		);

	beforeEach(() => {
		timeProvider = new MockTimeProvider(1_000);
		replica = DocumentReplica.create({ sessionId: "local" });
		awareness = AwarenessRegistrar.create(
			replica,
			{ sessionId: "local", userId: "u", displayName: "Local" },
			{ timeProvider },
		);
		surface = new CodeMirrorSurface();
		binding = EditingSurfaceBinding.attach(surface, replica, awareness, "local");
		undo = UndoScope.create(replica, binding, 500, { timeProvider });
	});

	afterEach(() => {
		if (!undo.destroyed) undo.destroy();
		binding.destroy();
		awareness.destroy();
		replica.destroy();
	});

	test("undo reverts only the latest local edit, never a remote one", () => {
		type(0, "A");
		remoteAppend("B");
		type(2, "C");
		expect(replica.text()).toBe("ABC");

		expect(undo.undo()).toBe(true);
		expect(replica.text()).toBe("AB");
		expect(surface.text()).toBe("AB");

		expect(undo.undo()).toBe(true);
		expect(replica.text()).toBe("B");
		expect(undo.canUndo()).toBe(false);
	});

	test("edits within the capture window form one step", () => {
		type(0, "a");
		timeProvider.advance(100);
		type(1, "b");
		timeProvider.advance(399);
		type(2, "c");

		expect(undo.depth()).toEqual({ undoDepth: 1, redoDepth: 0 });
		undo.undo();
		expect(replica.text()).toBe("");
	});

	test("a transaction that changes nothing does not split a step", () => {
		type(0, "a");
		replica.doc.transact(() => {}, null);
		timeProvider.advance(100);
		type(1, "b");

		expect(undo.depth()).toEqual({ undoDepth: 1, redoDepth: 0 });
		undo.undo();
		expect(replica.text()).toBe("");
	});

	test("a pause of the capture timeout starts a new step", () => {
		type(0, "a");
		timeProvider.advance(500);
		type(1, "b");

		undo.undo();
		expect(replica.text()).toBe("a");
	});

	test("redo replays what undo reverted", () => {
		type(0, "hello");
		undo.undo();
		expect(undo.canRedo()).toBe(true);

		expect(undo.redo()).toBe(true);
		expect(replica.text()).toBe("hello");
		expect(surface.text()).toBe("hello");
		expect(undo.canRedo()).toBe(false);
	});

	test("undo is published as Local and not recorded as a new step", () => {
		const origins: Origin[] = [];
		replica.subscribeLocal((_update, origin) => origins.push(origin));
		type(0, "x");

		undo.undo();

		expect(origins[origins.length - 1]).toEqual(LOCAL_ORIGIN);
		expect(undo.depth()).toEqual({ undoDepth: 0, redoDepth: 1 });
	});

	test("remote-only history leaves nothing to undo", () => {
		remoteAppend("theirs");
		expect(undo.canUndo()).toBe(false);
		expect(undo.undo()).toBe(false);
		expect(replica.text()).toBe("theirs");
	});

	test("undo keeps a remote edit made inside the reverted text", () => {
		type(0, "local words");
		replica.applyRemoteUpdate(
			peerEdit(replica.snapshot(), (content) => content.insert(5, "[peer]")),
		);

		undo.undo();
		expect(replica.text()).toBe("[peer]");
	});

	test("stack changes are observable", () => {
		const listener = jest.fn();
		undo.subscribe(listener);

		type(0, "x");
		expect(listener).toHaveBeenLastCalledWith({ undoDepth: 1, redoDepth: 0 });

		undo.undo();
		expect(listener).toHaveBeenLastCalledWith({ undoDepth: 0, redoDepth: 1 });

		undo.clear();
		expect(undo.canRedo()).toBe(false);
		expect(listener).toHaveBeenLastCalledWith({ undoDepth: 0, redoDepth: 0 });
	});

	test("destroy is idempotent and disables undo", () => {
		type(0, "x");
		undo.destroy();
		expect(() => undo.destroy()).not.toThrow();
		expect(undo.undo()).toBe(false);
		expect(replica.text()).toBe("x");
	});
});
