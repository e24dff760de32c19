import { afterEach, beforeEach, describe, expect, jest, test } from "@jest/globals";
import { MockTimeProvider } from "../../../__tests__/mocks/MockTimeProvider";
import { ErrorChannel } from "../../ErrorChannel";
import {
	DecodeError,
	StalenessCheckError,
	type CollabException,
} from "../../Exceptions";
import { DocumentReplica } from "../../replica/DocumentReplica";
import { MALFORMED, textUpdate } from "../../testing/fixtures";
import { StalenessReconciler } from "../StalenessReconciler";

describe("StalenessReconciler", () => {
	let timeProvider: MockTimeProvider;
	let errors: ErrorChannel;
	let reported: CollabException[];
	let replica: DocumentReplica;
	let reconciler: StalenessReconciler;

	const reconcilerFor = (
		target: DocumentReplica,
		comparison: "content" | "digest" = "content",
	) =>
		new StalenessReconciler(target, {
			timeoutMs: 10_000,
			comparison,
			timeProvider,
			errors,
		});

	const typeLocally = (text: string) => {
		const writer = replica.claimWriter("test");
		writer.transact((content) => content.insert(content.length, text));
		writer.release();
	};

	beforeEach(() => {
		timeProvider = new MockTimeProvider(0);
		errors = new ErrorChannel();
		reported = [];
		errors.subscribe((error) => reported.push(error));
		replica = DocumentReplica.create({ sessionId: "local" });
		reconciler = reconcilerFor(replica);
	});

	afterEach(() => {
		reconciler.destroy();
		replica.destroy();
		errors.destroy();
	});

	test("a byte-identical snapshot takes the fast path", async () => {
		typeLocally("same");
		const snapshot = replica.snapshot();
		const fetch = jest.fn(() => Promise.resolve(snapshot));

		await expect(reconciler.checkForStaleness(fetch)).resolves.toEqual({
			stale: false,
		});
		expect(fetch).toHaveBeenCalledTimes(1);
		expect(reconciler.stats).toEqual({
			checks: 1,
			fastPathHits: 1,
			trialMerges: 0,
			failures: 0,
		});
	});

	test("content the replica lacks is reported with the store's snapshot", async () => {
		const stored = textUpdate("Hello");

		const result = await reconciler.checkForStaleness(() =>
			Promise.resolve(stored),
		);

		expect(result.stale).toBe(true);
		expect(result.freshSnapshot).toBe(stored);
		expect(reconciler.stats.trialMerges).toBe(1);
	});

	test("the check leaves the live replica untouched", async () => {
		typeLocally("mine");
		await reconciler.checkForStaleness(() =>
			Promise.resolve(textUpdate("theirs")),
		);
		expect(replica.text()).toBe("mine");
	});

	test("a replica ahead of the store is not stale", async () => {
		typeLocally("Hello");
		const older = replica.snapshot();
		typeLocally(" world");

		const result = await reconciler.checkForStaleness(() =>
			Promise.resolve(older),
		);

		expect(result).toEqual({ stale: false });
		expect(reconciler.stats.trialMerges).toBe(1);
	});

	test("digest comparison detects the same difference", async () => {
		const digest = reconcilerFor(replica, "digest");
		try {
			const result = await digest.checkForStaleness(() =>
				Promise.resolve(textUpdate("Hello")),
			);
			expect(result.stale).toBe(true);
		} finally {
			digest.destroy();
		}
	});

	test("an empty store is not stale", async () => {
		typeLocally("draft");
		const result = await reconciler.checkForStaleness(() =>
			Promise.resolve(new Uint8Array(0)),
		);
		expect(result).toEqual({ stale: false });
		expect(reconciler.stats).toEqual({
			checks: 1,
			fastPathHits: 0,
			trialMerges: 0,
			failures: 0,
		});
	});

	test("a failed fetch resolves not stale and is reported", async () => {
		const result = await reconciler.checkForStaleness(() =>
			Promise.reject(new Error("store offline")),
		);

		expect(result).toEqual({ stale: false });
		expect(reported).toHaveLength(1);
		const [error] = reported;
		expect(error).toBeInstanceOf(StalenessCheckError);
		expect(error.message).toBe("snapshot fetch failed: store offline");
		expect(error instanceof StalenessCheckError && error.timedOut).toBe(false);
		expect(reconciler.stats.failures).toBe(1);
	});

	test("a fetch that throws synchronously is treated like a rejection", async () => {
		const result = await reconciler.checkForStaleness(() => {
			throw new Error("no connection");
		});
		expect(result).toEqual({ stale: false });
		expect(reported[0]?.message).toBe("snapshot fetch failed: no connection");
	});

	test("a fetch that never settles times out", async () => {
		const pending = reconciler.checkForStaleness(
			() => new Promise<Uint8Array>(() => undefined),
		);
		timeProvider.advance(10_000);

		await expect(pending).resolves.toEqual({ stale: false });
		const [error] = reported;
		expect(error).toBeInstanceOf(StalenessCheckError);
		expect(error instanceof StalenessCheckError && error.timedOut).toBe(true);
		expect(error.message).toBe("snapshot fetch timed out after 10000ms");
	});

	test("a malformed store snapshot resolves not stale", async () => {
		const result = await reconciler.checkForStaleness(() =>
			Promise.resolve(MALFORMED),
		);
		expect(result).toEqual({ stale: false });
		expect(reported[0]).toBeInstanceOf(StalenessCheckError);
		expect(reconciler.stats).toMatchObject({ trialMerges: 0, failures: 1 });
	});

	test("a snapshot that is not binary resolves not stale", async () => {
		// a loosely typed transport handing over decoded JSON
		const result = await reconciler.checkForStaleness(() =>
			Promise.resolve(JSON.parse('{"0":1,"1":2,"length":2}')),
		);
		expect(result).toEqual({ stale: false });
		expect(reported).toHaveLength(1);
		expect(reported[0]).toBeInstanceOf(StalenessCheckError);
		expect(reported[0].message).toBe(
			"store snapshot is not binary: [object Object]",
		);
		expect(reconciler.stats).toMatchObject({
			fastPathHits: 0,
			trialMerges: 0,
			failures: 1,
		});
	});

	test("a Buffer snapshot is read as bytes", async () => {
		typeLocally("same");
		const snapshot = Buffer.from(replica.snapshot());

		await expect(
			reconciler.checkForStaleness(() => Promise.resolve(snapshot)),
		).resolves.toEqual({ stale: false });
		expect(reported).toHaveLength(0);
		expect(reconciler.stats).toMatchObject({ fastPathHits: 1, failures: 0 });
	});

	test("a replica destroyed during the fetch resolves not stale", async () => {
		let resolveFetch: (bytes: Uint8Array) => void = () => undefined;
		const pending = reconciler.checkForStaleness(
			() =>
				new Promise<Uint8Array>((resolve) => {
					resolveFetch = resolve;
				}),
		);
		await Promise.resolve();
		replica.destroy();
		resolveFetch(textUpdate("late"));

		await expect(pending).resolves.toEqual({ stale: false });
		expect(reported).toHaveLength(0);
	});

	describe("applyFreshState", () => {
		test("merges the store's content without losing local edits", async () => {
			typeLocally("local");
			const published: Uint8Array[] = [];
			replica.subscribeLocal((update) => published.push(update));

			const result = await reconciler.checkForStaleness(() =>
				Promise.resolve(textUpdate("remote")),
			);
			expect(result.stale).toBe(true);
			reconciler.applyFreshState(result.freshSnapshot ?? new Uint8Array(0));

			expect(replica.text()).toContain("local");
			expect(replica.text()).toContain("remote");
			expect(replica.text()).toHaveLength("localremote".length);
			expect(published).toHaveLength(0);
		});

		test("an empty snapshot changes nothing", () => {
			typeLocally("kept");
			reconciler.applyFreshState(new Uint8Array(0));
			expect(replica.text()).toBe("kept");
		});

		test("malformed bytes throw a DecodeError", () => {
			expect(() => reconciler.applyFreshState(MALFORMED)).toThrow(DecodeError);
		});
	});
});
