import { describe, expect, test } from "@jest/globals";
import {
	CollabSettingsDefaults,
	resolveSettings,
	type CollabSettings,
} from "../src/CollabSettings";
import { ConfigurationError } from "../src/Exceptions";

describe("resolveSettings", () => {
	test("fills in defaults", () => {
		expect(resolveSettings()).toEqual({
			rootName: "contents",
			captureTimeoutMs: 500,
			stalenessTimeoutMs: 10_000,
			stalenessComparison: "content",
			presenceIdleTimeoutMs: 30_000,
			presenceSweepIntervalMs: 5_000,
			persistDebounceMs: 2_000,
			driftCheckIntervalMs: 0,
			enableDeltaLogging: false,
		});
	});

	test("overrides win and undefined keeps the default", () => {
		const settings = resolveSettings({
			captureTimeoutMs: 250,
			stalenessComparison: "digest",
			rootName: undefined,
		});
		expect(settings.captureTimeoutMs).toBe(250);
		expect(settings.stalenessComparison).toBe("digest");
		expect(settings.rootName).toBe("contents");
	});

	test("does not mutate the defaults", () => {
		resolveSettings({ persistDebounceMs: 1 });
		expect(CollabSettingsDefaults.persistDebounceMs).toBe(2_000);
	});

	test.each<Partial<CollabSettings>>([
		{ captureTimeoutMs: -1 },
		{ stalenessTimeoutMs: Number.NaN },
		{ persistDebounceMs: Number.POSITIVE_INFINITY },
	])("rejects %p", (overrides) => {
		expect(() => resolveSettings(overrides)).toThrow(ConfigurationError);
	});

	test("names the offending setting", () => {
		try {
			resolveSettings({ rootName: "  " });
			throw new Error("expected a ConfigurationError");
		} catch (e) {
			expect(e).toBeInstanceOf(ConfigurationError);
			expect(e instanceof ConfigurationError && e.setting).toBe("rootName");
		}
	});

	test("rejects unknown keys", () => {
		const overrides = { captureTimeoutMs: 100, captureTimeout: 100 };
		expect(() => resolveSettings(overrides)).toThrow(
			"captureTimeout: unknown setting",
		);
	});

	test("pruning needs a sweep interval", () => {
		expect(() => resolveSettings({ presenceSweepIntervalMs: 0 })).toThrow(
			ConfigurationError,
		);
		expect(
			resolveSettings({ presenceIdleTimeoutMs: 0, presenceSweepIntervalMs: 0 })
				.presenceSweepIntervalMs,
		).toBe(0);
	});
});
