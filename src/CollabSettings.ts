import { ConfigurationError } from "./Exceptions";

export type StalenessComparison = "content" | "digest";

export interface CollabSettings {
	/** Name of the shared Y.Text root. */
	rootName: string;
	/** Consecutive local edits closer together than this form one undo step. */
	captureTimeoutMs: number;
	/** A staleness check resolves as not stale after this long. 0 disables the timeout. */
	stalenessTimeoutMs: number;
	stalenessComparison: StalenessComparison;
	/** Remote presence not refreshed for this long is pruned. 0 disables pruning. */
	presenceIdleTimeoutMs: number;
	presenceSweepIntervalMs: number;
	/** Quiet period after a local edit before a best-effort persist. 0 disables it. */
	persistDebounceMs: number;
	/** 0 disables the periodic editor/replica drift check. */
	driftCheckIntervalMs: number;
	enableDeltaLogging: boolean;
}

export const CollabSettingsDefaults: CollabSettings = {
	rootName: "contents",
	captureTimeoutMs: 500,
	stalenessTimeoutMs: 10_000,
	stalenessComparison: "content",
	presenceIdleTimeoutMs: 30_000,
	presenceSweepIntervalMs: 5_000,
	persistDebounceMs: 2_000,
	driftCheckIntervalMs: 0,
	enableDeltaLogging: false,
} as const;

type DurationKey = {
	[K in keyof CollabSettings]: CollabSettings[K] extends number ? K : never;
}[keyof CollabSettings];

const durationKeys: DurationKey[] = [
	"captureTimeoutMs",
	"stalenessTimeoutMs",
	"presenceIdleTimeoutMs",
	"presenceSweepIntervalMs",
	"persistDebounceMs",
	"driftCheckIntervalMs",
];

export function resolveSettings(
	overrides: Partial<CollabSettings> = {},
): CollabSettings {
	const settings: CollabSettings = { ...CollabSettingsDefaults };
	for (const key of Object.keys(overrides)) {
		if (!isKeyOfCollabSettings(key)) {
			throw new ConfigurationError(key, "unknown setting");
		}
		copySetting(settings, overrides, key);
	}

	if (settings.rootName.trim() === "") {
		throw new ConfigurationError("rootName", "must not be empty");
	}
	for (const key of durationKeys) {
		const value = settings[key];
		if (!Number.isFinite(value) || value < 0) {
			throw new ConfigurationError(
				key,
				`must be a non-negative number, got ${value}`,
			);
		}
	}
	if (
		settings.stalenessComparison !== "content" &&
		settings.stalenessComparison !== "digest"
	) {
		throw new ConfigurationError(
			"stalenessComparison",
			`expected "content" or "digest", got ${String(settings.stalenessComparison)}`,
		);
	}
	if (settings.presenceIdleTimeoutMs > 0 && settings.presenceSweepIntervalMs === 0) {
		throw new ConfigurationError(
			"presenceSweepIntervalMs",
			"must be positive while presence pruning is enabled",
		);
	}
	return settings;
}

export function isKeyOfCollabSettings(key: string): key is keyof CollabSettings {
	return key in CollabSettingsDefaults;
}

function copySetting<K extends keyof CollabSettings>(
	target: CollabSettings,
	source: Partial<CollabSettings>,
	key: K,
): void {
	const value: CollabSettings[K] | undefined = source[key];
	if (value !== undefined) {
		target[key] = value;
	}
}
