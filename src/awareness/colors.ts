/**
 * Stable per-user cursor colors.
 *
 * Hues are spread with the golden angle so that users whose ids hash close
 * together still get visually distinct colors.
 */

const GOLDEN_ANGLE = 137.508;

function hashString(value: string): number {
	// FNV-1a, 32 bit
	let hash = 0x811c9dc5;
	for (let i = 0; i < value.length; i++) {
		hash ^= value.charCodeAt(i);
		hash = Math.imul(hash, 0x01000193);
	}
	return hash >>> 0;
}

export function colorForUser(userId: string): string {
	const hue = Math.round((hashString(userId) * GOLDEN_ANGLE) % 360);
	return `hsl(${hue}, 70%, 60%)`;
}

/** Translucent variant of an `hsl(...)` color, for selection highlights. */
export function selectionTint(color: string, alpha = 0.2): string {
	const match = /^hsl\((\d+),\s*(\d+)%,\s*(\d+)%\)$/.exec(color);
	if (!match) return color;
	return `hsla(${match[1]}, ${match[2]}%, ${match[3]}%, ${alpha})`;
}
