import { createHash } from "crypto";

export function generateHash(content: string | Uint8Array): string {
	return createHash("sha256").update(content).digest("hex");
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false;
	}
	return true;
}

/** True for any Uint8Array, Buffer included, whichever realm made it. */
export function isBytes(value: unknown): value is Uint8Array {
	return (
		ArrayBuffer.isView(value) &&
		Object.prototype.toString.call(value) === "[object Uint8Array]"
	);
}
