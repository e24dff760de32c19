import * as decoding from "lib0/decoding";
import { DecodeError, describeError } from "../Exceptions";

export interface AwarenessEntry {
	clientId: number;
	clock: number;
	state: unknown;
}

/**
 * Decode a y-protocols awareness payload without applying it.
 *
 * @throws DecodeError on truncated data, trailing bytes, or invalid JSON.
 */
export function readAwarenessUpdate(update: Uint8Array): AwarenessEntry[] {
	try {
		const decoder = decoding.createDecoder(update);
		const count = decoding.readVarUint(decoder);
		const entries: AwarenessEntry[] = [];
		for (let i = 0; i < count; i++) {
			const clientId = decoding.readVarUint(decoder);
			const clock = decoding.readVarUint(decoder);
			const state: unknown = JSON.parse(decoding.readVarString(decoder));
			entries.push({ clientId, clock, state });
		}
		if (decoding.hasContent(decoder)) {
			throw new Error(`unexpected trailing bytes after ${count} entries`);
		}
		return entries;
	} catch (e) {
		throw new DecodeError(
			`Malformed awareness update: ${describeError(e)}`,
			update.length,
			{ cause: e },
		);
	}
}
