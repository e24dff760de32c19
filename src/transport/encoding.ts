import { fromBase64, toBase64 } from "lib0/buffer";
import { DecodeError } from "../Exceptions";

const BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/** Text-safe form of an update or snapshot (standard base64, padded). */
export function encodeForTransport(bytes: Uint8Array): string {
	return toBase64(bytes);
}

/**
 * Inverse of `encodeForTransport`.
 *
 * @throws DecodeError when `text` is not padded standard base64.
 */
export function decodeFromTransport(text: string): Uint8Array {
	if (!BASE64.test(text)) {
		throw new DecodeError("Transport text is not valid base64", text.length);
	}
	return fromBase64(text);
}
