import { describe, expect, test } from "@jest/globals";
import { DecodeError } from "../../Exceptions";
import { textUpdate } from "../../testing/fixtures";
import { decodeFromTransport, encodeForTransport } from "../encoding";

describe("transport encoding", () => {
	test("encodes as padded standard base64", () => {
		expect(encodeForTransport(new Uint8Array([0, 1, 2, 250]))).toBe("AAEC+g==");
	});

	test("decodes what it encodes", () => {
		const update = textUpdate("over the wire");
		expect(decodeFromTransport(encodeForTransport(update))).toEqual(update);
	});

	test("empty text is the empty payload", () => {
		expect(encodeForTransport(new Uint8Array(0))).toBe("");
		expect(decodeFromTransport("")).toEqual(new Uint8Array(0));
	});

	test.each(["abc", "not base64!", "AAEC+g=", "AA==AA=="])(
		"rejects %p",
		(text) => {
			expect(() => decodeFromTransport(text)).toThrow(DecodeError);
		},
	);
});
