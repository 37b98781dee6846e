import { Option } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { parseCredentialLine } from "../../../src/core/credentials/parse.js";

describe("parseCredentialLine", () => {
	it("splits on a colon", () => {
		expect(parseCredentialLine("alice:secret")).toEqual(
			Option.some({ username: "alice", password: "secret" }),
		);
	});

	it("trims the line and both fields", () => {
		expect(parseCredentialLine("  bob , hunter2 \r")).toEqual(
			Option.some({ username: "bob", password: "hunter2" }),
		);
	});

	it("keeps later delimiters in the password", () => {
		expect(parseCredentialLine("carol:pa:ss")).toEqual(
			Option.some({ username: "carol", password: "pa:ss" }),
		);
	});

	it("prefers the delimiter listed first", () => {
		expect(parseCredentialLine("dave,x:y")).toEqual(
			Option.some({ username: "dave,x", password: "y" }),
		);
		expect(parseCredentialLine("erin|a;b")).toEqual(
			Option.some({ username: "erin|a", password: "b" }),
		);
	});

	it("uses an explicit delimiter only", () => {
		expect(parseCredentialLine("eve|pw:1", "|")).toEqual(
			Option.some({ username: "eve", password: "pw:1" }),
		);
		expect(parseCredentialLine("eve:pw", "|")).toEqual(Option.none());
	});

	it("skips blank and malformed lines", () => {
		for (const line of ["", "   ", "nodelimiter", ":nouser", "nopass:", " : "]) {
			expect(Option.isNone(parseCredentialLine(line))).toBe(true);
		}
	});
});

describe("parse invariants", () => {
	it("recovers any colon-separated pair", () => {
		fc.assert(
			fc.property(
				fc.stringMatching(/^[A-Za-z0-9._@-]{1,20}$/),
				fc.stringMatching(/^[!-~]{1,20}$/),
				(username, password) => {
					expect(parseCredentialLine(`${username}:${password}`)).toEqual(
						Option.some({ username, password }),
					);
				},
			),
		);
	});
});
