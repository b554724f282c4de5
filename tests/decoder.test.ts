import { describe } from "vitest";
import { decode, safeDecode } from "../src/decoder.js";
import { encode } from "../src/encoder.js";
import {
	DepthExceededError,
	FramingError,
	OptionsError,
	PayloadTypeError,
	SizeExceededError,
	StructuralError,
	TnetError,
	TrailingDataError,
} from "../src/errors.js";
import { type DecodeOptions, MAX_DEPTH_LIMIT } from "../src/options.js";
import { Value, valueEquals } from "../src/value.js";

const bytes = (text: string) => new TextEncoder().encode(text);

/** `depth` lists, each wrapping the next, innermost empty */
function nestedLists(depth: number): string {
	let frame = "0:]";
	for (let i = 1; i < depth; i++) frame = `${frame.length}:${frame}]`;
	return frame;
}

function decodeError(input: string | Uint8Array, options?: DecodeOptions): TnetError {
	const result = safeDecode(input, options);
	if (result.success) throw new Error("Expected decoding to fail");
	return result.error;
}

describe("decode", (it) => {
	describe("scalars", (it) => {
		it("should decode a string", ({ expect }) => {
			expect(decode("5:hello,")).toEqual(Value.string("hello"));
		});

		it("should decode null", ({ expect }) => {
			expect(decode("0:~")).toEqual({ type: "null" });
		});

		it("should decode integers", ({ expect }) => {
			expect(decode("3:123#")).toEqual({ type: "integer", value: 123n });
			expect(decode("2:-7#")).toEqual({ type: "integer", value: -7n });
			expect(decode("1:0#")).toEqual({ type: "integer", value: 0n });
		});

		it("should widen integers beyond 64 bits", ({ expect }) => {
			expect(decode("22:1180591620717411303424#")).toEqual({
				type: "integer",
				value: 2n ** 70n,
			});
		});

		it("should decode floats", ({ expect }) => {
			expect(decode("4:1.25^")).toEqual({ type: "float", value: 1.25 });
			expect(decode("5:1e300^")).toEqual({ type: "float", value: 1e300 });
			const negativeZero = decode("2:-0^");
			expect(negativeZero.type === "float" && Object.is(negativeZero.value, -0)).toBe(
				true,
			);
		});

		it("should decode booleans", ({ expect }) => {
			expect(decode("4:true!")).toEqual({ type: "boolean", value: true });
			expect(decode("5:false!")).toEqual({ type: "boolean", value: false });
		});

		it("should take string payloads verbatim", ({ expect }) => {
			expect(decode("12:3:foo,3:bar,,")).toEqual(Value.string("3:foo,3:bar,"));
			expect(decode(Uint8Array.of(0x32, 0x3a, 0xff, 0x00, 0x2c))).toEqual(
				Value.string(Uint8Array.of(0xff, 0x00)),
			);
		});

		it("should count UTF-8 bytes in text input", ({ expect }) => {
			expect(decode("6:héllo,")).toEqual(Value.string("héllo"));
		});
	});

	describe("aggregates", (it) => {
		it("should decode a list of strings", ({ expect }) => {
			expect(decode("16:5:hello,5:world,]")).toEqual(
				Value.list([Value.string("hello"), Value.string("world")]),
			);
		});

		it("should decode empty aggregates", ({ expect }) => {
			expect(decode("0:]")).toEqual(Value.list([]));
			expect(decode("0:}")).toEqual(Value.dict([]));
		});

		it("should decode nested lists", ({ expect }) => {
			expect(decode("6:0:~0:]]")).toEqual(
				Value.list([Value.null(), Value.list([])]),
			);
			expect(decode("14:10:2:10#2:10#]]")).toEqual(
				Value.list([Value.list([Value.integer(10), Value.integer(10)])]),
			);
		});

		it("should decode a dictionary", ({ expect }) => {
			expect(decode("27:3:int,1:1#3:seq,8:1:a,1:b,]}")).toEqual(
				Value.dict([
					["int", Value.integer(1)],
					["seq", Value.list([Value.string("a"), Value.string("b")])],
				]),
			);
		});

		it("should preserve dictionary order", ({ expect }) => {
			expect(decode("16:1:b,1:1#1:a,1:2#}")).toEqual(
				Value.dict([
					["b", Value.integer(1)],
					["a", Value.integer(2)],
				]),
			);
		});

		it("should keep duplicate keys", ({ expect }) => {
			const value = decode("16:1:a,1:1#1:a,1:2#}");
			expect(value.type === "dict" && value.entries.length).toBe(2);
			expect(value).toEqual(
				Value.dict([
					["a", Value.integer(1)],
					["a", Value.integer(2)],
				]),
			);
		});

		it("should return a frozen tree", ({ expect }) => {
			const value = decode("16:5:hello,5:world,]");
			expect(Object.isFrozen(value)).toBe(true);
			expect(value.type === "list" && Object.isFrozen(value.items)).toBe(true);
		});
	});

	describe("input types", (it) => {
		it("should accept ArrayBuffers", ({ expect }) => {
			const buffer = new ArrayBuffer(3);
			new Uint8Array(buffer).set(bytes("0:~"));
			expect(decode(buffer)).toEqual(Value.null());
		});

		it("should accept fragments", ({ expect }) => {
			expect(decode([bytes("5:hel"), bytes("lo,")])).toEqual(
				Value.string("hello"),
			);
		});

		it("should not alias the input buffer", ({ expect }) => {
			const input = Buffer.from("5:hello,");
			const value = decode(input);
			input[2] = 0x4a;
			expect(value).toEqual(Value.string("hello"));
		});
	});

	describe("payload type errors", (it) => {
		const cases: [string, string][] = [
			["2:01#", "invalid-integer"],
			["2:-0#", "invalid-integer"],
			["1:-#", "invalid-integer"],
			["3:1.5#", "invalid-integer"],
			["2:+1#", "invalid-integer"],
			["2:.5^", "invalid-float"],
			["3:NaN^", "invalid-float"],
			["5:1e999^", "invalid-float"],
			["4:True!", "invalid-boolean"],
			["3:yes!", "invalid-boolean"],
			["1:x~", "invalid-null"],
		];

		for (const [input, reason] of cases) {
			it(`should reject ${input} as ${reason}`, ({ expect }) => {
				const error = decodeError(input);
				expect(error).toBeInstanceOf(PayloadTypeError);
				expect(error instanceof PayloadTypeError && error.reason).toBe(reason);
				expect(error.offset).toBe(0);
			});
		}

		it("should report the offset of the offending child", ({ expect }) => {
			const error = decodeError("8:1:1#1:x#]");
			expect(error).toBeInstanceOf(PayloadTypeError);
			expect(error.offset).toBe(6);
		});
	});

	describe("framing errors", (it) => {
		it("should reject a missing tag", ({ expect }) => {
			const error = decodeError("3:abc");
			expect(error).toBeInstanceOf(FramingError);
			expect(error instanceof FramingError && error.reason).toBe("missing-tag");
		});

		it("should reject a payload shorter than declared", ({ expect }) => {
			expect(decodeError("2:5#")).toBeInstanceOf(FramingError);
			expect(decodeError("5:ab,")).toBeInstanceOf(FramingError);
		});

		it("should keep a malformed child length a framing error", ({ expect }) => {
			const error = decodeError("3:x:~]");
			expect(error).toBeInstanceOf(FramingError);
			expect(error instanceof FramingError && error.reason).toBe(
				"invalid-length",
			);
			expect(error.offset).toBe(2);
		});
	});

	describe("structural errors", (it) => {
		it("should reject a child that overruns its parent", ({ expect }) => {
			const error = decodeError("6:5:abc,]");
			expect(error).toBeInstanceOf(StructuralError);
			expect(error instanceof StructuralError && error.reason).toBe("overrun");
			expect(error.offset).toBe(2);
			expect(error.cause).toBeInstanceOf(FramingError);
		});

		it("should reject a non-string key", ({ expect }) => {
			const error = decodeError("8:1:1#1:a,}");
			expect(error).toBeInstanceOf(StructuralError);
			expect(error instanceof StructuralError && error.reason).toBe(
				"non-string-key",
			);
			expect(error.offset).toBe(2);
		});

		it("should reject a key without a value", ({ expect }) => {
			const error = decodeError("4:1:a,}");
			expect(error).toBeInstanceOf(StructuralError);
			expect(error instanceof StructuralError && error.reason).toBe(
				"odd-pair-count",
			);
		});
	});

	describe("trailing data", (it) => {
		it("should reject bytes after the top-level frame", ({ expect }) => {
			const error = decodeError("0:~x");
			expect(error).toBeInstanceOf(TrailingDataError);
			expect(error instanceof TrailingDataError && error.remaining).toBe(1);
			expect(error.message).toBe(
				"1 trailing byte(s) after top-level frame (at byte 3)",
			);
		});

		it("should reject two concatenated frames", ({ expect }) => {
			expect(decodeError("0:~0:~")).toBeInstanceOf(TrailingDataError);
		});
	});

	describe("depth limit", (it) => {
		it("should accept nesting up to maxDepth", ({ expect }) => {
			expect(decode(nestedLists(3), { maxDepth: 3 }).type).toBe("list");
		});

		it("should reject nesting beyond maxDepth", ({ expect }) => {
			const error = decodeError(nestedLists(4), { maxDepth: 3 });
			expect(error).toBeInstanceOf(DepthExceededError);
			expect(error instanceof DepthExceededError && error.maxDepth).toBe(3);
		});

		it("should default to 512 levels", ({ expect }) => {
			expect(decode(nestedLists(512)).type).toBe("list");
			expect(decodeError(nestedLists(513))).toBeInstanceOf(DepthExceededError);
		});

		it("should decode nesting at the largest accepted maxDepth", ({
			expect,
		}) => {
			expect(
				decode(nestedLists(MAX_DEPTH_LIMIT), { maxDepth: MAX_DEPTH_LIMIT }).type,
			).toBe("list");
		});

		it("should refuse a maxDepth above the limit instead of overflowing the stack", ({
			expect,
		}) => {
			const error = decodeError(nestedLists(MAX_DEPTH_LIMIT + 1), {
				maxDepth: 1_000_000,
			});
			expect(error).toBeInstanceOf(OptionsError);
		});

		it("should allow only scalars at maxDepth 0", ({ expect }) => {
			expect(decode("0:~", { maxDepth: 0 })).toEqual(Value.null());
			expect(decodeError("0:]", { maxDepth: 0 })).toBeInstanceOf(
				DepthExceededError,
			);
		});

		it("should count dictionaries as nesting", ({ expect }) => {
			const error = decodeError("7:1:a,0:}}", { maxDepth: 1 });
			expect(error).toBeInstanceOf(DepthExceededError);
			expect(error.offset).toBe(6);
		});
	});

	describe("size limit", (it) => {
		it("should sum every declared payload length", ({ expect }) => {
			expect(decode("16:5:hello,5:world,]", { maxTotalSize: 26 }).type).toBe(
				"list",
			);
		});

		it("should fail at the frame that crosses the limit", ({ expect }) => {
			const error = decodeError("16:5:hello,5:world,]", { maxTotalSize: 25 });
			expect(error).toBeInstanceOf(SizeExceededError);
			expect(error.offset).toBe(11);
		});

		it("should check the top-level frame first", ({ expect }) => {
			const error = decodeError("16:5:hello,5:world,]", { maxTotalSize: 15 });
			expect(error).toBeInstanceOf(SizeExceededError);
			expect(error.offset).toBe(0);
		});

		it("should count dictionary keys", ({ expect }) => {
			expect(decodeError("16:5:hello,5:world,}", { maxTotalSize: 25 })).toBeInstanceOf(
				SizeExceededError,
			);
		});
	});

	describe("options", (it) => {
		it("should reject invalid options", ({ expect }) => {
			expect(() => decode("0:~", { maxDepth: -1 })).toThrow(OptionsError);
			expect(() => decode("0:~", { maxTotalSize: 1.5 })).toThrow(OptionsError);
		});
	});

	describe("truncated input", (it) => {
		it("should fail cleanly for every proper prefix of a valid encoding", ({
			expect,
		}) => {
			const full = encode(
				Value.dict([
					["name", Value.string("widget")],
					["sizes", Value.list([Value.integer(-12), Value.float(2.5)])],
					["ok", Value.boolean(true)],
					["none", Value.null()],
				]),
			);
			for (let length = 0; length < full.length; length++) {
				const result = safeDecode(full.subarray(0, length));
				expect(result.success).toBe(false);
			}
			expect(safeDecode(full).success).toBe(true);
		});
	});

	describe("round trip", (it) => {
		it("should decode what encode writes", ({ expect }) => {
			const trees = [
				Value.null(),
				Value.integer(2n ** 100n),
				Value.integer(-1),
				Value.float(-0),
				Value.float(0.1),
				Value.string(Uint8Array.of(0, 255, 58, 44)),
				Value.list([]),
				Value.dict([
					["a", Value.list([Value.dict([["", Value.boolean(false)]])])],
					["a", Value.float(1e-7)],
				]),
			];
			for (const tree of trees) {
				expect(valueEquals(decode(encode(tree)), tree)).toBe(true);
			}
		});

		it("should re-encode non-canonical floats canonically", ({ expect }) => {
			const text = (value: Uint8Array) => new TextDecoder().decode(value);
			expect(text(encode(decode("3:1.0^")))).toBe("1:1^");
			expect(text(encode(decode("5:1.250^")))).toBe("4:1.25^");
			expect(text(encode(decode("4:1E+2^")))).toBe("3:100^");
		});
	});
});

describe("safeDecode", (it) => {
	it("should return the value on success", ({ expect }) => {
		expect(safeDecode("0:~")).toEqual({ success: true, value: Value.null() });
	});

	it("should return the error on failure", ({ expect }) => {
		const result = safeDecode("3:abc");
		expect(result.success).toBe(false);
		expect(!result.success && result.error).toBeInstanceOf(FramingError);
	});

	it("should report invalid options as a failure", ({ expect }) => {
		const result = safeDecode("0:~", { maxDepth: -1 });
		expect(!result.success && result.error).toBeInstanceOf(OptionsError);
	});
});
