/**
 * Native Bridge
 *
 * Maps plain JavaScript values to and from the Value model, and provides
 * `stringify`/`parse` for going straight between JavaScript values and bytes.
 */

import { decode } from "./decoder.js";
import { encode } from "./encoder.js";
import { DepthExceededError, EncodeError, PayloadTypeError } from "./errors.js";
import type { TnetInput } from "./input.js";
import {
	type EncodeOptions,
	EncodeOptionsSchema,
	type FromValueOptions,
	FromValueOptionsSchema,
	type ParseOptions,
	ParseOptionsSchema,
	resolveOptions,
} from "./options.js";
import { type DictEntry, Value } from "./value.js";

/**
 * Plain JavaScript shape of a decoded tree
 */
export type NativeValue =
	| null
	| boolean
	| number
	| bigint
	| string
	| Uint8Array
	| NativeValue[]
	| { [key: string]: NativeValue }
	| Map<string, NativeValue>;

function isPlainObject(value: object): value is Record<string, unknown> {
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

function kindOf(value: unknown): string {
	if (typeof value === "object" && value !== null) {
		return value.constructor?.name ?? "object";
	}
	return typeof value;
}

/**
 * Convert a plain JavaScript value to a Value tree
 *
 * Safe integers become Integers and every other number a Float, so `1.0`
 * is written as an Integer. Objects become Dictionaries in property order;
 * `undefined` members are skipped, and `undefined` elsewhere becomes Null.
 *
 * @param native - Value to convert
 * @param options - Nesting limit, which also stops cyclic objects
 * @throws EncodeError for values with no TNetString form
 * @throws DepthExceededError when nesting passes `maxDepth`
 */
export function toValue(native: unknown, options?: EncodeOptions): Value {
	const { maxDepth } = resolveOptions(EncodeOptionsSchema, options);

	function enter(depth: number): number {
		if (depth + 1 > maxDepth) throw new DepthExceededError(maxDepth);
		return depth + 1;
	}

	function convert(input: unknown, depth: number): Value {
		switch (typeof input) {
			case "undefined":
				return Value.null();
			case "boolean":
				return Value.boolean(input);
			case "bigint":
				return Value.integer(input);
			case "number":
				if (!Number.isFinite(input)) {
					throw new EncodeError(`Cannot encode non-finite number ${input}`, input);
				}
				return Number.isSafeInteger(input) && !Object.is(input, -0)
					? Value.integer(input)
					: Value.float(input);
			case "string":
				return Value.string(input);
			case "object": {
				if (input === null) return Value.null();
				if (input instanceof Uint8Array) return Value.string(new Uint8Array(input));
				if (input instanceof Date) return Value.string(input.toISOString());
				if (Array.isArray(input)) {
					const next = enter(depth);
					return Value.list(input.map((item: unknown) => convert(item, next)));
				}
				if (input instanceof Map) {
					const next = enter(depth);
					const entries: [string | Uint8Array, Value][] = [];
					for (const [key, item] of input) {
						if (typeof key !== "string" && !(key instanceof Uint8Array)) {
							throw new EncodeError(
								`Map keys must be strings or Uint8Arrays, got ${kindOf(key)}`,
								key,
							);
						}
						entries.push([
							key instanceof Uint8Array ? new Uint8Array(key) : key,
							convert(item, next),
						]);
					}
					return Value.dict(entries);
				}
				if (isPlainObject(input)) {
					const next = enter(depth);
					const entries: [string, Value][] = [];
					for (const [key, item] of Object.entries(input)) {
						if (item !== undefined) entries.push([key, convert(item, next)]);
					}
					return Value.dict(entries);
				}
				throw new EncodeError(`Cannot encode ${kindOf(input)}`, input);
			}
			default:
				throw new EncodeError(`Cannot encode ${kindOf(input)}`, input);
		}
	}

	return convert(native, 0);
}

/**
 * Convert a Value tree to plain JavaScript values
 *
 * Dictionary keys are decoded as UTF-8 text. When a key repeats, the last
 * value wins and a warning is logged.
 *
 * @param value - Tree to convert
 * @param options - Integer, string and dictionary mapping
 * @throws PayloadTypeError for keys (or, in `text` mode, strings) that are
 * not valid UTF-8 and, in `number` mode, for unsafe integers
 */
export function fromValue(
	value: Value,
	options?: FromValueOptions,
): NativeValue {
	const { integers, strings, dicts } = resolveOptions(
		FromValueOptionsSchema,
		options,
	);
	const textDecoder = new TextDecoder("utf-8", { fatal: true });

	function text(bytes: Uint8Array): string {
		try {
			return textDecoder.decode(bytes);
		} catch (err) {
			throw new PayloadTypeError(
				"invalid-utf8",
				`String is not valid UTF-8: ${err instanceof Error ? err.message : String(err)}`,
			);
		}
	}

	function string(bytes: Uint8Array): string | Uint8Array {
		if (strings === "bytes") return new Uint8Array(bytes);
		if (strings === "text") return text(bytes);
		try {
			return textDecoder.decode(bytes);
		} catch {
			return new Uint8Array(bytes);
		}
	}

	function integer(n: bigint): number | bigint {
		if (integers === "bigint") return n;
		const safe =
			n >= BigInt(Number.MIN_SAFE_INTEGER) &&
			n <= BigInt(Number.MAX_SAFE_INTEGER);
		if (safe) return Number(n);
		if (integers === "auto") return n;
		throw new PayloadTypeError(
			"unsafe-integer",
			`Integer ${n} is outside the safe number range`,
		);
	}

	function dict(entries: readonly DictEntry[]): NativeValue {
		const warnDuplicate = (key: string) =>
			console.warn(`Duplicate dictionary key '${key}': keeping the last value`);

		if (dicts === "map") {
			const map = new Map<string, NativeValue>();
			for (const [rawKey, item] of entries) {
				const key = text(rawKey);
				if (map.has(key)) warnDuplicate(key);
				map.set(key, convert(item));
			}
			return map;
		}

		const obj: { [key: string]: NativeValue } = {};
		for (const [rawKey, item] of entries) {
			const key = text(rawKey);
			if (Object.hasOwn(obj, key)) warnDuplicate(key);
			// defineProperty so that "__proto__" becomes an own key
			Object.defineProperty(obj, key, {
				value: convert(item),
				enumerable: true,
				writable: true,
				configurable: true,
			});
		}
		return obj;
	}

	function convert(node: Value): NativeValue {
		switch (node.type) {
			case "null":
				return null;
			case "boolean":
			case "float":
				return node.value;
			case "integer":
				return integer(node.value);
			case "string":
				return string(node.value);
			case "list":
				return node.items.map(convert);
			case "dict":
				return dict(node.entries);
		}
	}

	return convert(value);
}

/**
 * Encode a plain JavaScript value to TNetString bytes
 *
 * @example
 * ```ts
 * stringify({ hello: "world" }); // bytes of "16:5:hello,5:world,}"
 * ```
 */
export function stringify(native: unknown, options?: EncodeOptions): Uint8Array {
	return encode(toValue(native, options), options);
}

/**
 * Decode TNetString bytes straight to plain JavaScript values
 *
 * @example
 * ```ts
 * parse("27:3:int,1:1#3:seq,8:1:a,1:b,]}"); // { int: 1, seq: ["a", "b"] }
 * ```
 */
export function parse(input: TnetInput, options?: ParseOptions): NativeValue {
	const { maxDepth, maxTotalSize, ...mapping } = resolveOptions(
		ParseOptionsSchema,
		options,
	);
	return fromValue(decode(input, { maxDepth, maxTotalSize }), mapping);
}
