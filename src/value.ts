/**
 * Value Model
 *
 * The tagged union produced by the decoder and consumed by the encoder.
 * Nodes are frozen on construction; change a tree by building a new one.
 */

import * as z from "zod";

export interface NullValue {
	readonly type: "null";
}

export interface BooleanValue {
	readonly type: "boolean";
	readonly value: boolean;
}

/**
 * Integers are arbitrary precision, so they never overflow
 */
export interface IntegerValue {
	readonly type: "integer";
	readonly value: bigint;
}

export interface FloatValue {
	readonly type: "float";
	readonly value: number;
}

/**
 * Strings are opaque bytes, not necessarily UTF-8
 */
export interface StringValue {
	readonly type: "string";
	readonly value: Uint8Array;
}

export interface ListValue {
	readonly type: "list";
	readonly items: readonly Value[];
}

export type DictEntry = readonly [key: Uint8Array, value: Value];

/**
 * Ordered key/value pairs; duplicate keys are kept as-is
 */
export interface DictValue {
	readonly type: "dict";
	readonly entries: readonly DictEntry[];
}

export type Value =
	| NullValue
	| BooleanValue
	| IntegerValue
	| FloatValue
	| StringValue
	| ListValue
	| DictValue;

export type ValueType = Value["type"];

const NULL: NullValue = Object.freeze({ type: "null" });
const TRUE: BooleanValue = Object.freeze({ type: "boolean", value: true });
const FALSE: BooleanValue = Object.freeze({ type: "boolean", value: false });

function toBytes(text: string | Uint8Array): Uint8Array {
	return typeof text === "string" ? new TextEncoder().encode(text) : text;
}

/**
 * Value constructors
 *
 * @example
 * ```ts
 * const tree = Value.dict([
 *   ["name", Value.string("widget")],
 *   ["sizes", Value.list([Value.integer(1), Value.float(2.5)])],
 * ]);
 * ```
 */
export const Value = {
	null(): NullValue {
		return NULL;
	},

	boolean(value: boolean): BooleanValue {
		return value ? TRUE : FALSE;
	},

	/**
	 * @throws RangeError if a number is not a safe integer
	 */
	integer(value: bigint | number): IntegerValue {
		if (typeof value === "number" && !Number.isSafeInteger(value)) {
			throw new RangeError(`${value} is not a safe integer`);
		}
		return Object.freeze({ type: "integer", value: BigInt(value) });
	},

	float(value: number): FloatValue {
		return Object.freeze({ type: "float", value });
	},

	/**
	 * Text is stored as its UTF-8 bytes
	 */
	string(value: string | Uint8Array): StringValue {
		return Object.freeze({ type: "string", value: toBytes(value) });
	},

	list(items: Iterable<Value>): ListValue {
		return Object.freeze({ type: "list", items: Object.freeze([...items]) });
	},

	dict(
		entries: Iterable<readonly [key: string | Uint8Array, value: Value]>,
	): DictValue {
		const pairs: DictEntry[] = [];
		for (const [key, value] of entries) {
			pairs.push(Object.freeze([toBytes(key), value] as const));
		}
		return Object.freeze({ type: "dict", entries: Object.freeze(pairs) });
	},
} as const;

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false;
	}
	return true;
}

/**
 * Structural equality
 *
 * Floats compare with `Object.is`, so `-0` and `0` differ and NaN equals NaN.
 * Dictionary entries compare pairwise in order.
 */
export function valueEquals(a: Value, b: Value): boolean {
	switch (a.type) {
		case "null":
			return b.type === "null";
		case "boolean":
			return b.type === "boolean" && b.value === a.value;
		case "integer":
			return b.type === "integer" && b.value === a.value;
		case "float":
			return b.type === "float" && Object.is(a.value, b.value);
		case "string":
			return b.type === "string" && bytesEqual(a.value, b.value);
		case "list":
			return (
				b.type === "list" &&
				a.items.length === b.items.length &&
				a.items.every((item, i) => {
					const other = b.items[i];
					return other !== undefined && valueEquals(item, other);
				})
			);
		case "dict":
			return (
				b.type === "dict" &&
				a.entries.length === b.entries.length &&
				a.entries.every(([key, value], i) => {
					const other = b.entries[i];
					return (
						other !== undefined &&
						bytesEqual(key, other[0]) &&
						valueEquals(value, other[1])
					);
				})
			);
	}
}

const BytesSchema = z.custom<Uint8Array>(
	(value) => value instanceof Uint8Array,
	{ message: "Expected Uint8Array" },
);

/**
 * Zod schema for a Value tree
 *
 * Stricter than the `Value` type in one respect: floats must be finite,
 * since NaN and infinities cannot be encoded.
 */
export const ValueSchema: z.ZodType<Value> = z.lazy(() =>
	z.discriminatedUnion("type", [
		z.object({ type: z.literal("null") }),
		z.object({ type: z.literal("boolean"), value: z.boolean() }),
		z.object({ type: z.literal("integer"), value: z.bigint() }),
		z.object({ type: z.literal("float"), value: z.number() }),
		z.object({ type: z.literal("string"), value: BytesSchema }),
		z.object({ type: z.literal("list"), items: z.array(ValueSchema) }),
		z.object({
			type: z.literal("dict"),
			entries: z.array(z.tuple([BytesSchema, ValueSchema])),
		}),
	]),
);
