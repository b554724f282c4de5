/**
 * tnetcodec
 *
 * TNetString (typed netstring) decoding and encoding for untrusted input,
 * with depth and size limits, arbitrary-precision integers, and Zod codecs.
 *
 * @example
 * ```ts
 * import { decode, encode, Value } from "tnetcodec";
 *
 * const bytes = encode(Value.dict([["hello", Value.string("world")]]));
 * // "16:5:hello,5:world,}"
 *
 * const tree = decode(bytes, { maxDepth: 32, maxTotalSize: 1 << 20 });
 *
 * // Plain JavaScript values
 * import { parse, stringify } from "tnetcodec";
 * parse(stringify({ int: 1, seq: ["a", "b"] })); // { int: 1, seq: ["a", "b"] }
 * ```
 */

// Decoding and encoding
export { type DecodeResult, decode, safeDecode } from "./decoder.js";
export { encode, encodeToString } from "./encoder.js";
// Errors
export {
	DepthExceededError,
	EncodeError,
	FramingError,
	type FramingErrorReason,
	OptionsError,
	PayloadTypeError,
	type PayloadTypeErrorReason,
	SizeExceededError,
	StructuralError,
	type StructuralErrorReason,
	TnetError,
	type TnetErrorCode,
	TnetErrorCodes,
	TrailingDataError,
} from "./errors.js";
// Framing
export { type Frame, isTag, parseFrame, Tag } from "./frame.js";
export { type TnetInput, toBytes } from "./input.js";
// Native values
export {
	fromValue,
	type NativeValue,
	parse,
	stringify,
	toValue,
} from "./native.js";
// Numbers
export {
	formatFloat,
	formatInteger,
	parseFloatText,
	parseIntegerText,
} from "./numeric.js";
// Options
export {
	DEFAULT_MAX_DEPTH,
	MAX_DEPTH_LIMIT,
	type DecodeOptions,
	DecodeOptionsSchema,
	type EncodeOptions,
	EncodeOptionsSchema,
	type FromValueOptions,
	FromValueOptionsSchema,
	type ParseOptions,
	ParseOptionsSchema,
} from "./options.js";
// Value model
export {
	type BooleanValue,
	type DictEntry,
	type DictValue,
	type FloatValue,
	type IntegerValue,
	type ListValue,
	type NullValue,
	type StringValue,
	Value,
	ValueSchema,
	type ValueType,
	valueEquals,
} from "./value.js";
