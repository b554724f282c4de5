/**
 * Codec Factories
 *
 * Zod-based codecs for serialization with built-in validation.
 * Provides factories for creating codecs that encode to string or binary.
 *
 * @example
 * ```ts
 * const MyDataCodec = createTnetstringCodec(MyDataSchema);
 * const bytes = MyDataCodec.encode(data); // Uint8Array
 * const decoded = MyDataCodec.decode(bytes); // validated MyData
 *
 * // Safe decode with error handling
 * const result = MyDataCodec.safeDecode(bytes);
 * if (result.success) {
 *   console.log(result.data);
 * } else {
 *   console.error(result.error);
 * }
 * ```
 */

import type { LiteralUnion } from "type-fest";
import * as z from "zod";

/**
 * Type alias for a Zod codec that encodes to string
 */
export type StringCodec<T extends z.ZodType = z.ZodType> = z.ZodCodec<
	z.ZodString,
	T
>;

/**
 * Type alias for a Zod codec that encodes to Uint8Array
 */
export type BinaryCodec<T extends z.ZodType = z.ZodType> = z.ZodCodec<
	z.ZodCustom<Uint8Array, Uint8Array>,
	T
>;

/**
 * Wire codec - either string or binary
 */
export type WireCodec<T extends z.ZodType = z.ZodType> =
	| StringCodec<T>
	| BinaryCodec<T>;

/**
 * Options for codec factories
 */
export interface CodecOptions {
	/** Custom error message for parse failures */
	errorMessage?: string;
}

/**
 * Codec factory signature
 *
 * `TOptions` carries serializer-specific settings (limits, mappings) through
 * to the serialize and deserialize functions.
 */
export interface CodecFactory<
	TEncoded,
	TOptions extends CodecOptions = CodecOptions,
> {
	<T extends z.ZodType>(
		schema: T,
		options?: TOptions,
	): z.ZodCodec<
		string extends TEncoded ? z.ZodString : z.ZodCustom<TEncoded, TEncoded>,
		T
	>;
}

const BytesSchema = z.custom<Uint8Array>(
	(value) => value instanceof Uint8Array,
	{ message: "Expected Uint8Array" },
);

function failureMessage(
	err: unknown,
	formatName: string,
	options?: CodecOptions,
): string {
	return (
		options?.errorMessage ??
		(err instanceof Error ? err.message : `Invalid ${formatName}`)
	);
}

/**
 * Create a custom string codec factory
 *
 * @param serialize - Function to serialize a value to string
 * @param deserialize - Function to deserialize a string to a value
 * @param formatName - Name of the format for error messages
 * @returns A codec factory function
 *
 * @example
 * ```ts
 * const textCodec = createStringCodecFactory(
 *   (value) => encodeToString(toValue(value)),
 *   (text) => parse(text),
 *   "tnetstring",
 * );
 * ```
 */
export function createStringCodecFactory<
	TOptions extends CodecOptions = CodecOptions,
>(
	serialize: (value: unknown, options?: TOptions) => string,
	deserialize: (text: string, options?: TOptions) => unknown,
	formatName: LiteralUnion<z.core.$ZodStringFormats, string>,
): CodecFactory<string, TOptions> {
	return <T extends z.ZodType>(
		schema: T,
		options?: TOptions,
	): StringCodec<T> => {
		return z.codec(z.string(), schema, {
			decode: (text, ctx) => {
				try {
					return deserialize(text, options) as z.util.MaybeAsync<z.input<T>>;
				} catch (err) {
					ctx.issues.push({
						code: "invalid_format",
						format: formatName,
						input: text,
						message: failureMessage(err, formatName, options),
					});
					return z.NEVER;
				}
			},
			encode: (value) => serialize(value, options),
		});
	};
}

/**
 * Create a custom binary codec factory
 *
 * @param serialize - Function to serialize a value to Uint8Array
 * @param deserialize - Function to deserialize a Uint8Array to a value
 * @param formatName - Name of the format for error messages
 * @returns A codec factory function
 *
 * @example
 * ```ts
 * const tnetCodec = createBinaryCodecFactory(stringify, parse, "tnetstring");
 *
 * const DataCodec = tnetCodec(MySchema);
 * const bytes = DataCodec.encode(data); // Uint8Array
 * const data = DataCodec.decode(bytes); // validated
 * ```
 */
export function createBinaryCodecFactory<
	TOptions extends CodecOptions = CodecOptions,
>(
	serialize: (value: unknown, options?: TOptions) => Uint8Array,
	deserialize: (bytes: Uint8Array, options?: TOptions) => unknown,
	formatName: string,
): CodecFactory<Uint8Array, TOptions> {
	return <T extends z.ZodType>(
		schema: T,
		options?: TOptions,
	): BinaryCodec<T> => {
		return z.codec(BytesSchema, schema, {
			decode: (bytes, ctx) => {
				try {
					return deserialize(bytes, options) as z.util.MaybeAsync<z.input<T>>;
				} catch (err) {
					ctx.issues.push({
						code: "invalid_format",
						format: formatName,
						input: String(bytes),
						message: failureMessage(err, formatName, options),
					});
					return z.NEVER;
				}
			},
			encode: (value) => serialize(value, options),
		});
	};
}

/**
 * Helper to check if a codec encodes to string
 */
export function isStringCodec(
	codec: z.ZodCodec<z.ZodType, z.ZodType>,
): codec is StringCodec {
	// Check if the "from" schema accepts strings
	return codec._zod.def.in._zod.def.type === "string";
}

/**
 * Helper to check if a codec encodes to binary
 */
export function isBinaryCodec(
	codec: z.ZodCodec<z.ZodType, z.ZodType>,
): codec is BinaryCodec {
	return !isStringCodec(codec);
}
