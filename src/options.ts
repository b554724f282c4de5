/**
 * Codec Options
 *
 * Zod schemas for decode, encode and native bridge options. Options are
 * plain objects; unset fields take the defaults below.
 */

import * as z from "zod";
import { OptionsError } from "./errors.js";

/**
 * Default cap on List/Dictionary nesting
 */
export const DEFAULT_MAX_DEPTH = 512;

/**
 * Largest accepted `maxDepth`; the recursive walks stay within the call
 * stack up to this depth
 */
export const MAX_DEPTH_LIMIT = 1024;

const MaxDepthSchema = z
	.number()
	.int()
	.nonnegative()
	.max(MAX_DEPTH_LIMIT)
	.default(DEFAULT_MAX_DEPTH);

/**
 * Decoder options
 */
export const DecodeOptionsSchema = z.object({
	/** Maximum List/Dictionary nesting (default 512, at most 1024) */
	maxDepth: MaxDepthSchema,
	/** Maximum sum of all declared payload lengths, in bytes (default unbounded) */
	maxTotalSize: z.number().int().nonnegative().optional(),
});
export type DecodeOptions = z.input<typeof DecodeOptionsSchema>;

/**
 * Encoder options
 */
export const EncodeOptionsSchema = z.object({
	/** Maximum List/Dictionary nesting (default 512) */
	maxDepth: MaxDepthSchema,
});
export type EncodeOptions = z.input<typeof EncodeOptionsSchema>;

/**
 * Options for converting Values to plain JavaScript values
 */
export const FromValueOptionsSchema = z.object({
	/**
	 * Integer mapping: `auto` gives a number when safe and a bigint otherwise,
	 * `bigint` always gives a bigint, `number` rejects unsafe integers
	 */
	integers: z.enum(["auto", "bigint", "number"]).default("auto"),
	/**
	 * String mapping: `auto` gives text when the bytes are valid UTF-8 and a
	 * Uint8Array otherwise, `text` rejects invalid UTF-8, `bytes` always
	 * gives a Uint8Array
	 */
	strings: z.enum(["auto", "text", "bytes"]).default("auto"),
	/** Dictionary mapping: a plain object or a Map */
	dicts: z.enum(["object", "map"]).default("object"),
});
export type FromValueOptions = z.input<typeof FromValueOptionsSchema>;

/**
 * Options for `parse`: decoder options plus the Value mapping
 */
export const ParseOptionsSchema = DecodeOptionsSchema.extend(
	FromValueOptionsSchema.shape,
);
export type ParseOptions = z.input<typeof ParseOptionsSchema>;

/**
 * Validate options and fill in defaults
 *
 * @param schema - Options schema
 * @param options - Caller-supplied options
 * @returns Resolved options
 * @throws OptionsError carrying the Zod issues
 */
export function resolveOptions<T extends z.ZodType>(
	schema: T,
	options: z.input<T> | undefined,
): z.output<T> {
	const result = schema.safeParse(options ?? {});
	if (!result.success) {
		throw new OptionsError(
			`Invalid options: ${z.prettifyError(result.error)}`,
			result.error.issues,
		);
	}
	return result.data;
}
