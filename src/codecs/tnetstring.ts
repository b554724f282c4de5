/**
 * TNetString codecs
 *
 * Zod codecs that parse TNetString into plain JavaScript values and validate
 * them against a schema, and that encode validated values back to
 * TNetString.
 *
 * @example
 * ```ts
 * import { createTnetstringCodec } from "tnetcodec/codecs";
 *
 * const UserCodec = createTnetstringCodec(
 *   z.object({ id: z.number(), name: z.string() }),
 *   { maxDepth: 8 },
 * );
 * const bytes = UserCodec.encode({ id: 1, name: "Ada" });
 * const user = UserCodec.decode(bytes);
 * ```
 */

import * as z from "zod";
import { encodeToString } from "../encoder.js";
import { parse, stringify, toValue } from "../native.js";
import type { ParseOptions } from "../options.js";
import {
	type CodecOptions,
	createBinaryCodecFactory,
	createStringCodecFactory,
} from "./factory.js";

/**
 * Codec options: parse limits and mappings plus the factory options
 */
export type TnetstringCodecOptions = CodecOptions & ParseOptions;

function encodeOptions(options?: TnetstringCodecOptions) {
	return { maxDepth: options?.maxDepth };
}

function parseOptions(options?: TnetstringCodecOptions): ParseOptions {
	return {
		maxDepth: options?.maxDepth,
		maxTotalSize: options?.maxTotalSize,
		integers: options?.integers,
		strings: options?.strings,
		dicts: options?.dicts,
	};
}

/**
 * Factory for binary TNetString codecs
 *
 * @param schema - Zod schema the decoded value must satisfy
 * @param options - Limits and mappings for parsing, plus an error message
 * @returns A codec between Uint8Array and the schema's type
 */
export const createTnetstringCodec = createBinaryCodecFactory<TnetstringCodecOptions>(
	(value, options) => stringify(value, encodeOptions(options)),
	(bytes, options) => parse(bytes, parseOptions(options)),
	"tnetstring",
);

/**
 * Factory for TNetString codecs over UTF-8 text
 *
 * Length prefixes count UTF-8 bytes. Encoding fails if a byte string in the
 * value is not valid UTF-8.
 */
export const createTnetstringTextCodec =
	createStringCodecFactory<TnetstringCodecOptions>(
		(value, options) =>
			encodeToString(toValue(value, encodeOptions(options)), encodeOptions(options)),
		(text, options) => parse(text, parseOptions(options)),
		"tnetstring",
	);

/**
 * Default binary codec for unknown values
 *
 * Use when you need to serialize arbitrary data without schema validation.
 * The decoded value will be `unknown` and should be validated separately.
 */
export const TnetstringCodec = createTnetstringCodec(z.unknown());

/**
 * Default text codec for unknown values
 */
export const TnetstringTextCodec = createTnetstringTextCodec(z.unknown());
