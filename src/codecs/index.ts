/**
 * Codecs
 *
 * Zod-based codecs for serialization with built-in validation.
 *
 * - Factory functions for creating custom codecs
 * - TNetString codecs, binary and text
 */

// Core types and factories
export {
	type BinaryCodec,
	type CodecFactory,
	type CodecOptions,
	createBinaryCodecFactory,
	createStringCodecFactory,
	isBinaryCodec,
	isStringCodec,
	type StringCodec,
	type WireCodec,
} from "./factory.js";

// TNetString codecs
export {
	createTnetstringCodec,
	createTnetstringTextCodec,
	TnetstringCodec,
	type TnetstringCodecOptions,
	TnetstringTextCodec,
} from "./tnetstring.js";
