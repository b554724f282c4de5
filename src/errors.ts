/**
 * TNetString Error Classes
 *
 * Every failure raised by the decoder, encoder or native bridge is a
 * `TnetError`. Decode errors carry the byte offset of the frame that failed.
 */

/**
 * Error codes, one per error kind
 */
export const TnetErrorCodes = {
	FRAMING: "ERR_TNET_FRAMING",
	PAYLOAD_TYPE: "ERR_TNET_PAYLOAD_TYPE",
	STRUCTURAL: "ERR_TNET_STRUCTURAL",
	DEPTH_EXCEEDED: "ERR_TNET_DEPTH_EXCEEDED",
	SIZE_EXCEEDED: "ERR_TNET_SIZE_EXCEEDED",
	TRAILING_DATA: "ERR_TNET_TRAILING_DATA",
	ENCODE: "ERR_TNET_ENCODE",
	INVALID_OPTIONS: "ERR_TNET_INVALID_OPTIONS",
} as const;

export type TnetErrorCode =
	(typeof TnetErrorCodes)[keyof typeof TnetErrorCodes];

export interface TnetErrorOptions {
	/** Byte offset of the frame that failed */
	offset?: number;
	/** Additional error data */
	data?: unknown;
	/** Underlying error */
	cause?: unknown;
}

/**
 * Base class for all TNetString errors
 *
 * @param code - Error code (from TnetErrorCodes)
 * @param message - Human-readable error message
 * @param options - Optional offset, data and cause
 */
export class TnetError extends Error {
	readonly code: TnetErrorCode;
	readonly offset?: number;
	readonly data?: unknown;

	constructor(code: TnetErrorCode, message: string, options?: TnetErrorOptions) {
		super(
			options?.offset === undefined
				? message
				: `${message} (at byte ${options.offset})`,
			options?.cause === undefined ? undefined : { cause: options.cause },
		);
		this.name = "TnetError";
		this.code = code;
		this.offset = options?.offset;
		this.data = options?.data;
	}
}

export type FramingErrorReason =
	| "missing-length"
	| "invalid-length"
	| "leading-zero"
	| "missing-colon"
	| "truncated-payload"
	| "missing-tag"
	| "unknown-tag";

const framingMessages: Record<FramingErrorReason, string> = {
	"missing-length": "Missing length prefix",
	"invalid-length": "Invalid character in length prefix",
	"leading-zero": "Length prefix has a leading zero",
	"missing-colon": "Length prefix is not terminated by ':'",
	"truncated-payload": "Truncated payload",
	"missing-tag": "Truncated frame: missing type tag",
	"unknown-tag": "Unknown type tag",
};

/**
 * Thrown when a frame's length prefix, colon, payload or tag is malformed
 *
 * @param reason - Which part of the frame is broken
 * @param offset - Offset of the frame's first byte
 */
export class FramingError extends TnetError {
	readonly reason: FramingErrorReason;

	constructor(reason: FramingErrorReason, offset: number) {
		super(TnetErrorCodes.FRAMING, framingMessages[reason], { offset });
		this.name = "FramingError";
		this.reason = reason;
	}
}

/**
 * Returns true when a framing failure means the frame ran past the end of
 * the bytes it was allowed to use.
 */
export function isOverrun(error: FramingError): boolean {
	return (
		error.reason === "missing-colon" ||
		error.reason === "truncated-payload" ||
		error.reason === "missing-tag"
	);
}

export type PayloadTypeErrorReason =
	| "invalid-integer"
	| "invalid-float"
	| "invalid-boolean"
	| "invalid-null"
	| "unsafe-integer"
	| "invalid-utf8";

/**
 * Thrown when a payload does not match the grammar of its type tag
 *
 * Stands for the "type error" kind of the format; named so that it does not
 * shadow the global `TypeError`.
 *
 * @param reason - What was wrong with the payload
 * @param message - Human-readable error message
 * @param offset - Offset of the frame, when decoding
 */
export class PayloadTypeError extends TnetError {
	readonly reason: PayloadTypeErrorReason;

	constructor(reason: PayloadTypeErrorReason, message: string, offset?: number) {
		super(TnetErrorCodes.PAYLOAD_TYPE, message, { offset });
		this.name = "PayloadTypeError";
		this.reason = reason;
	}
}

export type StructuralErrorReason =
	| "overrun"
	| "odd-pair-count"
	| "non-string-key";

const structuralMessages: Record<StructuralErrorReason, string> = {
	overrun: "Child frame overruns its parent",
	"odd-pair-count": "Dictionary key has no value",
	"non-string-key": "Dictionary key is not a string",
};

/**
 * Thrown when an aggregate's children do not fit its payload
 *
 * @param reason - Which structural rule was broken
 * @param offset - Offset of the offending child frame
 * @param cause - Framing error behind an overrun
 */
export class StructuralError extends TnetError {
	readonly reason: StructuralErrorReason;

	constructor(reason: StructuralErrorReason, offset: number, cause?: unknown) {
		super(TnetErrorCodes.STRUCTURAL, structuralMessages[reason], {
			offset,
			cause,
		});
		this.name = "StructuralError";
		this.reason = reason;
	}
}

/**
 * Thrown when aggregates nest deeper than the configured maximum
 *
 * @param maxDepth - Configured maximum depth
 * @param offset - Offset of the aggregate that went too deep
 */
export class DepthExceededError extends TnetError {
	readonly maxDepth: number;

	constructor(maxDepth: number, offset?: number) {
		super(
			TnetErrorCodes.DEPTH_EXCEEDED,
			`Maximum nesting depth of ${maxDepth} exceeded`,
			{ offset },
		);
		this.name = "DepthExceededError";
		this.maxDepth = maxDepth;
	}
}

/**
 * Thrown when the summed payload lengths exceed the configured maximum
 *
 * @param maxTotalSize - Configured maximum in bytes
 * @param offset - Offset of the frame that crossed the limit
 */
export class SizeExceededError extends TnetError {
	readonly maxTotalSize: number;

	constructor(maxTotalSize: number, offset: number) {
		super(
			TnetErrorCodes.SIZE_EXCEEDED,
			`Total payload size exceeds ${maxTotalSize} bytes`,
			{ offset },
		);
		this.name = "SizeExceededError";
		this.maxTotalSize = maxTotalSize;
	}
}

/**
 * Thrown when bytes remain after the top-level frame
 *
 * @param remaining - Number of unconsumed bytes
 * @param offset - Offset of the first unconsumed byte
 */
export class TrailingDataError extends TnetError {
	readonly remaining: number;

	constructor(remaining: number, offset: number) {
		super(
			TnetErrorCodes.TRAILING_DATA,
			`${remaining} trailing byte(s) after top-level frame`,
			{ offset },
		);
		this.name = "TrailingDataError";
		this.remaining = remaining;
	}
}

/**
 * Thrown when a value cannot be written as TNetString
 *
 * @param message - Description of the unencodable value
 */
export class EncodeError extends TnetError {
	constructor(message: string, data?: unknown) {
		super(TnetErrorCodes.ENCODE, message, { data });
		this.name = "EncodeError";
	}
}

/**
 * Thrown when decode, encode or bridge options fail validation
 *
 * @param message - Description of the validation failure
 * @param data - Zod issues
 */
export class OptionsError extends TnetError {
	constructor(message: string, data?: unknown) {
		super(TnetErrorCodes.INVALID_OPTIONS, message, { data });
		this.name = "OptionsError";
	}
}
