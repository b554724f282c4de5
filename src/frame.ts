/**
 * Framer
 *
 * Extracts one `length:payload<tag>` frame from a byte buffer. Stateless and
 * non-recursive; aggregate payloads are framed again by the decoder.
 */

import { FramingError } from "./errors.js";

/**
 * Type tag bytes
 */
export const Tag = {
	String: 0x2c, // ,
	Integer: 0x23, // #
	Float: 0x5e, // ^
	Boolean: 0x21, // !
	Null: 0x7e, // ~
	List: 0x5d, // ]
	Dict: 0x7d, // }
} as const;

export type Tag = (typeof Tag)[keyof typeof Tag];

const COLON = 0x3a;
const ZERO = 0x30;
const NINE = 0x39;

export function isTag(byte: number): byte is Tag {
	return (
		byte === Tag.String ||
		byte === Tag.Integer ||
		byte === Tag.Float ||
		byte === Tag.Boolean ||
		byte === Tag.Null ||
		byte === Tag.List ||
		byte === Tag.Dict
	);
}

/**
 * One framed record
 */
export interface Frame {
	/** Declared payload length */
	length: number;
	/** Type tag byte */
	tag: Tag;
	/** Offset of the first payload byte */
	payloadStart: number;
	/** Offset one past the last payload byte (the tag's offset) */
	payloadEnd: number;
	/** Offset one past the tag byte */
	next: number;
}

/**
 * Parse the frame starting at `offset`
 *
 * Never reads at or beyond `end`, so a caller framing the children of an
 * aggregate passes the aggregate's payload end.
 *
 * @param buffer - Bytes to read
 * @param offset - Offset of the frame's first length digit
 * @param end - Offset one past the last byte the frame may use
 * @returns The parsed frame
 * @throws FramingError when the frame is malformed or does not fit
 */
export function parseFrame(
	buffer: Uint8Array,
	offset: number,
	end: number = buffer.length,
): Frame {
	const limit = Math.min(end, buffer.length);
	let cursor = offset;
	let length = 0;

	while (cursor < limit) {
		const byte = buffer[cursor];
		if (byte === COLON) break;
		if (byte === undefined || byte < ZERO || byte > NINE) {
			throw new FramingError("invalid-length", offset);
		}
		if (cursor > offset && length === 0) {
			throw new FramingError("leading-zero", offset);
		}
		length = length * 10 + (byte - ZERO);
		cursor++;
	}

	if (cursor >= limit) throw new FramingError("missing-colon", offset);
	if (cursor === offset) throw new FramingError("missing-length", offset);

	const payloadStart = cursor + 1;
	// digit runs too long to be exact are still far past any limit
	if (length > limit - payloadStart) {
		throw new FramingError("truncated-payload", offset);
	}
	const payloadEnd = payloadStart + length;
	if (payloadEnd >= limit) throw new FramingError("missing-tag", offset);

	const tag = buffer[payloadEnd];
	if (tag === undefined || !isTag(tag)) {
		throw new FramingError("unknown-tag", offset);
	}

	return { length, tag, payloadStart, payloadEnd, next: payloadEnd + 1 };
}
