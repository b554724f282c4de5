/**
 * TNetString decoding
 *
 * Recursive descent over frames. Nesting is checked against `maxDepth` before
 * any child is framed, and declared payload lengths are summed against
 * `maxTotalSize` before the payload is read.
 */

import {
	DepthExceededError,
	FramingError,
	isOverrun,
	PayloadTypeError,
	SizeExceededError,
	StructuralError,
	TnetError,
	TrailingDataError,
} from "./errors.js";
import { type Frame, parseFrame, Tag } from "./frame.js";
import { type TnetInput, toBytes } from "./input.js";
import { parseFloatText, parseIntegerText } from "./numeric.js";
import {
	type DecodeOptions,
	DecodeOptionsSchema,
	resolveOptions,
} from "./options.js";
import { type DictEntry, Value } from "./value.js";

const TRUE_BYTES = [0x74, 0x72, 0x75, 0x65];
const FALSE_BYTES = [0x66, 0x61, 0x6c, 0x73, 0x65];

function payloadIs(
	buffer: Uint8Array,
	frame: Frame,
	literal: readonly number[],
): boolean {
	if (frame.length !== literal.length) return false;
	return literal.every((byte, i) => buffer[frame.payloadStart + i] === byte);
}

/**
 * Result of `safeDecode`
 */
export type DecodeResult =
	| { success: true; value: Value }
	| { success: false; error: TnetError };

/**
 * Decode a complete TNetString buffer to a Value tree
 *
 * @param input - Bytes (or UTF-8 text) holding exactly one top-level frame
 * @param options - Depth and size limits
 * @returns The decoded, frozen Value tree
 * @throws TnetError describing the first problem found, scanning outer
 * frames before inner ones and children left to right
 *
 * @example
 * ```ts
 * const value = decode("16:5:hello,5:world,]");
 * // { type: "list", items: [{ type: "string", ... }, { type: "string", ... }] }
 * ```
 */
export function decode(input: TnetInput, options?: DecodeOptions): Value {
	const { maxDepth, maxTotalSize } = resolveOptions(
		DecodeOptionsSchema,
		options,
	);
	const buffer = toBytes(input);
	let totalSize = 0;

	// copies, so the tree never aliases the caller's buffer
	const copy = (start: number, end: number) =>
		new Uint8Array(buffer.subarray(start, end));

	function account(frame: Frame, offset: number): void {
		totalSize += frame.length;
		if (maxTotalSize !== undefined && totalSize > maxTotalSize) {
			throw new SizeExceededError(maxTotalSize, offset);
		}
	}

	/**
	 * Frame a child inside its parent's payload. A child that needs bytes
	 * past the parent's payload end overruns the parent.
	 */
	function frameChild(offset: number, end: number): Frame {
		try {
			return parseFrame(buffer, offset, end);
		} catch (err) {
			if (err instanceof FramingError && isOverrun(err)) {
				throw new StructuralError("overrun", offset, err);
			}
			throw err;
		}
	}

	function decodeList(frame: Frame, depth: number): Value {
		const items: Value[] = [];
		let cursor = frame.payloadStart;
		while (cursor < frame.payloadEnd) {
			const child = frameChild(cursor, frame.payloadEnd);
			items.push(decodeFrame(child, cursor, depth));
			cursor = child.next;
		}
		return Value.list(items);
	}

	function decodeDict(frame: Frame, depth: number): Value {
		const entries: DictEntry[] = [];
		let cursor = frame.payloadStart;
		while (cursor < frame.payloadEnd) {
			const keyOffset = cursor;
			const key = frameChild(cursor, frame.payloadEnd);
			if (key.tag !== Tag.String) {
				throw new StructuralError("non-string-key", keyOffset);
			}
			account(key, keyOffset);
			cursor = key.next;
			if (cursor >= frame.payloadEnd) {
				throw new StructuralError("odd-pair-count", keyOffset);
			}
			const child = frameChild(cursor, frame.payloadEnd);
			entries.push([
				copy(key.payloadStart, key.payloadEnd),
				decodeFrame(child, cursor, depth),
			]);
			cursor = child.next;
		}
		return Value.dict(entries);
	}

	function decodeFrame(frame: Frame, offset: number, depth: number): Value {
		account(frame, offset);
		const payload = () => buffer.subarray(frame.payloadStart, frame.payloadEnd);

		switch (frame.tag) {
			case Tag.String:
				return Value.string(copy(frame.payloadStart, frame.payloadEnd));
			case Tag.Integer: {
				const value = parseIntegerText(payload());
				if (value === undefined) {
					throw new PayloadTypeError(
						"invalid-integer",
						"Invalid integer payload",
						offset,
					);
				}
				return Value.integer(value);
			}
			case Tag.Float: {
				const value = parseFloatText(payload());
				if (value === undefined) {
					throw new PayloadTypeError(
						"invalid-float",
						"Invalid float payload",
						offset,
					);
				}
				return Value.float(value);
			}
			case Tag.Boolean:
				if (payloadIs(buffer, frame, TRUE_BYTES)) return Value.boolean(true);
				if (payloadIs(buffer, frame, FALSE_BYTES)) return Value.boolean(false);
				throw new PayloadTypeError(
					"invalid-boolean",
					"Boolean payload must be 'true' or 'false'",
					offset,
				);
			case Tag.Null:
				if (frame.length !== 0) {
					throw new PayloadTypeError(
						"invalid-null",
						"Null payload must be empty",
						offset,
					);
				}
				return Value.null();
			case Tag.List:
			case Tag.Dict: {
				if (depth + 1 > maxDepth) throw new DepthExceededError(maxDepth, offset);
				return frame.tag === Tag.List
					? decodeList(frame, depth + 1)
					: decodeDict(frame, depth + 1);
			}
		}
	}

	const top = parseFrame(buffer, 0);
	const value = decodeFrame(top, 0, 0);
	if (top.next !== buffer.length) {
		throw new TrailingDataError(buffer.length - top.next, top.next);
	}
	return value;
}

/**
 * Decode without throwing
 *
 * @returns `{ success: true, value }` or `{ success: false, error }`
 *
 * @example
 * ```ts
 * const result = safeDecode(bytes, { maxDepth: 32 });
 * if (result.success) {
 *   handle(result.value);
 * } else {
 *   reject(result.error.code);
 * }
 * ```
 */
export function safeDecode(
	input: TnetInput,
	options?: DecodeOptions,
): DecodeResult {
	try {
		return { success: true, value: decode(input, options) };
	} catch (err) {
		if (err instanceof TnetError) return { success: false, error: err };
		throw err;
	}
}
