/**
 * Input Normalization
 *
 * The decoder works on bytes. Text is encoded as UTF-8, so length prefixes
 * count UTF-8 bytes, not UTF-16 code units.
 */

/**
 * Accepted decoder input
 *
 * Buffers are Uint8Arrays. An array holds fragments of one message, as read
 * from a socket or stream.
 */
export type TnetInput = string | ArrayBuffer | Uint8Array | Uint8Array[];

/**
 * Convert decoder input to a single Uint8Array
 *
 * Uint8Arrays (including Buffers) are returned as-is, without copying.
 * Fragments are concatenated.
 */
export function toBytes(input: TnetInput): Uint8Array {
	if (Array.isArray(input)) {
		const totalLength = input.reduce((sum, buf) => sum + buf.byteLength, 0);
		const result = new Uint8Array(totalLength);
		let offset = 0;
		for (const buf of input) {
			result.set(buf, offset);
			offset += buf.byteLength;
		}
		return result;
	}
	if (typeof input === "string") return new TextEncoder().encode(input);
	if (input instanceof ArrayBuffer) return new Uint8Array(input);
	return input;
}
