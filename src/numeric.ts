/**
 * Numeric Formatter
 *
 * Conversions between payload text and `bigint`/`number`. Integers are
 * arbitrary precision; floats use ECMAScript's shortest round-trip form.
 */

const INTEGER_PATTERN = /^(?:-?[1-9][0-9]*|0)$/;
const FLOAT_PATTERN = /^-?[0-9]+(?:\.[0-9]+)?(?:[eE][+-]?[0-9]+)?$/;

/**
 * Payload bytes as ASCII text, or undefined if any byte is not ASCII
 */
function asciiText(bytes: Uint8Array): string | undefined {
	let text = "";
	for (const byte of bytes) {
		if (byte > 0x7f) return undefined;
		text += String.fromCharCode(byte);
	}
	return text;
}

export function formatInteger(value: bigint): string {
	return value.toString(10);
}

/**
 * Format a finite float so that parsing the text yields the same bits
 *
 * @throws RangeError for NaN and infinities, which the grammar cannot express
 */
export function formatFloat(value: number): string {
	if (!Number.isFinite(value)) {
		throw new RangeError(`Cannot format non-finite float ${value}`);
	}
	if (Object.is(value, -0)) return "-0";
	return value.toString();
}

/**
 * Parse an integer payload
 *
 * @returns The value, or undefined if the text is not `-?[1-9][0-9]*` or `0`
 */
export function parseIntegerText(bytes: Uint8Array): bigint | undefined {
	const text = asciiText(bytes);
	if (text === undefined || !INTEGER_PATTERN.test(text)) return undefined;
	return BigInt(text);
}

/**
 * Parse a float payload
 *
 * @returns The value, or undefined if the text does not match the float
 * grammar or overflows to infinity
 */
export function parseFloatText(bytes: Uint8Array): number | undefined {
	const text = asciiText(bytes);
	if (text === undefined || !FLOAT_PATTERN.test(text)) return undefined;
	const value = Number(text);
	return Number.isFinite(value) ? value : undefined;
}
