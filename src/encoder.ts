/**
 * TNetString encoding
 *
 * Post-order walk: an aggregate's header slot is reserved, its children are
 * written, and only then is the header filled in with their byte length.
 */

import { DepthExceededError, EncodeError } from "./errors.js";
import { Tag } from "./frame.js";
import { formatFloat, formatInteger } from "./numeric.js";
import {
	type EncodeOptions,
	EncodeOptionsSchema,
	resolveOptions,
} from "./options.js";
import type { Value } from "./value.js";

const TAG_BYTES: Record<Value["type"], Uint8Array> = {
	null: Uint8Array.of(Tag.Null),
	boolean: Uint8Array.of(Tag.Boolean),
	integer: Uint8Array.of(Tag.Integer),
	float: Uint8Array.of(Tag.Float),
	string: Uint8Array.of(Tag.String),
	list: Uint8Array.of(Tag.List),
	dict: Uint8Array.of(Tag.Dict),
};

/**
 * Growing list of output chunks
 */
class ChunkWriter {
	readonly chunks: Uint8Array[] = [];
	length = 0;
	private readonly textEncoder = new TextEncoder();

	push(chunk: Uint8Array): void {
		this.chunks.push(chunk);
		this.length += chunk.byteLength;
	}

	pushText(text: string): void {
		this.push(this.textEncoder.encode(text));
	}

	/** Reserve a chunk to be filled in later */
	reserve(): number {
		this.chunks.push(new Uint8Array(0));
		return this.chunks.length - 1;
	}

	fillText(slot: number, text: string): void {
		const chunk = this.textEncoder.encode(text);
		this.chunks[slot] = chunk;
		this.length += chunk.byteLength;
	}

	concat(): Uint8Array {
		const result = new Uint8Array(this.length);
		let offset = 0;
		for (const chunk of this.chunks) {
			result.set(chunk, offset);
			offset += chunk.byteLength;
		}
		return result;
	}
}

/**
 * Encode a Value tree to TNetString bytes
 *
 * @param value - Tree to encode
 * @param options - Nesting limit, which also stops hand-built cyclic trees
 * @returns The encoded bytes
 * @throws EncodeError for non-finite floats and nodes that are not Values
 * @throws DepthExceededError when the tree nests deeper than `maxDepth`
 *
 * @example
 * ```ts
 * encode(Value.list([Value.string("hello"), Value.string("world")]));
 * // bytes of "16:5:hello,5:world,]"
 * ```
 */
export function encode(value: Value, options?: EncodeOptions): Uint8Array {
	const { maxDepth } = resolveOptions(EncodeOptionsSchema, options);
	const out = new ChunkWriter();

	function scalar(type: Value["type"], payload: string | Uint8Array): void {
		if (typeof payload === "string") {
			out.pushText(`${payload.length}:${payload}`);
		} else {
			out.pushText(`${payload.byteLength}:`);
			out.push(payload);
		}
		out.push(TAG_BYTES[type]);
	}

	function write(node: Value, depth: number): void {
		switch (node.type) {
			case "null":
				scalar("null", "");
				return;
			case "boolean":
				scalar("boolean", node.value ? "true" : "false");
				return;
			case "integer":
				scalar("integer", formatInteger(node.value));
				return;
			case "float":
				if (!Number.isFinite(node.value)) {
					throw new EncodeError(
						`Cannot encode non-finite float ${node.value}`,
						node.value,
					);
				}
				scalar("float", formatFloat(node.value));
				return;
			case "string":
				scalar("string", node.value);
				return;
			case "list":
			case "dict": {
				if (depth + 1 > maxDepth) throw new DepthExceededError(maxDepth);
				const slot = out.reserve();
				const start = out.length;
				if (node.type === "list") {
					for (const item of node.items) write(item, depth + 1);
				} else {
					for (const [key, item] of node.entries) {
						scalar("string", key);
						write(item, depth + 1);
					}
				}
				out.fillText(slot, `${out.length - start}:`);
				out.push(TAG_BYTES[node.type]);
				return;
			}
			default: {
				const unknown: never = node;
				throw new EncodeError("Not a TNetString value", unknown);
			}
		}
	}

	write(value, 0);
	return out.concat();
}

/**
 * Encode a Value tree to a UTF-8 string
 *
 * @throws EncodeError if a string payload is not valid UTF-8
 */
export function encodeToString(value: Value, options?: EncodeOptions): string {
	const bytes = encode(value, options);
	try {
		return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
	} catch (err) {
		throw new EncodeError("Encoded bytes are not valid UTF-8", err);
	}
}
