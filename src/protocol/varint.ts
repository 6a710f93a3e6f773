/**
 * VarInt encoding: Minecraft's LEB128 variant, 1-5 bytes for a signed 32-bit value.
 * Reads are bounds-checked so stream consumers can tell "incomplete" from "corrupt".
 */

export const MAX_VARINT_SIZE = 5;

/** Thrown when a varint runs past the end of the buffer; more bytes may complete it. */
export class IncompleteVarIntError extends RangeError {
	constructor() {
		super("VarInt extends past end of buffer");
		this.name = "IncompleteVarIntError";
	}
}

export const readVarInt = (
	buffer: Buffer,
	offset: number,
): { value: number; size: number } => {
	let value = 0;
	let size = 0;
	let byte: number;
	do {
		if (offset + size >= buffer.length) throw new IncompleteVarIntError();
		byte = buffer[offset + size];
		value |= (byte & 0x7f) << (size * 7);
		size++;
		if (size >= MAX_VARINT_SIZE && byte & 0x80) throw new Error("VarInt too big");
	} while (byte & 0x80);
	return { value: value | 0, size };
};

export const writeVarInt = (
	value: number,
	buffer: Buffer,
	offset: number,
): number => {
	let v = value >>> 0;
	while (v & ~0x7f) {
		buffer[offset++] = (v & 0x7f) | 0x80;
		v >>>= 7;
	}
	buffer[offset++] = v;
	return offset;
};

export const sizeOfVarInt = (value: number): number => {
	let v = value >>> 0;
	let size = 0;
	do {
		v >>>= 7;
		size++;
	} while (v);
	return size;
};

/** Encode a single varint into a fresh buffer. */
export const encodeVarInt = (value: number): Buffer => {
	const out = Buffer.allocUnsafe(sizeOfVarInt(value));
	writeVarInt(value, out, 0);
	return out;
};
