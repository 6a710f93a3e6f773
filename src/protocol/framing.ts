/**
 * Packet framing: varint length-prefix encoding/decoding.
 * Wire format: [varint: packet_length][packet_data...]
 */

import { encodeVarInt, IncompleteVarIntError, readVarInt } from "./varint.ts";

/** Largest frame a vanilla server accepts (3-byte varint length). */
export const MAX_FRAME_LENGTH = 2097151;

/** Frame a packet by prepending its varint-encoded length. */
export const framePacket = (data: Buffer): Buffer =>
	Buffer.concat([encodeVarInt(data.length), data]);

/** Length prefix at the head of `pending`, or null until all of it has arrived. */
const peekLength = (pending: Buffer): { length: number; size: number } | null => {
	try {
		const { value, size } = readVarInt(pending, 0);
		return { length: value, size };
	} catch (err) {
		if (err instanceof IncompleteVarIntError) return null;
		throw err;
	}
};

export type Splitter = {
	/** Feed bytes; returns every frame completed by them. */
	readonly write: (chunk: Buffer) => Buffer[];
	/** Bytes held back waiting for the rest of a frame. */
	readonly pending: () => number;
};

/**
 * Packet splitter: extracts complete packets from a stream of bytes.
 * Throws on a negative or oversized length prefix; the stream is unusable after that.
 */
export const createSplitter = (): Splitter => {
	let pending: Buffer = Buffer.alloc(0);

	return {
		write: (chunk: Buffer): Buffer[] => {
			pending = pending.length > 0 ? Buffer.concat([pending, chunk]) : chunk;
			const frames: Buffer[] = [];

			for (let head = peekLength(pending); head; head = peekLength(pending)) {
				if (head.length < 0 || head.length > MAX_FRAME_LENGTH) {
					throw new Error(`Invalid frame length: ${head.length}`);
				}
				const end = head.size + head.length;
				if (pending.length < end) break;
				frames.push(pending.subarray(head.size, end));
				pending = pending.subarray(end);
			}

			return frames;
		},

		pending: () => pending.length,
	};
};
