/**
 * Packet stream: one frame in, one frame out, over a TCP socket.
 * Callers see whole frames only; splitting happens here.
 */

import type { Socket } from "node:net";
import { createSplitter } from "./framing.ts";

export type PacketStream = {
	/** Next complete frame, or null once the peer is gone. Rejects on a corrupt length prefix. */
	readonly read: () => Promise<Buffer | null>;
	/** Write one already-framed packet; resolves once handed to the OS. */
	readonly write: (frame: Buffer) => Promise<void>;
	/** Flush pending writes, send FIN, then destroy the socket. */
	readonly close: () => void;
	/** Peer address as reported by the socket ("" when unknown). */
	readonly remoteAddress: string;
};

const HIGH_WATER_FRAMES = 64;

/** Upper bound on waiting for buffered writes to drain before a hard close. */
export const CLOSE_GRACE_MS = 2_000;

/** Wrap a connected (or connecting) socket as a PacketStream. */
export const createSocketStream = (socket: Socket): PacketStream => {
	const splitter = createSplitter();
	const frames: Buffer[] = [];
	let waiting: {
		resolve: (frame: Buffer | null) => void;
		reject: (err: Error) => void;
	} | null = null;
	let ended = false;
	let corrupt: Error | null = null;

	const settle = () => {
		if (!waiting) return;
		const { resolve, reject } = waiting;
		const next = frames.shift();
		if (next) {
			waiting = null;
			resolve(next);
		} else if (corrupt) {
			waiting = null;
			reject(corrupt);
		} else if (ended) {
			waiting = null;
			resolve(null);
		}
	};

	socket.on("data", (chunk: Buffer) => {
		try {
			frames.push(...splitter.write(chunk));
		} catch (err) {
			corrupt = err instanceof Error ? err : new Error(String(err));
			socket.destroy();
		}
		if (frames.length >= HIGH_WATER_FRAMES) socket.pause();
		settle();
	});

	const finish = () => {
		ended = true;
		settle();
	};
	socket.on("end", finish);
	socket.on("close", finish);
	// Surfaced as end-of-stream; the caller only needs to stop reading.
	socket.on("error", finish);

	return {
		remoteAddress: socket.remoteAddress ?? "",

		read: () =>
			new Promise<Buffer | null>((resolve, reject) => {
				if (waiting) {
					reject(new Error("Concurrent read on packet stream"));
					return;
				}
				waiting = { resolve, reject };
				if (socket.isPaused() && frames.length < HIGH_WATER_FRAMES) {
					socket.resume();
				}
				settle();
			}),

		write: (frame: Buffer) =>
			new Promise<void>((resolve, reject) => {
				if (socket.destroyed || !socket.writable) {
					reject(new Error("Socket is not writable"));
					return;
				}
				socket.write(frame, (err) => (err ? reject(err) : resolve()));
			}),

		close: () => {
			if (socket.destroyed) return;
			const grace = setTimeout(() => socket.destroy(), CLOSE_GRACE_MS);
			grace.unref();
			socket.once("close", () => clearTimeout(grace));
			socket.end(() => socket.destroy());
		},
	};
};
