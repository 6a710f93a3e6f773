/**
 * String key-value stores for geolocation results.
 */

import { promises as fs } from "node:fs";
import { dirname } from "node:path";

export type KeyValueStore = {
	readonly get: (key: string) => Promise<string | undefined>;
	readonly put: (key: string, value: string) => Promise<void>;
};

export const createMemoryStore = (
	initial: Iterable<readonly [string, string]> = [],
): KeyValueStore => {
	const entries = new Map<string, string>(initial);
	return {
		get: async (key) => entries.get(key),
		put: async (key, value) => {
			entries.set(key, value);
		},
	};
};

const isMissingFile = (err: unknown): boolean =>
	err instanceof Error && "code" in err && err.code === "ENOENT";

/**
 * JSON-file store: the whole map lives in memory and is rewritten on every
 * put. Writes are chained so two puts never interleave on disk; each write
 * goes to a temp file first and is renamed into place.
 */
export const createFileStore = (path: string): KeyValueStore => {
	let loaded: Promise<Map<string, string>> | null = null;
	let writing: Promise<void> = Promise.resolve();

	const load = (): Promise<Map<string, string>> => {
		if (!loaded) {
			loaded = fs.readFile(path, "utf8").then(
				(text) => {
					const parsed: unknown = JSON.parse(text);
					const entries = new Map<string, string>();
					if (typeof parsed === "object" && parsed !== null) {
						for (const [k, v] of Object.entries(parsed)) {
							if (typeof v === "string") entries.set(k, v);
						}
					}
					return entries;
				},
				(err: unknown) => {
					if (isMissingFile(err)) return new Map<string, string>();
					throw err;
				},
			);
		}
		return loaded;
	};

	const flush = async (entries: Map<string, string>) => {
		await fs.mkdir(dirname(path), { recursive: true });
		const tmp = `${path}.tmp`;
		await fs.writeFile(tmp, JSON.stringify(Object.fromEntries(entries)));
		await fs.rename(tmp, path);
	};

	return {
		get: async (key) => (await load()).get(key),
		put: async (key, value) => {
			const entries = await load();
			entries.set(key, value);
			const write = writing.then(() => flush(entries));
			// Keep the chain alive after a failed write; this caller still sees the error.
			writing = write.catch(() => undefined);
			await write;
		},
	};
};
