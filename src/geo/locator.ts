/**
 * IP geolocation via the ipinfo lite API, memoized in a KeyValueStore.
 * A hit never touches the network; a miss makes one request and persists the
 * answer before returning it. Entries never expire.
 */

import { z } from "zod";
import type { KeyValueStore } from "./store.ts";

export const GeoRecord = z.object({
	ip: z.string(),
	asn: z.string().optional(),
	as_name: z.string().optional(),
	as_domain: z.string().optional(),
	country_code: z.string(),
	country: z.string(),
	continent_code: z.string(),
	continent: z.string(),
});

export type GeoRecord = z.infer<typeof GeoRecord>;

export type GeoLocator = {
	readonly locate: (ip: string) => Promise<GeoRecord>;
};

export const IPINFO_LITE_URL = "https://api.ipinfo.io/lite";

export type GeoLocatorOptions = {
	readonly token: string;
	readonly store: KeyValueStore;
	readonly baseUrl?: string;
	readonly fetch?: typeof fetch;
};

/** Strip the IPv4-mapped prefix dual-stack sockets report ("::ffff:1.2.3.4"). */
export const normalizeClientIp = (ip: string): string =>
	/^::ffff:\d+\.\d+\.\d+\.\d+$/i.test(ip) ? ip.slice(7) : ip;

const parseCached = (text: string): GeoRecord | null => {
	try {
		const result = GeoRecord.safeParse(JSON.parse(text));
		return result.success ? result.data : null;
	} catch {
		// Unparsable entry: treated as a miss and overwritten.
		return null;
	}
};

export const createGeoLocator = (options: GeoLocatorOptions): GeoLocator => {
	const baseUrl = options.baseUrl ?? IPINFO_LITE_URL;
	const doFetch = options.fetch ?? fetch;
	const inflight = new Map<string, Promise<GeoRecord>>();

	const request = async (ip: string): Promise<GeoRecord> => {
		const url = `${baseUrl}/${encodeURIComponent(ip)}?token=${encodeURIComponent(options.token)}`;
		const response = await doFetch(url, {
			headers: { Accept: "application/json" },
		});
		if (!response.ok) {
			throw new Error(`Geolocation lookup for ${ip} failed (${response.status})`);
		}
		const record = GeoRecord.parse(await response.json());
		await options.store.put(ip, JSON.stringify(record));
		return record;
	};

	return {
		locate: async (rawIp) => {
			const ip = normalizeClientIp(rawIp);
			const cachedText = await options.store.get(ip);
			const cached = cachedText === undefined ? null : parseCached(cachedText);
			if (cached) return cached;

			const pending = inflight.get(ip);
			if (pending) return pending;
			const lookup = request(ip).finally(() => inflight.delete(ip));
			inflight.set(ip, lookup);
			return lookup;
		},
	};
};
