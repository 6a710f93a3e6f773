import { describe, expect, it, vi } from "vitest";
import { createBackendServer } from "../src/backend/server.ts";
import type { ServerSelector } from "../src/selector/index.ts";
import {
	createStatusCache,
	renderStatus,
	STATUS_REFRESH_INTERVAL,
} from "../src/status/index.ts";

/** Selector whose player count is scripted call by call. */
const countingSelector = (...counts: (number | Error)[]) => {
	const queue = [...counts];
	const getPlayerCount = vi.fn(async () => {
		const next = queue.shift() ?? 0;
		if (next instanceof Error) throw next;
		return next;
	});
	const selector: ServerSelector = {
		name: "test",
		findServer: async () => createBackendServer({ address: "unused.example.com" }),
		getPlayerCount,
	};
	return { selector, getPlayerCount };
};

/** Clock the test moves by hand. */
const manualClock = (start = 1_000_000) => {
	let now = start;
	return { now: () => now, advance: (ms: number) => (now += ms) };
};

describe("renderStatus", () => {
	it("renders the fixed status document", () => {
		expect(JSON.parse(renderStatus("Hello", 769, 12))).toEqual({
			version: { name: "Handoff", protocol: 769 },
			players: { max: 1000, online: 12, sample: [] },
			description: "Hello",
			enforceSecureChat: false,
		});
	});

	it("has no favicon", () => {
		expect(renderStatus("m", 766, 0)).toBe(
			'{"version":{"name":"Handoff","protocol":766},"players":{"max":1000,"online":0,"sample":[]},"description":"m","enforceSecureChat":false}',
		);
	});
});

describe("status cache", () => {
	it("refreshes on first use", async () => {
		const { selector, getPlayerCount } = countingSelector(5);
		const cache = createStatusCache(selector, { now: manualClock().now });

		const status = JSON.parse(await cache.getStatus("motd", 769));
		expect(status.players.online).toBe(5);
		expect(getPlayerCount).toHaveBeenCalledTimes(1);
	});

	it("returns identical payloads within the interval with one query", async () => {
		const { selector, getPlayerCount } = countingSelector(5, 9);
		const clock = manualClock();
		const cache = createStatusCache(selector, { now: clock.now });

		const first = await cache.getStatus("motd", 769);
		clock.advance(STATUS_REFRESH_INTERVAL - 1);
		const second = await cache.getStatus("motd", 769);

		expect(second).toBe(first);
		expect(getPlayerCount).toHaveBeenCalledTimes(1);
	});

	it("refreshes once the interval has passed", async () => {
		const { selector, getPlayerCount } = countingSelector(5, 9);
		const clock = manualClock();
		const cache = createStatusCache(selector, { now: clock.now });

		await cache.getStatus("motd", 769);
		clock.advance(STATUS_REFRESH_INTERVAL);
		const status = JSON.parse(await cache.getStatus("motd", 769));

		expect(status.players.online).toBe(9);
		expect(getPlayerCount).toHaveBeenCalledTimes(2);
	});

	it("shares one refresh between concurrent callers", async () => {
		let release: (count: number) => void = () => {};
		const getPlayerCount = vi.fn(
			() =>
				new Promise<number>((resolve) => {
					release = resolve;
				}),
		);
		const selector: ServerSelector = {
			name: "slow",
			findServer: async () => createBackendServer({ address: "unused.example.com" }),
			getPlayerCount,
		};
		const cache = createStatusCache(selector, { now: manualClock().now });

		const pending = Array.from({ length: 5 }, () => cache.getStatus("motd", 769));
		release(21);
		const results = await Promise.all(pending);

		expect(getPlayerCount).toHaveBeenCalledTimes(1);
		for (const r of results) expect(JSON.parse(r).players.online).toBe(21);
	});

	it("keeps separate entries per motd and protocol", async () => {
		const { selector, getPlayerCount } = countingSelector(3);
		const cache = createStatusCache(selector, { now: manualClock().now });

		const a = JSON.parse(await cache.getStatus("first", 766));
		const b = JSON.parse(await cache.getStatus("second", 769));

		expect(a.description).toBe("first");
		expect(a.version.protocol).toBe(766);
		expect(b.description).toBe("second");
		expect(b.version.protocol).toBe(769);
		expect(cache.size()).toBe(2);
		expect(getPlayerCount).toHaveBeenCalledTimes(1);
	});

	it("adds an entry when the count changes and keeps the old one", async () => {
		const { selector } = countingSelector(1, 2, 1);
		const clock = manualClock();
		const cache = createStatusCache(selector, { now: clock.now });

		const first = await cache.getStatus("motd", 769);
		clock.advance(STATUS_REFRESH_INTERVAL);
		await cache.getStatus("motd", 769);
		clock.advance(STATUS_REFRESH_INTERVAL);
		const third = await cache.getStatus("motd", 769);

		expect(cache.size()).toBe(2);
		expect(third).toBe(first);
	});

	it("keeps the last count when a refresh fails", async () => {
		const { selector, getPlayerCount } = countingSelector(
			8,
			new Error("probe fan-out failed"),
		);
		const clock = manualClock();
		const cache = createStatusCache(selector, { now: clock.now });

		await cache.getStatus("motd", 769);
		clock.advance(STATUS_REFRESH_INTERVAL);
		const status = JSON.parse(await cache.getStatus("motd", 769));

		expect(status.players.online).toBe(8);
		expect(cache.playerCount()).toBe(8);
		expect(getPlayerCount).toHaveBeenCalledTimes(2);
	});

	it("honours a custom interval", async () => {
		const { selector, getPlayerCount } = countingSelector(1, 2);
		const clock = manualClock();
		const cache = createStatusCache(selector, { now: clock.now, refreshInterval: 100 });

		await cache.getStatus("motd", 769);
		clock.advance(100);
		await cache.getStatus("motd", 769);
		expect(getPlayerCount).toHaveBeenCalledTimes(2);
	});
});
