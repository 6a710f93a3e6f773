import { describe, expect, it, vi } from "vitest";
import {
	createSequence,
	mapConcurrent,
	TimeoutError,
	withTimeout,
} from "../src/util/async.ts";

describe("withTimeout", () => {
	it("resolves with the promise's value", async () => {
		expect(await withTimeout(Promise.resolve(7), 50)).toBe(7);
	});

	it("rejects with TimeoutError when too slow", async () => {
		const err = await withTimeout(new Promise(() => {}), 10, "Probe").catch(
			(e: unknown) => e,
		);
		expect(err).toBeInstanceOf(TimeoutError);
		expect(err).toMatchObject({ message: "Probe timed out after 10ms" });
	});

	it("passes the promise's own rejection through", async () => {
		const failure = new Error("refused");
		await expect(withTimeout(Promise.reject(failure), 50)).rejects.toBe(failure);
	});

	it("clears its timer", async () => {
		vi.useFakeTimers();
		try {
			await withTimeout(Promise.resolve(1), 1000);
			expect(vi.getTimerCount()).toBe(0);
		} finally {
			vi.useRealTimers();
		}
	});
});

describe("mapConcurrent", () => {
	it("keeps input order regardless of completion order", async () => {
		const result = await mapConcurrent([30, 10, 20], 3, async (ms, i) => {
			await new Promise((resolve) => setTimeout(resolve, ms));
			return i;
		});
		expect(result).toEqual([0, 1, 2]);
	});

	it("handles an empty list", async () => {
		expect(await mapConcurrent([], 4, async () => 1)).toEqual([]);
	});
});

describe("createSequence", () => {
	it("counts up from its start", () => {
		const seq = createSequence(5);
		expect([seq.next(), seq.next(), seq.next()]).toEqual([5, 6, 7]);
	});
});
