/**
 * RFC 2782 target selection: lowest priority wins, weight decides among equals.
 */

export type SrvRecord = {
	readonly name: string;
	readonly port: number;
	readonly priority: number;
	readonly weight: number;
};

/** Uniform source in [0, 1), swappable for tests. */
export type RandomSource = () => number;

/** Integer in [0, bound). */
const randomBelow = (bound: number, random: RandomSource): number =>
	Math.min(bound - 1, Math.floor(random() * bound));

/**
 * Pick one record. Re-randomized on every call: among the records sharing the
 * minimum priority, a zero total weight means a uniform draw, otherwise a
 * draw in [0, total) walks the candidates by cumulative weight.
 */
export const pickSrvRecord = <T extends SrvRecord>(
	records: readonly T[],
	random: RandomSource = Math.random,
): T | null => {
	if (records.length === 0) return null;

	let minPriority = Number.POSITIVE_INFINITY;
	for (const r of records) minPriority = Math.min(minPriority, r.priority);
	const candidates = records.filter((r) => r.priority === minPriority);

	const totalWeight = candidates.reduce((sum, r) => sum + r.weight, 0);
	if (totalWeight === 0) {
		return candidates[randomBelow(candidates.length, random)] ?? null;
	}

	let pick = randomBelow(totalWeight, random);
	for (const r of candidates) {
		if (pick < r.weight) return r;
		pick -= r.weight;
	}
	return null;
};

/** `_service._proto.host`, with any leading underscores on the labels normalized to one. */
export const srvQueryName = (
	service: string,
	protocol: string,
	host: string,
): string =>
	`_${service.replace(/^_+/, "")}._${protocol.replace(/^_+/, "")}.${host}`;
