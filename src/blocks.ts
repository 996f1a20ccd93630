import type {
	Block,
	CanonicalRecord,
	FamilyTotals,
	LimitSource,
	ModelFamily,
	SessionLimitEstimate,
	TokenTotals,
} from './types.js';
import { TOKEN_CATEGORIES } from './types.js';
import type { PricingTable } from './pricing.js';
import { modelFamily, recordCost } from './pricing.js';
import { compareChronologically } from './dedupe.js';
import { tokenCount } from './reader.js';
import { floorToUtcHour, MS_PER_HOUR, MS_PER_MINUTE } from './utils.js';

export const DEFAULT_BLOCK_HOURS = 5;

export type BlockOptions = {
	now: Date;
	pricing: PricingTable;
	durationMs?: number;
};

export type SessionLimitOptions = {
	/** Returned when no completed block has any output. */
	minLimit: number;
	/** Returned when there are too few completed blocks to trust a percentile. */
	planLimit: number;
	minSessions: number;
	hitThreshold: number;
	commonLimits: readonly number[];
	percentile?: number;
};

export type BurnRate = {
	outputTokensPerMinute: number;
	costPerHour: number;
	projectedOutputTokens: number;
	remainingMinutes: number;
};

function emptyTotals(): TokenTotals {
	return { input: 0, output: 0, cacheWrite: 0, cacheRead: 0 };
}

type OpenBlock = {
	start: Date;
	records: CanonicalRecord[];
};

function closeBlock(open: OpenBlock, durationMs: number, pricing: PricingTable): Block {
	const tokens = emptyTotals();
	const perFamily: Partial<Record<ModelFamily, FamilyTotals>> = {};
	const models: string[] = [];
	let costUSD = 0;

	for (const record of open.records) {
		const cost = recordCost(pricing, record);
		costUSD += cost;

		const family = modelFamily(record.model);
		const familyTotals = perFamily[family] ?? { ...emptyTotals(), costUSD: 0, records: 0 };
		for (const category of TOKEN_CATEGORIES) {
			const value = tokenCount(record, category);
			tokens[category] += value;
			familyTotals[category] += value;
		}
		familyTotals.costUSD += cost;
		familyTotals.records += 1;
		perFamily[family] = familyTotals;

		if (record.model != null && !models.includes(record.model)) {
			models.push(record.model);
		}
	}

	const last = open.records.at(-1);
	return {
		id: open.start.toISOString(),
		start: open.start,
		end: new Date(open.start.getTime() + durationMs),
		actualEnd: last?.timestamp ?? null,
		records: open.records,
		isActive: false,
		isGap: false,
		tokens,
		perFamily,
		models,
		costUSD,
	};
}

function gapBlock(from: Date, to: Date): Block {
	return {
		id: `gap-${from.toISOString()}`,
		start: from,
		end: to,
		actualEnd: null,
		records: [],
		isActive: false,
		isGap: true,
		tokens: emptyTotals(),
		perFamily: {},
		models: [],
		costUSD: 0,
	};
}

/**
 * Groups records into fixed-duration windows starting at the UTC hour of
 * their first record. Window starts are hour-aligned rather than anchored at
 * the first message, so they can run up to an hour ahead of the host's own
 * window. Idle stretches of at least one duration become gap blocks.
 */
export function buildBlocks(records: readonly CanonicalRecord[], options: BlockOptions): Block[] {
	const durationMs = options.durationMs ?? DEFAULT_BLOCK_HOURS * MS_PER_HOUR;
	const sorted = [...records].sort(compareChronologically);
	const blocks: Block[] = [];
	let current: OpenBlock | null = null;

	for (const record of sorted) {
		const time = record.timestamp.getTime();
		if (current != null && time < current.start.getTime() + durationMs) {
			current.records.push(record);
			continue;
		}

		if (current != null) {
			const closed = closeBlock(current, durationMs, options.pricing);
			blocks.push(closed);
			if (closed.actualEnd != null && time - closed.actualEnd.getTime() >= durationMs) {
				blocks.push(gapBlock(closed.actualEnd, record.timestamp));
			}
		}
		current = { start: floorToUtcHour(record.timestamp), records: [record] };
	}

	if (current != null) {
		blocks.push(closeBlock(current, durationMs, options.pricing));
	}

	return markActive(blocks, options.now);
}

function markActive(blocks: Block[], now: Date): Block[] {
	for (let index = blocks.length - 1; index >= 0; index -= 1) {
		const block = blocks[index];
		if (block == null || block.isGap) {
			continue;
		}
		if (now >= block.start && now < block.end) {
			blocks[index] = { ...block, isActive: true };
		}
		// Only the latest real block can be active.
		break;
	}
	return blocks;
}

export function activeBlock(blocks: readonly Block[]): Block | null {
	return blocks.find((block) => block.isActive) ?? null;
}

export function completedBlocks(blocks: readonly Block[]): Block[] {
	return blocks.filter((block) => !block.isGap && !block.isActive);
}

/**
 * Percentile by linear interpolation between the closest ranks, at rank
 * `p * (n - 1)` of the sorted values.
 */
export function percentile(values: readonly number[], p: number): number | null {
	if (values.length === 0) {
		return null;
	}
	const sorted = [...values].sort((a, b) => a - b);
	const rank = p * (sorted.length - 1);
	const lowerIndex = Math.floor(rank);
	const upperIndex = Math.min(lowerIndex + 1, sorted.length - 1);
	const lower = sorted[lowerIndex];
	const upper = sorted[upperIndex];
	if (lower == null || upper == null) {
		return null;
	}
	return lower + (rank - lowerIndex) * (upper - lower);
}

function hitsKnownLimit(output: number, options: SessionLimitOptions): boolean {
	return options.commonLimits.some((limit) => output >= limit * options.hitThreshold);
}

function estimate(limit: number, source: LimitSource, sampleSize: number): SessionLimitEstimate {
	return { limit, source, sampleSize };
}

/**
 * Output-token limit for a window when none is configured, from the P90 of
 * completed windows. Windows that ran into a known plan limit are preferred
 * over all completed windows.
 */
export function estimateSessionLimit(
	blocks: readonly Block[],
	options: SessionLimitOptions,
): SessionLimitEstimate {
	const p = options.percentile ?? 0.9;
	const outputs = completedBlocks(blocks)
		.map((block) => block.tokens.output)
		.filter((output) => output > 0);

	if (outputs.length === 0) {
		return estimate(options.minLimit, 'minimum', 0);
	}
	if (outputs.length < options.minSessions) {
		return estimate(options.planLimit, 'plan', outputs.length);
	}

	const hits = outputs.filter((output) => hitsKnownLimit(output, options));
	const [values, source]: [number[], LimitSource] = hits.length > 0 ? [hits, 'limit-hits'] : [outputs, 'completed'];
	const value = percentile(values, p);
	if (value == null) {
		return estimate(options.planLimit, 'plan', values.length);
	}
	return estimate(Math.max(Math.trunc(value), options.minLimit), source, values.length);
}

export function blockBurnRate(block: Block, now: Date): BurnRate | null {
	const first = block.records[0];
	const last = block.records.at(-1);
	if (block.isGap || first == null || last == null) {
		return null;
	}
	const elapsedMinutes = (last.timestamp.getTime() - first.timestamp.getTime()) / MS_PER_MINUTE;
	if (elapsedMinutes <= 0) {
		return null;
	}

	const outputTokensPerMinute = block.tokens.output / elapsedMinutes;
	const costPerHour = (block.costUSD / elapsedMinutes) * 60;
	const remainingMinutes = Math.max(0, (block.end.getTime() - now.getTime()) / MS_PER_MINUTE);
	return {
		outputTokensPerMinute,
		costPerHour,
		projectedOutputTokens: Math.round(block.tokens.output + outputTokensPerMinute * remainingMinutes),
		remainingMinutes: Math.round(remainingMinutes),
	};
}
