import type {
	Block,
	CanonicalRecord,
	LimitEvent,
	ModelFamily,
	PlanTier,
	QuotaLabel,
	QuotaResult,
	SessionLimitEstimate,
} from './types.js';
import type { PricingTable } from './pricing.js';
import type { ResetBoundaries, WeeklyResetPolicy } from './periods.js';
import type { SessionLimitOptions } from './blocks.js';
import { activeBlock, estimateSessionLimit } from './blocks.js';
import { costSince, resetBoundaries, sumSince } from './periods.js';

export const PLAN_OUTPUT_LIMITS: Readonly<Record<PlanTier, number>> = {
	pro: 19_000,
	max5: 88_000,
	max20: 220_000,
};

export type SessionLimitPolicy = 'plan' | 'p90' | number;

export type QuotaLimits = {
	plan: PlanTier;
	sessionLimit: SessionLimitPolicy;
	weeklyOutputLimit: number;
	weeklyFilteredLimit: number;
	weeklyFilteredFamily: ModelFamily;
	monthlyCostLimit: number;
	p90: Omit<SessionLimitOptions, 'planLimit'>;
};

export type QuotaInput = {
	now: Date;
	/** Deduplicated records of the whole history. */
	records: readonly CanonicalRecord[];
	blocks: readonly Block[];
	/** Deduplicated records of the current session's transcript, when known. */
	sessionRecords?: readonly CanonicalRecord[] | null;
	limitEvents?: readonly LimitEvent[];
	limits: QuotaLimits;
	pricing: PricingTable;
	weeklyReset?: WeeklyResetPolicy;
	/** Precomputed reset instants; derived from `now` when omitted. */
	boundaries?: ResetBoundaries;
};

export type QuotaReport = {
	session: QuotaResult;
	weeklyAll: QuotaResult;
	weeklyFiltered: QuotaResult;
	cost: QuotaResult;
	sessionLimit: SessionLimitEstimate | null;
	activeBlock: Block | null;
	boundaries: ResetBoundaries;
};

export function quotaRatio(used: number, limit: number): number {
	if (!Number.isFinite(limit) || limit <= 0 || !Number.isFinite(used)) {
		return 0;
	}
	return Math.max(0, used / limit);
}

export function createQuotaResult(
	label: QuotaLabel,
	used: number,
	limit: number,
	resetsAt: Date | null = null,
): QuotaResult {
	return { label, used, limit, ratio: quotaRatio(used, limit), resetsAt };
}

function resolveSessionLimit(
	blocks: readonly Block[],
	limits: QuotaLimits,
): { limit: number; estimate: SessionLimitEstimate | null } {
	const planLimit = PLAN_OUTPUT_LIMITS[limits.plan];
	if (typeof limits.sessionLimit === 'number') {
		return { limit: limits.sessionLimit, estimate: null };
	}
	if (limits.sessionLimit === 'plan') {
		return { limit: planLimit, estimate: null };
	}
	const estimate = estimateSessionLimit(blocks, { ...limits.p90, planLimit });
	return { limit: estimate.limit, estimate };
}

function sessionResetTime(block: Block | null, events: readonly LimitEvent[]): Date | null {
	if (block == null) {
		return null;
	}
	for (const event of events) {
		if (event.resetsAt != null && event.timestamp >= block.start && event.timestamp <= block.end) {
			return event.resetsAt;
		}
	}
	return block.end;
}

function sessionOutput(input: QuotaInput, block: Block | null): number {
	if (input.sessionRecords != null) {
		const since = block?.start ?? new Date(0);
		return sumSince(input.sessionRecords, since, 'output');
	}
	return block?.tokens.output ?? 0;
}

/**
 * Derives the four quota figures. Ratios above 1 are over quota and are
 * reported as-is.
 */
export function assembleQuotas(input: QuotaInput): QuotaReport {
	const boundaries = input.boundaries ?? resetBoundaries(input.now, input.weeklyReset);
	const { limits } = input;
	const block = activeBlock(input.blocks);

	const sessionLimit = resolveSessionLimit(input.blocks, limits);
	const session = createQuotaResult(
		'session',
		sessionOutput(input, block),
		sessionLimit.limit,
		sessionResetTime(block, input.limitEvents ?? []),
	);

	const weeklyAll = createQuotaResult(
		'weekly-all',
		sumSince(input.records, boundaries.weekly, 'output'),
		limits.weeklyOutputLimit,
		boundaries.nextWeekly,
	);

	const weeklyFiltered = createQuotaResult(
		'weekly-filtered',
		sumSince(input.records, boundaries.weekly, 'output', limits.weeklyFilteredFamily),
		limits.weeklyFilteredLimit,
		boundaries.nextWeekly,
	);

	const cost = createQuotaResult(
		'cost',
		costSince(input.records, boundaries.monthly, input.pricing),
		limits.monthlyCostLimit,
		boundaries.nextMonthly,
	);

	return {
		session,
		weeklyAll,
		weeklyFiltered,
		cost,
		sessionLimit: sessionLimit.estimate,
		activeBlock: block,
		boundaries,
	};
}
