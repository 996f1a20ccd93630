import type { CanonicalRecord, ModelFamily, TokenCategory } from './types.js';
import type { PricingTable } from './pricing.js';
import { modelFamily, recordCost } from './pricing.js';
import { tokenCount } from './reader.js';

export type WeeklyResetPolicy = {
	/** 0 = Sunday … 6 = Saturday, local time. */
	weekday: number;
	hour: number;
};

export const DEFAULT_WEEKLY_RESET: WeeklyResetPolicy = { weekday: 1, hour: 4 };

/** Most recent `weekday` at `hour:00` local time that is not after `now`. */
export function lastWeeklyReset(now: Date, policy: WeeklyResetPolicy = DEFAULT_WEEKLY_RESET): Date {
	const daysBack = (now.getDay() - policy.weekday + 7) % 7;
	const candidate = new Date(now.getFullYear(), now.getMonth(), now.getDate() - daysBack, policy.hour, 0, 0, 0);
	if (candidate > now) {
		candidate.setDate(candidate.getDate() - 7);
	}
	return candidate;
}

export function nextWeeklyReset(now: Date, policy: WeeklyResetPolicy = DEFAULT_WEEKLY_RESET): Date {
	const last = lastWeeklyReset(now, policy);
	return new Date(last.getFullYear(), last.getMonth(), last.getDate() + 7, policy.hour, 0, 0, 0);
}

export function monthStart(now: Date): Date {
	return new Date(now.getFullYear(), now.getMonth(), 1, 0, 0, 0, 0);
}

export function nextMonthStart(now: Date): Date {
	return new Date(now.getFullYear(), now.getMonth() + 1, 1, 0, 0, 0, 0);
}

export type ResetBoundaries = {
	weekly: Date;
	nextWeekly: Date;
	monthly: Date;
	nextMonthly: Date;
};

export function resetBoundaries(now: Date, policy: WeeklyResetPolicy = DEFAULT_WEEKLY_RESET): ResetBoundaries {
	return {
		weekly: lastWeeklyReset(now, policy),
		nextWeekly: nextWeeklyReset(now, policy),
		monthly: monthStart(now),
		nextMonthly: nextMonthStart(now),
	};
}

export function sumSince(
	records: readonly CanonicalRecord[],
	boundary: Date,
	category: TokenCategory,
	family?: ModelFamily,
): number {
	let total = 0;
	for (const record of records) {
		if (record.timestamp < boundary) {
			continue;
		}
		if (family != null && modelFamily(record.model) !== family) {
			continue;
		}
		total += tokenCount(record, category);
	}
	return total;
}

export function costSince(records: readonly CanonicalRecord[], boundary: Date, pricing: PricingTable): number {
	let total = 0;
	for (const record of records) {
		if (record.timestamp >= boundary) {
			total += recordCost(pricing, record);
		}
	}
	return total;
}
