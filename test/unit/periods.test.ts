import { describe, it, expect } from 'vitest';
import {
	costSince,
	lastWeeklyReset,
	monthStart,
	nextMonthStart,
	nextWeeklyReset,
	resetBoundaries,
	sumSince,
} from '../../src/periods.js';
import { createPricingTable } from '../../src/pricing.js';
import { makeRecord } from '../helpers/fixtures.js';

// 2026-10-12 is a Monday. Dates are built in local time; the suite runs in UTC.
const local = (month: number, day: number, hour = 0, minute = 0) => new Date(2026, month - 1, day, hour, minute);

describe('weekly reset', () => {
	it('uses this week’s reset once it has passed', () => {
		const now = local(10, 12, 10);
		expect(lastWeeklyReset(now)).toEqual(local(10, 12, 4));
		expect(nextWeeklyReset(now)).toEqual(local(10, 19, 4));
	});

	it('uses last week’s reset on the reset day before the reset hour', () => {
		const now = local(10, 12, 3, 59);
		expect(lastWeeklyReset(now)).toEqual(local(10, 5, 4));
		expect(nextWeeklyReset(now)).toEqual(local(10, 12, 4));
	});

	it('treats the reset instant itself as the start of the new week', () => {
		expect(lastWeeklyReset(local(10, 12, 4))).toEqual(local(10, 12, 4));
	});

	it('walks back across the weekend', () => {
		expect(lastWeeklyReset(local(10, 17, 23))).toEqual(local(10, 12, 4));
		expect(lastWeeklyReset(local(10, 18, 12))).toEqual(local(10, 12, 4));
	});

	it('honours a custom reset weekday and hour', () => {
		const policy = { weekday: 0, hour: 0 };
		expect(lastWeeklyReset(local(10, 14, 9), policy)).toEqual(local(10, 11, 0));
		expect(nextWeeklyReset(local(10, 14, 9), policy)).toEqual(local(10, 18, 0));
	});
});

describe('month boundaries', () => {
	it('starts at midnight on the first', () => {
		expect(monthStart(local(10, 12, 10))).toEqual(local(10, 1));
		expect(nextMonthStart(local(10, 12, 10))).toEqual(local(11, 1));
	});

	it('rolls over the year', () => {
		expect(nextMonthStart(local(12, 15))).toEqual(new Date(2027, 0, 1));
	});

	it('collects every boundary for one instant', () => {
		expect(resetBoundaries(local(10, 12, 10))).toEqual({
			weekly: local(10, 12, 4),
			nextWeekly: local(10, 19, 4),
			monthly: local(10, 1),
			nextMonthly: local(11, 1),
		});
	});
});

describe('sumSince', () => {
	const boundary = local(10, 12, 4);
	const records = [
		makeRecord({ timestamp: local(10, 12, 3, 59), tokens: { output: 1000 } }),
		makeRecord({ timestamp: local(10, 12, 4), tokens: { output: 40 } }),
		makeRecord({ timestamp: local(10, 13, 9), tokens: { output: 60 }, model: 'claude-opus-4-1' }),
		makeRecord({ timestamp: local(10, 13, 10), tokens: { input: 7 } }),
	];

	it('counts records at or after the boundary', () => {
		expect(sumSince(records, boundary, 'output')).toBe(100);
		expect(sumSince(records, boundary, 'input')).toBe(7);
	});

	it('filters by model family', () => {
		expect(sumSince(records, boundary, 'output', 'sonnet')).toBe(40);
		expect(sumSince(records, boundary, 'output', 'opus')).toBe(60);
		expect(sumSince(records, boundary, 'output', 'haiku')).toBe(0);
	});
});

describe('costSince', () => {
	it('adds logged costs and estimates the rest', () => {
		const pricing = createPricingTable();
		const records = [
			makeRecord({ timestamp: local(9, 30, 12), tokens: { output: 5 }, costUSD: 0.25 }),
			makeRecord({ timestamp: local(10, 2), tokens: { output: 5 }, costUSD: 1.5 }),
			makeRecord({ timestamp: local(10, 3), tokens: { output: 1_000_000 } }),
		];
		expect(costSince(records, local(10, 1), pricing)).toBe(16.5);
	});
});
