import { describe, it, expect } from 'vitest';
import { buildBlocks } from '../../src/blocks.js';
import { createPricingTable } from '../../src/pricing.js';
import { assembleQuotas, createQuotaResult, PLAN_OUTPUT_LIMITS, quotaRatio } from '../../src/quota.js';
import type { QuotaInput, QuotaLimits } from '../../src/quota.js';
import type { LimitEvent } from '../../src/types.js';
import { makeRecord } from '../helpers/fixtures.js';

const pricing = createPricingTable();

const limits: QuotaLimits = {
	plan: 'max5',
	sessionLimit: 'plan',
	weeklyOutputLimit: 300,
	weeklyFilteredLimit: 200,
	weeklyFilteredFamily: 'sonnet',
	monthlyCostLimit: 50,
	p90: {
		minLimit: 19_000,
		minSessions: 5,
		hitThreshold: 0.95,
		commonLimits: [19_000, 88_000, 220_000, 880_000],
	},
};

const now = new Date('2026-10-12T11:00:00Z');

const records = [
	makeRecord({ timestamp: '2026-10-05T10:00:00Z', tokens: { output: 1000 } }),
	makeRecord({ timestamp: '2026-10-12T09:30:00Z', tokens: { output: 40 }, model: 'claude-opus-4-1' }),
	makeRecord({ timestamp: '2026-10-12T10:15:00Z', tokens: { output: 60 } }),
];

const blocks = buildBlocks(records, { now, pricing });

function input(overrides: Partial<QuotaInput> = {}): QuotaInput {
	return { now, records, blocks, limits, pricing, ...overrides };
}

function limitEvent(timestamp: string, resetsAt: string | null): LimitEvent {
	return {
		kind: 'system',
		timestamp: new Date(timestamp),
		resetsAt: resetsAt == null ? null : new Date(resetsAt),
		text: 'usage limit reached',
	};
}

describe('quotaRatio', () => {
	it('is zero when there is no usable limit', () => {
		expect(quotaRatio(10, 0)).toBe(0);
		expect(quotaRatio(10, -1)).toBe(0);
		expect(quotaRatio(10, Number.POSITIVE_INFINITY)).toBe(0);
	});

	it('reports over-quota usage above one', () => {
		expect(quotaRatio(150, 100)).toBe(1.5);
	});

	it('never goes negative', () => {
		expect(quotaRatio(-5, 100)).toBe(0);
	});
});

describe('createQuotaResult', () => {
	it('computes the ratio and defaults the reset to null', () => {
		expect(createQuotaResult('weekly-all', 75, 300)).toEqual({
			label: 'weekly-all',
			used: 75,
			limit: 300,
			ratio: 0.25,
			resetsAt: null,
		});
	});
});

describe('assembleQuotas', () => {
	it('reports zeros for an empty history', () => {
		const report = assembleQuotas(input({ records: [], blocks: [] }));
		expect(report.session).toEqual({ label: 'session', used: 0, limit: 88_000, ratio: 0, resetsAt: null });
		expect(report.weeklyAll).toEqual({
			label: 'weekly-all',
			used: 0,
			limit: 300,
			ratio: 0,
			resetsAt: new Date('2026-10-19T04:00:00Z'),
		});
		expect(report.weeklyFiltered.used).toBe(0);
		expect(report.cost).toEqual({
			label: 'cost',
			used: 0,
			limit: 50,
			ratio: 0,
			resetsAt: new Date('2026-11-01T00:00:00Z'),
		});
		expect(report.activeBlock).toBeNull();
		expect(report.sessionLimit).toBeNull();
	});

	it('takes session usage from the active window', () => {
		const report = assembleQuotas(input());
		expect(report.activeBlock?.id).toBe('2026-10-12T09:00:00.000Z');
		expect(report.session.used).toBe(100);
		expect(report.session.limit).toBe(PLAN_OUTPUT_LIMITS.max5);
		expect(report.session.resetsAt).toEqual(new Date('2026-10-12T14:00:00Z'));
	});

	it('counts weekly output since the last reset', () => {
		const report = assembleQuotas(input());
		expect(report.weeklyAll.used).toBe(100);
		expect(report.weeklyAll.ratio).toBeCloseTo(1 / 3, 10);
		expect(report.weeklyFiltered.used).toBe(60);
		expect(report.weeklyFiltered.ratio).toBe(0.3);
		expect(report.weeklyFiltered.resetsAt).toEqual(new Date('2026-10-19T04:00:00Z'));
	});

	it('prices the month so far', () => {
		const report = assembleQuotas(input());
		expect(report.cost.used).toBeCloseTo(0.0165, 10);
		expect(report.cost.limit).toBe(50);
	});

	it('keeps over-quota ratios', () => {
		const report = assembleQuotas(input({ limits: { ...limits, weeklyOutputLimit: 50 } }));
		expect(report.weeklyAll.ratio).toBe(2);
	});

	it('treats a zero limit as no quota', () => {
		const report = assembleQuotas(input({ limits: { ...limits, weeklyFilteredLimit: 0 } }));
		expect(report.weeklyFiltered.used).toBe(60);
		expect(report.weeklyFiltered.ratio).toBe(0);
	});

	it('uses a reset time announced inside the active window', () => {
		const report = assembleQuotas(
			input({
				limitEvents: [
					limitEvent('2026-10-05T11:00:00Z', '2026-10-05T15:00:00Z'),
					limitEvent('2026-10-12T10:20:00Z', null),
					limitEvent('2026-10-12T10:30:00Z', '2026-10-12T12:00:00Z'),
				],
			}),
		);
		expect(report.session.resetsAt).toEqual(new Date('2026-10-12T12:00:00Z'));
	});

	it('counts the session transcript from the start of the active window', () => {
		const sessionRecords = [
			makeRecord({ timestamp: '2026-10-12T08:00:00Z', tokens: { output: 999 } }),
			makeRecord({ timestamp: '2026-10-12T09:45:00Z', tokens: { output: 25 } }),
		];
		expect(assembleQuotas(input({ sessionRecords })).session.used).toBe(25);
	});

	it('honours a fixed session limit', () => {
		const report = assembleQuotas(input({ limits: { ...limits, sessionLimit: 5000 } }));
		expect(report.session.limit).toBe(5000);
		expect(report.session.ratio).toBe(0.02);
		expect(report.sessionLimit).toBeNull();
	});

	it('estimates the session limit from history when asked to', () => {
		const report = assembleQuotas(input({ limits: { ...limits, sessionLimit: 'p90' } }));
		expect(report.sessionLimit).toEqual({ limit: 88_000, source: 'plan', sampleSize: 1 });
		expect(report.session.limit).toBe(88_000);
	});
});
