import type { ModelFamily, ObservedTokens, TokenCategory } from './types.js';
import { TOKEN_CATEGORIES } from './types.js';

/** USD per million tokens. */
export type PricingEntry = Readonly<Record<TokenCategory, number>>;

export type PricingTable = {
	readonly entries: Readonly<Partial<Record<ModelFamily, PricingEntry>>>;
	readonly defaultFamily: ModelFamily;
	/** Price every model at the default family's rates. */
	readonly flat: boolean;
};

export type PricedRecord = {
	readonly model: string | null;
	readonly tokens: ObservedTokens;
	readonly costUSD: number | null;
};

const TOKENS_PER_MILLION = 1_000_000;

// Cache reads are not billed against the extra-usage cap.
export const DEFAULT_PRICING_ENTRIES = {
	opus: { input: 5, output: 25, cacheWrite: 6.25, cacheRead: 0 },
	sonnet: { input: 3, output: 15, cacheWrite: 3.75, cacheRead: 0 },
	haiku: { input: 1, output: 5, cacheWrite: 1.25, cacheRead: 0 },
} as const satisfies Partial<Record<ModelFamily, PricingEntry>>;

const FALLBACK_ENTRY: PricingEntry = DEFAULT_PRICING_ENTRIES.sonnet;

export function createPricingTable(options: {
	defaultFamily?: ModelFamily;
	flat?: boolean;
	entries?: Partial<Record<ModelFamily, PricingEntry>>;
} = {}): PricingTable {
	return Object.freeze({
		entries: Object.freeze({ ...(options.entries ?? DEFAULT_PRICING_ENTRIES) }),
		defaultFamily: options.defaultFamily ?? 'sonnet',
		flat: options.flat ?? true,
	});
}

export function modelFamily(model: string | null): ModelFamily {
	if (model == null) {
		return 'other';
	}
	const lower = model.toLowerCase();
	if (lower.includes('opus')) {
		return 'opus';
	}
	if (lower.includes('sonnet')) {
		return 'sonnet';
	}
	if (lower.includes('haiku')) {
		return 'haiku';
	}
	return 'other';
}

export function rateFor(table: PricingTable, model: string | null): PricingEntry {
	const fallback = table.entries[table.defaultFamily] ?? FALLBACK_ENTRY;
	if (table.flat) {
		return fallback;
	}
	return table.entries[modelFamily(model)] ?? fallback;
}

export function estimateCost(table: PricingTable, record: Pick<PricedRecord, 'model' | 'tokens'>): number {
	const rate = rateFor(table, record.model);
	let total = 0;
	for (const category of TOKEN_CATEGORIES) {
		total += ((record.tokens[category] ?? 0) / TOKENS_PER_MILLION) * rate[category];
	}
	return total;
}

/** Cost carried by the log line when present, otherwise the table estimate. */
export function recordCost(table: PricingTable, record: PricedRecord): number {
	if (record.costUSD != null && Number.isFinite(record.costUSD)) {
		return record.costUSD;
	}
	return estimateCost(table, record);
}
