export type TokenCategory = 'input' | 'output' | 'cacheWrite' | 'cacheRead';

export const TOKEN_CATEGORIES = ['input', 'output', 'cacheWrite', 'cacheRead'] as const satisfies readonly TokenCategory[];

/**
 * Token counts as seen on one log line. A category is present only when the
 * line carried it; a missing key means "no information", not zero.
 */
export type ObservedTokens = Readonly<Partial<Record<TokenCategory, number>>>;

export type TokenTotals = Record<TokenCategory, number>;

export type ModelFamily = 'opus' | 'sonnet' | 'haiku' | 'other';

export type UsageRecord = {
	readonly timestamp: Date;
	readonly logicalId: string;
	readonly messageId: string | null;
	readonly requestId: string | null;
	readonly model: string | null;
	readonly tokens: ObservedTokens;
	readonly costUSD: number | null;
	readonly source: string;
	readonly line: number;
};

export type CanonicalRecord = UsageRecord & {
	readonly observations: number;
};

export type LimitEvent = {
	readonly kind: 'system' | 'tool-result';
	readonly timestamp: Date;
	readonly resetsAt: Date | null;
	readonly text: string;
};

export type FamilyTotals = TokenTotals & {
	costUSD: number;
	records: number;
};

export type Block = {
	readonly id: string;
	readonly start: Date;
	readonly end: Date;
	readonly actualEnd: Date | null;
	readonly records: readonly CanonicalRecord[];
	readonly isActive: boolean;
	readonly isGap: boolean;
	readonly tokens: Readonly<TokenTotals>;
	readonly perFamily: Readonly<Partial<Record<ModelFamily, Readonly<FamilyTotals>>>>;
	readonly models: readonly string[];
	readonly costUSD: number;
};

export type QuotaLabel = 'session' | 'weekly-all' | 'weekly-filtered' | 'cost';

export type QuotaResult = {
	readonly label: QuotaLabel;
	readonly used: number;
	readonly limit: number;
	readonly ratio: number;
	readonly resetsAt: Date | null;
};

export type PlanTier = 'pro' | 'max5' | 'max20';

export type LimitSource = 'limit-hits' | 'completed' | 'minimum' | 'plan';

export type SessionLimitEstimate = {
	limit: number;
	source: LimitSource;
	sampleSize: number;
};
