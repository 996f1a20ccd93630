import type { QuotaConfig } from './config.js';
import type { Logger } from './logger.js';
import type { PricingTable } from './pricing.js';
import type { QuotaLimits, QuotaReport } from './quota.js';
import type { ReadText, UsageScan } from './reader.js';
import type { Block, CanonicalRecord } from './types.js';
import { buildBlocks } from './blocks.js';
import { deduplicate } from './dedupe.js';
import { createSilentLogger } from './logger.js';
import { createPricingTable } from './pricing.js';
import { assembleQuotas } from './quota.js';
import { readUsageSources, readUtf8 } from './reader.js';
import { MS_PER_HOUR } from './utils.js';

export type SnapshotOptions = {
	/** Every log file of the history. */
	files: readonly string[];
	/** The current session's transcript; the active block stands in when omitted. */
	sessionFiles?: readonly string[];
	config: QuotaConfig;
	now?: Date;
	readText?: ReadText;
	logger?: Logger;
};

export type ScanStats = {
	sources: number;
	lines: number;
	invalidLines: number;
	records: number;
	canonicalRecords: number;
	unreadable: UsageScan['unreadable'];
};

export type QuotaSnapshot = QuotaReport & {
	now: Date;
	blocks: Block[];
	scan: ScanStats;
};

export function pricingFromConfig(config: QuotaConfig): PricingTable {
	return createPricingTable({
		defaultFamily: config.pricing.defaultFamily,
		flat: config.pricing.mode === 'flat',
	});
}

export function limitsFromConfig(config: QuotaConfig): QuotaLimits {
	return {
		plan: config.plan,
		sessionLimit: config.session.limit,
		weeklyOutputLimit: config.weekly.outputLimit,
		weeklyFilteredLimit: config.weekly.filteredLimit,
		weeklyFilteredFamily: config.weekly.filteredFamily,
		monthlyCostLimit: config.monthly.costLimit,
		p90: config.p90,
	};
}

/**
 * One computation cycle. Every call reads its inputs afresh, so calling it
 * again after the logs grow picks up the appended lines.
 */
export async function computeQuotaSnapshot(options: SnapshotOptions): Promise<QuotaSnapshot> {
	const now = options.now ?? new Date();
	const logger = (options.logger ?? createSilentLogger()).child({ module: 'engine' });
	const readText = options.readText ?? readUtf8;
	const { config } = options;
	const pricing = pricingFromConfig(config);

	const scan = await readUsageSources(options.files, readText);
	for (const failure of scan.unreadable) {
		logger.debug({ source: failure.source, error: failure.error }, 'log file unreadable, skipped');
	}
	if (scan.invalidLines > 0) {
		logger.debug({ invalidLines: scan.invalidLines }, 'skipped invalid log lines');
	}

	const records = deduplicate(scan.records);
	const blocks = buildBlocks(records, {
		now,
		pricing,
		durationMs: config.session.durationHours * MS_PER_HOUR,
	});

	let sessionRecords: CanonicalRecord[] | null = null;
	if (options.sessionFiles != null && options.sessionFiles.length > 0) {
		const sessionScan = await readUsageSources(options.sessionFiles, readText);
		for (const failure of sessionScan.unreadable) {
			logger.warn({ source: failure.source, error: failure.error }, 'session transcript unreadable');
		}
		sessionRecords = deduplicate(sessionScan.records);
	}

	const report = assembleQuotas({
		now,
		records,
		blocks,
		sessionRecords,
		limitEvents: scan.limitEvents,
		limits: limitsFromConfig(config),
		pricing,
		weeklyReset: { weekday: config.weekly.resetWeekday, hour: config.weekly.resetHour },
	});

	logger.debug(
		{
			records: records.length,
			blocks: blocks.length,
			activeBlock: report.activeBlock?.id ?? null,
			sessionLimitSource: report.sessionLimit?.source ?? 'configured',
		},
		'quota snapshot computed',
	);

	return {
		...report,
		now,
		blocks,
		scan: {
			sources: scan.sources,
			lines: scan.lines,
			invalidLines: scan.invalidLines,
			records: scan.records.length,
			canonicalRecords: records.length,
			unreadable: scan.unreadable,
		},
	};
}
