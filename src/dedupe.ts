import type { CanonicalRecord, TokenCategory, UsageRecord } from './types.js';
import { TOKEN_CATEGORIES } from './types.js';
import { tokenCount } from './reader.js';

function totalTokens(record: UsageRecord): number {
	let total = 0;
	for (const category of TOKEN_CATEGORIES) {
		total += tokenCount(record, category);
	}
	return total;
}

/**
 * Orders two snapshots of one logical unit. The later cumulative snapshot
 * carries more tokens; the remaining keys only make the choice independent of
 * file and arrival order.
 */
function compareSnapshots(a: UsageRecord, b: UsageRecord): number {
	const byOutput = tokenCount(a, 'output') - tokenCount(b, 'output');
	if (byOutput !== 0) {
		return byOutput;
	}
	const byTotal = totalTokens(a) - totalTokens(b);
	if (byTotal !== 0) {
		return byTotal;
	}
	const byTime = a.timestamp.getTime() - b.timestamp.getTime();
	if (byTime !== 0) {
		return byTime;
	}
	if (a.source !== b.source) {
		return a.source < b.source ? 1 : -1;
	}
	return b.line - a.line;
}

function mergeGroup(group: readonly UsageRecord[]): CanonicalRecord {
	let best = group[0];
	const tokens: Partial<Record<TokenCategory, number>> = {};
	for (const record of group) {
		if (best == null || compareSnapshots(record, best) > 0) {
			best = record;
		}
		for (const category of TOKEN_CATEGORIES) {
			const value = record.tokens[category];
			if (value == null) {
				continue;
			}
			const known = tokens[category];
			tokens[category] = known == null ? value : Math.max(known, value);
		}
	}
	if (best == null) {
		throw new Error('Cannot merge an empty record group');
	}
	return { ...best, tokens, observations: group.length };
}

/**
 * Collapses incremental snapshots to one canonical record per logical id:
 * the snapshot with the most tokens, carrying the largest value observed for
 * each token category. Sorted by timestamp.
 */
export function deduplicate(records: Iterable<UsageRecord>): CanonicalRecord[] {
	const groups = new Map<string, UsageRecord[]>();
	for (const record of records) {
		const group = groups.get(record.logicalId);
		if (group == null) {
			groups.set(record.logicalId, [record]);
		} else {
			group.push(record);
		}
	}

	const canonical: CanonicalRecord[] = [];
	for (const group of groups.values()) {
		canonical.push(mergeGroup(group));
	}
	return canonical.sort(compareChronologically);
}

export function compareChronologically(
	a: Pick<UsageRecord, 'timestamp' | 'logicalId'>,
	b: Pick<UsageRecord, 'timestamp' | 'logicalId'>,
): number {
	const byTime = a.timestamp.getTime() - b.timestamp.getTime();
	if (byTime !== 0) {
		return byTime;
	}
	if (a.logicalId === b.logicalId) {
		return 0;
	}
	return a.logicalId < b.logicalId ? -1 : 1;
}
