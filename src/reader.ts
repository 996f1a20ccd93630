import { readFile } from 'node:fs/promises';
import type { LimitEvent, ObservedTokens, TokenCategory, UsageRecord } from './types.js';
import { TOKEN_CATEGORIES } from './types.js';
import { asRecord, asTrimmedString, hasOwn, MS_PER_MINUTE, splitCompleteLines } from './utils.js';

export type ParseFailure = 'malformed-json' | 'not-an-object' | 'missing-timestamp';

export type LineParseResult =
	| { status: 'record'; record: UsageRecord }
	| { status: 'limit'; event: LimitEvent }
	| { status: 'ignored' }
	| { status: 'invalid'; reason: ParseFailure };

export type LineContext = {
	source: string;
	line: number;
};

export type SourceScan = {
	records: UsageRecord[];
	limitEvents: LimitEvent[];
	lines: number;
	invalidLines: number;
};

export type UsageScan = SourceScan & {
	sources: number;
	unreadable: Array<{ source: string; error: string }>;
};

export type ReadText = (filePath: string) => Promise<string>;

const TOKEN_FIELDS: Record<TokenCategory, readonly string[]> = {
	input: ['input_tokens', 'inputTokens'],
	output: ['output_tokens', 'outputTokens'],
	cacheWrite: ['cache_creation_input_tokens', 'cache_creation_tokens'],
	cacheRead: ['cache_read_input_tokens', 'cache_read_tokens'],
};

const TOKEN_FIELD_CATEGORIES = TOKEN_CATEGORIES.map((category) => [category, TOKEN_FIELDS[category]] as const);

const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

// Epoch seconds at or above this are year 5138 or later: a millisecond value or garbage.
const MAX_EPOCH_SECONDS = 1e11;

function toDate(value: unknown): Date | null {
	if (typeof value === 'number') {
		if (!Number.isFinite(value) || value < 0 || value >= MAX_EPOCH_SECONDS) {
			return null;
		}
		// epoch seconds
		return new Date(value * 1000);
	}

	const text = asTrimmedString(value);
	if (text == null) {
		return null;
	}
	// Zone-less timestamps are UTC; Date would read a date-time form as local time.
	return new Date(text.includes('T') && !ZONE_DESIGNATOR.test(text) ? `${text}Z` : text);
}

export function parseTimestamp(value: unknown): Date | null {
	const date = toDate(value);
	return date == null || Number.isNaN(date.getTime()) ? null : date;
}

/** A present, usable token count, or undefined for "no information". */
function readTokenValue(value: unknown): number | undefined {
	if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
		return undefined;
	}
	return Math.floor(value);
}

function observeTokens(source: Record<string, unknown>): ObservedTokens | null {
	const observed: Partial<Record<TokenCategory, number>> = {};
	let found = false;
	for (const [category, keys] of TOKEN_FIELD_CATEGORIES) {
		for (const key of keys) {
			if (!hasOwn(source, key)) {
				continue;
			}
			const value = readTokenValue(source[key]);
			if (value != null) {
				observed[category] = value;
				found = true;
				break;
			}
		}
	}
	return found ? observed : null;
}

function tokenSources(line: Record<string, unknown>): Array<Record<string, unknown> | null> {
	const messageUsage = asRecord(asRecord(line.message)?.usage);
	const usage = asRecord(line.usage);
	return line.type === 'assistant' ? [messageUsage, usage, line] : [usage, messageUsage, line];
}

function extractTokens(line: Record<string, unknown>): ObservedTokens | null {
	for (const source of tokenSources(line)) {
		if (source == null) {
			continue;
		}
		const observed = observeTokens(source);
		if (observed != null) {
			return observed;
		}
	}
	return null;
}

function extractModel(line: Record<string, unknown>): string | null {
	return (
		asTrimmedString(asRecord(line.message)?.model) ??
		asTrimmedString(line.model) ??
		asTrimmedString(asRecord(line.usage)?.model) ??
		null
	);
}

function extractCost(line: Record<string, unknown>): number | null {
	for (const candidate of [line.costUSD, line.cost_usd, line.cost]) {
		if (typeof candidate === 'number' && Number.isFinite(candidate) && candidate >= 0) {
			return candidate;
		}
	}
	return null;
}

function detectSystemLimit(line: Record<string, unknown>, timestamp: Date): LimitEvent | null {
	const content = line.content;
	if (typeof content !== 'string') {
		return null;
	}
	const lower = content.toLowerCase();
	if (!lower.includes('limit') && !lower.includes('rate')) {
		return null;
	}
	const wait = /wait\s+(\d+)\s+minutes?/.exec(lower);
	const resetsAt = wait?.[1] != null ? new Date(timestamp.getTime() + Number(wait[1]) * MS_PER_MINUTE) : null;
	return { kind: 'system', timestamp, resetsAt, text: content };
}

function toolResultTexts(line: Record<string, unknown>): string[] {
	const content = asRecord(line.message)?.content;
	if (!Array.isArray(content)) {
		return [];
	}
	const texts: string[] = [];
	for (const item of content) {
		const itemRecord = asRecord(item);
		if (itemRecord?.type !== 'tool_result' || !Array.isArray(itemRecord.content)) {
			continue;
		}
		for (const part of itemRecord.content) {
			const text = asRecord(part)?.text;
			if (typeof text === 'string') {
				texts.push(text);
			}
		}
	}
	return texts;
}

function detectToolResultLimit(line: Record<string, unknown>, timestamp: Date): LimitEvent | null {
	for (const text of toolResultTexts(line)) {
		if (!text.toLowerCase().includes('limit reached')) {
			continue;
		}
		const reset = /limit reached\|(\d+)/.exec(text);
		const resetsAt = reset?.[1] != null ? new Date(Number(reset[1]) * 1000) : null;
		return { kind: 'tool-result', timestamp, resetsAt, text };
	}
	return null;
}

function detectLimitEvent(line: Record<string, unknown>, timestamp: Date): LimitEvent | null {
	if (line.type === 'system') {
		return detectSystemLimit(line, timestamp);
	}
	if (line.type === 'user') {
		return detectToolResultLimit(line, timestamp);
	}
	return null;
}

export function parseUsageLine(text: string, context: LineContext): LineParseResult {
	const trimmed = text.trim();
	if (trimmed === '') {
		return { status: 'ignored' };
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(trimmed);
	} catch {
		return { status: 'invalid', reason: 'malformed-json' };
	}

	const line = asRecord(parsed);
	if (line == null) {
		return { status: 'invalid', reason: 'not-an-object' };
	}

	const timestamp = parseTimestamp(line.timestamp);
	if (timestamp == null) {
		return { status: 'invalid', reason: 'missing-timestamp' };
	}

	const tokens = extractTokens(line);
	if (tokens == null) {
		const event = detectLimitEvent(line, timestamp);
		return event == null ? { status: 'ignored' } : { status: 'limit', event };
	}

	const message = asRecord(line.message);
	const messageId = asTrimmedString(line.message_id) ?? asTrimmedString(message?.id) ?? null;
	const requestId = asTrimmedString(line.requestId) ?? asTrimmedString(line.request_id) ?? null;
	const logicalId =
		messageId != null && requestId != null
			? `${messageId}:${requestId}`
			: `${context.source}#${context.line}`;

	return {
		status: 'record',
		record: {
			timestamp,
			logicalId,
			messageId,
			requestId,
			model: extractModel(line),
			tokens,
			costUSD: extractCost(line),
			source: context.source,
			line: context.line,
		},
	};
}

export function tokenCount(record: { tokens: ObservedTokens }, category: TokenCategory): number {
	return record.tokens[category] ?? 0;
}

export function scanText(content: string, source: string): SourceScan {
	const scan: SourceScan = { records: [], limitEvents: [], lines: 0, invalidLines: 0 };
	const lines = splitCompleteLines(content);
	for (let index = 0; index < lines.length; index += 1) {
		const text = lines[index];
		if (text == null) {
			continue;
		}
		scan.lines += 1;
		const result = parseUsageLine(text, { source, line: index + 1 });
		switch (result.status) {
			case 'record':
				scan.records.push(result.record);
				break;
			case 'limit':
				scan.limitEvents.push(result.event);
				break;
			case 'invalid':
				scan.invalidLines += 1;
				break;
			case 'ignored':
				break;
		}
	}
	return scan;
}

export const readUtf8: ReadText = (filePath) => readFile(filePath, 'utf8');

export async function readUsageSources(
	sources: readonly string[],
	readText: ReadText = readUtf8,
): Promise<UsageScan> {
	const scan: UsageScan = {
		records: [],
		limitEvents: [],
		lines: 0,
		invalidLines: 0,
		sources: 0,
		unreadable: [],
	};

	for (const source of sources) {
		let content: string;
		try {
			content = await readText(source);
		} catch (error) {
			scan.unreadable.push({
				source,
				error: error instanceof Error ? error.message : String(error),
			});
			continue;
		}

		const fileScan = scanText(content, source);
		scan.sources += 1;
		for (const record of fileScan.records) {
			scan.records.push(record);
		}
		for (const event of fileScan.limitEvents) {
			scan.limitEvents.push(event);
		}
		scan.lines += fileScan.lines;
		scan.invalidLines += fileScan.invalidLines;
	}

	return scan;
}
