import type { CanonicalRecord, ObservedTokens } from '../../src/types.js';
import type { QuotaConfig } from '../../src/config.js';
import { parseConfig } from '../../src/config.js';

let counter = 0;

export function makeRecord(
	overrides: {
		timestamp: string | Date;
		tokens?: ObservedTokens;
		model?: string | null;
		logicalId?: string;
		costUSD?: number | null;
		source?: string;
		line?: number;
	},
): CanonicalRecord {
	counter += 1;
	const timestamp = typeof overrides.timestamp === 'string' ? new Date(overrides.timestamp) : overrides.timestamp;
	return {
		timestamp,
		logicalId: overrides.logicalId ?? `msg_${counter}:req_${counter}`,
		messageId: null,
		requestId: null,
		model: overrides.model === undefined ? 'claude-sonnet-4-5' : overrides.model,
		tokens: overrides.tokens ?? { input: 0, output: 0, cacheWrite: 0, cacheRead: 0 },
		costUSD: overrides.costUSD ?? null,
		source: overrides.source ?? 'test.jsonl',
		line: overrides.line ?? counter,
		observations: 1,
	};
}

export function assistantLine(options: {
	timestamp: string;
	messageId?: string;
	requestId?: string;
	model?: string;
	usage?: Record<string, unknown>;
	costUSD?: number;
}): string {
	const message: Record<string, unknown> = {
		model: options.model ?? 'claude-sonnet-4-5',
		usage: options.usage ?? { input_tokens: 0, output_tokens: 0 },
	};
	if (options.messageId != null) {
		message.id = options.messageId;
	}
	const line: Record<string, unknown> = {
		type: 'assistant',
		timestamp: options.timestamp,
		message,
	};
	if (options.requestId != null) {
		line.requestId = options.requestId;
	}
	if (options.costUSD != null) {
		line.costUSD = options.costUSD;
	}
	return JSON.stringify(line);
}

export function jsonl(lines: string[]): string {
	return lines.map((line) => `${line}\n`).join('');
}

export function testConfig(raw: Record<string, unknown> = {}): QuotaConfig {
	return parseConfig(raw);
}
