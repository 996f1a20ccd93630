import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { asRecord, asTrimmedString, getHomeDirectory, splitCommaList } from './utils.js';

const familySchema = z.enum(['opus', 'sonnet', 'haiku', 'other']);

const planSchema = z.enum(['pro', 'max5', 'max20']);

const sessionSchema = z.object({
	limit: z.union([z.enum(['plan', 'p90']), z.number().int().positive()]).default('plan'),
	durationHours: z.number().positive().max(24).default(5),
});

const weeklySchema = z.object({
	outputLimit: z.number().nonnegative().default(300_000),
	filteredLimit: z.number().nonnegative().default(1_000_000),
	filteredFamily: familySchema.default('sonnet'),
	resetWeekday: z.number().int().min(0).max(6).default(1),
	resetHour: z.number().int().min(0).max(23).default(4),
});

const monthlySchema = z.object({
	costLimit: z.number().nonnegative().default(50),
});

const pricingSchema = z.object({
	mode: z.enum(['flat', 'per-model']).default('flat'),
	defaultFamily: familySchema.default('sonnet'),
});

const p90Schema = z.object({
	minLimit: z.number().int().positive().default(19_000),
	minSessions: z.number().int().positive().default(5),
	hitThreshold: z.number().positive().max(1).default(0.95),
	commonLimits: z.array(z.number().int().positive()).default([19_000, 88_000, 220_000, 880_000]),
});

const loggingSchema = z.object({
	level: z.enum(['debug', 'info', 'warn', 'error']).default('warn'),
	json: z.boolean().optional(),
	file: z.string().optional(),
});

export const quotaConfigSchema = z.object({
	plan: planSchema.default('max5'),
	session: sessionSchema.default({}),
	weekly: weeklySchema.default({}),
	monthly: monthlySchema.default({}),
	pricing: pricingSchema.default({}),
	p90: p90Schema.default({}),
	dataDirs: z.array(z.string().min(1)).optional(),
	logging: loggingSchema.default({}),
});

export type QuotaConfig = z.infer<typeof quotaConfigSchema>;
export type LoggingConfig = QuotaConfig['logging'];

export class ConfigError extends Error {
	constructor(
		message: string,
		readonly issues: string[] = [],
	) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
		this.name = 'ConfigError';
	}
}

export function parseConfig(raw: unknown): QuotaConfig {
	const result = quotaConfigSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError(
			'Invalid configuration',
			result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`),
		);
	}
	return result.data;
}

const ENV_PATTERN = /\$\{env:([A-Z_][A-Z0-9_]*)\}/g;

export function substituteEnv(raw: string, env: NodeJS.ProcessEnv = process.env): string {
	return raw.replace(ENV_PATTERN, (match, varName: string) => {
		const value = env[varName];
		if (value === undefined) {
			throw new ConfigError(`Missing environment variable: ${varName} (referenced as ${match})`);
		}
		return value;
	});
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
	const text = asTrimmedString(env[name]);
	// Left as NaN on bad input so the schema reports it.
	return text == null ? undefined : Number(text);
}

function withSection(
	raw: Record<string, unknown>,
	section: string,
	values: Record<string, unknown>,
): Record<string, unknown> {
	const defined = Object.entries(values).filter(([, value]) => value !== undefined);
	if (defined.length === 0) {
		return raw;
	}
	return { ...raw, [section]: { ...(asRecord(raw[section]) ?? {}), ...Object.fromEntries(defined) } };
}

/** Environment variables win over the config file. */
export function applyEnvOverrides(raw: unknown, env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
	let merged: Record<string, unknown> = { ...(asRecord(raw) ?? {}) };

	const plan = asTrimmedString(env.CLAUDE_PLAN_TYPE);
	if (plan != null) {
		merged.plan = plan;
	}
	const configDir = asTrimmedString(env.CLAUDE_CONFIG_DIR);
	if (configDir != null) {
		merged.dataDirs = splitCommaList(configDir).map((value) => path.resolve(value));
	}

	merged = withSection(merged, 'weekly', {
		outputLimit: envNumber(env, 'CLAUDE_WEEKLY_OUTPUT_LIMIT'),
		filteredLimit: envNumber(env, 'CLAUDE_WEEKLY_SONNET_LIMIT'),
	});
	merged = withSection(merged, 'monthly', {
		costLimit: envNumber(env, 'CLAUDE_EXTRA_USAGE_LIMIT'),
	});
	merged = withSection(merged, 'logging', {
		level: asTrimmedString(env.USAGE_QUOTA_LOG_LEVEL),
	});
	return merged;
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
	return asTrimmedString(env.USAGE_QUOTA_CONFIG) ?? path.join(getHomeDirectory(), '.usage-quota', 'config.json');
}

export async function loadConfig(
	options: { path?: string; env?: NodeJS.ProcessEnv } = {},
): Promise<QuotaConfig> {
	const env = options.env ?? process.env;
	const configPath = path.resolve(options.path ?? getConfigPath(env));

	let content: string | null;
	try {
		content = await readFile(configPath, 'utf8');
	} catch (error) {
		if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
			throw error;
		}
		content = null;
	}

	let raw: unknown = {};
	if (content != null) {
		try {
			raw = JSON.parse(substituteEnv(content, env));
		} catch (error) {
			if (error instanceof ConfigError) {
				throw error;
			}
			throw new ConfigError(`Config file ${configPath} is not valid JSON`);
		}
	}

	return parseConfig(applyEnvOverrides(raw, env));
}
