import { readdir, stat } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;

export function asRecord(value: unknown): Record<string, unknown> | null {
	if (value == null || typeof value !== 'object' || Array.isArray(value)) {
		return null;
	}
	return value as Record<string, unknown>;
}

export function asTrimmedString(value: unknown): string | undefined {
	if (typeof value !== 'string') {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed === '' ? undefined : trimmed;
}

export function hasOwn(record: Record<string, unknown>, key: string): boolean {
	return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * Splits file content into lines. The trailing segment is only kept when the
 * content ends with a newline: anything after the last newline may still be
 * mid-write.
 */
export function splitCompleteLines(content: string): string[] {
	const lines = content.split('\n');
	// Either '' (terminated) or an unterminated partial line.
	lines.pop();
	return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

export function floorToUtcHour(date: Date): Date {
	const floored = new Date(date.getTime());
	floored.setUTCMinutes(0, 0, 0);
	return floored;
}

export async function isDirectory(dirPath: string): Promise<boolean> {
	try {
		const info = await stat(dirPath);
		return info.isDirectory();
	} catch {
		return false;
	}
}

export async function listFilesRecursively(rootDir: string, extension: string): Promise<string[]> {
	const files: string[] = [];
	if (!(await isDirectory(rootDir))) {
		return files;
	}

	const stack = [rootDir];
	while (stack.length > 0) {
		const current = stack.pop();
		if (current == null) {
			continue;
		}

		try {
			const entries = await readdir(current, { withFileTypes: true, encoding: 'utf8' });
			for (const entry of entries) {
				const fullPath = path.join(current, entry.name);
				if (entry.isDirectory()) {
					stack.push(fullPath);
					continue;
				}
				if (!entry.isFile() || !fullPath.endsWith(extension)) {
					continue;
				}
				files.push(fullPath);
			}
		} catch {
			// unreadable directory: it contributes no files
			continue;
		}
	}

	files.sort();
	return files;
}

export function getHomeDirectory(): string {
	return os.homedir();
}

export function splitCommaList(input: string): string[] {
	return input
		.split(',')
		.map((part) => part.trim())
		.filter((part) => part !== '');
}

export function pad2(value: number): string {
	return String(value).padStart(2, '0');
}

export function formatCurrency(value: number): string {
	return new Intl.NumberFormat('en-US', {
		style: 'currency',
		currency: 'USD',
		minimumFractionDigits: 2,
		maximumFractionDigits: 2,
	}).format(value);
}

/** 785 → "785", 8785 → "8.8k", 88000 → "88k", 1000000 → "1M" */
export function formatTokens(value: number): string {
	const rounded = Math.round(value);
	if (rounded < 1000) {
		return String(rounded);
	}
	if (rounded >= 1_000_000) {
		return `${trimFraction(rounded / 1_000_000)}M`;
	}
	return `${trimFraction(rounded / 1000)}k`;
}

function trimFraction(value: number): string {
	const fixed = value.toFixed(1);
	return fixed.endsWith('.0') ? fixed.slice(0, -2) : fixed;
}

export function formatPercent(ratio: number): string {
	return `${trimFraction(ratio * 100)}%`;
}

/** Time left until `target`, e.g. "2d3h", "4h21m", "37m"; empty once passed. */
export function formatRemaining(target: Date, now: Date): string {
	const totalSeconds = Math.floor((target.getTime() - now.getTime()) / 1000);
	if (totalSeconds <= 0) {
		return '';
	}
	const days = Math.floor(totalSeconds / 86_400);
	const hours = Math.floor((totalSeconds % 86_400) / 3600);
	const minutes = Math.floor((totalSeconds % 3600) / 60);
	if (days > 0) {
		return `${days}d${hours}h`;
	}
	if (hours > 0) {
		return `${hours}h${pad2(minutes)}m`;
	}
	return `${minutes}m`;
}

const MONTH_NAMES = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'] as const;

function sameLocalDay(a: Date, b: Date): boolean {
	return a.getFullYear() === b.getFullYear() && a.getMonth() === b.getMonth() && a.getDate() === b.getDate();
}

/** Local-time reset label: "9pm", "11:30pm", "tmrw 4am" or "Feb 19 at 4am". */
export function formatResetLabel(target: Date, now: Date): string {
	const hour = target.getHours();
	const hour12 = hour % 12 === 0 ? 12 : hour % 12;
	const suffix = hour < 12 ? 'am' : 'pm';
	const minutes = target.getMinutes();
	const time = minutes === 0 ? `${hour12}${suffix}` : `${hour12}:${pad2(minutes)}${suffix}`;

	if (sameLocalDay(target, now)) {
		return time;
	}
	const tomorrow = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
	if (sameLocalDay(target, tomorrow)) {
		return `tmrw ${time}`;
	}
	return `${MONTH_NAMES[target.getMonth()] ?? ''} ${target.getDate()} at ${time}`;
}

export function ansiEnabled(noColorFlag: boolean): boolean {
	return !noColorFlag && process.env.NO_COLOR == null;
}

export function color(text: string, code: string, enabled: boolean): string {
	if (!enabled) {
		return text;
	}
	return `\x1b[${code}m${text}\x1b[0m`;
}

export function bold(text: string, enabled: boolean): string {
	return color(text, '1', enabled);
}
