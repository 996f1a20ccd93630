import type { QuotaLabel, QuotaResult } from '../types.js';
import type { QuotaReport } from '../quota.js';
import {
	bold,
	color,
	formatCurrency,
	formatPercent,
	formatRemaining,
	formatResetLabel,
	formatTokens,
} from '../utils.js';

export type RenderOptions = {
	now: Date;
	colorsEnabled: boolean;
	filteredFamily: string;
	barWidth?: number;
};

const FILL = '▪';
const EMPTY = '▫';

function capitalize(text: string): string {
	return text === '' ? text : `${text[0]?.toUpperCase() ?? ''}${text.slice(1)}`;
}

export function quotaTitle(label: QuotaLabel, filteredFamily: string): string {
	switch (label) {
		case 'session':
			return 'Session';
		case 'weekly-all':
			return 'Current week';
		case 'weekly-filtered':
			return `Week (${capitalize(filteredFamily)})`;
		case 'cost':
			return 'Extra usage';
	}
}

function barColor(ratio: number): string {
	if (ratio >= 0.8) {
		return '31';
	}
	if (ratio >= 0.6) {
		return '33';
	}
	return '32';
}

export function renderProgressBar(width: number, ratio: number, colorsEnabled: boolean): string {
	const clamped = Math.max(0, Math.min(1, ratio));
	const filled = Math.round(clamped * width);
	const filledBar = filled > 0 ? color(FILL.repeat(filled), barColor(ratio), colorsEnabled) : '';
	const emptyBar = width - filled > 0 ? color(EMPTY.repeat(width - filled), '90', colorsEnabled) : '';
	return filledBar + emptyBar;
}

function renderAmount(result: QuotaResult): string {
	if (result.label === 'cost') {
		return `${formatCurrency(result.used)}/${formatCurrency(result.limit)}`;
	}
	return `${formatTokens(result.used)}/${formatTokens(result.limit)}`;
}

export function renderQuotaLine(result: QuotaResult, options: RenderOptions): string {
	const parts = [
		bold(quotaTitle(result.label, options.filteredFamily), options.colorsEnabled),
		renderProgressBar(options.barWidth ?? 10, result.ratio, options.colorsEnabled),
		renderAmount(result),
		color(`(${formatPercent(result.ratio)})`, '90', options.colorsEnabled),
	];
	if (result.resetsAt != null) {
		parts.push(color(`Resets ${formatResetLabel(result.resetsAt, options.now)}`, '90', options.colorsEnabled));
		const remaining = formatRemaining(result.resetsAt, options.now);
		if (remaining !== '') {
			parts.push(`[${remaining}]`);
		}
	}
	return parts.join(' ');
}

export function renderQuotaReport(report: QuotaReport, options: RenderOptions): string {
	return [report.session, report.weeklyAll, report.weeklyFiltered, report.cost]
		.map((result) => renderQuotaLine(result, options))
		.join('\n');
}
