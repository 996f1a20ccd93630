import type { PlanTier } from '../types.js';
import { splitCommaList } from '../utils.js';

export type CliOptions = {
	plan?: PlanTier;
	dataDirs?: string[];
	transcript?: string;
	configPath?: string;
	json: boolean;
	noColor: boolean;
	help: boolean;
};

function parsePlan(input: string): PlanTier | null {
	switch (input.trim().toLowerCase()) {
		case 'pro':
			return 'pro';
		case 'max5':
		case 'max-5':
		case 'max5x':
			return 'max5';
		case 'max20':
		case 'max-20':
		case 'max20x':
			return 'max20';
		default:
			return null;
	}
}

function requirePlan(raw: string): PlanTier {
	const plan = parsePlan(raw);
	if (plan == null) {
		throw new Error(`Unknown plan "${raw}". Use: pro, max5 or max20`);
	}
	return plan;
}

function requireValue(argv: string[], index: number, flag: string): string {
	const raw = argv[index + 1];
	if (raw == null || raw.trim() === '') {
		throw new Error(`Missing value after ${flag}`);
	}
	return raw.trim();
}

export function parseArgs(argv: string[]): CliOptions {
	const options: CliOptions = {
		json: false,
		noColor: false,
		help: false,
	};

	for (let i = 0; i < argv.length; i += 1) {
		const arg = argv[i];
		if (arg == null) {
			continue;
		}

		if (arg === '--help' || arg === '-h') {
			options.help = true;
			continue;
		}
		if (arg === '--json') {
			options.json = true;
			continue;
		}
		if (arg === '--no-color') {
			options.noColor = true;
			continue;
		}

		if (arg === '--plan' || arg === '-p') {
			options.plan = requirePlan(requireValue(argv, i, arg));
			i += 1;
			continue;
		}
		if (arg.startsWith('--plan=')) {
			options.plan = requirePlan(arg.slice('--plan='.length));
			continue;
		}

		if (arg === '--data-dir' || arg === '-d') {
			options.dataDirs = [...(options.dataDirs ?? []), ...splitCommaList(requireValue(argv, i, arg))];
			i += 1;
			continue;
		}
		if (arg.startsWith('--data-dir=')) {
			options.dataDirs = [...(options.dataDirs ?? []), ...splitCommaList(arg.slice('--data-dir='.length))];
			continue;
		}

		if (arg === '--transcript' || arg === '-t') {
			options.transcript = requireValue(argv, i, arg);
			i += 1;
			continue;
		}
		if (arg.startsWith('--transcript=')) {
			options.transcript = arg.slice('--transcript='.length).trim();
			continue;
		}

		if (arg === '--config' || arg === '-c') {
			options.configPath = requireValue(argv, i, arg);
			i += 1;
			continue;
		}
		if (arg.startsWith('--config=')) {
			options.configPath = arg.slice('--config='.length).trim();
			continue;
		}

		throw new Error(`Unknown argument "${arg}". Run with --help.`);
	}

	return options;
}

export function printHelp(): void {
	console.log(
		[
			'Usage: usage-quota [options]',
			'',
			'Prints session, weekly and monthly-cost quota usage from local usage logs.',
			'When stdin is piped, the status-line hook JSON supplies the session transcript.',
			'',
			'Options:',
			'  -p, --plan <tier>         pro | max5 | max20',
			'  -d, --data-dir <list>     Comma list of data directories to scan',
			'  -t, --transcript <file>   Current session transcript (.jsonl)',
			'  -c, --config <file>       Config file (default ~/.usage-quota/config.json)',
			'      --json                Print the snapshot as JSON',
			'      --no-color            Disable ANSI colors',
			'  -h, --help                Show help',
		].join('\n'),
	);
}
