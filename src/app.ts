import { parseArgs, printHelp } from './cli/options.js';
import { parseHookInput, readStdin } from './cli/hook.js';
import { loadConfig } from './config.js';
import type { QuotaConfig } from './config.js';
import { computeQuotaSnapshot } from './engine.js';
import { discoverLogFiles } from './loaders.js';
import { createLogger } from './logger.js';
import { snapshotToJson } from './reporting/json.js';
import { renderQuotaReport } from './reporting/render.js';
import { ansiEnabled } from './utils.js';

function applyCliOverrides(config: QuotaConfig, plan: QuotaConfig['plan'] | undefined, dataDirs: string[] | undefined): QuotaConfig {
	return {
		...config,
		plan: plan ?? config.plan,
		dataDirs: dataDirs ?? config.dataDirs,
	};
}

export async function runApp(argv: string[]): Promise<void> {
	const options = parseArgs(argv);
	if (options.help) {
		printHelp();
		return;
	}

	const loaded = await loadConfig({ path: options.configPath });
	const config = applyCliOverrides(loaded, options.plan, options.dataDirs);
	const logger = createLogger(config.logging);

	const hook = process.stdin.isTTY ? {} : parseHookInput(await readStdin());
	const transcript = options.transcript ?? hook.transcriptPath;

	const files = await discoverLogFiles(config.dataDirs);
	if (files.length === 0) {
		logger.warn({ dataDirs: config.dataDirs ?? null }, 'no usage logs found');
	}

	const snapshot = await computeQuotaSnapshot({
		files,
		sessionFiles: transcript != null ? [transcript] : undefined,
		config,
		logger,
	});

	if (options.json) {
		console.log(JSON.stringify(snapshotToJson(snapshot), null, 2));
		return;
	}

	console.log(
		renderQuotaReport(snapshot, {
			now: snapshot.now,
			colorsEnabled: ansiEnabled(options.noColor),
			filteredFamily: config.weekly.filteredFamily,
		}),
	);
}
