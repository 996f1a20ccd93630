#!/usr/bin/env node

import { runApp } from './app.js';
import { ConfigError } from './config.js';

runApp(process.argv.slice(2)).catch((error: unknown) => {
	if (error instanceof ConfigError) {
		console.error(`Config error: ${error.message}`);
		process.exitCode = 2;
		return;
	}
	const message = error instanceof Error ? error.message : String(error);
	console.error(`Error: ${message}`);
	process.exitCode = 1;
});
