import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { detectDataRoots, discoverLogFiles, getDataRoots } from '../../src/loaders.js';

describe('loaders', () => {
	let home: string;
	let data: string;

	beforeEach(() => {
		home = realpathSync(mkdtempSync(path.join(os.tmpdir(), 'usage-quota-home-')));
		data = realpathSync(mkdtempSync(path.join(os.tmpdir(), 'usage-quota-data-')));
		vi.stubEnv('HOME', home);
		vi.stubEnv('XDG_CONFIG_HOME', path.join(home, '.config'));
	});

	afterEach(() => {
		vi.unstubAllEnvs();
		rmSync(home, { recursive: true, force: true });
		rmSync(data, { recursive: true, force: true });
	});

	function touch(...segments: string[]): string {
		const filePath = path.join(data, ...segments);
		mkdirSync(path.dirname(filePath), { recursive: true });
		writeFileSync(filePath, '');
		return filePath;
	}

	it('lists configured roots before the defaults', () => {
		expect(getDataRoots([data])).toEqual([
			data,
			path.join(home, '.config', 'claude'),
			path.join(home, '.claude'),
		]);
	});

	it('drops duplicate roots', () => {
		expect(getDataRoots([path.join(home, '.claude')])).toEqual([
			path.join(home, '.claude'),
			path.join(home, '.config', 'claude'),
		]);
	});

	it('marks roots without a projects directory unavailable', async () => {
		touch('projects', 'demo', 'a.jsonl');
		const roots = await detectDataRoots([data]);
		expect(roots[0]).toEqual({ root: data, projectsDir: path.join(data, 'projects'), available: true });
		expect(roots.slice(1).map((root) => root.available)).toEqual([false, false]);
	});

	it('finds every log file under the projects directory', async () => {
		const first = touch('projects', 'alpha', 'one.jsonl');
		const second = touch('projects', 'beta', 'nested', 'two.jsonl');
		touch('projects', 'beta', 'notes.txt');

		expect(await discoverLogFiles([data])).toEqual([first, second].sort());
	});

	it('accepts a projects directory directly and counts each file once', async () => {
		const file = touch('projects', 'alpha', 'one.jsonl');
		expect(await discoverLogFiles([data, path.join(data, 'projects')])).toEqual([file]);
	});

	it('lists a root reached through a symlink once', async () => {
		const file = touch('projects', 'alpha', 'one.jsonl');
		const linked = path.join(home, 'linked-data');
		symlinkSync(data, linked, 'dir');

		const files = await discoverLogFiles([data, linked]);
		expect(files).toEqual([file]);
	});

	it('resolves files listed through a symlinked root to their real path', async () => {
		const file = touch('projects', 'alpha', 'one.jsonl');
		const linked = path.join(home, 'linked-data');
		symlinkSync(data, linked, 'dir');

		expect(await discoverLogFiles([linked])).toEqual([file]);
	});

	it('finds nothing when no root exists', async () => {
		expect(await discoverLogFiles([path.join(data, 'missing')])).toEqual([]);
	});
});
