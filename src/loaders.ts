import { realpath } from 'node:fs/promises';
import path from 'node:path';
import { getHomeDirectory, isDirectory, listFilesRecursively } from './utils.js';

export type DataRoot = {
	root: string;
	projectsDir: string;
	available: boolean;
};

/**
 * Candidate data roots, in discovery order: configured directories first,
 * then the XDG config location and the home-directory default.
 */
export function getDataRoots(configured?: readonly string[]): string[] {
	const home = getHomeDirectory();
	const xdg = process.env.XDG_CONFIG_HOME?.trim();
	const xdgRoot = xdg != null && xdg !== '' ? xdg : path.join(home, '.config');
	const candidates = [
		...(configured ?? []).map((value) => path.resolve(value)),
		path.join(xdgRoot, 'claude'),
		path.join(home, '.claude'),
	];
	return [...new Set(candidates)];
}

function projectsDirFor(root: string): string {
	return path.basename(root) === 'projects' ? root : path.join(root, 'projects');
}

export async function detectDataRoots(configured?: readonly string[]): Promise<DataRoot[]> {
	return Promise.all(
		getDataRoots(configured).map(async (root) => {
			const projectsDir = projectsDirFor(root);
			return { root, projectsDir, available: await isDirectory(projectsDir) };
		}),
	);
}

/** Symlink-free form of `target`; a path that cannot be resolved stays as given. */
async function realPathOf(target: string): Promise<string> {
	try {
		return await realpath(target);
	} catch {
		return target;
	}
}

/**
 * Every `.jsonl` log under the available roots, sorted. Roots and files are
 * compared by their real path, so a root reached through a symlink is listed
 * once.
 */
export async function discoverLogFiles(configured?: readonly string[]): Promise<string[]> {
	const roots = await detectDataRoots(configured);
	const seenRoots = new Set<string>();
	const files = new Set<string>();
	for (const root of roots) {
		if (!root.available) {
			continue;
		}
		const projectsDir = await realPathOf(root.projectsDir);
		if (seenRoots.has(projectsDir)) {
			continue;
		}
		seenRoots.add(projectsDir);
		for (const file of await listFilesRecursively(projectsDir, '.jsonl')) {
			files.add(await realPathOf(file));
		}
	}
	return [...files].sort();
}
