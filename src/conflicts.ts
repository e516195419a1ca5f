import { ownedDirs, type PluginRecord } from "@gdm/manifest";

export interface Conflict {
	/** Directory under the addons tree */
	dir: string;
	plugins: string[];
}

/**
 * Normalize a directory name for comparison. Case is ignored since projects
 * move between case-insensitive filesystems.
 */
function normalizeDir(dir: string): string {
	return dir.replace(/\/+$/, "").toLowerCase();
}

/**
 * Detect directories a plugin is about to place that another record already owns.
 *
 * @param name - Record the directories are placed for; its own directories never conflict
 * @param dirs - Primary and sub-asset directories of the new fetch
 * @param records - Every record currently in the manifest
 */
export function detectConflicts(name: string, dirs: readonly string[], records: readonly PluginRecord[]): Conflict[] {
	const owners = new Map<string, string[]>();
	for (const record of records) {
		if (record.name === name) continue;
		for (const dir of ownedDirs(record)) {
			const key = normalizeDir(dir);
			owners.set(key, [...(owners.get(key) ?? []), record.name]);
		}
	}

	const conflicts: Conflict[] = [];
	for (const dir of dirs) {
		const existing = owners.get(normalizeDir(dir));
		if (existing?.length) {
			conflicts.push({ dir, plugins: [...existing, name] });
		}
	}
	return conflicts;
}

/**
 * Detect all directories claimed by more than one record.
 */
export function detectAllConflicts(records: readonly PluginRecord[]): Conflict[] {
	const destMap = new Map<string, { dir: string; plugins: string[] }>();

	for (const record of records) {
		for (const dir of ownedDirs(record)) {
			const key = normalizeDir(dir);
			const entry = destMap.get(key) ?? { dir, plugins: [] };
			if (!entry.plugins.includes(record.name)) entry.plugins.push(record.name);
			destMap.set(key, entry);
		}
	}

	return [...destMap.values()].filter(entry => entry.plugins.length > 1);
}

/**
 * Format conflicts for display
 */
export function formatConflicts(conflicts: Conflict[]): string[] {
	return conflicts.map(conflict => `${conflict.plugins.join(" and ")} both install ${conflict.dir}`);
}
