import { join } from "node:path";
import { isDirectory, movePath, removePath, sameEntry } from "@gdm/files";
import type { ResolvedLayout } from "@gdm/layout";
import { ownedDirs, type PluginRecord } from "@gdm/manifest";
import { logger } from "@gdm/output";

/**
 * Move the primary and sub-asset directories of a resolved layout into the
 * addons tree, replacing whatever was there.
 *
 * @returns the directory names placed, primary first
 */
export async function placeLayout(layout: ResolvedLayout, addonsDir: string): Promise<string[]> {
	const dirs = [layout.primary, ...layout.subAssets];
	for (const dir of dirs) {
		await movePath(join(layout.root, dir), join(addonsDir, dir));
	}
	logger.debug("Placed plugin directories", { addonsDir, dirs });
	return dirs;
}

/**
 * Delete directories from the addons tree, skipping any still claimed by `keep`.
 * A name that differs from a kept one only by case is skipped only when both
 * resolve to the same directory.
 */
export async function removeDirs(addonsDir: string, dirs: readonly string[], keep: Iterable<string> = []): Promise<string[]> {
	const kept = [...keep];
	const removed: string[] = [];
	for (const dir of dirs) {
		if (await isClaimed(addonsDir, dir, kept)) continue;
		await removePath(join(addonsDir, dir));
		removed.push(dir);
	}
	if (removed.length > 0) logger.debug("Removed plugin directories", { addonsDir, removed });
	return removed;
}

async function isClaimed(addonsDir: string, dir: string, kept: readonly string[]): Promise<boolean> {
	if (kept.includes(dir)) return true;
	const folded = dir.toLowerCase();
	for (const other of kept) {
		if (other.toLowerCase() === folded && (await sameEntry(join(addonsDir, dir), join(addonsDir, other)))) return true;
	}
	return false;
}

/** Directories of a record that are absent from the addons tree. */
export async function missingDirs(addonsDir: string, record: PluginRecord): Promise<string[]> {
	const missing: string[] = [];
	for (const dir of ownedDirs(record)) {
		if (!(await isDirectory(join(addonsDir, dir)))) missing.push(dir);
	}
	return missing;
}
