import type { Dirent } from "node:fs";
import { mkdir, readdir } from "node:fs/promises";
import { join } from "node:path";
import { GdmError, toFilesystemError } from "@gdm/errors";
import { movePath, pathExists } from "@gdm/files";
import { logger } from "@gdm/output";

/** Descriptor file that marks a directory as a plugin root. */
export const PLUGIN_DESCRIPTOR = "plugin.cfg";

export interface LayoutCandidate {
	name: string;
	hasDescriptor: boolean;
}

/** Top-level contents of a staged addons tree. */
export interface StagedEntries {
	dirs: LayoutCandidate[];
	files: string[];
}

export interface LayoutPlan {
	primary: string;
	subAssets: string[];
	/** Primary carries a plugin descriptor and gets activated */
	enabled: boolean;
	/** Top-level entries to gather into a synthesized plugin directory */
	gather?: { into: string; entries: string[]; wholeTree: boolean };
}

export interface ResolvedLayout {
	/** Directory holding the primary and sub-asset directories */
	root: string;
	primary: string;
	subAssets: string[];
	enabled: boolean;
}

function normalizeName(name: string): string {
	return name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function commonPrefixLength(a: string, b: string): number {
	let i = 0;
	while (i < a.length && i < b.length && a[i] === b[i]) i++;
	return i;
}

function matchTier(candidate: string, identity: string): number {
	if (candidate.toLowerCase() === identity.toLowerCase()) return 0;
	const c = normalizeName(candidate);
	const id = normalizeName(identity);
	if (!c || !id) return 3;
	if (c === id) return 1;
	if (c.startsWith(id) || id.startsWith(c)) return 2;
	return 3;
}

/**
 * Order candidate plugin directories by how well they match the requested
 * identity: case-insensitive exact match, then the same name ignoring
 * punctuation, then a prefix match in either direction, then the rest.
 * Ties go to the longer shared prefix, the shorter name, then alphabetical order.
 */
export function rankCandidates(candidates: readonly string[], identity: string): string[] {
	const id = normalizeName(identity);
	const scored = candidates.map(name => ({
		name,
		tier: matchTier(name, identity),
		shared: commonPrefixLength(normalizeName(name), id),
	}));
	scored.sort((a, b) => {
		if (a.tier !== b.tier) return a.tier - b.tier;
		if (a.shared !== b.shared) return b.shared - a.shared;
		if (a.name.length !== b.name.length) return a.name.length - b.name.length;
		return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
	});
	return scored.map(s => s.name);
}

/**
 * Directory name for a plugin root synthesized from loose files.
 */
export function pluginDirName(identity: string): string {
	const slug = identity
		.trim()
		.toLowerCase()
		.replace(/[^a-z0-9._-]+/g, "_")
		.replace(/^[._-]+|[._-]+$/g, "");
	return slug || "plugin";
}

/**
 * Decide the primary plugin directory and its sub-assets for a staged tree.
 */
export function planLayout(entries: StagedEntries, identity: string): LayoutPlan {
	const { dirs, files } = entries;
	if (dirs.length === 0 && files.length === 0) {
		throw new GdmError("EmptyAsset", `"${identity}" contains no plugin files`);
	}

	const synthName = pluginDirName(identity);

	// The tree root is itself the plugin
	if (files.includes(PLUGIN_DESCRIPTOR)) {
		return {
			primary: synthName,
			subAssets: [],
			enabled: true,
			gather: { into: synthName, entries: [...dirs.map(d => d.name), ...files], wholeTree: true },
		};
	}

	let candidates = dirs;
	let gather: LayoutPlan["gather"];
	if (files.length > 0) {
		const lowered = new Set([identity.toLowerCase(), synthName]);
		const existing = dirs.find(d => lowered.has(d.name.toLowerCase()));
		const into = existing?.name ?? synthName;
		gather = { into, entries: [...files], wholeTree: false };
		if (!existing) candidates = [...dirs, { name: into, hasDescriptor: false }];
	}

	const roots = candidates.filter(c => c.hasDescriptor);
	const pool = roots.length > 0 ? roots : candidates;
	const [primary] = rankCandidates(
		pool.map(c => c.name),
		identity,
	);
	if (primary === undefined) {
		throw new GdmError("EmptyAsset", `"${identity}" contains no plugin directory`);
	}

	return {
		primary,
		subAssets: candidates
			.map(c => c.name)
			.filter(name => name !== primary)
			.sort(),
		enabled: candidates.some(c => c.name === primary && c.hasDescriptor),
		gather,
	};
}

function isIgnoredEntry(name: string): boolean {
	return name.startsWith(".") || name === "__MACOSX";
}

export async function scanStagedTree(root: string): Promise<StagedEntries> {
	let listing: Dirent[];
	try {
		listing = await readdir(root, { withFileTypes: true });
	} catch (err) {
		throw toFilesystemError(err, root, "read");
	}

	const dirs: LayoutCandidate[] = [];
	const files: string[] = [];
	for (const entry of listing) {
		if (isIgnoredEntry(entry.name)) continue;
		if (entry.isDirectory()) {
			dirs.push({ name: entry.name, hasDescriptor: await pathExists(join(root, entry.name, PLUGIN_DESCRIPTOR)) });
		} else if (entry.isFile()) {
			files.push(entry.name);
		}
	}
	dirs.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
	files.sort();
	return { dirs, files };
}

/**
 * Inspect a staged addons tree and shape it into plugin directories, gathering
 * loose files into a synthesized plugin root when needed.
 */
export async function resolveLayout(stagedRoot: string, identity: string): Promise<ResolvedLayout> {
	const plan = planLayout(await scanStagedTree(stagedRoot), identity);
	let root = stagedRoot;

	if (plan.gather) {
		const { into, entries, wholeTree } = plan.gather;
		if (wholeTree) root = `${stagedRoot}.gathered`;
		const target = join(root, into);
		try {
			await mkdir(target, { recursive: true });
		} catch (err) {
			throw toFilesystemError(err, target, "create");
		}
		for (const entry of entries) {
			await movePath(join(stagedRoot, entry), join(target, entry));
		}
		logger.debug("Gathered loose files into plugin directory", { into, count: entries.length });
	}

	return { root, primary: plan.primary, subAssets: plan.subAssets, enabled: plan.enabled };
}
