import type { Dirent } from "node:fs";
import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join, relative } from "node:path";
import { strToU8, zipSync } from "fflate";
import type { AssetDetails, AssetSummary, Catalog, VersionInfo } from "@gdm/catalog";
import { GdmError } from "@gdm/errors";
import type { GitTransport } from "@gdm/git";
import { getProjectPaths, type ProjectPaths } from "@gdm/paths";
import { resolveSettings } from "@gdm/settings";

export const PROJECT_GODOT = [
	"; Engine configuration file.",
	"; It's best edited using the editor UI and not directly,",
	"; since the parameters that go here are not all obvious.",
	";",
	"; Format:",
	";   [section] ; section goes between []",
	";   param=value ; assign values to parameters",
	"",
	"config_version=5",
	"",
	"[application]",
	"",
	'config/name="Demo"',
	'config/features=PackedStringArray("4.3", "Forward Plus")',
	'config/icon="res://icon.svg"',
	"",
	"[rendering]",
	"",
	'renderer/rendering_method="gl_compatibility"',
	"",
].join("\n");

/** PROJECT_GODOT with an activation section holding `paths`. */
export function withActivations(paths: string[], base = PROJECT_GODOT): string {
	const value = paths.map(path => `"${path}"`).join(", ");
	return base.replace("[rendering]", `[editor_plugins]\n\nenabled=PackedStringArray(${value})\n\n[rendering]`);
}

export function makeZip(files: Record<string, string>): Uint8Array {
	return zipSync(Object.fromEntries(Object.entries(files).map(([path, content]) => [path, strToU8(content)])));
}

export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
	for (const [path, content] of Object.entries(files)) {
		const target = join(root, path);
		await mkdir(dirname(target), { recursive: true });
		await writeFile(target, content);
	}
}

/** Every file below `root`, as sorted relative paths. */
export async function listTree(root: string): Promise<string[]> {
	const out: string[] = [];
	async function walk(dir: string): Promise<void> {
		let entries: Dirent[];
		try {
			entries = await readdir(dir, { withFileTypes: true });
		} catch {
			return; // missing directory lists as empty
		}
		for (const entry of entries) {
			const full = join(dir, entry.name);
			if (entry.isDirectory()) await walk(full);
			else out.push(relative(root, full).split("\\").join("/"));
		}
	}
	await walk(root);
	return out.sort();
}

export interface TestProject {
	root: string;
	paths: ProjectPaths;
	cleanup(): Promise<void>;
}

export async function createProject(projectGodot = PROJECT_GODOT): Promise<TestProject> {
	const root = await mkdtemp(join(tmpdir(), "gdm-test-"));
	await writeFile(join(root, "project.godot"), projectGodot);
	return {
		root,
		paths: getProjectPaths(root, resolveSettings({}, {})),
		cleanup: () => rm(root, { recursive: true, force: true }),
	};
}

export interface FakeAsset {
	assetId: string;
	title: string;
	author?: string;
	godotVersion?: string;
	license?: string;
	latest: string;
	/** version -> zip contents */
	versions: Record<string, Record<string, string>>;
}

/**
 * In-memory catalog. Downloads are zipped on the fly from the asset's file map.
 */
export class FakeCatalog implements Catalog {
	readonly downloads: string[] = [];
	readonly searches: Array<{ query: string; godotVersion?: string }> = [];
	/** Asset ids whose downloads fail */
	readonly failing = new Set<string>();

	constructor(readonly assets: FakeAsset[]) {}

	#find(assetId: string): FakeAsset {
		const asset = this.assets.find(a => a.assetId === assetId);
		if (!asset) throw new GdmError("NotFound", `Catalog has no asset ${assetId}`);
		return asset;
	}

	#summary(asset: FakeAsset): AssetSummary {
		return {
			assetId: asset.assetId,
			title: asset.title,
			author: asset.author ?? "someone",
			category: "Tools",
			godotVersion: asset.godotVersion ?? "4.3",
			version: asset.latest,
			license: asset.license ?? "MIT",
			supportLevel: "community",
			modifyDate: "2026-01-01 00:00:00",
		};
	}

	async search(query: string, godotVersion?: string): Promise<AssetSummary[]> {
		this.searches.push({ query, godotVersion });
		const wanted = query.toLowerCase();
		return this.assets.filter(asset => asset.title.toLowerCase().includes(wanted)).map(asset => this.#summary(asset));
	}

	async getAsset(assetId: string): Promise<AssetDetails> {
		const asset = this.#find(assetId);
		return { ...this.#summary(asset), downloadUrl: `https://example.test/${assetId}.zip`, description: "" };
	}

	async getVersions(assetId: string): Promise<VersionInfo[]> {
		const asset = this.#find(assetId);
		const older = Object.keys(asset.versions).filter(version => version !== asset.latest);
		return [asset.latest, ...older].map(version => ({ version }));
	}

	async download(assetId: string, version: string): Promise<Uint8Array> {
		const asset = this.#find(assetId);
		if (this.failing.has(assetId)) {
			throw new GdmError("DownloadFailed", `Request for asset ${assetId} failed: HTTP 500`);
		}
		const files = asset.versions[version];
		if (!files) throw new GdmError("VersionNotFound", `Asset ${assetId} has no version "${version}"`);
		this.downloads.push(`${assetId}@${version}`);
		return makeZip(files);
	}
}

/**
 * Git transport serving repositories from memory: url -> ref -> files.
 */
export class FakeGitTransport implements GitTransport {
	readonly checkouts: string[] = [];

	constructor(readonly repos: Record<string, Record<string, Record<string, string>>>) {}

	async checkout(url: string, ref: string, dest: string): Promise<void> {
		const repo = this.repos[url];
		if (!repo) throw new Error(`fatal: repository '${url}' not found`);
		const files = repo[ref];
		if (!files) throw new Error(`fatal: Remote branch ${ref} not found in upstream origin`);
		this.checkouts.push(`${url}#${ref}`);
		await writeTree(dest, { ...files, ".git/HEAD": "ref: refs/heads/main\n" });
	}
}

export function pluginCfg(name: string, version: string): string {
	return `[plugin]\n\nname="${name}"\nversion="${version}"\nscript="plugin.gd"\n`;
}

/** Archive shaped like a typical repository download: one top dir holding addons/. */
export function gutVersion(version: string): Record<string, string> {
	return {
		[`gut-${version}/addons/gut/plugin.cfg`]: pluginCfg("Gut", version),
		[`gut-${version}/addons/gut/gut.gd`]: `extends Node # ${version}\n`,
		[`gut-${version}/README.md`]: "readme\n",
	};
}

export const GUT: FakeAsset = {
	assetId: "42",
	title: "Gut",
	latest: "9.5.0",
	versions: { "9.5.0": gutVersion("9.5.0"), "9.1.0": gutVersion("9.1.0") },
};
