import { fetchCatalogAsset } from "@gdm/archive";
import type { AssetSummary, Catalog } from "@gdm/catalog";
import { type Conflict, detectAllConflicts, detectConflicts, formatConflicts } from "@gdm/conflicts";
import { GdmError, isFetchStageError } from "@gdm/errors";
import { fetchGitSource, type GitTransport } from "@gdm/git";
import { parseGitUrl } from "@gdm/git-url";
import { resolveLayout } from "@gdm/layout";
import { withLock } from "@gdm/lock";
import { isCatalogRecord, ManifestStore, ownedDirs, type PluginRecord, type PluginSource } from "@gdm/manifest";
import { logger } from "@gdm/output";
import { parallelLimit } from "@gdm/parallel";
import type { ProjectPaths } from "@gdm/paths";
import { missingDirs, placeLayout, removeDirs } from "@gdm/placement";
import { activationPath, ProjectConfig } from "@gdm/project-config";
import { type AssetChooser, resolveAssetByName, resolveCatalogVersion, resolveGitRef, resolveLatestVersion } from "@gdm/resolver";
import { ScratchCache } from "@gdm/scratch";

export interface EngineOptions {
	paths: ProjectPaths;
	catalog: Catalog;
	git: GitTransport;
	/** Worker limit for per-plugin fetches */
	concurrency?: number;
	/** Asked when a name search matches several assets */
	chooseAsset?: AssetChooser;
}

export interface AddRequest {
	/** Plugin name, searched in the catalog unless an asset id or git URL is given */
	name?: string;
	version?: string;
	assetId?: string;
	gitUrl?: string;
	ref?: string;
	/** Overwrite directories owned by other records */
	force?: boolean;
}

export interface AddResult {
	record: PluginRecord;
	previous?: PluginRecord;
}

export type PluginAction = "installed" | "updated" | "unchanged" | "skipped" | "removed";

export interface PluginResult {
	name: string;
	ok: boolean;
	action?: PluginAction;
	from?: string;
	to?: string;
	error?: GdmError;
}

export interface BatchResult {
	results: PluginResult[];
	/** Activation entries added and removed by the operation */
	activated: string[];
	deactivated: string[];
}

export interface OutdatedEntry {
	name: string;
	assetId: string;
	current: string;
	latest: string;
	outdated: boolean;
}

export interface OutdatedReport {
	entries: OutdatedEntry[];
	failures: PluginResult[];
}

export interface PluginStatus {
	record: PluginRecord;
	missing: string[];
	activated: boolean;
}

export interface ProjectStatus {
	plugins: PluginStatus[];
	/** Enabled records whose descriptor is not in the activation list */
	inactive: string[];
	/** Activation entries with no enabled record behind them */
	unmanaged: string[];
	conflicts: Conflict[];
}

export function batchFailed(batch: { results: PluginResult[] }): boolean {
	return batch.results.some(result => !result.ok);
}

interface Transaction {
	manifest: ManifestStore;
	config: ProjectConfig;
	scratch: ScratchCache;
}

interface Fetched {
	record: PluginRecord;
	previous?: PluginRecord;
}

function tagError(err: unknown, name: string): unknown {
	return err instanceof GdmError ? err.forPlugin(name) : err;
}

function sourceLabel(source: PluginSource): string {
	return source.type === "catalog" ? source.version : source.ref;
}

/**
 * Reconciles the manifest, the addons tree and the activation section of
 * project.godot.
 *
 * Mutating operations hold the project lock, place files first and then write
 * the manifest and the project file once each. Scratch space is released
 * before every operation returns.
 */
export class Engine {
	readonly paths: ProjectPaths;
	readonly #catalog: Catalog;
	readonly #git: GitTransport;
	readonly #concurrency: number;
	readonly #chooseAsset?: AssetChooser;

	constructor(options: EngineOptions) {
		this.paths = options.paths;
		this.#catalog = options.catalog;
		this.#git = options.git;
		this.#concurrency = Math.max(1, options.concurrency ?? 4);
		this.#chooseAsset = options.chooseAsset;
	}

	#activationPath(installPath: string): string {
		return activationPath(this.paths.addonsDirName, installPath);
	}

	#expectedActivations(manifest: ManifestStore): string[] {
		return manifest
			.records()
			.filter(record => record.enabled)
			.map(record => this.#activationPath(record.installPath));
	}

	async #transaction<T>(fn: (tx: Transaction) => Promise<T>): Promise<T> {
		return withLock(this.paths.lock, async () => {
			// Both stores are parsed before anything is fetched or placed
			const manifest = await ManifestStore.load(this.paths.manifest);
			const config = await ProjectConfig.load(this.paths.projectFile);
			const scratch = new ScratchCache(this.paths.cache);
			try {
				const result = await fn({ manifest, config, scratch });
				await manifest.save();
				await config.save();
				return result;
			} finally {
				await scratch.releaseAll();
			}
		});
	}

	/**
	 * Fetch `source`, place its directories and record the result in the manifest.
	 * Directories the previous version owned but the new one does not are deleted.
	 */
	async #fetchAndPlace(
		tx: Transaction,
		source: PluginSource,
		identity: string,
		details: { name?: string; title?: string; godotVersion?: string; license?: string; force?: boolean },
	): Promise<Fetched> {
		return tx.scratch.with(details.name ?? identity, async scratchDir => {
			const staged =
				source.type === "catalog"
					? await fetchCatalogAsset(this.#catalog, source.assetId, source.version, scratchDir)
					: await fetchGitSource(this.#git, source.url, source.ref, scratchDir);
			const layout = await resolveLayout(staged, identity);

			const previous = tx.manifest.findBySource(source) ?? tx.manifest.get(details.name ?? layout.primary);
			const name = previous?.name ?? details.name ?? layout.primary;
			const dirs = [layout.primary, ...layout.subAssets];

			const conflicts = detectConflicts(name, dirs, tx.manifest.records());
			if (conflicts.length > 0 && !details.force) {
				throw new GdmError("Conflict", formatConflicts(conflicts).join("; "), {
					plugin: name,
					hint: "Remove the other plugin first, or pass --force to overwrite.",
				});
			}

			await placeLayout(layout, this.paths.addons);

			const record: PluginRecord = {
				name,
				source,
				title: details.title ?? previous?.title,
				installPath: layout.primary,
				subAssets: layout.subAssets,
				enabled: layout.enabled,
				godotVersion: details.godotVersion ?? previous?.godotVersion,
				license: details.license ?? previous?.license,
			};

			if (previous) {
				const others = tx.manifest.records().filter(other => other.name !== previous.name);
				const stale = ownedDirs(previous).filter(dir => !dirs.includes(dir));
				await removeDirs(this.paths.addons, stale, [...others.flatMap(ownedDirs), ...dirs]);
				if (previous.name !== name) tx.manifest.remove(previous.name);
			}
			tx.manifest.upsert(record);
			return { record, previous };
		});
	}

	/** Move a record's activation entry to match its new layout. */
	#reactivate(config: ProjectConfig, record: PluginRecord, previous?: PluginRecord): { activated: string[]; deactivated: string[] } {
		const wanted = record.enabled ? [this.#activationPath(record.installPath)] : [];
		const old = previous?.enabled ? [this.#activationPath(previous.installPath)] : [];
		const drop = old.filter(path => !wanted.includes(path));
		const before = config.activated;
		config.deactivate(drop);
		config.activate(wanted);
		const after = config.activated;
		return {
			activated: after.filter(path => !before.includes(path)),
			deactivated: before.filter(path => !after.includes(path)),
		};
	}

	/**
	 * Add a plugin, or move an already tracked one to another version or ref.
	 */
	async add(request: AddRequest): Promise<AddResult> {
		const { name, assetId, gitUrl } = request;
		if (gitUrl && (assetId || request.version)) {
			throw new GdmError("Usage", "A git source takes --ref, not --asset-id or --version");
		}
		if (name && assetId) {
			throw new GdmError("Usage", "Give a plugin name or --asset-id, not both");
		}
		if (!gitUrl && !assetId && !name) {
			throw new GdmError("Usage", "Give a plugin name, --asset-id or --git");
		}

		return this.#transaction(async tx => {
			let fetched: Fetched;

			if (gitUrl) {
				const parsed = parseGitUrl(gitUrl);
				if (!parsed) {
					throw new GdmError("Usage", `Not a git repository URL: ${gitUrl}`);
				}
				const source: PluginSource = { type: "git", url: parsed.url, ref: resolveGitRef(request.ref ?? parsed.ref) };
				const tracked = tx.manifest.findBySource(source);
				const identity = tracked?.installPath ?? name ?? parsed.name;
				fetched = await this.#fetchAndPlace(tx, source, identity, { name: tracked?.name, force: request.force });
			} else {
				let summary: AssetSummary | undefined;
				if (!assetId && name) {
					summary = await resolveAssetByName(this.#catalog, name, tx.config.godotVersion(), this.#chooseAsset);
				}
				const id = assetId ?? summary?.assetId;
				if (!id) throw new GdmError("NotFound", `No catalog asset for "${name ?? ""}"`);

				const { asset, version } = await resolveCatalogVersion(this.#catalog, id, request.version);
				const source: PluginSource = { type: "catalog", assetId: id, version };
				const tracked = tx.manifest.findBySource(source);
				const identity = tracked?.installPath ?? name ?? asset.title;
				fetched = await this.#fetchAndPlace(tx, source, identity, {
					name: tracked?.name,
					title: asset.title,
					godotVersion: asset.godotVersion || undefined,
					license: asset.license || undefined,
					force: request.force,
				});
			}

			this.#reactivate(tx.config, fetched.record, fetched.previous);
			logger.debug("Added plugin", { name: fetched.record.name, source: fetched.record.source });
			return fetched;
		});
	}

	/**
	 * Restore every record whose directories are missing at its recorded
	 * version, then make the activation section match the manifest exactly.
	 */
	async install(options: { force?: boolean } = {}): Promise<BatchResult> {
		return this.#transaction(async tx => {
			const records = tx.manifest.records();
			const results = await parallelLimit(records, this.#concurrency, async (record): Promise<PluginResult> => {
				const missing = await missingDirs(this.paths.addons, record);
				if (missing.length === 0) {
					return { name: record.name, ok: true, action: "unchanged", to: sourceLabel(record.source) };
				}
				try {
					await this.#fetchAndPlace(tx, record.source, record.installPath, { name: record.name, force: options.force });
					return { name: record.name, ok: true, action: "installed", to: sourceLabel(record.source) };
				} catch (err) {
					return this.#failure(record.name, err);
				}
			});
			this.#throwFatal(results);

			const before = tx.config.activated;
			tx.config.setActivated(this.#expectedActivations(tx.manifest));
			const after = tx.config.activated;
			return {
				results,
				activated: after.filter(path => !before.includes(path)),
				deactivated: before.filter(path => !after.includes(path)),
			};
		});
	}

	/**
	 * Move catalog records to the catalog's latest version. Git records are never touched.
	 */
	async update(names: string[] = [], options: { force?: boolean } = {}): Promise<BatchResult> {
		return this.#transaction(async tx => {
			const records = this.#select(tx.manifest, names);
			const activated: string[] = [];
			const deactivated: string[] = [];

			const results = await parallelLimit(records, this.#concurrency, async (record): Promise<PluginResult> => {
				if (!isCatalogRecord(record)) {
					return { name: record.name, ok: true, action: "skipped", from: sourceLabel(record.source) };
				}
				const current = record.source.version;
				try {
					const latest = await resolveLatestVersion(this.#catalog, record.source.assetId);
					if (latest === current) {
						return { name: record.name, ok: true, action: "unchanged", from: current, to: latest };
					}
					const source: PluginSource = { type: "catalog", assetId: record.source.assetId, version: latest };
					await this.#fetchAndPlace(tx, source, record.installPath, { name: record.name, force: options.force });
					return { name: record.name, ok: true, action: "updated", from: current, to: latest };
				} catch (err) {
					return this.#failure(record.name, err);
				}
			});
			this.#throwFatal(results);

			for (const result of results) {
				const before = records.find(record => record.name === result.name);
				const after = tx.manifest.get(result.name);
				if (result.action !== "updated" || !after) continue;
				const change = this.#reactivate(tx.config, after, before);
				activated.push(...change.activated);
				deactivated.push(...change.deactivated);
			}
			return { results, activated, deactivated };
		});
	}

	/**
	 * Report catalog records with a newer version available. Nothing is written.
	 */
	async outdated(names: string[] = []): Promise<OutdatedReport> {
		const manifest = await ManifestStore.load(this.paths.manifest);
		const records = this.#select(manifest, names).filter(isCatalogRecord);

		const results = await parallelLimit(records, this.#concurrency, async record => {
			try {
				const latest = await resolveLatestVersion(this.#catalog, record.source.assetId);
				const entry: OutdatedEntry = {
					name: record.name,
					assetId: record.source.assetId,
					current: record.source.version,
					latest,
					outdated: latest !== record.source.version,
				};
				return entry;
			} catch (err) {
				return this.#failure(record.name, err);
			}
		});
		this.#throwFatal(results.filter((r): r is PluginResult => "ok" in r));

		return {
			entries: results.filter((r): r is OutdatedEntry => "latest" in r),
			failures: results.filter((r): r is PluginResult => "ok" in r),
		};
	}

	/**
	 * Delete plugins with their sub-assets and drop their activation entries.
	 * Every name must be tracked; nothing is removed otherwise.
	 */
	async remove(names: string[]): Promise<PluginRecord[]> {
		if (names.length === 0) throw new GdmError("Usage", "Give at least one plugin name to remove");

		return this.#transaction(async tx => {
			const unknown = names.filter(name => !tx.manifest.has(name));
			if (unknown.length > 0) {
				throw new GdmError("NotFound", `Plugin not tracked: ${unknown.join(", ")}`, {
					plugin: unknown[0],
					hint: "Run gdm list to see tracked plugins.",
				});
			}

			const removed: PluginRecord[] = [];
			for (const name of new Set(names)) {
				const record = tx.manifest.remove(name);
				if (!record) continue;
				const keep = tx.manifest.records().flatMap(ownedDirs);
				await removeDirs(this.paths.addons, ownedDirs(record), keep);
				if (record.enabled) tx.config.deactivate([this.#activationPath(record.installPath)]);
				removed.push(record);
			}
			return removed;
		});
	}

	/**
	 * Read-only consistency report across the manifest, the addons tree and
	 * the activation section.
	 */
	async status(): Promise<ProjectStatus> {
		const manifest = await ManifestStore.load(this.paths.manifest);
		const config = await ProjectConfig.load(this.paths.projectFile);
		const active = config.activated;

		const plugins: PluginStatus[] = [];
		for (const record of manifest.records()) {
			plugins.push({
				record,
				missing: await missingDirs(this.paths.addons, record),
				activated: active.includes(this.#activationPath(record.installPath)),
			});
		}

		const expected = this.#expectedActivations(manifest);
		return {
			plugins,
			inactive: expected.filter(path => !active.includes(path)),
			unmanaged: active.filter(path => !expected.includes(path)),
			conflicts: detectAllConflicts(manifest.records()),
		};
	}

	#select(manifest: ManifestStore, names: string[]): PluginRecord[] {
		if (names.length === 0) return manifest.records();
		const unknown = names.filter(name => !manifest.has(name));
		if (unknown.length > 0) {
			throw new GdmError("NotFound", `Plugin not tracked: ${unknown.join(", ")}`, { plugin: unknown[0] });
		}
		return manifest.records().filter(record => names.includes(record.name));
	}

	#failure(name: string, err: unknown): PluginResult {
		const tagged = tagError(err, name);
		if (tagged instanceof GdmError) {
			logger.debug("Plugin step failed", { name, code: tagged.code });
			return { name, ok: false, error: tagged };
		}
		return { name, ok: false, error: new GdmError("FilesystemError", String(err), { plugin: name, cause: err }) };
	}

	/** Persistence-class failures abort the whole operation. */
	#throwFatal(results: PluginResult[]): void {
		const fatal = results.find(result => result.error && !isFetchStageError(result.error));
		if (fatal?.error) throw fatal.error;
	}
}
