import { readFile } from "node:fs/promises";
import { z } from "zod";
import { errnoCode, errorMessage, GdmError, toFilesystemError } from "@gdm/errors";
import { writeFileAtomic } from "@gdm/files";
import { logger } from "@gdm/output";

/** A directory name directly under the addons tree. */
const installDirSchema = z
	.string()
	.min(1)
	.refine(value => !/[\\/]/.test(value) && value !== "." && value !== "..", {
		message: "must be a single directory name under the addons tree",
	});

const catalogSourceSchema = z.object({
	type: z.literal("catalog"),
	assetId: z.string().min(1),
	version: z.string().min(1),
});

const gitSourceSchema = z.object({
	type: z.literal("git"),
	url: z.string().min(1),
	ref: z.string().min(1),
});

const sourceSchema = z.discriminatedUnion("type", [catalogSourceSchema, gitSourceSchema]);

const entrySchema = z.object({
	source: sourceSchema,
	title: z.string().optional(),
	installPath: installDirSchema,
	subAssets: z.array(installDirSchema).default([]),
	enabled: z.boolean().default(true),
	godotVersion: z.string().optional(),
	license: z.string().optional(),
});

const manifestSchema = z.object({
	plugins: z.record(z.string().min(1), entrySchema).default({}),
});

export type CatalogSource = z.infer<typeof catalogSourceSchema>;
export type GitSource = z.infer<typeof gitSourceSchema>;
export type PluginSource = z.infer<typeof sourceSchema>;

/**
 * One tracked plugin. The name is the manifest key.
 */
export interface PluginRecord {
	name: string;
	source: PluginSource;
	title?: string;
	/** Primary directory under the addons tree */
	installPath: string;
	/** Co-bundled directories placed alongside the primary, never activated */
	subAssets: string[];
	/** Primary ships a plugin descriptor and belongs in the activation section */
	enabled: boolean;
	godotVersion?: string;
	license?: string;
}

export function isCatalogRecord(record: PluginRecord): record is PluginRecord & { source: CatalogSource } {
	return record.source.type === "catalog";
}

export function sameSource(a: PluginSource, b: PluginSource): boolean {
	if (a.type === "catalog" && b.type === "catalog") return a.assetId === b.assetId;
	if (a.type === "git" && b.type === "git") return normalizeGitUrl(a.url) === normalizeGitUrl(b.url);
	return false;
}

function normalizeGitUrl(url: string): string {
	return url.replace(/\/+$/, "").replace(/\.git$/, "").toLowerCase();
}

export function describeSource(source: PluginSource): string {
	return source.type === "catalog" ? `asset ${source.assetId} @ ${source.version}` : `${source.url} @ ${source.ref}`;
}

/** Every directory a record owns under the addons tree. */
export function ownedDirs(record: PluginRecord): string[] {
	return [record.installPath, ...record.subAssets];
}

function serializeSource(source: PluginSource): PluginSource {
	return source.type === "catalog"
		? { type: "catalog", assetId: source.assetId, version: source.version }
		: { type: "git", url: source.url, ref: source.ref };
}

/**
 * In-memory manifest, loaded once per operation and written back wholesale.
 */
export class ManifestStore {
	readonly #records = new Map<string, PluginRecord>();
	#persisted: string | null;

	private constructor(
		readonly path: string,
		persisted: string | null,
	) {
		this.#persisted = persisted;
	}

	/**
	 * Load the manifest at `path`. A missing file is an empty manifest.
	 */
	static async load(path: string): Promise<ManifestStore> {
		let text: string;
		try {
			text = await readFile(path, "utf-8");
		} catch (err) {
			if (errnoCode(err) === "ENOENT") return new ManifestStore(path, null);
			throw toFilesystemError(err, path, "read");
		}

		let data: unknown;
		try {
			data = JSON.parse(text);
		} catch (err) {
			throw new GdmError("CorruptManifest", `${path} is not valid JSON: ${errorMessage(err)}`, { cause: err });
		}

		const parsed = manifestSchema.safeParse(data);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			const where = issue ? issue.path.join(".") || "(root)" : "(root)";
			throw new GdmError("CorruptManifest", `${path} is malformed at ${where}: ${issue?.message ?? "invalid"}`, {
				cause: parsed.error,
			});
		}

		const store = new ManifestStore(path, text);
		for (const [name, entry] of Object.entries(parsed.data.plugins)) {
			store.#records.set(name, { name, ...entry });
		}
		return store;
	}

	static empty(path: string): ManifestStore {
		return new ManifestStore(path, null);
	}

	get size(): number {
		return this.#records.size;
	}

	/** Records sorted by name. */
	records(): PluginRecord[] {
		return [...this.#records.values()].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
	}

	get(name: string): PluginRecord | undefined {
		return this.#records.get(name);
	}

	has(name: string): boolean {
		return this.#records.has(name);
	}

	/** The record already tracking the same asset id or git repository. */
	findBySource(source: PluginSource): PluginRecord | undefined {
		return this.records().find(record => sameSource(record.source, source));
	}

	upsert(record: PluginRecord): void {
		this.#records.set(record.name, { ...record, subAssets: [...record.subAssets] });
	}

	remove(name: string): PluginRecord | undefined {
		const record = this.#records.get(name);
		this.#records.delete(name);
		return record;
	}

	serialize(): string {
		const plugins: Record<string, unknown> = {};
		for (const record of this.records()) {
			plugins[record.name] = {
				source: serializeSource(record.source),
				title: record.title,
				installPath: record.installPath,
				subAssets: record.subAssets,
				enabled: record.enabled,
				godotVersion: record.godotVersion,
				license: record.license,
			};
		}
		return `${JSON.stringify({ plugins }, null, 2)}\n`;
	}

	/**
	 * Write the manifest atomically. Unchanged content is not rewritten.
	 *
	 * @returns whether the file was written
	 */
	async save(): Promise<boolean> {
		const text = this.serialize();
		if (text === this.#persisted) return false;
		await writeFileAtomic(this.path, text);
		this.#persisted = text;
		logger.debug("Saved manifest", { path: this.path, plugins: this.size });
		return true;
	}
}
