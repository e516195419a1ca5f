import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { errorMessage, GdmError } from "@gdm/errors";
import { logger } from "@gdm/output";
import { getRetryDelayMs, isRetryableStatus } from "@gdm/retry-after";

/**
 * One search hit in the asset library.
 */
export interface AssetSummary {
	assetId: string;
	title: string;
	author: string;
	category: string;
	godotVersion: string;
	/** Human version string, e.g. "9.5.0" */
	version: string;
	license: string;
	supportLevel: string;
	modifyDate: string;
}

export interface AssetDetails extends AssetSummary {
	downloadUrl: string;
	description: string;
}

/**
 * A version the catalog offers for an asset. Older versions come from the
 * asset's accepted edits and carry the edit id needed to find their download.
 */
export interface VersionInfo {
	version: string;
	editId?: string;
	downloadUrl?: string;
}

/**
 * Remote catalog the engine resolves and downloads catalog assets from.
 */
export interface Catalog {
	search(query: string, godotVersion?: string): Promise<AssetSummary[]>;
	getAsset(assetId: string): Promise<AssetDetails>;
	/** Every version on offer, latest first. */
	getVersions(assetId: string): Promise<VersionInfo[]>;
	download(assetId: string, version: string): Promise<Uint8Array>;
}

const idSchema = z.union([z.string(), z.number()]).transform(String);
const text = z
	.union([z.string(), z.number()])
	.nullish()
	.transform(value => (value === null || value === undefined ? "" : String(value)));

const summarySchema = z.object({
	asset_id: idSchema,
	title: text,
	author: text,
	category: text,
	godot_version: text,
	version_string: text,
	cost: text,
	support_level: text,
	modify_date: text,
});

const detailsSchema = summarySchema.extend({
	download_url: text,
	description: text,
});

const searchResponseSchema = z.object({
	result: z.array(summarySchema),
});

const editListSchema = z.object({
	result: z.array(
		z.object({
			edit_id: idSchema,
			asset_id: idSchema,
			version_string: text,
		}),
	),
	pages: z.coerce.number().int().nonnegative().default(1),
});

const editSchema = z.object({
	edit_id: idSchema,
	asset_id: idSchema,
	version_string: text,
	download_url: text,
});

function toSummary(raw: z.infer<typeof summarySchema>): AssetSummary {
	return {
		assetId: raw.asset_id,
		title: raw.title,
		author: raw.author,
		category: raw.category,
		godotVersion: raw.godot_version,
		version: raw.version_string,
		license: raw.cost,
		supportLevel: raw.support_level,
		modifyDate: raw.modify_date,
	};
}

export interface HttpCatalogOptions {
	baseUrl: string;
	timeoutMs: number;
	/** Retries for rate-limited / unavailable responses */
	maxRetries?: number;
	fetch?: typeof fetch;
	sleep?: (ms: number) => Promise<unknown>;
}

/**
 * Aborts once no progress is reported for `ms`. Each attempt arms a fresh
 * signal; every received chunk pushes the deadline back.
 */
class IdleDeadline {
	#controller = new AbortController();
	#timer: ReturnType<typeof setTimeout> | undefined;

	constructor(readonly ms: number) {}

	arm(): AbortSignal {
		this.#controller = new AbortController();
		this.touch();
		return this.#controller.signal;
	}

	touch(): void {
		clearTimeout(this.#timer);
		const controller = this.#controller;
		this.#timer = setTimeout(
			() => controller.abort(Object.assign(new Error(`no data for ${this.ms}ms`), { name: "TimeoutError" })),
			this.ms,
		);
	}

	clear(): void {
		clearTimeout(this.#timer);
	}
}

function isTimeout(err: unknown): boolean {
	return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

async function readBody(response: Response, onProgress: () => void): Promise<Uint8Array> {
	if (!response.body) return new Uint8Array(await response.arrayBuffer());
	const reader = response.body.getReader();
	const chunks: Uint8Array[] = [];
	let size = 0;
	for (;;) {
		const { done, value } = await reader.read();
		if (done) break;
		if (!(value instanceof Uint8Array)) continue;
		chunks.push(value);
		size += value.byteLength;
		onProgress();
	}
	const bytes = new Uint8Array(size);
	let offset = 0;
	for (const chunk of chunks) {
		bytes.set(chunk, offset);
		offset += chunk.byteLength;
	}
	return bytes;
}

/** Stop paging edit history after this many pages. */
const MAX_EDIT_PAGES = 50;

/**
 * Catalog backed by the Godot Asset Library HTTP API.
 */
export class HttpCatalog implements Catalog {
	readonly #baseUrl: string;
	readonly #timeoutMs: number;
	readonly #maxRetries: number;
	readonly #fetch: typeof fetch;
	readonly #sleep: (ms: number) => Promise<unknown>;

	constructor(options: HttpCatalogOptions) {
		this.#baseUrl = options.baseUrl.replace(/\/+$/, "");
		this.#timeoutMs = options.timeoutMs;
		this.#maxRetries = options.maxRetries ?? 2;
		this.#fetch = options.fetch ?? fetch;
		this.#sleep = options.sleep ?? (ms => sleep(ms));
	}

	async search(query: string, godotVersion?: string): Promise<AssetSummary[]> {
		const params: Record<string, string> = { filter: query };
		if (godotVersion) params.godot_version = godotVersion;
		const data = await this.#getJson("/asset", params, searchResponseSchema, `search "${query}"`);
		return data.result.map(toSummary);
	}

	async getAsset(assetId: string): Promise<AssetDetails> {
		const raw = await this.#getJson(`/asset/${encodeURIComponent(assetId)}`, {}, detailsSchema, `asset ${assetId}`);
		return { ...toSummary(raw), downloadUrl: raw.download_url, description: raw.description };
	}

	async getVersions(assetId: string): Promise<VersionInfo[]> {
		const latest = await this.getAsset(assetId);
		const versions: VersionInfo[] = [{ version: latest.version, downloadUrl: latest.downloadUrl }];
		const seen = new Set([latest.version]);

		for (let page = 0; page < MAX_EDIT_PAGES; page++) {
			const edits = await this.#getJson(
				"/asset/edit",
				{ asset: assetId, status: "new accepted", page: String(page) },
				editListSchema,
				`version history of asset ${assetId}`,
			);
			for (const edit of edits.result) {
				if (edit.asset_id !== assetId || !edit.version_string || seen.has(edit.version_string)) continue;
				seen.add(edit.version_string);
				versions.push({ version: edit.version_string, editId: edit.edit_id });
			}
			if (edits.result.length === 0 || page >= edits.pages - 1) break;
		}

		return versions;
	}

	async download(assetId: string, version: string): Promise<Uint8Array> {
		const url = await this.#resolveDownloadUrl(assetId, version);
		logger.debug("Downloading asset", { assetId, version, url });
		// The timeout bounds silence on the wire, not the whole transfer
		const deadline = new IdleDeadline(this.#timeoutMs);
		try {
			const response = await this.#request(url, `download of asset ${assetId} ${version}`, () => deadline.arm());
			return await readBody(response, () => deadline.touch());
		} catch (err) {
			if (err instanceof GdmError) throw err;
			const reason = isTimeout(err) ? `stalled for ${this.#timeoutMs}ms` : errorMessage(err);
			throw new GdmError("DownloadFailed", `Download of asset ${assetId} ${version} was interrupted: ${reason}`, { cause: err });
		} finally {
			deadline.clear();
		}
	}

	async #resolveDownloadUrl(assetId: string, version: string): Promise<string> {
		const versions = await this.getVersions(assetId);
		const match = versions.find(v => v.version === version);
		if (!match) {
			throw new GdmError("VersionNotFound", `Asset ${assetId} has no version "${version}"`);
		}
		let url = match.downloadUrl;
		if (!url && match.editId) {
			const edit = await this.#getJson(`/asset/edit/${encodeURIComponent(match.editId)}`, {}, editSchema, `edit ${match.editId}`);
			url = edit.download_url;
		}
		if (!url) {
			throw new GdmError("DownloadFailed", `The catalog has no download URL for asset ${assetId} ${version}`);
		}
		return url;
	}

	async #getJson<S extends z.ZodTypeAny>(path: string, params: Record<string, string>, schema: S, what: string): Promise<z.output<S>> {
		const query = new URLSearchParams(params).toString();
		const url = `${this.#baseUrl}${path}${query ? `?${query}` : ""}`;
		const response = await this.#request(url, what);

		let body: unknown;
		try {
			body = await response.json();
		} catch (err) {
			throw new GdmError("DownloadFailed", `Catalog returned invalid JSON for ${what}`, { cause: err });
		}
		const parsed = schema.safeParse(body);
		if (!parsed.success) {
			// The asset library answers unknown ids with an empty object / error body
			throw new GdmError("NotFound", `Catalog has no ${what}`, { cause: parsed.error });
		}
		return parsed.data;
	}

	async #request(url: string, what: string, signal: () => AbortSignal = () => AbortSignal.timeout(this.#timeoutMs)): Promise<Response> {
		for (let attempt = 0; ; attempt++) {
			let response: Response;
			try {
				response = await this.#fetch(url, { signal: signal() });
			} catch (err) {
				const reason = isTimeout(err) ? `timed out after ${this.#timeoutMs}ms` : errorMessage(err);
				throw new GdmError("DownloadFailed", `Request for ${what} failed: ${reason}`, { cause: err });
			}

			if (response.ok) return response;

			if (isRetryableStatus(response.status) && attempt < this.#maxRetries) {
				const delay = getRetryDelayMs(response.headers, attempt);
				logger.debug("Catalog asked to retry", { url, status: response.status, delay });
				await this.#sleep(delay);
				continue;
			}

			if (response.status === 404) {
				throw new GdmError("NotFound", `Catalog has no ${what}`);
			}
			throw new GdmError("DownloadFailed", `Request for ${what} failed: HTTP ${response.status} ${response.statusText}`.trim());
		}
	}
}
