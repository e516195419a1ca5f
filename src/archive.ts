import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import { unzipSync } from "fflate";
import type { Catalog } from "@gdm/catalog";
import { errorMessage, GdmError, toFilesystemError } from "@gdm/errors";
import { logger } from "@gdm/output";

const ADDONS_SEGMENT = "addons";

function isSafeArchivePath(p: string): boolean {
	if (!p) return false;
	if (p.startsWith("/")) return false;
	if (p.includes("\\")) return false;
	if (/^[A-Za-z]:/.test(p)) return false;
	const parts = p.split("/").filter(Boolean);
	if (!parts.length) return false;
	if (parts.some(x => x === "." || x === "..")) return false;
	return true;
}

function safeJoin(root: string, rel: string): string {
	const out = resolve(root, rel);
	const rootReal = resolve(root) + sep;
	if ((out + sep).startsWith(rootReal)) return out;
	throw new GdmError("CorruptArchive", `Unsafe path traversal: ${rel}`);
}

/**
 * Map archive file paths onto the addons tree they describe.
 *
 * A single top-level directory shared by every entry is stripped. When any
 * entry sits under an `addons/` segment, only content below the first such
 * segment is kept; otherwise the whole remaining tree is the addons root.
 *
 * @returns archive path -> path relative to the addons root
 */
export function normalizeArchivePaths(paths: readonly string[]): Map<string, string> {
	for (const p of paths) {
		if (!isSafeArchivePath(p)) {
			throw new GdmError("CorruptArchive", `Unsafe archive entry path: ${p}`);
		}
	}

	const split = paths.map(p => ({ original: p, parts: p.split("/").filter(Boolean) }));

	const [first] = split;
	const top = first?.parts[0];
	const sharedTop = top !== undefined && split.every(({ parts }) => parts.length > 1 && parts[0] === top);
	const stripped = sharedTop ? split.map(({ original, parts }) => ({ original, parts: parts.slice(1) })) : split;

	const hasAddons = stripped.some(({ parts }) => parts.slice(0, -1).includes(ADDONS_SEGMENT));
	const result = new Map<string, string>();

	for (const { original, parts } of stripped) {
		let kept = parts;
		if (hasAddons) {
			const index = parts.indexOf(ADDONS_SEGMENT);
			if (index < 0 || index === parts.length - 1) continue;
			kept = parts.slice(index + 1);
		}
		if (kept.length > 0) result.set(original, kept.join("/"));
	}
	return result;
}

/**
 * Unpack a zip archive into `destDir` as a normalized addons tree.
 *
 * @returns number of files written
 */
export async function extractArchive(data: Uint8Array, destDir: string): Promise<number> {
	let files: Record<string, Uint8Array>;
	try {
		files = unzipSync(data);
	} catch (err) {
		throw new GdmError("CorruptArchive", `Archive could not be decompressed: ${errorMessage(err)}`, { cause: err });
	}

	const names = Object.keys(files).filter(name => !name.endsWith("/"));
	const mapping = normalizeArchivePaths(names);

	for (const [name, rel] of mapping) {
		const content = files[name];
		if (!content) continue;
		const outPath = safeJoin(destDir, rel);
		try {
			await mkdir(dirname(outPath), { recursive: true });
			await writeFile(outPath, content);
		} catch (err) {
			throw toFilesystemError(err, outPath, "extract");
		}
	}

	logger.debug("Archive extracted", { destDir, entries: names.length, kept: mapping.size });
	return mapping.size;
}

/**
 * Download a catalog asset and stage its addons tree under `scratchDir`.
 *
 * @returns the staged addons root
 */
export async function fetchCatalogAsset(catalog: Catalog, assetId: string, version: string, scratchDir: string): Promise<string> {
	const data = await catalog.download(assetId, version);
	if (data.byteLength === 0) {
		throw new GdmError("DownloadFailed", `Download of asset ${assetId} ${version} was empty`);
	}
	const staged = join(scratchDir, "staged");
	await mkdir(staged, { recursive: true });
	await extractArchive(data, staged);
	return staged;
}
