import type { AssetDetails, AssetSummary, Catalog } from "@gdm/catalog";
import { GdmError } from "@gdm/errors";
import { sanitize } from "@gdm/output";

export const DEFAULT_GIT_REF = "main";

/**
 * Picks one asset when a name search is ambiguous. Returning undefined
 * declines the choice.
 */
export type AssetChooser = (name: string, candidates: AssetSummary[]) => Promise<AssetSummary | undefined>;

export interface ResolvedCatalogVersion {
	asset: AssetDetails;
	version: string;
}

/**
 * Determine the version to fetch for a catalog asset: the explicit version when
 * the catalog offers it, otherwise the catalog's latest.
 */
export async function resolveCatalogVersion(catalog: Catalog, assetId: string, explicitVersion?: string): Promise<ResolvedCatalogVersion> {
	const asset = await catalog.getAsset(assetId);
	if (!explicitVersion || explicitVersion === asset.version) {
		return { asset, version: asset.version };
	}

	const versions = await catalog.getVersions(assetId);
	if (!versions.some(v => v.version === explicitVersion)) {
		const offered = versions.map(v => v.version).join(", ");
		throw new GdmError("VersionNotFound", `${sanitize(asset.title)} (${assetId}) has no version "${explicitVersion}"`, {
			hint: offered ? `Available versions: ${sanitize(offered)}` : undefined,
		});
	}
	return { asset, version: explicitVersion };
}

/** Latest version the catalog reports for an asset. */
export async function resolveLatestVersion(catalog: Catalog, assetId: string): Promise<string> {
	return (await catalog.getAsset(assetId)).version;
}

/**
 * Git sources need no lookup: the ref is the version.
 */
export function resolveGitRef(ref?: string): string {
	const trimmed = ref?.trim();
	return trimmed ? trimmed : DEFAULT_GIT_REF;
}

/**
 * Find the catalog asset a plugin name refers to.
 *
 * A single hit wins. Among several, an exact (case-insensitive) title match
 * wins; otherwise `choose` decides, and without it the name is ambiguous.
 */
export async function resolveAssetByName(
	catalog: Catalog,
	name: string,
	godotVersion: string | undefined,
	choose?: AssetChooser,
): Promise<AssetSummary> {
	const results = await catalog.search(name, godotVersion);
	const forVersion = godotVersion ? ` for Godot ${godotVersion}` : "";

	if (results.length === 0) {
		throw new GdmError("NotFound", `No asset named "${name}" found in the catalog${forVersion}`, {
			hint: "Check the spelling, or pass --asset-id.",
		});
	}

	const [only] = results;
	if (results.length === 1 && only) return only;

	const wanted = name.toLowerCase();
	const exact = results.filter(r => r.title.toLowerCase() === wanted);
	if (exact.length === 1 && exact[0]) return exact[0];

	if (choose) {
		const chosen = await choose(name, results);
		if (chosen) return chosen;
	}

	const listing = results.map(r => `  ${sanitize(r.title)} (asset id ${r.assetId})`).join("\n");
	throw new GdmError("NotFound", `"${name}" matches ${results.length} assets${forVersion}:\n${listing}`, {
		hint: "Pass --asset-id to pick one.",
	});
}
