import { z } from "zod";
import { GdmError } from "@gdm/errors";

export const DEFAULT_API_URL = "https://godotengine.org/asset-library/api";

const positiveInt = z.coerce.number().int().positive();

const settingsSchema = z.object({
	apiUrl: z
		.string()
		.url()
		.transform(url => url.replace(/\/+$/, "")),
	manifestFile: z.string().min(1),
	projectFile: z.string().min(1),
	addonsDir: z.string().min(1),
	cacheDir: z.string().min(1),
	timeoutMs: positiveInt,
	concurrency: positiveInt.max(32),
});

export type Settings = z.infer<typeof settingsSchema>;

const settingKeys = settingsSchema.keyof();

/** Raw (unvalidated) settings as they come from flags or the environment. */
export type SettingsInput = { [K in keyof Settings]?: string | number };

const ENV_KEYS: Record<keyof Settings, string> = {
	apiUrl: "GDM_API_URL",
	manifestFile: "GDM_MANIFEST",
	projectFile: "GDM_PROJECT_FILE",
	addonsDir: "GDM_ADDONS_DIR",
	cacheDir: "GDM_CACHE_DIR",
	timeoutMs: "GDM_TIMEOUT_MS",
	concurrency: "GDM_CONCURRENCY",
};

const DEFAULTS: Record<keyof Settings, string | number> = {
	apiUrl: DEFAULT_API_URL,
	manifestFile: "gdm.json",
	projectFile: "project.godot",
	addonsDir: "addons",
	cacheDir: ".gdm",
	timeoutMs: 30_000,
	concurrency: 4,
};

/**
 * Resolve settings: explicit overrides first, then environment variables, then defaults.
 */
export function resolveSettings(overrides: SettingsInput = {}, env: NodeJS.ProcessEnv = process.env): Settings {
	const raw: Record<string, string | number> = {};
	for (const key of settingKeys.options) {
		const envValue = env[ENV_KEYS[key]];
		raw[key] = overrides[key] ?? (envValue !== undefined && envValue !== "" ? envValue : DEFAULTS[key]);
	}

	const parsed = settingsSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(issue => {
			const key = settingKeys.safeParse(issue.path[0]);
			if (!key.success) return issue.message;
			return `${key.data} (${ENV_KEYS[key.data]}): ${issue.message}`;
		});
		throw new GdmError("Usage", `Invalid settings:\n  ${issues.join("\n  ")}`);
	}
	return parsed.data;
}
