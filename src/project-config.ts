import { readFile } from "node:fs/promises";
import { errnoCode, GdmError, toFilesystemError } from "@gdm/errors";
import { writeFileAtomic } from "@gdm/files";
import { logger } from "@gdm/output";

/** Section gdm owns in project.godot. */
export const MANAGED_SECTION = "editor_plugins";
const MANAGED_KEY = "enabled";

type ConfigLine =
	| { kind: "blank" | "comment" | "other"; raw: string[] }
	| { kind: "section"; name: string; raw: string[] }
	| { kind: "entry"; key: string; value: string; raw: string[] };

interface SectionRange {
	/** Index of the header line */
	header: number;
	/** Index one past the section's last line */
	end: number;
}

/**
 * Scan a value for brackets left open outside double-quoted strings.
 */
function openDepth(text: string, state: { depth: number; inString: boolean }): void {
	for (let i = 0; i < text.length; i++) {
		const ch = text[i];
		if (state.inString) {
			if (ch === "\\") i++;
			else if (ch === '"') state.inString = false;
			continue;
		}
		if (ch === '"') state.inString = true;
		else if (ch === "(" || ch === "[" || ch === "{") state.depth++;
		else if (ch === ")" || ch === "]" || ch === "}") state.depth--;
	}
}

function parseLines(text: string, path: string): ConfigLine[] {
	const physical = text.split(/\r?\n/);
	if (physical.length > 0 && physical[physical.length - 1] === "") physical.pop();

	const lines: ConfigLine[] = [];
	for (let i = 0; i < physical.length; i++) {
		const line = physical[i] ?? "";
		const trimmed = line.trim();

		if (!trimmed) {
			lines.push({ kind: "blank", raw: [line] });
			continue;
		}
		if (trimmed.startsWith(";") || trimmed.startsWith("#")) {
			lines.push({ kind: "comment", raw: [line] });
			continue;
		}
		if (trimmed.startsWith("[")) {
			const header = /^\[([^\]]+)\]$/.exec(trimmed);
			if (!header?.[1]) {
				throw new GdmError("ConfigParseError", `${path}:${i + 1}: malformed section header ${trimmed}`);
			}
			lines.push({ kind: "section", name: header[1].trim(), raw: [line] });
			continue;
		}

		const eq = line.indexOf("=");
		if (eq < 0) {
			lines.push({ kind: "other", raw: [line] });
			continue;
		}

		const key = line.slice(0, eq).trim();
		const raw = [line];
		const state = { depth: 0, inString: false };
		openDepth(line.slice(eq + 1), state);
		const startLine = i + 1;
		while ((state.depth > 0 || state.inString) && i + 1 < physical.length) {
			i++;
			const next = physical[i] ?? "";
			raw.push(next);
			openDepth(`\n${next}`, state);
		}
		if (state.depth !== 0 || state.inString) {
			throw new GdmError("ConfigParseError", `${path}:${startLine}: unbalanced value for "${key}"`);
		}
		lines.push({ kind: "entry", key, value: raw.join("\n").slice(eq + 1).trim(), raw });
	}
	return lines;
}

function unescape(value: string): string {
	return value.replace(/\\(.)/g, "$1");
}

function escape(value: string): string {
	return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/** Quoted strings in a Godot array literal such as `PackedStringArray("a", "b")`. */
export function parseStringArray(value: string): string[] {
	return [...value.matchAll(/"((?:[^"\\]|\\.)*)"/g)].map(match => unescape(match[1] ?? ""));
}

export function formatStringArray(items: readonly string[], type = "PackedStringArray"): string {
	const quoted = items.map(item => `"${escape(item)}"`);
	// Godot 3 pads its pool arrays
	if (type === "PoolStringArray") return `PoolStringArray( ${quoted.join(", ")} )`;
	return `${type}(${quoted.join(", ")})`;
}

/** `res://` path of a plugin descriptor under the addons tree. */
export function activationPath(addonsDirName: string, installPath: string): string {
	return `res://${addonsDirName}/${installPath}/plugin.cfg`;
}

/**
 * A loaded project.godot. Edits touch only the managed activation entry; every
 * other line is written back exactly as read.
 */
export class ProjectConfig {
	#lines: ConfigLine[];
	readonly #eol: string;
	readonly #trailingNewline: boolean;
	#persisted: string;

	private constructor(
		readonly path: string,
		text: string,
	) {
		this.#persisted = text;
		this.#eol = text.includes("\r\n") ? "\r\n" : "\n";
		this.#trailingNewline = text === "" || text.endsWith("\n");
		this.#lines = parseLines(text, path);
	}

	static parse(text: string, path = "project.godot"): ProjectConfig {
		return new ProjectConfig(path, text);
	}

	static async load(path: string): Promise<ProjectConfig> {
		let text: string;
		try {
			text = await readFile(path, "utf-8");
		} catch (err) {
			if (errnoCode(err) === "ENOENT") {
				throw new GdmError("NotFound", `Project file ${path} not found`, { hint: "Run gdm from inside a Godot project." });
			}
			throw toFilesystemError(err, path, "read");
		}
		return new ProjectConfig(path, text);
	}

	#section(name: string): SectionRange | undefined {
		const header = this.#lines.findIndex(line => line.kind === "section" && line.name === name);
		if (header < 0) return undefined;
		let end = header + 1;
		while (end < this.#lines.length && this.#lines[end]?.kind !== "section") end++;
		return { header, end };
	}

	#entryIndex(range: SectionRange | undefined, key: string): number {
		const start = range ? range.header + 1 : 0;
		const end = range ? range.end : this.#lines.findIndex(line => line.kind === "section");
		const stop = end < 0 ? this.#lines.length : end;
		for (let i = start; i < stop; i++) {
			const line = this.#lines[i];
			if (line?.kind === "entry" && line.key === key) return i;
		}
		return -1;
	}

	/**
	 * Raw value of `key` in `section`; `null` names the preamble before any section.
	 */
	getValue(section: string | null, key: string): string | undefined {
		const range = section === null ? undefined : this.#section(section);
		if (section !== null && !range) return undefined;
		const line = this.#lines[this.#entryIndex(range, key)];
		return line?.kind === "entry" ? line.value : undefined;
	}

	get configVersion(): number | undefined {
		const raw = this.getValue(null, "config_version");
		const version = raw === undefined ? Number.NaN : Number.parseInt(raw, 10);
		return Number.isNaN(version) ? undefined : version;
	}

	/**
	 * Engine version the project targets, e.g. "4.5". Read from
	 * `config/features`, falling back to the config format version.
	 */
	godotVersion(): string | undefined {
		const features = this.getValue("application", "config/features");
		const version = features ? parseStringArray(features).find(item => /^\d+\.\d+/.test(item)) : undefined;
		if (version) return version;
		switch (this.configVersion) {
			case 5:
				return "4.5";
			case 4:
				return "3.6";
			default:
				return undefined;
		}
	}

	/** Activated plugin descriptor paths, in file order. */
	get activated(): string[] {
		const value = this.getValue(MANAGED_SECTION, MANAGED_KEY);
		return value ? parseStringArray(value) : [];
	}

	activate(paths: readonly string[]): boolean {
		const current = this.activated;
		const missing = paths.filter((path, i) => !current.includes(path) && paths.indexOf(path) === i);
		if (missing.length === 0) return false;
		this.#write([...current, ...missing]);
		return true;
	}

	deactivate(paths: readonly string[]): boolean {
		const current = this.activated;
		const next = current.filter(path => !paths.includes(path));
		if (next.length === current.length) return false;
		this.#write(next);
		return true;
	}

	/**
	 * Make the activation list exactly `paths`: entries already listed keep
	 * their position, new ones are appended in the given order.
	 */
	setActivated(paths: readonly string[]): boolean {
		const wanted = [...new Set(paths)];
		const current = this.activated;
		const kept = [...new Set(current)].filter(path => wanted.includes(path));
		const next = [...kept, ...wanted.filter(path => !kept.includes(path))];
		const unchanged = next.length === current.length && next.every((path, i) => path === current[i]);
		const hasEntry = this.getValue(MANAGED_SECTION, MANAGED_KEY) !== undefined;
		if (unchanged && (hasEntry || next.length === 0)) return false;
		this.#write(next);
		return true;
	}

	#arrayType(): string {
		const existing = this.getValue(MANAGED_SECTION, MANAGED_KEY);
		const match = existing ? /^([A-Za-z]+StringArray)\s*\(/.exec(existing) : null;
		if (match?.[1]) return match[1];
		return this.configVersion === 4 ? "PoolStringArray" : "PackedStringArray";
	}

	#write(paths: string[]): void {
		const range = this.#section(MANAGED_SECTION);

		if (paths.length === 0) {
			if (!range) return;
			const index = this.#entryIndex(range, MANAGED_KEY);
			if (index >= 0) this.#lines.splice(index, 1);
			this.#dropSectionIfEmpty();
			return;
		}

		const value = formatStringArray(paths, this.#arrayType());
		const entry: ConfigLine = { kind: "entry", key: MANAGED_KEY, value, raw: [`${MANAGED_KEY}=${value}`] };

		if (range) {
			const index = this.#entryIndex(range, MANAGED_KEY);
			if (index >= 0) {
				this.#lines[index] = entry;
				return;
			}
			// After the section's last non-blank line
			let at = range.end;
			while (at - 1 > range.header && this.#lines[at - 1]?.kind === "blank") at--;
			const insert: ConfigLine[] = at === range.header + 1 ? [blank(), entry] : [entry];
			if (this.#lines[at]?.kind === "section") insert.push(blank());
			this.#lines.splice(at, 0, ...insert);
			return;
		}

		const header: ConfigLine = { kind: "section", name: MANAGED_SECTION, raw: [`[${MANAGED_SECTION}]`] };
		const before = this.#lines.findIndex(line => line.kind === "section" && line.name.toLowerCase() > MANAGED_SECTION);
		if (before >= 0) {
			this.#lines.splice(before, 0, header, blank(), entry, blank());
			return;
		}
		const last = this.#lines[this.#lines.length - 1];
		if (last && last.kind !== "blank") this.#lines.push(blank());
		this.#lines.push(header, blank(), entry);
	}

	#dropSectionIfEmpty(): void {
		const range = this.#section(MANAGED_SECTION);
		if (!range) return;
		for (let i = range.header + 1; i < range.end; i++) {
			if (this.#lines[i]?.kind !== "blank") return;
		}
		let start = range.header;
		if (range.end === this.#lines.length && start > 0 && this.#lines[start - 1]?.kind === "blank") start--;
		this.#lines.splice(start, range.end - start);
	}

	serialize(): string {
		const body = this.#lines.flatMap(line => line.raw).join(this.#eol);
		return body && this.#trailingNewline ? `${body}${this.#eol}` : body;
	}

	get changed(): boolean {
		return this.serialize() !== this.#persisted;
	}

	/**
	 * Write the file atomically when it changed.
	 *
	 * @returns whether the file was written
	 */
	async save(): Promise<boolean> {
		const text = this.serialize();
		if (text === this.#persisted) return false;
		await writeFileAtomic(this.path, text);
		this.#persisted = text;
		logger.debug("Saved project config", { path: this.path, activated: this.activated.length });
		return true;
	}
}

function blank(): ConfigLine {
	return { kind: "blank", raw: [""] };
}
