import chalk from "chalk";
import { isDebug, logger } from "@gdm/output";

export type GdmErrorCode =
	| "NotFound"
	| "VersionNotFound"
	| "RefNotFound"
	| "DownloadFailed"
	| "TransportError"
	| "CorruptArchive"
	| "EmptyAsset"
	| "CorruptManifest"
	| "ConfigParseError"
	| "FilesystemError"
	| "Conflict"
	| "Usage";

/** Codes that only abort the affected plugin's step inside a batch. */
const FETCH_STAGE_CODES: ReadonlySet<GdmErrorCode> = new Set([
	"DownloadFailed",
	"CorruptArchive",
	"RefNotFound",
	"TransportError",
	"EmptyAsset",
	"VersionNotFound",
	"NotFound",
	"Conflict",
]);

export interface GdmErrorOptions {
	plugin?: string;
	cause?: unknown;
	hint?: string;
}

export class GdmError extends Error {
	readonly code: GdmErrorCode;
	readonly plugin?: string;
	readonly hint?: string;

	constructor(code: GdmErrorCode, message: string, options: GdmErrorOptions = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = "GdmError";
		this.code = code;
		this.plugin = options.plugin;
		this.hint = options.hint;
	}

	/** Tag an error with the plugin it belongs to, keeping code and cause. */
	forPlugin(plugin: string): GdmError {
		if (this.plugin === plugin) return this;
		return new GdmError(this.code, this.message, { plugin, cause: this.cause, hint: this.hint });
	}
}

export function isFetchStageError(err: unknown): boolean {
	return err instanceof GdmError && FETCH_STAGE_CODES.has(err.code);
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
	return err instanceof Error && "code" in err && typeof err.code === "string";
}

export function errnoCode(err: unknown): string | undefined {
	return isErrnoException(err) ? err.code : undefined;
}

/**
 * Wrap a filesystem failure into a FilesystemError, with actionable guidance
 * for permission problems.
 */
export function toFilesystemError(err: unknown, path: string, action: string): GdmError {
	if (err instanceof GdmError) return err;
	const code = errnoCode(err);
	if (code === "EACCES" || code === "EPERM") {
		return new GdmError("FilesystemError", `Permission denied: Cannot ${action} ${path}`, {
			cause: err,
			hint: "Check directory permissions or run with appropriate privileges.",
		});
	}
	return new GdmError("FilesystemError", `Failed to ${action} ${path}: ${errorMessage(err)}`, { cause: err });
}

export function formatError(err: unknown): string {
	const lines: string[] = [];
	if (err instanceof GdmError) {
		const subject = err.plugin ? `${err.plugin}: ` : "";
		lines.push(chalk.red(`Error: ${subject}${err.message}`));
		if (err.hint) lines.push(`${chalk.yellow("Hint:")} ${err.hint}`);
		if (isDebug()) {
			lines.push(chalk.dim(`[${err.code}]`));
			if (err.cause !== undefined) lines.push(chalk.dim(`Caused by: ${errorMessage(err.cause)}`));
		}
	} else {
		lines.push(chalk.red(`Error: ${errorMessage(err)}`));
	}
	if (isDebug() && err instanceof Error && err.stack) {
		lines.push(chalk.dim(err.stack));
	}
	return lines.join("\n");
}

/**
 * Wraps a command function with consistent error handling.
 * - Catches errors and logs user-friendly messages
 * - Shows stack trace only when debug output is on
 * - Sets non-zero exit code on error
 */
export function withErrorHandling<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
	return async (...args: A) => {
		try {
			await fn(...args);
		} catch (err) {
			logger.debug("Command failed", { code: err instanceof GdmError ? err.code : "Unknown" });
			console.error(formatError(err));
			process.exitCode = 1;
		}
	};
}
