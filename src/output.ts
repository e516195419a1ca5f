import chalk from "chalk";

let jsonMode = false;
let debugMode = Boolean(process.env.DEBUG);

export function setJsonMode(value: boolean): void {
	jsonMode = value;
}

export function isJsonMode(): boolean {
	return jsonMode;
}

export function setDebug(value: boolean): void {
	debugMode = value;
}

export function isDebug(): boolean {
	return debugMode;
}

/**
 * Human-facing output. Suppressed entirely in JSON mode so stdout carries
 * a single JSON document.
 */
export function log(...args: unknown[]): void {
	if (jsonMode) return;
	console.log(...args);
}

export function outputJson(value: unknown): void {
	console.log(JSON.stringify(value, null, 2));
}

// CSI / OSC sequences and bare control characters (tab and newline excepted)
const ESCAPE_PATTERN = /\u001b\[[0-?]*[ -/]*[@-~]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)|[\u0000-\u0008\u000b-\u001f\u007f]/g;

/**
 * Strip terminal escape sequences from remote metadata before printing it.
 */
export function sanitize(text: string): string {
	return text.replace(ESCAPE_PATTERN, "");
}

type LogContext = Record<string, unknown>;

function formatContext(context?: LogContext): string {
	if (!context || Object.keys(context).length === 0) return "";
	return ` ${JSON.stringify(context)}`;
}

/**
 * Diagnostic logger. Writes to stderr so it never mixes with command output.
 */
export const logger = {
	debug(message: string, context?: LogContext): void {
		if (!debugMode) return;
		console.error(chalk.dim(`[debug] ${message}${formatContext(context)}`));
	},
	warn(message: string, context?: LogContext): void {
		console.error(chalk.yellow(`warning: ${message}${formatContext(context)}`));
	},
};
