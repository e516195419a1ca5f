import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import { GitError, simpleGit } from "simple-git";
import { errorMessage, GdmError } from "@gdm/errors";
import { isDirectory, removePath } from "@gdm/files";
import { logger } from "@gdm/output";

/**
 * Clones a repository at a ref into a local directory.
 */
export interface GitTransport {
	checkout(url: string, ref: string, dest: string): Promise<void>;
}

const COMMIT_REF = /^[0-9a-f]{7,40}$/i;
const MISSING_REF = /not found|couldn't find remote ref|could not find remote ref|did not match any|not our ref|unknown revision|invalid refspec/i;
const TRANSPORT_FAILURE = /repository\b.*\bnot found|not a git repository|could not resolve host|authentication failed|permission denied|could not read from remote/i;

/**
 * Map a git failure onto RefNotFound or TransportError.
 */
export function classifyGitError(err: unknown, url: string, ref: string): GdmError {
	if (err instanceof GdmError) return err;
	const message = errorMessage(err);
	if (MISSING_REF.test(message) && !TRANSPORT_FAILURE.test(message)) {
		return new GdmError("RefNotFound", `Ref "${ref}" not found in ${url}`, { cause: err });
	}
	const detail = err instanceof GitError ? message.trim().split("\n").pop() ?? message : message;
	return new GdmError("TransportError", `Could not fetch ${url}: ${detail}`, { cause: err });
}

/**
 * Shallow checkouts through the git CLI.
 *
 * Branches and tags are cloned with `--depth 1 --branch`. A commit hash that
 * cannot be cloned that way is fetched by id instead.
 */
export class SimpleGitTransport implements GitTransport {
	constructor(private readonly timeoutMs: number) {}

	async checkout(url: string, ref: string, dest: string): Promise<void> {
		const options = { timeout: { block: this.timeoutMs } };
		try {
			await simpleGit(options).clone(url, dest, ["--depth", "1", "--branch", ref, "--single-branch"]);
			return;
		} catch (err) {
			if (!COMMIT_REF.test(ref)) throw classifyGitError(err, url, ref);
			logger.debug("Branch clone failed, fetching commit", { url, ref, error: errorMessage(err) });
		}

		try {
			await removePath(dest);
			await mkdir(dest, { recursive: true });
			const repo = simpleGit({ ...options, baseDir: dest });
			await repo.init();
			await repo.addRemote("origin", url);
			await repo.fetch(["--depth", "1", "origin", ref]);
			await repo.checkout("FETCH_HEAD");
		} catch (err) {
			throw classifyGitError(err, url, ref);
		}
	}
}

/**
 * Check out `url` at `ref` under `scratchDir` and stage its addons tree.
 *
 * @returns the repository's `addons/` directory when it has one, otherwise the
 * checkout root with `.git` removed
 */
export async function fetchGitSource(transport: GitTransport, url: string, ref: string, scratchDir: string): Promise<string> {
	const checkout = join(scratchDir, "repo");
	logger.debug("Checking out git source", { url, ref, checkout });
	try {
		await transport.checkout(url, ref, checkout);
	} catch (err) {
		throw classifyGitError(err, url, ref);
	}

	const addons = join(checkout, "addons");
	if (await isDirectory(addons)) return addons;

	await removePath(join(checkout, ".git"));
	return checkout;
}
