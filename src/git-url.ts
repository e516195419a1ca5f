/**
 * A git repository reference parsed from user input.
 */
export interface GitRepoUrl {
	/** Clone URL without ref suffix or embedded credentials */
	url: string;
	/** Git host domain (e.g., "github.com") */
	host: string;
	/** Repository path (e.g., "user/repo") */
	path: string;
	/** Last path segment, used as the default plugin name */
	name: string;
	/** Ref given as an `@ref` or `#ref` suffix */
	ref?: string;
}

const SCP_LIKE = /^git@([^:]+):(.+)$/;

export function stripUrlCredentials(url: string): string {
	if (!url.includes("://")) return url;
	try {
		const parsed = new URL(url);
		if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return url;
		if (!parsed.username && !parsed.password) return url;
		parsed.username = "";
		parsed.password = "";
		return parsed.toString().replace(/\/$/, "");
	} catch {
		return url;
	}
}

function splitPathRef(pathWithMaybeRef: string): { repoPath: string; ref?: string } {
	const refSeparator = pathWithMaybeRef.indexOf("@");
	if (refSeparator < 0) return { repoPath: pathWithMaybeRef };
	const repoPath = pathWithMaybeRef.slice(0, refSeparator);
	const ref = pathWithMaybeRef.slice(refSeparator + 1);
	if (!repoPath || !ref) return { repoPath: pathWithMaybeRef };
	return { repoPath, ref };
}

/**
 * Separate an `@ref` suffix from the repository part of a URL.
 */
export function splitRef(url: string): { repo: string; ref?: string } {
	const scpLikeMatch = url.match(SCP_LIKE);
	if (scpLikeMatch) {
		const { repoPath, ref } = splitPathRef(scpLikeMatch[2] ?? "");
		if (!ref) return { repo: url };
		return { repo: `git@${scpLikeMatch[1] ?? ""}:${repoPath}`, ref };
	}

	if (url.includes("://")) {
		try {
			const parsed = new URL(url);
			const { repoPath, ref } = splitPathRef(parsed.pathname.replace(/^\/+/, ""));
			if (!ref) return { repo: url };
			parsed.pathname = `/${repoPath}`;
			return { repo: parsed.toString().replace(/\/$/, ""), ref };
		} catch {
			return { repo: url };
		}
	}

	const slashIndex = url.indexOf("/");
	if (slashIndex < 0) return { repo: url };
	const host = url.slice(0, slashIndex);
	const { repoPath, ref } = splitPathRef(url.slice(slashIndex + 1));
	if (!ref) return { repo: url };
	return { repo: `${host}/${repoPath}`, ref };
}

/**
 * Parse a git URL into its clone URL, host, repository path and optional ref.
 *
 * Handles:
 * - SSH SCP-like URLs (`git@github.com:user/repo`)
 * - HTTPS/HTTP/SSH protocol URLs
 * - Bare `host/user/repo` shorthand (cloned over https)
 * - Ref pinning via `@ref` or `#ref` suffix
 *
 * Local paths and `file://` URLs are accepted as-is, which is what tests and
 * mirrors use.
 */
export function parseGitUrl(source: string): GitRepoUrl | null {
	let input = source.trim();
	if (!input) return null;

	let hashRef: string | undefined;
	const hashIndex = input.indexOf("#");
	if (hashIndex >= 0) {
		const hash = input.slice(hashIndex + 1);
		input = input.slice(0, hashIndex);
		if (hash) {
			try {
				hashRef = decodeURIComponent(hash);
			} catch {
				return null;
			}
		}
	}

	if (input.startsWith("file://") || input.startsWith("/") || input.startsWith("./") || input.startsWith("../")) {
		const path = input.replace(/^file:\/\//, "").replace(/\/+$/, "");
		const name = repoName(path);
		if (!name) return null;
		return { url: input.replace(/\/+$/, ""), host: "", path, name, ref: hashRef };
	}

	const { repo, ref: atRef } = splitRef(input);
	const ref = hashRef ?? atRef;
	let url = repo;
	let host = "";
	let repoPath = "";

	const scpLikeMatch = repo.match(SCP_LIKE);
	if (scpLikeMatch) {
		host = scpLikeMatch[1] ?? "";
		repoPath = scpLikeMatch[2] ?? "";
	} else {
		if (!/^https?:\/\/|^ssh:\/\//.test(repo)) {
			if (!repo.includes("/")) return null;
			url = `https://${repo}`;
		}
		try {
			const parsed = new URL(url);
			host = parsed.hostname;
			repoPath = parsed.pathname.replace(/^\/+/, "");
		} catch {
			return null;
		}
		url = stripUrlCredentials(url);
		if (!host.includes(".") && host !== "localhost") return null;
	}

	const normalizedPath = repoPath.replace(/\.git$/, "").replace(/\/+$/, "");
	if (!host || !normalizedPath || normalizedPath.split("/").length < 2) return null;

	return { url, host, path: normalizedPath, name: repoName(normalizedPath), ref };
}

function repoName(path: string): string {
	const segment = path.split("/").filter(Boolean).pop() ?? "";
	return segment.replace(/\.git$/, "");
}
