/** Backoff policy for catalog requests that hit rate limits or a busy server. */

const RETRY_CAP_MS = 10_000;
const FIRST_BACKOFF_MS = 500;

/** Seconds-since-epoch values start here; anything smaller is a relative wait. */
const EPOCH_SECONDS_FLOOR = 1e9;
const EPOCH_MILLIS_FLOOR = 1e12;

type HintReader = (raw: string, now: number) => number | undefined;

export function isRetryableStatus(status: number): boolean {
	return status === 429 || status === 503;
}

/** Wait before retry `attempt` (0-based). Server hints win over backoff; both are capped. */
export function getRetryDelayMs(headers: Headers, attempt: number, now: number = Date.now()): number {
	const wait = getRetryAfterMsFromHeaders(headers, now) ?? FIRST_BACKOFF_MS * 2 ** attempt;
	return Math.min(wait, RETRY_CAP_MS);
}

export function getRetryAfterMsFromHeaders(headers: Headers, now: number = Date.now()): number | undefined {
	let longest: number | undefined;
	for (const [name, read] of HINT_READERS) {
		const raw = headers.get(name)?.trim();
		if (!raw) continue;
		const wait = read(raw, now);
		if (wait !== undefined && (longest === undefined || wait > longest)) longest = wait;
	}
	return longest;
}

function untilInstant(targetMs: number, now: number): number | undefined {
	return targetMs > now ? Math.ceil(targetMs - now) : undefined;
}

/** `Retry-After: <seconds>` or `Retry-After: <HTTP date>`. */
const readRetryAfter: HintReader = (raw, now) => {
	const seconds = Number(raw);
	if (Number.isFinite(seconds)) return seconds > 0 ? Math.ceil(seconds * 1000) : undefined;
	const at = Date.parse(raw);
	return Number.isNaN(at) ? undefined : untilInstant(at, now);
};

/** `X-RateLimit-Reset`: relative seconds, or an epoch in seconds or milliseconds. */
const readRateLimitReset: HintReader = (raw, now) => {
	const value = Number(raw);
	if (!Number.isFinite(value) || value <= 0) return undefined;
	if (value > EPOCH_MILLIS_FLOOR) return untilInstant(value, now);
	if (value > EPOCH_SECONDS_FLOOR) return untilInstant(value * 1000, now);
	return Math.ceil(value * 1000);
};

const HINT_READERS: ReadonlyArray<readonly [string, HintReader]> = [
	["retry-after", readRetryAfter],
	["x-ratelimit-reset", readRateLimitReset],
];
