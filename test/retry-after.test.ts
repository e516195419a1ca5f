import { describe, expect, it } from "vitest";
import { getRetryAfterMsFromHeaders, getRetryDelayMs, isRetryableStatus } from "@gdm/retry-after";

const NOW = Date.parse("2026-01-01T00:00:00Z");

describe("retry-after", () => {
	it("retries only rate limiting and unavailability", () => {
		expect([429, 503, 500, 404].map(isRetryableStatus)).toEqual([true, true, false, false]);
	});

	it("reads Retry-After as seconds or an HTTP date", () => {
		expect(getRetryAfterMsFromHeaders(new Headers({ "retry-after": "2" }), NOW)).toBe(2000);
		expect(getRetryAfterMsFromHeaders(new Headers({ "retry-after": "Thu, 01 Jan 2026 00:00:05 GMT" }), NOW)).toBe(5000);
		expect(getRetryAfterMsFromHeaders(new Headers({ "retry-after": "soon" }), NOW)).toBeUndefined();
	});

	it("reads rate-limit reset headers", () => {
		expect(getRetryAfterMsFromHeaders(new Headers({ "x-ratelimit-reset": "3" }), NOW)).toBe(3000);
		expect(getRetryAfterMsFromHeaders(new Headers({ "x-ratelimit-reset": String(NOW / 1000 + 4) }), NOW)).toBe(4000);
	});

	it("backs off exponentially without a hint and caps every delay", () => {
		expect(getRetryDelayMs(new Headers(), 0, NOW)).toBe(500);
		expect(getRetryDelayMs(new Headers(), 2, NOW)).toBe(2000);
		expect(getRetryDelayMs(new Headers(), 8, NOW)).toBe(10_000);
		expect(getRetryDelayMs(new Headers({ "retry-after": "60" }), 0, NOW)).toBe(10_000);
	});
});
