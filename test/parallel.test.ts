import { setTimeout as sleep } from "node:timers/promises";
import { describe, expect, it } from "vitest";
import { parallelLimit } from "@gdm/parallel";

describe("parallelLimit", () => {
	it("keeps input order and respects the limit", async () => {
		let running = 0;
		let peak = 0;

		const results = await parallelLimit([30, 10, 20, 5, 15], 2, async (ms, index) => {
			running++;
			peak = Math.max(peak, running);
			await sleep(ms);
			running--;
			return `${index}:${ms}`;
		});

		expect(results).toEqual(["0:30", "1:10", "2:20", "3:5", "4:15"]);
		expect(peak).toBe(2);
	});

	it("handles an empty list", async () => {
		expect(await parallelLimit([], 4, async () => 1)).toEqual([]);
	});
});
