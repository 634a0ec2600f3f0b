import { describe, expect, it } from "vitest";
import { ConfigurationManager } from "./config.js";

describe("ConfigurationManager", () => {
	it("should default to quiet logging and unbounded proof depth", () => {
		const config = ConfigurationManager.createDefault();
		expect(config.logging.enabled).toBe(false);
		expect(config.logging.allowedIds.size).toBe(0);
		expect([...config.logging.deniedIds]).toEqual([
			"FORWARD_PASS_COMPLETE",
			"BACKWARD_RULE_TRY",
		]);
		expect(config.backward.maxDepth).toBe(Number.POSITIVE_INFINITY);
	});

	it("should merge section overrides over the defaults", () => {
		const config = ConfigurationManager.create({
			logging: { enabled: true },
			backward: { maxDepth: 8 },
		});
		expect(config.logging.enabled).toBe(true);
		expect([...config.logging.deniedIds]).toEqual([
			"FORWARD_PASS_COMPLETE",
			"BACKWARD_RULE_TRY",
		]);
		expect(config.backward.maxDepth).toBe(8);
	});

	it("should replace id filters wholesale", () => {
		const config = ConfigurationManager.create({
			logging: { deniedIds: new Set(["BACKWARD_GOAL_GIVEN"]) },
		});
		expect([...config.logging.deniedIds]).toEqual(["BACKWARD_GOAL_GIVEN"]);
	});
});
