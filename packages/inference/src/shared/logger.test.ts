import { describe, expect, it } from "vitest";
import { ConfigurationManager } from "./config.js";
import { getDefaultLogger, Logger } from "./logger.js";

function capture(overrides: Parameters<typeof ConfigurationManager.create>[0]) {
	const lines: unknown[][] = [];
	const logger = new Logger(
		ConfigurationManager.create(overrides).logging,
		(...args) => lines.push(args),
	);
	return { logger, lines };
}

describe("Logger", () => {
	it("should print nothing when disabled", () => {
		const { logger, lines } = capture({});
		logger.log("FORWARD_RULE_FIRED", "ignored");
		expect(lines).toEqual([]);
	});

	it("should print strings on the id line", () => {
		const { logger, lines } = capture({ logging: { enabled: true } });
		logger.log("FORWARD_RULE_FIRED", "b from a");
		expect(lines).toEqual([["[FORWARD_RULE_FIRED] b from a"]]);
	});

	it("should inspect object payloads", () => {
		const { logger, lines } = capture({ logging: { enabled: true } });
		logger.log("BACKWARD_GOAL_GIVEN", { goal: "a", depth: 2 });
		expect(lines).toEqual([["[BACKWARD_GOAL_GIVEN]", "{ goal: 'a', depth: 2 }"]]);
	});

	it("should honour denied ids", () => {
		const { logger, lines } = capture({ logging: { enabled: true } });
		logger.log("FORWARD_PASS_COMPLETE", "denied by default");
		expect(logger.isEnabled("FORWARD_PASS_COMPLETE")).toBe(false);
		expect(lines).toEqual([]);
	});

	it("should only print allowed ids when an allow list is set", () => {
		const { logger, lines } = capture({
			logging: { enabled: true, allowedIds: new Set(["BACKWARD_GOAL_CYCLE"]) },
		});
		logger.log("BACKWARD_GOAL_GIVEN", "skipped");
		logger.log("BACKWARD_GOAL_CYCLE", "kept");
		expect(lines).toEqual([["[BACKWARD_GOAL_CYCLE] kept"]]);
	});

	it("should not evaluate lazy payloads for filtered ids", () => {
		const { logger } = capture({});
		let evaluated = false;
		logger.log("FORWARD_RULE_FIRED", () => {
			evaluated = true;
			return "never";
		});
		expect(evaluated).toBe(false);
	});

	it("should share one disabled default logger", () => {
		expect(getDefaultLogger()).toBe(getDefaultLogger());
		expect(getDefaultLogger().isEnabled("FORWARD_RULE_FIRED")).toBe(false);
	});
});
