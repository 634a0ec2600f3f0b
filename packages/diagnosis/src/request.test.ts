import { describe, expect, it } from "vitest";
import { DiagnosisInputError } from "./errors.js";
import {
	normalizeFacts,
	normalizeGoal,
	parseBackwardRequest,
	parseForwardRequest,
} from "./request.js";

function issuesOf(fn: () => unknown): readonly string[] {
	try {
		fn();
	} catch (error) {
		if (error instanceof DiagnosisInputError) return error.issues;
		throw error;
	}
	throw new Error("expected a DiagnosisInputError");
}

describe("normalizeFacts", () => {
	it("should trim atoms and drop blanks", () => {
		expect([...normalizeFacts(["  a", "b  ", "", " \t "])]).toEqual(["a", "b"]);
	});

	it("should collapse duplicates after trimming", () => {
		expect([...normalizeFacts(["a", " a ", "a"])]).toEqual(["a"]);
	});

	it("should keep case distinct", () => {
		expect(normalizeFacts(["Router_Off", "router_off"]).size).toBe(2);
	});
});

describe("normalizeGoal", () => {
	it("should trim the goal", () => {
		expect(normalizeGoal("\tfault_network\n")).toBe("fault_network");
	});

	it("should leave a blank goal empty", () => {
		expect(normalizeGoal("   ")).toBe("");
	});
});

describe("parseForwardRequest", () => {
	it("should normalize a valid body", () => {
		const { facts } = parseForwardRequest({
			facts: ["battery_low ", " battery_low", ""],
		});
		expect([...facts]).toEqual(["battery_low"]);
	});

	it("should reject non-string atoms", () => {
		expect(issuesOf(() => parseForwardRequest({ facts: ["a", 1] }))).toEqual([
			"facts.1: Expected string, received number",
		]);
	});

	it("should reject facts that are not a list", () => {
		expect(issuesOf(() => parseForwardRequest({ facts: "a" }))).toEqual([
			"facts: Expected array, received string",
		]);
	});

	it("should reject a missing body", () => {
		expect(issuesOf(() => parseForwardRequest(null))).toEqual([
			"(root): Expected object, received null",
		]);
	});
});

describe("parseBackwardRequest", () => {
	it("should normalize facts and goal", () => {
		const request = parseBackwardRequest({
			facts: [" old_battery", "battery_low"],
			goal: " fault_battery ",
		});
		expect(request.goal).toBe("fault_battery");
		expect([...request.facts]).toEqual(["old_battery", "battery_low"]);
	});

	it("should reject a missing or null goal", () => {
		expect(issuesOf(() => parseBackwardRequest({ facts: [] }))).toEqual([
			"goal: Required",
		]);
		expect(
			issuesOf(() => parseBackwardRequest({ facts: [], goal: null })),
		).toEqual(["goal: Expected string, received null"]);
	});

	it("should accept a blank goal", () => {
		const request = parseBackwardRequest({ facts: [], goal: "  " });
		expect(request.goal).toBe("");
	});

	it("should report every problem at once", () => {
		expect(issuesOf(() => parseBackwardRequest({ facts: [true] }))).toEqual([
			"facts.0: Expected string, received boolean",
			"goal: Required",
		]);
	});

	it("should describe the problems in the error message", () => {
		const error = new DiagnosisInputError(["goal: Required", "facts: Required"]);
		expect(error.name).toBe("DiagnosisInputError");
		expect(error.message).toBe(
			"Invalid diagnosis request: goal: Required; facts: Required",
		);
	});
});
