// CHANGE: Specs for header emphasis, report lines and the color decision
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	emphasizeHeader,
	shouldEmphasize,
} from "../../../src/core/format/emphasis.js";
import { formatReport } from "../../../src/core/format/report.js";

describe("emphasizeHeader", () => {
	it("returns the text unchanged when emphasis is off", () => {
		expect(emphasizeHeader("services start", false)).toBe("services start");
	});

	it("wraps the text in bold, cyan and underline codes", () => {
		expect(emphasizeHeader("build", true)).toBe(
			"\u001b[1m\u001b[36m\u001b[4mbuild\u001b[24m\u001b[39m\u001b[22m",
		);
	});
});

describe("shouldEmphasize", () => {
	it("follows the terminal by default", () => {
		expect(shouldEmphasize({}, true)).toBe(true);
		expect(shouldEmphasize({}, false)).toBe(false);
	});

	it("is disabled by a non-empty NO_COLOR", () => {
		expect(shouldEmphasize({ NO_COLOR: "1" }, true)).toBe(false);
		expect(shouldEmphasize({ NO_COLOR: "" }, true)).toBe(true);
	});

	it("is forced by FORCE_COLOR unless it is 0", () => {
		expect(shouldEmphasize({ FORCE_COLOR: "1" }, false)).toBe(true);
		expect(shouldEmphasize({ FORCE_COLOR: "0" }, true)).toBe(false);
	});

	it("lets NO_COLOR win over FORCE_COLOR", () => {
		expect(shouldEmphasize({ NO_COLOR: "1", FORCE_COLOR: "1" }, true)).toBe(
			false,
		);
	});
});

describe("formatReport", () => {
	it("prints nothing for empty findings", () => {
		expect(formatReport("build", "", true)).toEqual([]);
	});

	it("prints the header, then the findings followed by a blank line", () => {
		expect(formatReport("services start", "line 3:1: E501 msg", false)).toEqual(
			["services start", "line 3:1: E501 msg\n"],
		);
	});
});
