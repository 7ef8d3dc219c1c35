// CHANGE: Specs for the exact argv of every linter
// PURITY: CORE

import { describe, expect, it } from "vitest";

import {
	Catchall,
	Rubocop,
	Ruff,
	Shellcheck,
} from "../../../src/core/handlers.js";
import {
	linterFor,
	renderInvocation,
	toolInvocation,
} from "../../../src/core/linters/invocation.js";

describe("linterFor / toolInvocation", () => {
	it("runs shellcheck with the path as only argument", () => {
		const linter = linterFor(Shellcheck);
		expect(linter).not.toBeNull();
		if (linter === null) return;
		expect(toolInvocation(linter, "/o/a.sh")).toEqual({
			binary: "shellcheck",
			args: ["/o/a.sh"],
		});
	});

	it("runs ruff check in full format without cache", () => {
		const linter = linterFor(Ruff);
		if (linter === null) throw new Error("ruff linter missing");
		expect(toolInvocation(linter, "/o/a.py")).toEqual({
			binary: "ruff",
			args: ["check", "--output-format=full", "--no-cache", "/o/a.py"],
		});
	});

	it("runs rubocop in clang format with style guide links", () => {
		const linter = linterFor(Rubocop);
		if (linter === null) throw new Error("rubocop linter missing");
		expect(toolInvocation(linter, "/o/a.rb")).toEqual({
			binary: "rubocop",
			args: ["--format=clang", "--display-style-guide", "/o/a.rb"],
		});
	});

	it("has no linter for Catchall", () => {
		expect(linterFor(Catchall)).toBeNull();
	});

	it("renders the command line for error messages", () => {
		expect(
			renderInvocation({ binary: "ruff", args: ["check", "/o/a.py"] }),
		).toBe("ruff check /o/a.py");
	});
});
