// CHANGE: Specs for qualified names and materialized file names
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { Catchall, Ruff, Shellcheck } from "../../src/core/handlers.js";
import { qualifyName, scriptFileName } from "../../src/core/naming.js";

describe("qualifyName", () => {
	it("uses the bare name at the root", () => {
		expect(qualifyName(undefined, "build")).toBe("build");
	});

	it("prefixes nested names with the parent chain", () => {
		expect(qualifyName("services", "start")).toBe("services start");
		expect(qualifyName("services start", "db")).toBe("services start db");
	});

	it("folds a name chain into the space-joined path", () => {
		const word = fc.stringMatching(/^[a-z]{1,8}$/);
		fc.assert(
			fc.property(fc.array(word, { minLength: 1, maxLength: 6 }), (names) => {
				const folded = names.reduce<string | undefined>(
					(parent, name) => qualifyName(parent, name),
					undefined,
				);
				return folded === names.join(" ");
			}),
		);
	});
});

describe("scriptFileName", () => {
	it("replaces every space with an underscore and appends the extension", () => {
		expect(scriptFileName("services start db", Shellcheck)).toBe(
			"services_start_db.sh",
		);
		expect(scriptFileName("lint", Ruff)).toBe("lint.py");
	});

	it("has no extension for Catchall", () => {
		expect(scriptFileName("deploy prod", Catchall)).toBe("deploy_prod");
	});
});
