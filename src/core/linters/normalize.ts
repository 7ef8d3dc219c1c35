// CHANGE: Pure normalizers turning raw linter stdout into path-free findings
// PURITY: CORE
// INVARIANT: ∀ tool, stdout: normalize(stdout, path) contains no "<path>:" prefix and no surrounding whitespace
// COMPLEXITY: O(n) where n = |stdout|

const splitLines = (text: string): readonly string[] => text.split(/\r?\n/u);

/**
 * Shellcheck prints `In <path> line N:` headers; the path and its trailing
 * space are removed everywhere.
 *
 * @pure true
 */
export function normalizeShellcheck(stdout: string, filePath: string): string {
	return stdout.trim().replaceAll(`${filePath} `, "");
}

/**
 * Ruff `--output-format=full` output.
 *
 * - `All checks passed!` lines are skipped
 * - processing stops at the summary line (`Found N error(s).`)
 * - `<path>:` becomes `line `
 *
 * @pure true
 * @complexity O(n) where n = |lines|
 *
 * @example
 * ```ts
 * normalizeRuff("f.py:3:1: E501 msg\nFound 1 error.\n", "f.py"); // "line 3:1: E501 msg"
 * ```
 */
export function normalizeRuff(stdout: string, filePath: string): string {
	const kept: string[] = [];
	for (const line of splitLines(stdout.trim())) {
		if (line === "All checks passed!") continue;
		if (line.startsWith("Found ")) break;
		kept.push(line.replaceAll(`${filePath}:`, "line "));
	}
	return kept.join("\n").trim();
}

/**
 * Rubocop `--format=clang` output without the inspection summary.
 *
 * @pure true
 */
export function normalizeRubocop(stdout: string, filePath: string): string {
	return splitLines(stdout)
		.filter((line) => !line.includes("1 file inspected"))
		.join("\n")
		.trim()
		.replaceAll(`${filePath}:`, "line ");
}
