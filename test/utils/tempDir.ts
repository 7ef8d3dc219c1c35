// CHANGE: Test helper creating isolated temporary directories and maskfiles
// PURITY: SHELL (file system I/O)
// INVARIANT: cleanup() removes the directory recursively and is idempotent

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Result of creating a temporary directory.
 *
 * Postconditions:
 * - cwd points to an empty, freshly created directory
 * - cleanup() removes the directory recursively
 */
export interface TempDir {
	readonly cwd: string;
	readonly cleanup: () => void;
}

export function createTempDir(): TempDir {
	const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "maskfile-lint-test-"));
	return {
		cwd,
		cleanup: (): void => {
			fs.rmSync(cwd, { recursive: true, force: true });
		},
	};
}

/**
 * Writes `content` as `<dir>/maskfile.md` and returns its path.
 */
export function writeMaskfile(dir: string, content: string): string {
	const file = path.join(dir, "maskfile.md");
	fs.writeFileSync(file, content, { encoding: "utf-8" });
	return file;
}

/**
 * Sorted entries of a directory.
 */
export function listDir(dir: string): readonly string[] {
	return fs.readdirSync(dir).sort();
}
