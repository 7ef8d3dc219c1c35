// CHANGE: Line-oriented maskfile parser producing the command tree
// WHY: Headings define commands, heading levels define nesting, the first tagged fence under a heading is its script
// PURITY: CORE
// INVARIANT: parse is total; subcommands keep document order
// COMPLEXITY: O(n) where n = number of lines

import type { CommandNode, Maskfile, Script } from "../types/index.js";

interface CommandBuilder {
	readonly level: number;
	readonly name: string;
	readonly descriptionLines: string[];
	script: Script | undefined;
	readonly subcommands: CommandBuilder[];
}

interface OpenFence {
	readonly marker: string;
	readonly info: string;
	readonly body: string[];
}

const HEADING = /^(#{1,6})[ \t]+(.*?)(?:[ \t]+#+)?[ \t]*$/u;
const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})(.*)$/u;
const PLACEHOLDER = /\([^)]*\)|\[[^\]]*\]/gu;

/**
 * Command name from heading text: positional placeholders (`(arg)`,
 * `[arg]`) are dropped and the last remaining word is kept, so that
 * `services start (name)` names the node `start`.
 *
 * @pure true
 */
export function commandNameOf(headingText: string): string {
	const words = headingText
		.replace(PLACEHOLDER, " ")
		.trim()
		.split(/\s+/u)
		.filter((word) => word.length > 0);
	return words.at(-1) ?? "";
}

/**
 * Closing fence: same character, at least as long, nothing else on the line.
 */
function closesFence(line: string, marker: string): boolean {
	const trimmed = line.trim();
	const char = marker.charAt(0);
	return (
		trimmed.length >= marker.length &&
		[...trimmed].every((c) => c === char)
	);
}

function scriptFromFence(fence: OpenFence): Script | undefined {
	const executor = fence.info.trim().split(/\s+/u)[0] ?? "";
	if (executor.length === 0) return undefined;
	const body = fence.body.join("\n");
	return { executor, source: body.length === 0 ? "" : `${body}\n` };
}

function freeze(builder: CommandBuilder): CommandNode {
	const node = {
		name: builder.name,
		description: builder.descriptionLines.join("\n").trim(),
		subcommands: builder.subcommands.map(freeze),
	};
	return builder.script === undefined
		? node
		: { ...node, script: builder.script };
}

/**
 * Mutable parse state, local to one parseMaskfile call.
 */
class MaskfileBuilder {
	title = "";
	readonly descriptionLines: string[] = [];
	readonly roots: CommandBuilder[] = [];
	private readonly stack: CommandBuilder[] = [];
	private current: CommandBuilder | undefined;
	private seenCommand = false;

	heading(level: number, text: string): void {
		if (level === 1) {
			if (this.title.length === 0) this.title = text.trim();
			this.stack.length = 0;
			this.current = undefined;
			return;
		}
		const name = commandNameOf(text);
		if (name.length === 0) {
			this.current = undefined;
			return;
		}
		while ((this.stack.at(-1)?.level ?? 0) >= level) this.stack.pop();
		const command: CommandBuilder = {
			level,
			name,
			descriptionLines: [],
			script: undefined,
			subcommands: [],
		};
		const parent = this.stack.at(-1);
		if (parent === undefined) this.roots.push(command);
		else parent.subcommands.push(command);
		this.stack.push(command);
		this.current = command;
		this.seenCommand = true;
	}

	fence(fence: OpenFence): void {
		if (this.current === undefined || this.current.script !== undefined) {
			return;
		}
		this.current.script = scriptFromFence(fence);
	}

	text(line: string): void {
		if (this.current === undefined) {
			if (!this.seenCommand) this.descriptionLines.push(line);
			return;
		}
		if (this.current.script === undefined) {
			this.current.descriptionLines.push(line);
		}
	}

	build(): Maskfile {
		return {
			title: this.title,
			description: this.descriptionLines.join("\n").trim(),
			commands: this.roots.map(freeze),
		};
	}
}

/**
 * Parses maskfile markdown into the command tree.
 *
 * @param content - Maskfile text
 * @returns Title, leading description and root commands
 *
 * @pure true
 * @invariant headings inside fenced blocks are code, not commands
 * @complexity O(n) where n = number of lines
 *
 * @example
 * ```ts
 * const maskfile = parseMaskfile("## build\n\n~~~sh\nmake\n~~~\n");
 * // maskfile.commands[0] = { name: "build", description: "", script: { executor: "sh", source: "make\n" }, subcommands: [] }
 * ```
 */
export function parseMaskfile(content: string): Maskfile {
	const builder = new MaskfileBuilder();
	let fence: OpenFence | undefined;

	for (const line of content.split(/\r?\n/u)) {
		if (fence !== undefined) {
			if (closesFence(line, fence.marker)) {
				builder.fence(fence);
				fence = undefined;
			} else {
				fence.body.push(line);
			}
			continue;
		}

		const opening = FENCE_OPEN.exec(line);
		if (opening !== null) {
			fence = { marker: opening[1] ?? "```", info: opening[2] ?? "", body: [] };
			continue;
		}

		const heading = HEADING.exec(line);
		if (heading !== null) {
			builder.heading((heading[1] ?? "").length, heading[2] ?? "");
			continue;
		}

		builder.text(line);
	}

	// unterminated fence runs to the end of the document
	if (fence !== undefined) builder.fence(fence);

	return builder.build();
}
