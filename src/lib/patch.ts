/**
 * Line-oriented rewrite of declarative variable assignments.
 *
 * Each edit is located by a fixed token at the start of a line. The token
 * must be followed by whitespace, "=" or the end of the line, so
 * `ENV TCL_ROOTFS` never captures `ENV TCL_ROOTFS_MD5=...`.
 */

export type Edit =
	| {
			/** `<token> <value>`; the rest of the line is replaced */
			kind: "assign";
			id: string;
			token: string;
			value: string;
	  }
	| {
			/** The whole line is replaced */
			kind: "line";
			id: string;
			token: string;
			line: string;
	  }
	| {
			/** Text between a fixed prefix and a fixed suffix is replaced */
			kind: "enclosed";
			id: string;
			prefix: string;
			suffix: string;
			value: string;
	  };

export interface PatchChange {
	/** 1-based line number */
	line: number;
	before: string;
	after: string;
	edits: string[];
}

export interface PatchResult {
	content: string;
	changes: PatchChange[];
	/** Edit id -> number of lines it matched */
	matches: Map<string, number>;
	/** Ids of edits that matched no line */
	unmatched: string[];
}

function startsWithToken(line: string, token: string): boolean {
	if (!line.startsWith(token)) return false;
	const next = line.charAt(token.length);
	return next === "" || next === "=" || /\s/.test(next);
}

/**
 * Check whether an edit targets a line.
 */
export function matchesEdit(edit: Edit, line: string): boolean {
	switch (edit.kind) {
		case "assign":
		case "line":
			return startsWithToken(line, edit.token);
		case "enclosed":
			return (
				line.length >= edit.prefix.length + edit.suffix.length &&
				line.startsWith(edit.prefix) &&
				line.endsWith(edit.suffix)
			);
	}
}

/**
 * Rewrite one line with an edit, or return null when the edit does not target it.
 */
export function applyEdit(edit: Edit, line: string): string | null {
	if (!matchesEdit(edit, line)) return null;
	switch (edit.kind) {
		case "assign":
			return `${edit.token} ${edit.value}`;
		case "line":
			return edit.line;
		case "enclosed":
			return `${edit.prefix}${edit.value}${edit.suffix}`;
	}
}

/**
 * Apply all edits to file content in one pass.
 *
 * Edits are tried in list order against every line, so a later edit sees
 * the output of an earlier one on the same line. Line endings (LF or CRLF)
 * and the final newline are kept as they were.
 */
export function applyEdits(content: string, edits: Edit[]): PatchResult {
	const matches = new Map<string, number>(edits.map((edit) => [edit.id, 0]));
	const changes: PatchChange[] = [];

	const lines = content.split("\n").map((raw, index) => {
		const hasCarriageReturn = raw.endsWith("\r");
		const before = hasCarriageReturn ? raw.slice(0, -1) : raw;

		let after = before;
		const applied: string[] = [];
		for (const edit of edits) {
			const rewritten = applyEdit(edit, after);
			if (rewritten === null) continue;
			after = rewritten;
			applied.push(edit.id);
			matches.set(edit.id, (matches.get(edit.id) ?? 0) + 1);
		}

		if (applied.length > 0 && after !== before) {
			changes.push({ line: index + 1, before, after, edits: applied });
		}
		return hasCarriageReturn ? `${after}\r` : after;
	});

	const unmatched = [...matches]
		.filter(([, count]) => count === 0)
		.map(([id]) => id);

	return { content: lines.join("\n"), changes, matches, unmatched };
}
