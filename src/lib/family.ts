/**
 * How a resolved version is checked before it may be pinned.
 *
 * - family: the version must stay inside a dotted prefix ("6.1" accepts "6.1.55")
 * - exact: the version must equal a known reference value
 */
export type VersionCheck =
	| { type: "family"; base: string }
	| { type: "exact"; expected: string };

export type ValidationResult =
	| { status: "ok" }
	| { status: "mismatch"; expected: string };

/**
 * Check whether a version belongs to a family prefix.
 * "6.1" matches "6.1" and "6.1.55" but not "6.10.2" or "6.2.0".
 */
export function matchesFamily(version: string, base: string): boolean {
	return version === base || version.startsWith(`${base}.`);
}

/**
 * Validate a resolved version against its check.
 */
export function validateVersion(
	resolved: string,
	check: VersionCheck,
): ValidationResult {
	switch (check.type) {
		case "family":
			return matchesFamily(resolved, check.base)
				? { status: "ok" }
				: { status: "mismatch", expected: `${check.base}.x` };
		case "exact":
			return resolved === check.expected
				? { status: "ok" }
				: { status: "mismatch", expected: check.expected };
	}
}
