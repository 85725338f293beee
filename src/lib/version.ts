/**
 * Dotted-numeric version ordering.
 *
 * Upstream projects here do not publish semver ("14.0", "6.1.55", "4.6.1",
 * "19.1.0-54729"), so versions are split on "." and compared segment by segment
 * the way `sort -V` does: numbers as integers, a missing segment sorts lowest.
 */

const NUMERIC_VERSION = /^\d+(\.\d+)*$/;

/**
 * Split a segment into its leading digits (without leading zeros) and
 * whatever text follows them.
 */
function splitSegment(segment: string): { digits: string | null; rest: string } {
	const match = segment.match(/^(\d+)(.*)$/);
	if (!match) {
		return { digits: null, rest: segment };
	}
	return {
		digits: (match[1] ?? "0").replace(/^0+(?=\d)/, ""),
		rest: match[2] ?? "",
	};
}

/**
 * Compare digit strings as integers of any size.
 */
function compareDigits(a: string, b: string): number {
	if (a.length !== b.length) return a.length < b.length ? -1 : 1;
	if (a === b) return 0;
	return a < b ? -1 : 1;
}

function compareSegments(a: string, b: string): number {
	const left = splitSegment(a);
	const right = splitSegment(b);

	if (left.digits !== null && right.digits !== null) {
		const result = compareDigits(left.digits, right.digits);
		if (result !== 0) return result;
	} else if (left.digits !== null) {
		return 1;
	} else if (right.digits !== null) {
		return -1;
	}

	if (left.rest === right.rest) return 0;
	return left.rest < right.rest ? -1 : 1;
}

/**
 * Compare two versions.
 * Returns: -1 if a < b, 0 if a === b, 1 if a > b
 */
export function compareVersions(a: string, b: string): number {
	const left = a.split(".");
	const right = b.split(".");
	const length = Math.max(left.length, right.length);

	for (let i = 0; i < length; i++) {
		const l = left[i];
		const r = right[i];
		if (l === undefined && r === undefined) return 0;
		if (l === undefined) return -1;
		if (r === undefined) return 1;
		const result = compareSegments(l, r);
		if (result !== 0) return result;
	}

	return 0;
}

/**
 * Sort versions highest first. Does not mutate the input.
 */
export function sortVersionsDescending(versions: readonly string[]): string[] {
	return [...versions].sort((a, b) => compareVersions(b, a));
}

/**
 * Get the highest version from a list, or null for an empty list.
 */
export function getLatestVersion(versions: readonly string[]): string | null {
	return sortVersionsDescending(versions)[0] ?? null;
}

/**
 * Check that a string is purely dotted digits ("6.1.55", "24.0").
 */
export function isNumericVersion(version: string): boolean {
	return NUMERIC_VERSION.test(version);
}

/**
 * Remove a leading format marker such as the "v" of "v24.0.5".
 */
export function stripVersionPrefix(version: string, prefix = "v"): string {
	return prefix && version.startsWith(prefix)
		? version.slice(prefix.length)
		: version;
}
