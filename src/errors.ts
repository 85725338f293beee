/**
 * Error thrown when a .pinbumprc file cannot be read or fails validation
 */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export type FetchFailureReason = "timeout" | "http" | "network";

/**
 * Get a human-readable description for common HTTP status codes
 */
function getHttpStatusDescription(status: number): string {
	const descriptions: Record<number, string> = {
		403: "Forbidden (possibly rate limited)",
		404: "Not Found",
		429: "Too Many Requests",
		500: "Internal Server Error",
		502: "Bad Gateway",
		503: "Service Unavailable",
		504: "Gateway Timeout",
	};
	return descriptions[status] || `HTTP Error ${status}`;
}

/**
 * Error thrown when a single upstream request fails
 */
export class FetchError extends Error {
	constructor(
		public readonly url: string,
		public readonly reason: FetchFailureReason,
		public readonly status?: number,
		detail?: string,
	) {
		super(FetchError.describe(url, reason, status, detail));
		this.name = "FetchError";
	}

	private static describe(
		url: string,
		reason: FetchFailureReason,
		status?: number,
		detail?: string,
	): string {
		switch (reason) {
			case "timeout":
				return `Timed out fetching ${url}`;
			case "http":
				return `Failed to fetch ${url}: ${getHttpStatusDescription(status ?? 0)} (HTTP ${status ?? "?"})`;
			case "network":
				return `Network error fetching ${url}${detail ? `: ${detail}` : ""}`;
		}
	}
}

/**
 * Error thrown when every mirror/path combination failed
 */
export class AllMirrorsFailedError extends Error {
	constructor(public readonly attempts: FetchError[]) {
		const lines = attempts.map((attempt) => `  - ${attempt.message}`).join("\n");
		super(`All ${attempts.length} mirror locations failed:\n${lines}`);
		this.name = "AllMirrorsFailedError";
	}
}

/**
 * Error thrown when a response body is not the document we expected
 */
export class ResponseFormatError extends Error {
	constructor(
		public readonly url: string,
		detail: string,
	) {
		super(`Unexpected response from ${url}: ${detail}`);
		this.name = "ResponseFormatError";
	}
}

/**
 * Error thrown when an upstream document lacks the field we need
 */
export class ParseError extends Error {
	constructor(
		public readonly subject: string,
		detail: string,
	) {
		super(`Could not determine ${subject}: ${detail}`);
		this.name = "ParseError";
	}
}

/**
 * Error thrown when upstream moved outside the tracked version family.
 * Someone has to review the new line and bump the configured base first.
 */
export class FamilyMismatchError extends Error {
	constructor(
		public readonly dependency: string,
		public readonly actual: string,
		public readonly expected: string,
		label: string = dependency,
	) {
		super(
			`${label} has an update! (${actual}; tracking ${expected}). Review it and bump the configured version before running again.`,
		);
		this.name = "FamilyMismatchError";
	}
}

/**
 * Error thrown when a checksum manifest has no entry for the wanted file
 */
export class AmbiguousMatchError extends Error {
	constructor(
		public readonly pattern: string,
		public readonly matches: number,
		source: string,
	) {
		super(
			`Expected one checksum entry matching "${pattern}" in ${source}, found ${matches}`,
		);
		this.name = "AmbiguousMatchError";
	}
}

/**
 * Error thrown when `git ls-remote` fails
 */
export class GitError extends Error {
	constructor(
		public readonly repository: string,
		detail: string,
	) {
		super(`git ls-remote failed for ${repository}: ${detail}`);
		this.name = "GitError";
	}
}

/**
 * Error thrown when a probed download is not published
 */
export class ArtifactMissingError extends Error {
	constructor(
		public readonly dependency: string,
		public readonly url: string,
		label: string = dependency,
	) {
		super(`${label}: image not published at ${url}`);
		this.name = "ArtifactMissingError";
	}
}

/**
 * A fetch or git failure attributed to the dependency being resolved.
 * The original error is kept as `cause`.
 */
export class DependencyError extends Error {
	constructor(
		public readonly dependency: string,
		label: string,
		cause: Error,
	) {
		super(`${label}: ${cause.message}`, { cause });
		this.name = "DependencyError";
	}
}
