/**
 * Version sources: one resolution strategy per tracked dependency.
 *
 * Each source kind turns a different upstream shape (plain text, JSON feed,
 * HTML index, git tags, redirect chain, existence probe) into one version
 * string. Dispatch is on `kind`; adding a kind means adding a case below.
 */

import type { z } from "zod";
import {
	AllMirrorsFailedError,
	ArtifactMissingError,
	DependencyError,
	FamilyMismatchError,
	FetchError,
	GitError,
	ParseError,
	ResponseFormatError,
} from "@/errors";
import type { Fetcher, MirrorCandidate } from "@/fetcher";
import type { TagLister } from "@/git";
import { matchesFamily, type VersionCheck, validateVersion } from "@/lib/family";
import {
	getLatestVersion,
	isNumericVersion,
	sortVersionsDescending,
	stripVersionPrefix,
} from "@/lib/version";

// =============================================================================
// Types
// =============================================================================

/** One release in a structured feed */
export interface FeedEntry {
	version: string;
	/** Whether the entry passes the feed's predicate (stable, longterm, ...) */
	include: boolean;
}

export interface FeedFormat {
	read(fetcher: Fetcher, url: string): Promise<FeedEntry[]>;
}

export type VersionSource =
	| {
			/** Plain-text "latest version" file, first mirror that answers */
			kind: "text";
			candidates: MirrorCandidate[];
	  }
	| {
			/** Existence probe; success means the reference is still current */
			kind: "spider";
			url: string;
			reference: string;
	  }
	| {
			/** JSON release list filtered, sorted and reduced to its head */
			kind: "feed";
			url: string;
			format: FeedFormat;
			/** Leading marker removed from versions (e.g. "v") */
			stripPrefix?: string;
	  }
	| {
			/** HTML index scraped for version-like links */
			kind: "listing";
			url: string;
			/** Global pattern; capture group 1 is the version */
			pattern: RegExp;
			/** Only consider candidates inside this family */
			family?: string;
	  }
	| {
			/** Remote git tags */
			kind: "tags";
			repository: string;
			/** Capture group 1 is the version */
			tagPattern: RegExp;
	  }
	| {
			/** Version embedded in a redirect target */
			kind: "redirect";
			/** Builds the discovery URL whose redirects are inspected */
			locate(fetcher: Fetcher): Promise<string>;
			/** First redirect target matching this is inspected */
			targetPattern: RegExp;
			/** Capture group 1 is the version */
			versionPattern: RegExp;
	  };

export type SourceKind = VersionSource["kind"];

export interface Dependency {
	/** Stable identifier (kernel, docker, ...) */
	name: string;
	/** Display name used in messages */
	label: string;
	source: VersionSource;
	check?: VersionCheck;
}

export interface SourceContext {
	fetcher: Fetcher;
	listTags: TagLister;
}

// =============================================================================
// Feed formats
// =============================================================================

/**
 * Define a feed format from a schema and a function flattening the document.
 */
export function defineFeedFormat<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	entries: (document: T) => FeedEntry[],
): FeedFormat {
	return {
		async read(fetcher, url) {
			return entries(await fetcher.json(url, schema));
		},
	};
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Pick the head of a feed: included entries, prefix stripped, highest first.
 */
export function selectFromFeed(
	entries: FeedEntry[],
	stripPrefix = "",
): string | null {
	const versions = entries
		.filter((entry) => entry.include)
		.map((entry) => stripVersionPrefix(entry.version, stripPrefix))
		.filter((version) => version.length > 0);
	return sortVersionsDescending(versions)[0] ?? null;
}

/**
 * Pick the highest version-like link of an HTML index.
 */
export function selectFromListing(
	html: string,
	pattern: RegExp,
	family?: string,
): string | null {
	const candidates = new Set<string>();
	for (const match of html.matchAll(pattern)) {
		const version = match[1];
		if (version && isNumericVersion(version)) {
			candidates.add(version);
		}
	}
	const inFamily = [...candidates].filter(
		(version) => family === undefined || matchesFamily(version, family),
	);
	return getLatestVersion(inFamily);
}

/**
 * Pick the highest numeric version among tag names.
 */
export function selectFromTags(
	tags: string[],
	tagPattern: RegExp,
): string | null {
	const versions: string[] = [];
	for (const tag of tags) {
		const version = tag.match(tagPattern)?.[1];
		if (version && isNumericVersion(version)) {
			versions.push(version);
		}
	}
	return getLatestVersion(versions);
}

/**
 * Extract the version from the first matching redirect target that carries one.
 */
export function selectFromRedirects(
	chain: string[],
	targetPattern: RegExp,
	versionPattern: RegExp,
): string | null {
	for (const location of chain) {
		if (!targetPattern.test(location)) continue;
		const version = location.match(versionPattern)?.[1];
		if (version) return version;
	}
	return null;
}

function required(
	dependency: Dependency,
	value: string | null,
	detail: string,
): string {
	if (value === null || value === "") {
		throw new ParseError(`${dependency.label} version`, detail);
	}
	return value;
}

/**
 * Resolve the candidate version of a dependency from its source.
 */
export async function resolveSource(
	dependency: Dependency,
	context: SourceContext,
): Promise<string> {
	const { fetcher, listTags } = context;
	const source = dependency.source;

	switch (source.kind) {
		case "text": {
			const body = await fetcher.any(source.candidates);
			return required(dependency, body.trim() || null, "empty version file");
		}
		case "spider": {
			const present = await fetcher.probe(source.url);
			if (!present) {
				throw new ArtifactMissingError(
					dependency.name,
					source.url,
					dependency.label,
				);
			}
			return source.reference;
		}
		case "feed": {
			const entries = await source.format.read(fetcher, source.url);
			return required(
				dependency,
				selectFromFeed(entries, source.stripPrefix),
				`no matching release in ${source.url}`,
			);
		}
		case "listing": {
			const html = await fetcher.text(source.url);
			return required(
				dependency,
				selectFromListing(html, source.pattern, source.family),
				`no version links${source.family ? ` in the ${source.family} family` : ""} at ${source.url}`,
			);
		}
		case "tags": {
			const tags = await listTags(source.repository);
			return required(
				dependency,
				selectFromTags(tags, source.tagPattern),
				`no version tags in ${source.repository}`,
			);
		}
		case "redirect": {
			const url = await source.locate(fetcher);
			const chain = await fetcher.redirects(url);
			return required(
				dependency,
				selectFromRedirects(chain, source.targetPattern, source.versionPattern),
				`no versioned redirect from ${url}`,
			);
		}
	}
}

/**
 * Wrap fetch and git failures so the message names what was being resolved.
 * Anything else is returned unchanged.
 */
export function attributeFailure(
	error: unknown,
	dependency: string,
	label: string,
): unknown {
	if (
		error instanceof FetchError ||
		error instanceof AllMirrorsFailedError ||
		error instanceof GitError
	) {
		return new DependencyError(dependency, label, error);
	}
	return error;
}

/**
 * Resolve a dependency and enforce its version check.
 *
 * @throws FamilyMismatchError when the version left the tracked family
 * @throws ParseError when the upstream document was not usable
 * @throws DependencyError when a request or git call failed
 */
export async function resolveDependency(
	dependency: Dependency,
	context: SourceContext,
): Promise<string> {
	let resolved: string;
	try {
		resolved = await resolveSource(dependency, context);
	} catch (error) {
		if (error instanceof ResponseFormatError) {
			throw new ParseError(`${dependency.label} version`, error.message);
		}
		throw attributeFailure(error, dependency.name, dependency.label);
	}

	if (dependency.check) {
		const result = validateVersion(resolved, dependency.check);
		if (result.status === "mismatch") {
			throw new FamilyMismatchError(
				dependency.name,
				resolved,
				result.expected,
				dependency.label,
			);
		}
	}

	if (process.env.PINBUMP_DEBUG) {
		console.log(`[resolve] ${dependency.name} = ${resolved}`);
	}

	return resolved;
}
