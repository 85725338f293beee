/**
 * Bounded-timeout HTTP retrieval for upstream release data.
 *
 * Every request carries an abort timeout so one unreachable host cannot stall
 * the run. Nothing is printed unless PINBUMP_DEBUG is set.
 */

import type { z } from "zod";
import {
	AllMirrorsFailedError,
	FetchError,
	ResponseFormatError,
} from "@/errors";

export type FetchLike = (
	input: string,
	init?: RequestInit,
) => Promise<Response>;

export interface FetcherOptions {
	/** Per-request timeout in milliseconds */
	timeoutMs: number;
	/** Injected fetch implementation (defaults to the global fetch) */
	fetch?: FetchLike;
	/** Extra headers sent with every request */
	headers?: Record<string, string>;
}

export interface MirrorCandidate {
	mirror: string;
	path: string;
}

export interface Fetcher {
	/** GET a URL and return its body as text */
	text(url: string, headers?: Record<string, string>): Promise<string>;
	/** GET a URL, parse JSON and validate it with a schema */
	json<T>(
		url: string,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		headers?: Record<string, string>,
	): Promise<T>;
	/** HEAD a URL, following redirects; true when it answers 2xx */
	probe(url: string): Promise<boolean>;
	/** Try each mirror/path combination in order; first success wins */
	any(candidates: MirrorCandidate[]): Promise<string>;
	/** Follow a redirect chain and return every Location visited */
	redirects(url: string, maxHops?: number): Promise<string[]>;
}

const USER_AGENT = "pinbump";
const DEFAULT_MAX_HOPS = 10;

/**
 * Join a mirror base URL and a relative path with exactly one slash.
 */
export function joinUrl(base: string, path: string): string {
	return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

function isTimeout(error: unknown): boolean {
	return (
		error instanceof Error &&
		(error.name === "TimeoutError" || error.name === "AbortError")
	);
}

function describeNetworkError(error: unknown): string {
	if (!(error instanceof Error)) return String(error);
	// undici wraps the socket error as `cause`
	if (error.cause instanceof Error) {
		return `${error.message} (${error.cause.message})`;
	}
	return error.message;
}

function debug(message: string): void {
	if (process.env.PINBUMP_DEBUG) {
		console.log(`[fetch] ${message}`);
	}
}

/**
 * Create a fetcher bound to a timeout.
 *
 * @example
 * ```typescript
 * const fetcher = createFetcher({ timeoutMs: 2000 });
 * const latest = await fetcher.text("https://example.com/latest");
 * ```
 */
export function createFetcher(options: FetcherOptions): Fetcher {
	const fetchImpl: FetchLike =
		options.fetch ?? ((input, init) => fetch(input, init));
	const baseHeaders: Record<string, string> = {
		"User-Agent": USER_AGENT,
		...options.headers,
	};

	async function request(
		url: string,
		init: RequestInit,
		read: (response: Response) => Promise<string>,
	): Promise<{ response: Response; body: string }> {
		debug(`${init.method ?? "GET"} ${url}`);
		try {
			const response = await fetchImpl(url, {
				...init,
				signal: AbortSignal.timeout(options.timeoutMs),
			});
			const body = await read(response);
			debug(`${response.status} ${url}`);
			return { response, body };
		} catch (error) {
			if (error instanceof FetchError) throw error;
			if (isTimeout(error)) {
				throw new FetchError(url, "timeout");
			}
			throw new FetchError(
				url,
				"network",
				undefined,
				describeNetworkError(error),
			);
		}
	}

	async function text(
		url: string,
		headers?: Record<string, string>,
	): Promise<string> {
		const { body } = await request(
			url,
			{ headers: { ...baseHeaders, ...headers } },
			async (response) => {
				if (!response.ok) {
					throw new FetchError(url, "http", response.status);
				}
				return response.text();
			},
		);
		return body;
	}

	async function json<T>(
		url: string,
		schema: z.ZodType<T, z.ZodTypeDef, unknown>,
		headers?: Record<string, string>,
	): Promise<T> {
		const body = await text(url, { Accept: "application/json", ...headers });
		let data: unknown;
		try {
			data = JSON.parse(body);
		} catch {
			throw new ResponseFormatError(url, "response is not JSON");
		}
		const result = schema.safeParse(data);
		if (!result.success) {
			const issue = result.error.issues[0];
			const path = issue?.path.join(".") || "(root)";
			throw new ResponseFormatError(
				url,
				`unexpected shape at ${path}: ${issue?.message ?? "invalid value"}`,
			);
		}
		return result.data;
	}

	async function probe(url: string): Promise<boolean> {
		try {
			const { response } = await request(
				url,
				{ method: "HEAD", headers: baseHeaders, redirect: "follow" },
				async () => "",
			);
			return response.ok;
		} catch (error) {
			if (error instanceof FetchError) {
				debug(`probe failed: ${error.message}`);
				return false;
			}
			throw error;
		}
	}

	async function any(candidates: MirrorCandidate[]): Promise<string> {
		const attempts: FetchError[] = [];
		for (const { mirror, path } of candidates) {
			const url = joinUrl(mirror, path);
			try {
				return await text(url);
			} catch (error) {
				if (!(error instanceof FetchError)) throw error;
				debug(`mirror failed, trying next: ${error.message}`);
				attempts.push(error);
			}
		}
		throw new AllMirrorsFailedError(attempts);
	}

	async function redirects(
		url: string,
		maxHops = DEFAULT_MAX_HOPS,
	): Promise<string[]> {
		const visited: string[] = [];
		let current = url;

		for (let hop = 0; hop < maxHops; hop++) {
			const { response } = await request(
				current,
				{ method: "HEAD", headers: baseHeaders, redirect: "manual" },
				async () => "",
			);
			const location = response.headers.get("location");
			if (response.status < 300 || response.status >= 400 || !location) {
				if (response.status >= 400) {
					throw new FetchError(current, "http", response.status);
				}
				return visited;
			}
			current = new URL(location, current).toString();
			visited.push(current);
		}

		return visited;
	}

	return { text, json, probe, any, redirects };
}
