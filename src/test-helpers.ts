/**
 * In-process stand-ins for the network and git, shared by the test files.
 */

import type { FetchLike } from "@/fetcher";

export type Route =
	| { status?: number; body?: string; headers?: Record<string, string> }
	| { error: Error };

export interface FakeFetch {
	fetch: FetchLike;
	/** "METHOD url" for every request, in order */
	calls: string[];
}

/**
 * Build a fetch stand-in from a url -> response table.
 * Unknown URLs answer 404.
 */
export function createFakeFetch(routes: Record<string, Route>): FakeFetch {
	const calls: string[] = [];

	const fetch: FetchLike = async (input, init) => {
		calls.push(`${init?.method ?? "GET"} ${input}`);
		const route = routes[input];
		if (!route) {
			return new Response("Not Found", { status: 404 });
		}
		if ("error" in route) {
			throw route.error;
		}
		const status = route.status ?? 200;
		const body = status >= 300 && status < 400 ? null : (route.body ?? "");
		return new Response(body, { status, headers: route.headers });
	};

	return { fetch, calls };
}

/**
 * Error shaped like the one undici throws when a host cannot be reached.
 */
export function networkError(): Error {
	return new TypeError("fetch failed", {
		cause: new Error("getaddrinfo ENOTFOUND example.invalid"),
	});
}

/**
 * Error shaped like the one AbortSignal.timeout produces.
 */
export function timeoutError(): Error {
	const error = new Error("The operation was aborted due to timeout");
	error.name = "TimeoutError";
	return error;
}
