/**
 * JSON-over-HTTP request helper built on the platform fetch.
 *
 * Each request gets its own AbortController: the deadline and an optional
 * caller signal both abort it, and the timer and listener are released in
 * `finally` whichever way the request ends. No retries happen here.
 */

export class TimeoutError extends Error {
	constructor(
		message: string,
		public readonly timeoutMs: number,
	) {
		super(message);
		this.name = "TimeoutError";
	}
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type HttpMethod = "GET" | "POST" | "PUT";

export interface JsonRequest {
	method: HttpMethod;
	url: string;
	headers?: Record<string, string>;
	/** Serialized with JSON.stringify when present. */
	body?: unknown;
	/** Deadline covering the request and reading the body. Non-positive disables it. */
	timeoutMs?: number;
	signal?: AbortSignal;
}

export type JsonResponse = {
	ok: boolean;
	status: number;
	statusText: string;
	raw: string;
	/** Parsed body; null for an empty body, undefined when the body is not JSON. */
	payload: unknown;
};

function safeJsonParse(raw: string): unknown {
	try {
		return JSON.parse(raw);
	} catch {
		return undefined;
	}
}

export async function requestJson(fetchImpl: FetchLike, request: JsonRequest): Promise<JsonResponse> {
	const controller = new AbortController();

	let externalAbortCleanup: (() => void) | undefined;
	const externalSignal = request.signal;
	if (externalSignal) {
		if (externalSignal.aborted) {
			controller.abort(externalSignal.reason);
		} else {
			const onAbort = () => controller.abort(externalSignal.reason);
			externalSignal.addEventListener("abort", onAbort, { once: true });
			externalAbortCleanup = () => externalSignal.removeEventListener("abort", onAbort);
		}
	}

	const timeoutMs = request.timeoutMs ?? 0;
	let timer: ReturnType<typeof setTimeout> | undefined;
	if (timeoutMs > 0 && Number.isFinite(timeoutMs)) {
		timer = setTimeout(() => {
			controller.abort(
				new TimeoutError(`${request.method} ${request.url} timed out after ${timeoutMs}ms`, timeoutMs),
			);
		}, timeoutMs);
		timer.unref();
	}

	const headers: Record<string, string> = { Accept: "application/json", ...request.headers };
	if (request.body !== undefined && !("Content-Type" in headers)) {
		headers["Content-Type"] = "application/json";
	}

	try {
		const response = await fetchImpl(request.url, {
			method: request.method,
			headers,
			body: request.body === undefined ? undefined : JSON.stringify(request.body),
			signal: controller.signal,
		});
		const raw = await response.text();
		return {
			ok: response.ok,
			status: response.status,
			statusText: response.statusText,
			raw,
			payload: raw ? safeJsonParse(raw) : null,
		};
	} finally {
		if (timer) clearTimeout(timer);
		externalAbortCleanup?.();
	}
}
