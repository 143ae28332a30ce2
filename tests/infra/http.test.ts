import { describe, expect, it, vi } from "vitest";

import { type FetchLike, requestJson, TimeoutError } from "../../src/infra/http.js";

function jsonResponse(body: unknown, status = 200): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

/** A fetch that never answers and rejects once its signal aborts. */
function hangingFetch(): FetchLike {
	return (_url, init) =>
		new Promise((_resolve, reject) => {
			init.signal?.addEventListener("abort", () => reject(init.signal?.reason), { once: true });
		});
}

describe("requestJson", () => {
	it("sends JSON with the default headers", async () => {
		const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({ ok: true }));

		await requestJson(fetchImpl, {
			method: "POST",
			url: "http://api.test/user/login",
			headers: { "User-Agent": "test-agent" },
			body: { username: "test-user" },
		});

		expect(fetchImpl).toHaveBeenCalledTimes(1);
		const [url, init] = fetchImpl.mock.calls[0];
		expect(url).toBe("http://api.test/user/login");
		expect(init.method).toBe("POST");
		expect(init.body).toBe('{"username":"test-user"}');
		expect(init.headers).toEqual({
			Accept: "application/json",
			"User-Agent": "test-agent",
			"Content-Type": "application/json",
		});
	});

	it("omits the body and Content-Type for requests without one", async () => {
		const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse([]));

		await requestJson(fetchImpl, { method: "GET", url: "http://api.test/devices" });

		const [, init] = fetchImpl.mock.calls[0];
		expect(init.body).toBeUndefined();
		expect(init.headers).toEqual({ Accept: "application/json" });
	});

	it("returns status, raw text and parsed payload", async () => {
		const fetchImpl: FetchLike = async () => jsonResponse({ id: "dev-1" }, 201);

		const response = await requestJson(fetchImpl, { method: "GET", url: "http://api.test/x" });

		expect(response.ok).toBe(true);
		expect(response.status).toBe(201);
		expect(response.raw).toBe('{"id":"dev-1"}');
		expect(response.payload).toEqual({ id: "dev-1" });
	});

	it("reports an empty body as null and a non-JSON body as undefined", async () => {
		const empty = await requestJson(async () => new Response(null, { status: 204 }), {
			method: "PUT",
			url: "http://api.test/x",
		});
		expect(empty.payload).toBeNull();

		const text = await requestJson(async () => new Response("Bad Gateway", { status: 502 }), {
			method: "GET",
			url: "http://api.test/x",
		});
		expect(text.ok).toBe(false);
		expect(text.raw).toBe("Bad Gateway");
		expect(text.payload).toBeUndefined();
	});

	it("aborts with TimeoutError after the deadline", async () => {
		const promise = requestJson(hangingFetch(), {
			method: "GET",
			url: "http://api.test/slow",
			timeoutMs: 10,
		});

		await expect(promise).rejects.toBeInstanceOf(TimeoutError);
		await expect(promise).rejects.toThrow("GET http://api.test/slow timed out after 10ms");
	});

	it("aborts when the caller's signal aborts", async () => {
		const controller = new AbortController();
		const promise = requestJson(hangingFetch(), {
			method: "GET",
			url: "http://api.test/slow",
			signal: controller.signal,
		});

		controller.abort(new Error("cancelled by caller"));

		await expect(promise).rejects.toThrow("cancelled by caller");
	});

	it("passes an already-aborted caller signal through to fetch", async () => {
		const controller = new AbortController();
		controller.abort(new Error("too late"));
		const fetchImpl = vi.fn<FetchLike>(async () => jsonResponse({}));

		await requestJson(fetchImpl, {
			method: "GET",
			url: "http://api.test/x",
			signal: controller.signal,
		});

		expect(fetchImpl.mock.calls[0][1].signal?.aborted).toBe(true);
	});

	it("removes its abort listener once the request settles", async () => {
		const controller = new AbortController();
		const removeSpy = vi.spyOn(controller.signal, "removeEventListener");

		await requestJson(async () => jsonResponse({}), {
			method: "GET",
			url: "http://api.test/x",
			signal: controller.signal,
		});

		expect(removeSpy).toHaveBeenCalledWith("abort", expect.any(Function));
	});
});
