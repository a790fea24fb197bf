import type { Server } from "http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { createApp, startServer, toRawFields } from "./server.js";
import { createSilentLogger } from "../utils/logger.js";
import { escapeHtml, renderPage } from "./view.js";

const FORM = {
	spot_price: "100",
	strike_price: "100",
	volatility: "20",
	risk_free_rate: "5",
	time_to_expiry: "365",
	market_price: "10.60",
	option_type: "call",
};

function fakeLogger() {
	return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

function urlOf(server: Server): string {
	const address = server.address();
	if (address === null || typeof address === "string") {
		throw new Error("server is not listening on a port");
	}
	return `http://127.0.0.1:${address.port}`;
}

function close(server: Server): Promise<void> {
	return new Promise((resolve, reject) => {
		server.close((error) => (error ? reject(error) : resolve()));
	});
}

describe("HTTP server", () => {
	let server: Server;
	let baseUrl: string;

	beforeAll(async () => {
		server = await new Promise<Server>((resolve) => {
			const started = createApp({ logger: createSilentLogger() }).listen(0, "127.0.0.1", () => resolve(started));
		});
		baseUrl = urlOf(server);
	});

	afterAll(async () => {
		await close(server);
	});

	it("answers health checks", async () => {
		const res = await fetch(`${baseUrl}/health`);
		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({
			success: true,
			data: { status: "ok", uptime: expect.any(Number) },
			timestamp: expect.any(String),
		});
	});

	it("serves the empty form", async () => {
		const res = await fetch(`${baseUrl}/`);
		expect(res.status).toBe(200);
		expect(res.headers.get("content-type")).toContain("text/html");
		expect(await res.text()).toContain('<form method="post" action="/">');
	});

	it("renders the result of a form submission", async () => {
		const res = await fetch(`${baseUrl}/`, {
			method: "POST",
			body: new URLSearchParams({ ...FORM, symbol: "spy" }),
		});
		const html = await res.text();

		expect(res.status).toBe(200);
		expect(html).toContain("<h2>SPY Call</h2>");
		expect(html).toContain("<p>Theoretical price: <strong>10.45</strong></p>");
		expect(html).toContain("<p>Edge: <strong>+0.15</strong></p>");
		expect(html).toContain("<p>Recommendation: <strong>Strong Sell</strong></p>");
	});

	it("renders the error message and keeps the submitted values", async () => {
		const res = await fetch(`${baseUrl}/`, {
			method: "POST",
			body: new URLSearchParams({ ...FORM, option_type: "straddle", symbol: "<b>" }),
		});
		const html = await res.text();

		expect(res.status).toBe(200);
		expect(html).toContain(
			'<p class="error">Invalid option type. Must be &#39;call&#39; or &#39;put&#39;</p>',
		);
		expect(html).toContain('name="symbol" value="&lt;b&gt;"');
	});

	it("evaluates JSON requests", async () => {
		const res = await fetch(`${baseUrl}/api/evaluate`, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: JSON.stringify({ ...FORM, option_type: "put", market_price: 5 }),
		});

		expect(res.status).toBe(200);
		expect(await res.json()).toEqual({
			success: true,
			data: {
				theoreticalPrice: 5.57,
				edge: -0.57,
				marketPrice: 5,
				recommendation: "Strong Buy",
				optionType: "Put",
			},
			timestamp: expect.any(String),
		});
	});

	it("answers 400 with the error code for invalid input", async () => {
		const { option_type: _omitted, ...partial } = FORM;
		const res = await fetch(`${baseUrl}/api/evaluate`, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: JSON.stringify(partial),
		});

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({
			success: false,
			error: "All fields are required: option_type",
			code: "MISSING_FIELD",
			timestamp: expect.any(String),
		});
	});

	it("answers 400 for a malformed body", async () => {
		const res = await fetch(`${baseUrl}/api/evaluate`, {
			method: "POST",
			headers: { "content-type": "application/json" },
			body: "{ nope",
		});

		expect(res.status).toBe(400);
		expect(await res.json()).toEqual({
			success: false,
			error: "Malformed request",
			code: "BAD_REQUEST",
			timestamp: expect.any(String),
		});
	});
});

describe("startServer", () => {
	it("listens on the configured host and port", async () => {
		const logger = fakeLogger();
		const server = await startServer(
			{ server: { host: "127.0.0.1", port: 0 }, logging: { level: "info" } },
			logger,
		);
		const res = await fetch(`${urlOf(server)}/health`);
		expect(res.status).toBe(200);
		expect(logger.info).toHaveBeenCalledWith("Option edge calculator listening on http://127.0.0.1:0");
		await close(server);
	});
});

describe("toRawFields", () => {
	it("keeps strings and finite numbers only", () => {
		expect(
			toRawFields({ a: "1", b: 2, c: null, d: { e: 1 }, f: Number.POSITIVE_INFINITY, g: true }),
		).toEqual({ a: "1", b: "2" });
	});

	it("handles a missing body", () => {
		expect(toRawFields(undefined)).toEqual({});
	});
});

describe("view", () => {
	it("escapes HTML", () => {
		expect(escapeHtml(`<a href="x">'&'</a>`)).toBe("&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;");
	});

	it("selects the submitted option type", () => {
		expect(renderPage({ fields: { option_type: "PUT" } })).toContain('<option value="put" selected>Put</option>');
	});
});
