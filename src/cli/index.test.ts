import chalk from "chalk";
import { afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { startServer } from "../api/server.js";
import { ConfigurationError } from "../core/errors.js";
import { renderResultTable, runCLI, toFields } from "./index.js";

vi.mock("../api/server.js", async (importOriginal) => {
	const actual = await importOriginal<typeof import("../api/server.js")>();
	return { ...actual, startServer: vi.fn() };
});

const PRICE_ARGS = [
	"price",
	"--spot",
	"100",
	"--strike",
	"100",
	"--volatility",
	"20",
	"--rate",
	"5",
	"--days",
	"365",
	"--market",
	"10.60",
];

describe("toFields", () => {
	it("maps options onto form fields", () => {
		expect(
			toFields({
				spot: "100",
				strike: "95",
				volatility: "20",
				rate: "5",
				days: "30",
				market: "7.5",
				type: "put",
				symbol: "spy",
			}),
		).toEqual({
			spot_price: "100",
			strike_price: "95",
			volatility: "20",
			risk_free_rate: "5",
			time_to_expiry: "30",
			market_price: "7.5",
			option_type: "put",
			symbol: "spy",
			expiry_date: undefined,
		});
	});
});

describe("renderResultTable", () => {
	beforeAll(() => {
		chalk.level = 0;
	});

	it("prints one row per field", () => {
		const lines = renderResultTable({
			theoreticalPrice: 10.45,
			edge: 0.15,
			marketPrice: 10.6,
			recommendation: "Strong Sell",
			optionType: "Call",
			symbol: "SPY",
		}).split("\n");

		expect(lines.some((line) => /│ Symbol\s+│ SPY\s+│/.test(line))).toBe(true);
		expect(lines.some((line) => /│ Market price\s+│ 10\.60\s+│/.test(line))).toBe(true);
		expect(lines.some((line) => /│ Theoretical price\s+│ 10\.45\s+│/.test(line))).toBe(true);
		expect(lines.some((line) => /│ Edge\s+│ \+0\.15\s+│/.test(line))).toBe(true);
		expect(lines.some((line) => /│ Recommendation\s+│ Strong Sell\s+│/.test(line))).toBe(true);
		expect(lines.some((line) => line.includes("Expiry"))).toBe(false);
	});
});

describe("runCLI", () => {
	beforeAll(() => {
		chalk.level = 0;
	});

	beforeEach(() => {
		vi.mocked(startServer).mockClear();
	});

	afterEach(() => {
		vi.restoreAllMocks();
		process.exitCode = undefined;
	});

	it("prints the evaluation table", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

		await runCLI(PRICE_ARGS);

		expect(log).toHaveBeenCalledTimes(1);
		expect(String(log.mock.calls[0]?.[0])).toMatch(/│ Recommendation\s+│ Strong Sell\s+│/);
		expect(process.exitCode).toBeUndefined();
	});

	it("reports validation errors and sets the exit code", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

		await runCLI([...PRICE_ARGS, "--type", "straddle"]);

		expect(error).toHaveBeenCalledWith("❌ Invalid option type. Must be 'call' or 'put'");
		expect(process.exitCode).toBe(1);
	});

	it("serves on the port given on the command line", async () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

		await runCLI(["serve", "--port", "9123"]);

		expect(startServer).toHaveBeenCalledTimes(1);
		expect(vi.mocked(startServer).mock.calls[0]?.[0].server.port).toBe(9123);
		expect(log).toHaveBeenCalledWith("✓ Listening on port 9123");
	});

	it("rejects an invalid port before starting", async () => {
		await expect(runCLI(["serve", "--port", "abc"])).rejects.toThrow(ConfigurationError);
		expect(startServer).not.toHaveBeenCalled();
	});
});
