import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { USAGE, runCli } from "./runCli";
import type { CliOutput } from "./runCli";

const FIXTURES = path.join(__dirname, "__tests__", "fixtures");
const PRICES = path.join(FIXTURES, "prices.csv");

const baseArgs = (envFile = "cli.env"): string[] => [
	"--file",
	PRICES,
	"--configDir",
	path.join(FIXTURES, "config"),
	"--envPath",
	path.join(FIXTURES, envFile),
];

const captureOutput = () => {
	const out: string[] = [];
	const err: string[] = [];
	const tables: unknown[] = [];
	const output: CliOutput = {
		out: (text) => out.push(text),
		err: (text) => err.push(text),
		table: (rows) => tables.push(rows),
	};
	const stdout = vi.spyOn(console, "log").mockImplementation(() => undefined);
	const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
	return { out, err, tables, output, stdout, stderr };
};

describe("runCli", () => {
	afterEach(() => {
		vi.restoreAllMocks();
		delete process.env.PRICELENS_PROFILE;
		delete process.env.PRICELENS_DATE_RANGE_DAYS;
		delete process.env.LOG_LEVEL;
	});

	it("prints nothing but the table with --csv", () => {
		const { out, err, output, stdout } = captureOutput();
		expect(runCli([...baseArgs(), "--csv"], output)).toBe(0);
		expect(out.join("\n").split("\n")).toEqual([
			"date,close,sma_3",
			"2024-01-01,10,",
			"2024-01-02,11,",
			"2024-01-03,12,11.0000",
			"2024-01-04,13,12.0000",
			"2024-01-05,14,13.0000",
		]);
		expect(err).toEqual([]);
		expect(stdout).not.toHaveBeenCalled();
	});

	it("prints a single parseable document with --json", () => {
		const { out, output, stdout } = captureOutput();
		expect(runCli(["--json", ...baseArgs()], output)).toBe(0);
		expect(out).toHaveLength(1);
		const payload: unknown = JSON.parse(out[0]);
		expect(payload).toMatchObject({
			range: {
				start: "2024-01-01T00:00:00.000Z",
				end: "2024-01-05T00:00:00.000Z",
			},
			points: 5,
			latest: { sma_3: 13 },
		});
		expect(stdout).not.toHaveBeenCalled();
	});

	it("prints the summary, latest indicators and statistics", () => {
		const { out, tables, output } = captureOutput();
		expect(runCli(baseArgs(), output)).toBe(0);
		expect(out).toEqual([
			"---- Summary ----",
			"Records: 5",
			"Date range: 2024-01-01 - 2024-01-05",
			"Latest close: 14.00",
			"Latest trading range: 13.00 - 14.50",
			"---- Indicators ----",
			"---- Statistics ----",
		]);
		expect(tables[0]).toEqual([{ indicator: "sma_3", value: "13.00" }]);
		expect(tables[1]).toMatchObject({
			close: { count: 5, mean: 12, min: 10, max: 14 },
		});
	});

	it("applies flag overrides on top of the profile", () => {
		const { out, output } = captureOutput();
		runCli([...baseArgs(), "--sma", "off", "--ema", "2", "--csv"], output);
		expect(out.join("\n").split("\n")[0]).toBe("date,close,ema_2");
	});

	it("sends log lines to stderr at the level from the env file", () => {
		const { output, stdout, stderr } = captureOutput();
		expect(runCli([...baseArgs("quiet.env"), "--csv"], output)).toBe(0);
		expect(stderr).not.toHaveBeenCalled();

		runCli([...baseArgs("cli.env"), "--csv"], output);
		expect(stdout).not.toHaveBeenCalled();
	});

	it("reports a failure and returns exit code 1", () => {
		const { out, err, output } = captureOutput();
		expect(runCli([], output)).toBe(1);
		expect(out).toEqual([]);
		expect(err).toEqual(["Analysis failed: Missing required --file <path>"]);
	});

	it("names a missing price file", () => {
		const missing = path.join(FIXTURES, "absent.csv");
		const { err, output } = captureOutput();
		const args = [...baseArgs(), "--file", missing];
		expect(runCli(args, output)).toBe(1);
		expect(err[0]).toBe(`Analysis failed: CSV file not found: ${missing}`);
	});

	it("prints usage for -h", () => {
		const { out, output } = captureOutput();
		expect(runCli(["-h"], output)).toBe(0);
		expect(out).toEqual([USAGE]);
	});
});
