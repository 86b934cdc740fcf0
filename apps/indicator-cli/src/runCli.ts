import path from "node:path";
import process from "node:process";
import {
	createLogger,
	describeError,
	getConfigMetadata,
	loadPricelensConfig,
} from "@pricelens/core";
import { loadPriceCsvFile } from "@pricelens/data";
import { formatIndicatorCsv } from "@pricelens/metrics";
import { runAnalysis, toJsonPayload } from "./analysis";
import type { AnalysisReport } from "./analysis";
import {
	buildIndicatorRequest,
	parseCliArgs,
	parseTimestamp,
	readFlag,
	readStringArg,
} from "./cliArgs";

const logger = createLogger("indicator-cli");

/** Where the command writes; logs go through the logger to stderr instead. */
export interface CliOutput {
	out: (text: string) => void;
	err: (text: string) => void;
	table: (rows: unknown) => void;
}

export const consoleOutput: CliOutput = {
	out: (text) => console.log(text),
	err: (text) => console.error(text),
	table: (rows) => console.table(rows),
};

export const USAGE = `Usage:
  pricelens --file <prices.csv> [options]

Options (all optional unless noted):
  --file <path>            CSV with Date,Open,High,Low,Close[,Volume] (required)
  --start <iso>            First date to include (defaults to last 180 days)
  --end <iso>              Last date to include
  --profile <name>         Indicator profile under config/indicators
  --configDir <path>       Custom config directory
  --envPath <path>         Custom .env path
  --sma <n,n,...|off>      Simple moving average periods
  --ema <n,n,...|off>      Exponential moving average periods
  --rsi <n|off>            RSI period
  --macd <fast,slow,signal|off>
  --bollinger <period[,stdDev]|off>
  --atr <n|off>            Average true range period
  --json                   Print the full result as JSON
  --csv                    Print a date/close/indicator table as CSV
  --help, -h               Show this message
`;

const formatNumber = (value: number | undefined): string =>
	typeof value === "number" ? value.toFixed(2) : "n/a";

const isoDay = (timestamp: number): string =>
	new Date(timestamp).toISOString().slice(0, 10);

const printSummary = (report: AnalysisReport, output: CliOutput): void => {
	const last = report.series[report.series.length - 1];
	output.out("---- Summary ----");
	output.out(`Records: ${report.series.length}`);
	output.out(
		`Date range: ${isoDay(report.range.start)} - ${isoDay(report.range.end)}`
	);
	output.out(`Latest close: ${formatNumber(last.close)}`);
	if (last.high !== undefined && last.low !== undefined) {
		const low = formatNumber(last.low);
		const high = formatNumber(last.high);
		output.out(`Latest trading range: ${low} - ${high}`);
	}
	const latest = Object.entries(report.latest).map(([indicator, value]) => ({
		indicator,
		value: formatNumber(value),
	}));
	if (latest.length > 0) {
		output.out("---- Indicators ----");
		output.table(latest);
	}
	output.out("---- Statistics ----");
	output.table(report.stats);
};

const execute = (argv: string[], output: CliOutput): void => {
	const args = parseCliArgs(argv);
	if (readFlag(args, "help")) {
		output.out(USAGE);
		return;
	}

	const file = readStringArg(args, "file");
	if (!file) {
		throw new Error("Missing required --file <path>");
	}

	const config = loadPricelensConfig({
		envPath: readStringArg(args, "envPath"),
		configDir: readStringArg(args, "configDir"),
		profile: readStringArg(args, "profile"),
	});
	logger.debug("config_loaded", {
		profile: getConfigMetadata(config.indicators),
	});

	const request = buildIndicatorRequest(args, config.indicators);
	const points = loadPriceCsvFile(path.resolve(process.cwd(), file), {
		logger,
	});
	const report = runAnalysis(points, {
		request,
		range: {
			start: parseTimestamp(readStringArg(args, "start"), "start"),
			end: parseTimestamp(readStringArg(args, "end"), "end"),
		},
		rangeDays: config.env.dateRangeDays,
		logger,
	});

	if (readFlag(args, "json")) {
		output.out(JSON.stringify(toJsonPayload(report), null, 2));
		return;
	}
	if (readFlag(args, "csv")) {
		output.out(
			formatIndicatorCsv(report.series, report.result, { precision: 4 })
		);
		return;
	}
	printSummary(report, output);
};

/** Runs one command line and returns the process exit code. */
export const runCli = (
	argv: string[],
	output: CliOutput = consoleOutput
): number => {
	try {
		execute(argv, output);
		return 0;
	} catch (error) {
		logger.error("analysis_failed", { error });
		output.err(`Analysis failed: ${describeError(error)}`);
		if (process.env.DEBUG && error instanceof Error && error.stack) {
			output.err(error.stack);
		}
		return 1;
	}
};
