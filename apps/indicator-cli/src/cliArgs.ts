import type { BollingerParams, IndicatorRequest, MacdParams } from "@pricelens/core";
import { InvalidParameterError } from "@pricelens/core";

export type ArgValue = string | boolean;

/** Flags that never take a value, so `--csv prices.csv` keeps the file. */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(["json", "csv", "help"]);

/**
 * Reads `--key value`, `--key=value` and bare flags; `-h` is `--help` and
 * everything after `--` is positional. The first positional is the file.
 */
export const parseCliArgs = (argv: string[]): Record<string, ArgValue> => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i += 1) {
		const token = argv[i];
		if (token === "--") {
			positionals.push(...argv.slice(i + 1));
			break;
		}
		if (token === "-h") {
			args.help = true;
			continue;
		}
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const body = token.slice(2);
		const eqIdx = body.indexOf("=");
		if (eqIdx !== -1) {
			args[body.slice(0, eqIdx)] = body.slice(eqIdx + 1);
			continue;
		}
		const next = argv[i + 1];
		if (!BOOLEAN_FLAGS.has(body) && next !== undefined && !next.startsWith("--")) {
			args[body] = next;
			i += 1;
		} else {
			args[body] = true;
		}
	}
	if (positionals.length > 0 && args.file === undefined) {
		args.file = positionals[0];
	}
	return args;
};

export const readStringArg = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	if (value === undefined || value === false) {
		return undefined;
	}
	if (value === true) {
		throw new InvalidParameterError(`--${key}`, "", "a value");
	}
	return value;
};

export const readFlag = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";

export const parseTimestamp = (
	value: string | undefined,
	label: string
): number | undefined => {
	if (value === undefined) {
		return undefined;
	}
	const ts = Date.parse(value);
	if (Number.isNaN(ts)) {
		throw new InvalidParameterError(`--${label}`, value, "an ISO date");
	}
	return ts;
};

const parseIntegerList = (value: string, label: string): number[] =>
	value
		.split(",")
		.map((token) => token.trim())
		.filter((token) => token.length > 0)
		.map((token) => {
			const num = Number(token);
			if (!Number.isInteger(num) || num <= 0) {
				throw new InvalidParameterError(`--${label}`, token, "a positive integer");
			}
			return num;
		});

export const parsePeriodList = (value: string, label: string): number[] => {
	const periods = parseIntegerList(value, label);
	if (!periods.length) {
		throw new InvalidParameterError(`--${label}`, value, "one or more periods");
	}
	return periods;
};

export const parseMacdArg = (value: string): MacdParams => {
	const parts = parseIntegerList(value, "macd");
	if (parts.length !== 3) {
		throw new InvalidParameterError("--macd", value, "fast,slow,signal");
	}
	const [fast, slow, signal] = parts;
	return { fast, slow, signal };
};

export const parseBollingerArg = (value: string): BollingerParams => {
	const [periodToken, stdDevToken, ...rest] = value.split(",");
	const period = Number(periodToken);
	const stdDev = stdDevToken === undefined ? 2 : Number(stdDevToken);
	if (
		rest.length > 0 ||
		!Number.isInteger(period) ||
		period < 2 ||
		!Number.isFinite(stdDev) ||
		stdDev <= 0
	) {
		throw new InvalidParameterError("--bollinger", value, "period[,stdDev]");
	}
	return { period, stdDev };
};

const parseSinglePeriod = (value: string, label: string): number => {
	const periods = parsePeriodList(value, label);
	if (periods.length !== 1) {
		throw new InvalidParameterError(`--${label}`, value, "a single period");
	}
	return periods[0];
};

/**
 * Applies indicator flags on top of a profile. A flag set to "off" drops the
 * indicator from the request.
 */
export const buildIndicatorRequest = (
	args: Record<string, ArgValue>,
	base: IndicatorRequest
): IndicatorRequest => {
	const request: IndicatorRequest = { ...base };
	const read = (key: string): string | undefined => {
		const value = readStringArg(args, key);
		return value?.toLowerCase() === "off" ? "off" : value;
	};

	const sma = read("sma");
	if (sma !== undefined) {
		request.sma = sma === "off" ? [] : parsePeriodList(sma, "sma");
	}
	const ema = read("ema");
	if (ema !== undefined) {
		request.ema = ema === "off" ? [] : parsePeriodList(ema, "ema");
	}
	const rsi = read("rsi");
	if (rsi === "off") {
		delete request.rsi;
	} else if (rsi !== undefined) {
		request.rsi = parseSinglePeriod(rsi, "rsi");
	}
	const macd = read("macd");
	if (macd === "off") {
		delete request.macd;
	} else if (macd !== undefined) {
		request.macd = parseMacdArg(macd);
	}
	const bollinger = read("bollinger");
	if (bollinger === "off") {
		delete request.bollinger;
	} else if (bollinger !== undefined) {
		request.bollinger = parseBollingerArg(bollinger);
	}
	const atr = read("atr");
	if (atr === "off") {
		delete request.atr;
	} else if (atr !== undefined) {
		request.atr = parseSinglePeriod(atr, "atr");
	}
	return request;
};
