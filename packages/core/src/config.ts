import fs from "node:fs";
import path from "node:path";
import { config as dotenvConfig } from "dotenv";

import { ConfigError } from "./errors";
import type { BollingerParams, IndicatorRequest, MacdParams } from "./types";

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const configMetadata = new WeakMap<object, ConfigMetadata>();

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = configMetadata.get(config) ?? {};
	configMetadata.set(config, { ...existing, ...metadata });
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	return configMetadata.get(config) ?? null;
};

export interface EnvConfig {
	configDir: string;
	profile: string;
	dateRangeDays: number;
}

export interface PricelensConfig {
	env: EnvConfig;
	indicators: IndicatorRequest;
}

export interface ConfigLoadOptions {
	envPath?: string;
	configDir?: string;
	profile?: string;
}

export const DEFAULT_PROFILE = "default";
export const DEFAULT_DATE_RANGE_DAYS = 180;

let cachedWorkspaceRoot: string | undefined;

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const isWorkspaceRoot = (dir: string): boolean => {
	const manifest = path.join(dir, "package.json");
	if (!fs.existsSync(manifest)) {
		return false;
	}
	const parsed: unknown = JSON.parse(fs.readFileSync(manifest, "utf-8"));
	return isRecord(parsed) && Array.isArray(parsed.workspaces);
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();

	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");
export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const parsePositiveInt = (
	value: string | undefined,
	key: string,
	fallback: number
): number => {
	if (value === undefined) {
		return fallback;
	}
	const parsed = Number(value);
	if (!Number.isInteger(parsed) || parsed <= 0) {
		throw new ConfigError(
			`Environment variable ${key} must be a positive integer, got "${value}"`,
			{ key }
		);
	}
	return parsed;
};

const readJsonFile = (filePath: string): unknown => {
	if (!fs.existsSync(filePath)) {
		throw new ConfigError(`Config file not found: ${filePath}`, {
			path: filePath,
		});
	}
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		const parsed: unknown = JSON.parse(contents);
		return parsed;
	} catch (error) {
		throw new ConfigError(
			`Config file ${filePath} is not valid JSON: ${
				error instanceof Error ? error.message : "parse failed"
			}`,
			{ path: filePath }
		);
	}
};

/** Values in the env file win over the process environment on every call. */
export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (fs.existsSync(envPath)) {
		dotenvConfig({ path: envPath, override: true });
	}

	const configDir = readOptionalEnvVar("PRICELENS_CONFIG_DIR");
	return {
		configDir: configDir
			? path.resolve(findWorkspaceRoot(), configDir)
			: getDefaultConfigDir(),
		profile: readOptionalEnvVar("PRICELENS_PROFILE") ?? DEFAULT_PROFILE,
		dateRangeDays: parsePositiveInt(
			readOptionalEnvVar("PRICELENS_DATE_RANGE_DAYS"),
			"PRICELENS_DATE_RANGE_DAYS",
			DEFAULT_DATE_RANGE_DAYS
		),
	};
};

const ensurePeriod = (value: unknown, field: string): number => {
	if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
		throw new ConfigError(`${field} must be a positive integer`, { field });
	}
	return value;
};

const ensurePeriodList = (value: unknown, field: string): number[] => {
	if (!Array.isArray(value)) {
		throw new ConfigError(`${field} must be an array of periods`, { field });
	}
	return value.map((entry, index) => ensurePeriod(entry, `${field}[${index}]`));
};

const parseMacd = (value: unknown, field: string): MacdParams => {
	if (!isRecord(value)) {
		throw new ConfigError(`${field} must be an object`, { field });
	}
	return {
		fast: ensurePeriod(value.fast, `${field}.fast`),
		slow: ensurePeriod(value.slow, `${field}.slow`),
		signal: ensurePeriod(value.signal, `${field}.signal`),
	};
};

const parseBollinger = (value: unknown, field: string): BollingerParams => {
	if (!isRecord(value)) {
		throw new ConfigError(`${field} must be an object`, { field });
	}
	const { stdDev } = value;
	if (typeof stdDev !== "number" || !Number.isFinite(stdDev) || stdDev <= 0) {
		throw new ConfigError(`${field}.stdDev must be a positive number`, {
			field: `${field}.stdDev`,
		});
	}
	return { period: ensurePeriod(value.period, `${field}.period`), stdDev };
};

export const parseIndicatorProfile = (
	raw: unknown,
	label = "indicators"
): IndicatorRequest => {
	if (!isRecord(raw)) {
		throw new ConfigError(`${label} profile must be a JSON object`);
	}
	const request: IndicatorRequest = {};
	if (raw.sma !== undefined) {
		request.sma = ensurePeriodList(raw.sma, `${label}.sma`);
	}
	if (raw.ema !== undefined) {
		request.ema = ensurePeriodList(raw.ema, `${label}.ema`);
	}
	if (raw.rsi !== undefined) {
		request.rsi = ensurePeriod(raw.rsi, `${label}.rsi`);
	}
	if (raw.macd !== undefined) {
		request.macd = parseMacd(raw.macd, `${label}.macd`);
	}
	if (raw.bollinger !== undefined) {
		request.bollinger = parseBollinger(raw.bollinger, `${label}.bollinger`);
	}
	if (raw.atr !== undefined) {
		request.atr = ensurePeriod(raw.atr, `${label}.atr`);
	}
	return request;
};

export const resolveIndicatorProfilePath = (
	configDir: string,
	profile: string
): string => {
	const fileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	return path.join(configDir, "indicators", fileName);
};

export const loadIndicatorProfile = (
	configDir = getDefaultConfigDir(),
	profile = DEFAULT_PROFILE
): IndicatorRequest => {
	const profilePath = resolveIndicatorProfilePath(configDir, profile);
	const request = parseIndicatorProfile(readJsonFile(profilePath), profile);
	return withConfigMetadata(request, {
		source: "file",
		path: profilePath,
		profile,
	});
};

export const loadPricelensConfig = (
	options: ConfigLoadOptions = {}
): PricelensConfig => {
	const env = loadEnvConfig(options.envPath ?? getDefaultEnvPath());
	const configDir = options.configDir ?? env.configDir;
	const profile = options.profile ?? env.profile;
	return {
		env: { ...env, configDir, profile },
		indicators: loadIndicatorProfile(configDir, profile),
	};
};
