export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogPayload {
	level: LogLevel;
	event: string;
	module: string;
	ts?: string;
	[key: string]: unknown;
}

export type LogData = Record<string, unknown>;

const LEVELS: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

const normalizeLevel = (value?: string): LogLevel => {
	if (!value) {
		return "info";
	}
	const normalized = value.trim().toLowerCase();
	return isLogLevel(normalized) ? normalized : "info";
};

interface LogSettings {
	minLevel: LogLevel;
	pretty: boolean;
}

// Read on every call so a .env loaded after import still applies.
const readSettings = (): LogSettings => ({
	minLevel: normalizeLevel(process.env.LOG_LEVEL),
	pretty: process.env.LOG_PRETTY === "true",
});

/**
 * Writes one structured entry to stderr, leaving stdout to command output.
 * `LOG_LEVEL` sets the threshold and `LOG_PRETTY=true` swaps the JSON line
 * for a readable one.
 */
export function log(payload: BaseLogPayload): void {
	const settings = readSettings();
	if (LEVELS[payload.level] < LEVELS[settings.minLevel]) {
		return;
	}
	const ts = payload.ts ?? new Date().toISOString();
	const base: BaseLogPayload = { ...payload, ts };

	if (settings.pretty) {
		console.error(formatPretty(base));
		return;
	}

	try {
		console.error(JSON.stringify(sanitizeValue(base, new WeakSet())));
	} catch (err) {
		console.error(
			JSON.stringify({
				ts,
				level: "error",
				event: "logging_error",
				module: "logger",
				error: err instanceof Error ? err.message : "serialization_failed",
			})
		);
	}
}

type EventLogger = (event: string, data?: LogData) => void;

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: LogData) => void;
	debug: EventLogger;
	info: EventLogger;
	warn: EventLogger;
	error: EventLogger;
}

export const createLogger = (moduleName: string): ModuleLogger => {
	const write = (level: LogLevel, event: string, data?: LogData): void =>
		log({ ...data, level, event, module: moduleName });
	const at =
		(level: LogLevel): EventLogger =>
		(event, data) =>
			write(level, event, data);
	return {
		log: write,
		debug: at("debug"),
		info: at("info"),
		warn: at("warn"),
		error: at("error"),
	};
};

export const sanitizeValue = (
	value: unknown,
	seen: WeakSet<object>
): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number" && !Number.isFinite(value)) {
		return String(value);
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (Array.isArray(value)) {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const arr = value.map((item) => sanitizeValue(item, seen));
		seen.delete(value);
		return arr;
	}
	if (value && typeof value === "object") {
		if (seen.has(value)) {
			return "[circular]";
		}
		seen.add(value);
		const clone: Record<string, unknown> = {};
		for (const [key, nested] of Object.entries(value)) {
			clone[key] = sanitizeValue(nested, seen);
		}
		seen.delete(value);
		return clone;
	}
	return value;
};

const formatField = (value: unknown): string => {
	const clean = sanitizeValue(value, new WeakSet());
	return typeof clean === "string" ? clean : JSON.stringify(clean);
};

const formatPretty = (base: BaseLogPayload): string => {
	const { level, event, module, ts, ...rest } = base;
	const fields = Object.entries(rest)
		.map(([key, value]) => `${key}=${formatField(value)}`)
		.join(" ");
	const head = `[${ts}] [${level.toUpperCase()}] ${module}:${event}`;
	return fields ? `${head} ${fields}` : head;
};
