import fs from "node:fs";
import type { PricePoint } from "@pricelens/core";
import { InvalidInputError, createLogger } from "@pricelens/core";
import type { CsvValidation, ParseCsvOptions } from "./types";

const defaultLogger = createLogger("csv");

export const DATE_COLUMNS = ["Date", "date"] as const;
export const REQUIRED_COLUMNS = ["Open", "High", "Low", "Close"] as const;
export const VOLUME_COLUMN = "Volume";

const VALIDATION_SAMPLE_ROWS = 5;

interface CsvRow {
	line: number;
	cells: string[];
}

interface CsvTable {
	header: string[];
	rows: CsvRow[];
}

/** Splits one CSV record, honouring double quotes and "" escapes. */
export const splitCsvLine = (line: string): string[] => {
	const cells: string[] = [];
	let current = "";
	let quoted = false;

	for (let i = 0; i < line.length; i += 1) {
		const char = line[i];
		if (quoted) {
			if (char === '"' && line[i + 1] === '"') {
				current += '"';
				i += 1;
			} else if (char === '"') {
				quoted = false;
			} else {
				current += char;
			}
			continue;
		}
		if (char === '"') {
			quoted = true;
		} else if (char === ",") {
			cells.push(current.trim());
			current = "";
		} else {
			current += char;
		}
	}
	cells.push(current.trim());
	return cells;
};

const countQuotes = (text: string): number => {
	let count = 0;
	for (const char of text) {
		if (char === '"') {
			count += 1;
		}
	}
	return count;
};

interface CsvRecord {
	line: number;
	text: string;
}

// A record continues onto the next line while a quoted cell is still open.
const readRecords = (text: string): CsvRecord[] => {
	const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);
	const records: CsvRecord[] = [];
	let pending: (CsvRecord & { quotes: number }) | null = null;

	for (let index = 0; index < lines.length; index += 1) {
		const raw = lines[index];
		if (pending) {
			pending.text += `\n${raw}`;
			pending.quotes += countQuotes(raw);
		} else if (raw.trim().length === 0) {
			continue;
		} else {
			pending = { line: index + 1, text: raw, quotes: countQuotes(raw) };
		}
		if (pending.quotes % 2 === 0) {
			records.push({ line: pending.line, text: pending.text });
			pending = null;
		}
	}
	if (pending) {
		records.push({ line: pending.line, text: pending.text });
	}
	return records;
};

const readTable = (text: string): CsvTable | null => {
	const [first, ...rest] = readRecords(text);
	if (first === undefined) {
		return null;
	}
	return {
		header: splitCsvLine(first.text),
		rows: rest.map(({ line, text: record }) => ({
			line,
			cells: splitCsvLine(record),
		})),
	};
};

const findDateColumn = (header: string[]): number =>
	header.findIndex((column) =>
		DATE_COLUMNS.some((candidate) => candidate === column)
	);

export const parseDateCell = (value: string): number | null => {
	const trimmed = value.trim();
	if (!trimmed) {
		return null;
	}
	const ts = Date.parse(trimmed);
	return Number.isNaN(ts) ? null : ts;
};

const validateTable = (table: CsvTable | null): CsvValidation => {
	if (!table) {
		return { valid: false, message: "Error validating CSV file: no header row" };
	}

	const dateIndex = findDateColumn(table.header);
	if (dateIndex === -1) {
		return { valid: false, message: "Missing 'Date' column in the CSV file." };
	}

	const missing = REQUIRED_COLUMNS.filter(
		(column) => !table.header.includes(column)
	);
	if (missing.length) {
		return {
			valid: false,
			message: `Missing required columns: ${missing.join(", ")}`,
		};
	}

	for (const row of table.rows.slice(0, VALIDATION_SAMPLE_ROWS)) {
		const cell = row.cells[dateIndex] ?? "";
		if (parseDateCell(cell) === null) {
			return {
				valid: false,
				message: `Date column format is invalid: could not parse "${cell}" on line ${row.line}`,
			};
		}
	}

	return { valid: true, message: "CSV format is valid." };
};

/**
 * Checks that a price table has a Date (or date) column, the OHLC columns and
 * parseable dates in its first rows.
 */
export const validatePriceCsv = (text: string): CsvValidation =>
	validateTable(readTable(text));

const parsePrice = (
	cell: string | undefined,
	column: string,
	line: number
): number => {
	const value = Number(cell?.trim() ?? "");
	if (cell === undefined || cell.trim() === "" || !Number.isFinite(value)) {
		throw new InvalidInputError(
			`Invalid ${column} value "${cell ?? ""}" on line ${line}`,
			{ column, line }
		);
	}
	return value;
};

export const parsePriceCsv = (
	text: string,
	options: ParseCsvOptions = {}
): PricePoint[] => {
	const logger = options.logger ?? defaultLogger;
	const table = readTable(text);
	const validation = validateTable(table);
	if (!table || !validation.valid) {
		throw new InvalidInputError(validation.message);
	}

	const { header } = table;
	const dateIndex = findDateColumn(header);
	const [openIndex, highIndex, lowIndex, closeIndex] = REQUIRED_COLUMNS.map(
		(column) => header.indexOf(column)
	);
	const volumeIndex = header.indexOf(VOLUME_COLUMN);

	const points = table.rows.map(({ line, cells }): PricePoint => {
		const dateCell = cells[dateIndex] ?? "";
		const timestamp = parseDateCell(dateCell);
		if (timestamp === null) {
			throw new InvalidInputError(
				`Invalid date "${dateCell}" on line ${line}`,
				{ column: header[dateIndex], line }
			);
		}
		const point: PricePoint = {
			timestamp,
			open: parsePrice(cells[openIndex], "Open", line),
			high: parsePrice(cells[highIndex], "High", line),
			low: parsePrice(cells[lowIndex], "Low", line),
			close: parsePrice(cells[closeIndex], "Close", line),
		};
		const volumeCell = volumeIndex === -1 ? undefined : cells[volumeIndex];
		if (volumeCell !== undefined && volumeCell !== "") {
			point.volume = parsePrice(volumeCell, VOLUME_COLUMN, line);
		}
		return point;
	});

	points.sort((a, b) => a.timestamp - b.timestamp);

	logger.info?.("csv_loaded", {
		rows: points.length,
		first: points.length ? new Date(points[0].timestamp).toISOString() : null,
		last: points.length
			? new Date(points[points.length - 1].timestamp).toISOString()
			: null,
		hasVolume: volumeIndex !== -1,
	});

	return points;
};

export const loadPriceCsvFile = (
	filePath: string,
	options: ParseCsvOptions = {}
): PricePoint[] => {
	if (!fs.existsSync(filePath)) {
		throw new InvalidInputError(`CSV file not found: ${filePath}`, {
			path: filePath,
		});
	}
	return parsePriceCsv(fs.readFileSync(filePath, "utf-8"), options);
};
