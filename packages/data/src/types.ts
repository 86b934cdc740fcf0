export interface DataLogger {
	info?: (event: string, payload?: Record<string, unknown>) => void;
	warn?: (event: string, payload?: Record<string, unknown>) => void;
	error?: (event: string, payload?: Record<string, unknown>) => void;
}

export interface CsvValidation {
	valid: boolean;
	message: string;
}

export interface ParseCsvOptions {
	logger?: DataLogger;
}

export interface DateRange {
	/** Inclusive lower bound, epoch ms. */
	start?: number;
	/** Inclusive upper bound, epoch ms. */
	end?: number;
}
