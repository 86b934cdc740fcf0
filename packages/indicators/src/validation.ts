import { EmptyInputError, InvalidParameterError } from "@pricelens/core";

export const assertPeriod = (name: string, value: number): void => {
	if (!Number.isInteger(value) || value <= 0) {
		throw new InvalidParameterError(name, value, "a positive integer");
	}
};

export const assertNonEmpty = (length: number, what = "series"): void => {
	if (length === 0) {
		throw new EmptyInputError(what);
	}
};

export const isDefined = (value: number | undefined): value is number =>
	value !== undefined;

export const emptySeries = (length: number): Array<number | undefined> =>
	new Array<number | undefined>(length).fill(undefined);
