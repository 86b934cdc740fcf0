export * from "./describeSeries";
export * from "./formatIndicatorCsv";
