import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

/** `YYYY-MM-DD` of `date` in UTC. */
export const reportDate = (date: Date = new Date()): string => date.toISOString().slice(0, 10);

export const simulationReportName = (symbol: string, date?: Date): string =>
  `${symbol}_simulation_${reportDate(date)}.csv`;

export const optimizationReportName = (strategy: string, date?: Date): string =>
  `${strategy}_optimization_${reportDate(date)}.csv`;

export const timeSeriesReportName = (strategy: string, date?: Date): string =>
  `${strategy}_timeseries_${reportDate(date)}.csv`;

/** Writes `content` to `resultsDir/fileName`, creating the directory. Returns the path. */
export const writeReport = async (
  resultsDir: string,
  fileName: string,
  content: string,
): Promise<string> => {
  await mkdir(resultsDir, { recursive: true });
  const reportPath = join(resultsDir, fileName);
  await writeFile(reportPath, content, { encoding: "utf-8" });
  return reportPath;
};
