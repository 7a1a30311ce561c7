/**
 * Pure rendering of a Report as CSV. No I/O.
 */
import type { Report, ReportCell, ReportSection } from "./types.js";

export type CsvRow = Array<string | number>;

const NOT_APPLICABLE = "N/A";

export function sectionTitle(host: string, section: ReportSection): string {
  return `Transcode test ('${host}') '${section.test}' - ${section.parallelism} process(es)`;
}

export function formatPercentage(cell: ReportCell): string {
  if (cell.status !== "ok") return "";
  return cell.percentage === undefined ? NOT_APPLICABLE : `${cell.percentage}%`;
}

/** Header row, then per section: title, four stat rows, two blank rows. */
export function renderCsvRows(report: Report): CsvRow[] {
  const rows: CsvRow[] = [["", ...report.assets]];

  for (const section of report.sections) {
    const average: CsvRow = ["Average"];
    const elapsed: CsvRow = ["Elapsed time"];
    const percentage: CsvRow = ["Percentage of real time"];
    const duration: CsvRow = ["Clip duration"];

    for (const cell of section.cells) {
      if (cell.status === "ok") {
        average.push(cell.average);
        elapsed.push(cell.total);
        duration.push(cell.referenceDuration ?? "");
      } else {
        average.push("");
        elapsed.push("");
        duration.push("");
      }
      percentage.push(formatPercentage(cell));
    }

    rows.push([sectionTitle(report.host, section)]);
    rows.push(average, elapsed, percentage, duration, [], []);
  }

  return rows;
}

export function escapeCsvField(field: string | number): string {
  const text = String(field);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function renderCsv(report: Report): string {
  return renderCsvRows(report)
    .map((row) => row.map(escapeCsvField).join(","))
    .join("\n") + "\n";
}
