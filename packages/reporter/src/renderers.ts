import { CHANGE_RECORD_FIELDS, type ChangeRecord, type ExtractionSummary } from "@churnlog/core";
import { formatRecord, toRecordFields } from "@churnlog/git-analyzer";
import type { CsvOptions } from "./domain.js";

const CSV_QUOTE_TRIGGER = /[",\r\n]/;

const csvCell = (value: string | number | boolean): string => {
  const text = String(value);
  if (!CSV_QUOTE_TRIGGER.test(text)) {
    return text;
  }

  return `"${text.replace(/"/g, '""')}"`;
};

export const renderJson = (records: readonly ChangeRecord[]): string =>
  JSON.stringify(records.map(toRecordFields));

export const renderCsv = (records: readonly ChangeRecord[], options: CsvOptions = {}): string => {
  const terminator = options.lineTerminator ?? "\n";
  const rows = [CHANGE_RECORD_FIELDS.join(",")];
  for (const record of records) {
    const fields = toRecordFields(record);
    rows.push(CHANGE_RECORD_FIELDS.map((field) => csvCell(fields[field])).join(","));
  }

  return rows.map((row) => `${row}${terminator}`).join("");
};

export const renderText = (records: readonly ChangeRecord[]): string =>
  records.map((record) => `${formatRecord(record)}\n`).join("");

export const renderSummary = (summary: ExtractionSummary): string => {
  const lines: string[] = [];
  lines.push("Extraction Summary");
  lines.push(`  repository: ${summary.repository}`);
  lines.push(`  commits: ${summary.totalCommits}`);
  lines.push(`  commitsWithFiles: ${summary.commitsWithFiles}`);
  lines.push(`  commitsWithoutFiles: ${summary.commitsWithoutFiles}`);
  lines.push(`  records: ${summary.totalRecords}`);
  lines.push(`  defectCommits: ${summary.defectCommits}`);
  lines.push(`    fromReferenceList: ${summary.defectCommitsBySource.reference_set}`);
  lines.push(`    fromMessages: ${summary.defectCommitsBySource.message}`);
  return lines.join("\n");
};
