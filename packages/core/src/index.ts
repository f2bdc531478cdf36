export type ChangeRecord = {
  repository: string;
  timestamp: number;
  commitId: string;
  file: string;
  linesAdded: number;
  linesDeleted: number;
  author: string;
  isDefect: boolean;
};

export const CHANGE_RECORD_FIELDS = [
  "repository",
  "timestamp",
  "commit_id",
  "file",
  "lines_added",
  "lines_deleted",
  "author",
  "is_defect",
] as const;

export type ChangeRecordField = (typeof CHANGE_RECORD_FIELDS)[number];

export type ChangeRecordFields = {
  repository: string;
  timestamp: number;
  commit_id: string;
  file: string;
  lines_added: number;
  lines_deleted: number;
  author: string;
  is_defect: boolean;
};

export type DefectSource = "reference_set" | "message" | "none";

export type ExtractionSummary = {
  repository: string;
  totalCommits: number;
  commitsWithFiles: number;
  commitsWithoutFiles: number;
  totalRecords: number;
  defectCommits: number;
  defectCommitsBySource: Readonly<Record<Exclude<DefectSource, "none">, number>>;
};

export type ExtractionResult = {
  records: readonly ChangeRecord[];
  summary: ExtractionSummary;
};

export type HistoryFormatErrorReason =
  | "missing_commit_header"
  | "missing_author"
  | "missing_date"
  | "unparsable_date";

const FATAL_LABEL = "FATAL ERROR: ";

export class HistoryFormatError extends Error {
  readonly reason: HistoryFormatErrorReason;
  readonly blockLines: readonly string[];

  constructor(reason: HistoryFormatErrorReason, message: string, blockLines: readonly string[]) {
    super(message);
    this.name = "HistoryFormatError";
    this.reason = reason;
    this.blockLines = blockLines;
  }
}

export const formatHistoryFormatError = (error: HistoryFormatError): string => {
  const indent = " ".repeat(FATAL_LABEL.length + 4);
  return [
    `${FATAL_LABEL}${error.message} block:`,
    "",
    ...error.blockLines.map((line) => `${indent}${line}`),
  ].join("\n");
};
