import {
  CHANGE_RECORD_FIELDS,
  type ChangeRecord,
  type ChangeRecordFields,
} from "@churnlog/core";
import type { FileChangeGroups } from "./log-patterns.js";

export const UNPARSED_LINE_COUNT = -1;

export type CommitFields = Pick<ChangeRecord, "repository" | "timestamp" | "commitId" | "author" | "isDefect">;

/**
 * A record whose commit-level fields are known but whose file-level fields
 * have not been read yet.
 */
export type ChangeRecordDraft = CommitFields & {
  file: string | null;
  linesAdded: number;
  linesDeleted: number;
};

export const createRecordDraft = (fields: CommitFields): ChangeRecordDraft => ({
  repository: fields.repository,
  timestamp: fields.timestamp,
  commitId: fields.commitId,
  author: fields.author,
  isDefect: fields.isDefect,
  file: null,
  linesAdded: UNPARSED_LINE_COUNT,
  linesDeleted: UNPARSED_LINE_COUNT,
});

export const cloneCommitFields = (record: CommitFields): ChangeRecordDraft => createRecordDraft(record);

export const completeRecord = (draft: ChangeRecordDraft, change: FileChangeGroups): ChangeRecord =>
  Object.freeze({
    repository: draft.repository,
    timestamp: draft.timestamp,
    commitId: draft.commitId,
    file: change.path,
    linesAdded: change.linesAdded,
    linesDeleted: change.linesDeleted,
    author: draft.author,
    isDefect: draft.isDefect,
  });

export const toRecordFields = (record: ChangeRecord): ChangeRecordFields => ({
  repository: record.repository,
  timestamp: record.timestamp,
  commit_id: record.commitId,
  file: record.file,
  lines_added: record.linesAdded,
  lines_deleted: record.linesDeleted,
  author: record.author,
  is_defect: record.isDefect,
});

const formatValue = (value: string | number | boolean): string => {
  if (typeof value === "number") {
    return String(value);
  }

  return `"${String(value)}"`;
};

export const formatRecord = (record: ChangeRecord): string => {
  const fields = toRecordFields(record);
  const pairs = CHANGE_RECORD_FIELDS.map((key) => `"${key}":${formatValue(fields[key])}`);
  return `{${pairs.join(",")}}`;
};
