import { HistoryFormatError, type ChangeRecord, type DefectSource } from "@churnlog/core";
import {
  cloneCommitFields,
  completeRecord,
  createRecordDraft,
  type ChangeRecordDraft,
} from "../domain/change-record.js";
import type { DefectReferenceSet } from "../domain/defect-reference-set.js";
import {
  DEFAULT_TICKET_PATTERN,
  findDefectReference,
  matchAuthorLine,
  matchCommitHeader,
  matchDateLine,
  matchFileChangeLine,
  parseHistoryDate,
  type FileChangeGroups,
  type TicketPattern,
} from "../domain/log-patterns.js";

export type CommitBlockContext = {
  repository: string;
  defectReferences: DefectReferenceSet;
  ticketPattern?: TicketPattern;
};

export type ParsedCommitBlock = {
  commitId: string;
  records: readonly ChangeRecord[];
  defectSource: DefectSource;
  defectReference?: string;
};

const parseCommitId = (lines: readonly string[]): string => {
  const header = matchCommitHeader(lines[0] ?? "");
  if (!header.matched) {
    throw new HistoryFormatError("missing_commit_header", "Unable to extract commit info from", lines);
  }

  return header.groups.commitId;
};

const parseAuthor = (lines: readonly string[]): string => {
  for (const line of lines.slice(1)) {
    const author = matchAuthorLine(line);
    if (author.matched) {
      return author.groups.address;
    }
  }

  throw new HistoryFormatError("missing_author", "Unable to identify author in", lines);
};

/**
 * Returns the commit time and the block index of the date line; message and
 * file lines start right after it.
 */
const parseTimestamp = (lines: readonly string[]): { timestamp: number; dateIndex: number } => {
  for (let index = 1; index < lines.length; index += 1) {
    const dateLine = matchDateLine(lines[index] ?? "");
    if (!dateLine.matched) {
      continue;
    }

    const timestamp = parseHistoryDate(dateLine.groups.raw);
    if (timestamp === null) {
      throw new HistoryFormatError("unparsable_date", "Unable to create timestamp from", lines);
    }

    return { timestamp, dateIndex: index };
  }

  throw new HistoryFormatError("missing_date", "Unable to create timestamp from", lines);
};

const classifyCommit = (
  commitId: string,
  messageLines: readonly string[],
  context: CommitBlockContext,
): { defectSource: DefectSource; defectReference?: string } => {
  if (context.defectReferences.has(commitId)) {
    return { defectSource: "reference_set" };
  }

  const reference = findDefectReference(messageLines.join("\n"), context.ticketPattern ?? DEFAULT_TICKET_PATTERN);
  if (reference.matched) {
    return { defectSource: "message", defectReference: reference.groups.reference };
  }

  return { defectSource: "none" };
};

export const parseCommitBlock = (lines: readonly string[], context: CommitBlockContext): ParsedCommitBlock => {
  const commitId = parseCommitId(lines);
  const author = parseAuthor(lines);
  const { timestamp, dateIndex } = parseTimestamp(lines);

  const messageLines: string[] = [];
  const changes: FileChangeGroups[] = [];
  for (const line of lines.slice(dateIndex + 1)) {
    const change = matchFileChangeLine(line);
    if (change.matched) {
      changes.push(change.groups);
    } else {
      messageLines.push(line);
    }
  }

  // merges and other commits without numstat lines produce nothing
  if (changes.length === 0) {
    return { commitId, records: [], defectSource: "none" };
  }

  const classification = classifyCommit(commitId, messageLines, context);
  const first: ChangeRecordDraft = createRecordDraft({
    repository: context.repository,
    timestamp,
    commitId,
    author,
    isDefect: classification.defectSource !== "none",
  });

  const records: ChangeRecord[] = [];
  changes.forEach((change, index) => {
    const draft = index === 0 ? first : cloneCommitFields(first);
    records.push(completeRecord(draft, change));
  });

  return {
    commitId,
    records,
    ...classification,
  };
};
