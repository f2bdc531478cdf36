export type MatchResult<TGroups> = { matched: false } | { matched: true; groups: TGroups };

export type CommitHeaderGroups = { commitId: string };
export type AuthorLineGroups = { name: string; address: string };
export type DateLineGroups = { raw: string };
export type FileChangeGroups = { linesAdded: number; linesDeleted: number; path: string };
export type DefectReferenceGroups = { reference: string };

export type TicketPattern = {
  projectKeys: readonly string[] | null;
  expression: RegExp;
};

const COMMIT_HEADER_PATTERN = /^commit\s+([0-9a-f]{40})(?![0-9a-f])/;
const AUTHOR_LINE_PATTERN = /^Author:\s+(.*)\s+<(.*)>/;
const DATE_LINE_PATTERN = /^Date:\s+(.*)$/;
const FILE_CHANGE_PATTERN = /^(\d+)\s+(\d+)\s+(\S.*)$/;
const HISTORY_DATE_PATTERN =
  /^(Mon|Tue|Wed|Thu|Fri|Sat|Sun)\s+(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+(\d{1,2})\s+(\d{2}):(\d{2}):(\d{2})\s+(\d{4})\s+([+-])(\d{2})(\d{2})$/;

const MONTHS = ["Jan", "Feb", "Mar", "Apr", "May", "Jun", "Jul", "Aug", "Sep", "Oct", "Nov", "Dec"];

const NOT_MATCHED = { matched: false } as const;

export const matchCommitHeader = (line: string): MatchResult<CommitHeaderGroups> => {
  const match = COMMIT_HEADER_PATTERN.exec(line);
  const commitId = match?.[1];
  if (commitId === undefined) {
    return NOT_MATCHED;
  }

  return { matched: true, groups: { commitId } };
};

export const isCommitHeader = (line: string): boolean => matchCommitHeader(line).matched;

export const matchAuthorLine = (line: string): MatchResult<AuthorLineGroups> => {
  const match = AUTHOR_LINE_PATTERN.exec(line);
  const name = match?.[1];
  const address = match?.[2];
  if (name === undefined || address === undefined) {
    return NOT_MATCHED;
  }

  return { matched: true, groups: { name, address } };
};

export const matchDateLine = (line: string): MatchResult<DateLineGroups> => {
  const match = DATE_LINE_PATTERN.exec(line);
  const raw = match?.[1];
  if (raw === undefined) {
    return NOT_MATCHED;
  }

  return { matched: true, groups: { raw: raw.trim() } };
};

/**
 * Converts the default `git log` date text (`Wed Jan 7 10:15:00 2015 -0500`)
 * to UTC epoch seconds. Returns null for text in any other shape and for
 * calendar dates that do not exist.
 */
export const parseHistoryDate = (raw: string): number | null => {
  const match = HISTORY_DATE_PATTERN.exec(raw.trim());
  if (match === null) {
    return null;
  }

  const [, , monthName, dayRaw, hourRaw, minuteRaw, secondRaw, yearRaw, sign, offsetHoursRaw, offsetMinutesRaw] =
    match;
  const month = MONTHS.indexOf(monthName ?? "");
  const day = Number(dayRaw);
  const hour = Number(hourRaw);
  const minute = Number(minuteRaw);
  const second = Number(secondRaw);
  const year = Number(yearRaw);
  const offsetHours = Number(offsetHoursRaw);
  const offsetMinutes = Number(offsetMinutesRaw);

  if (month < 0 || hour > 23 || minute > 59 || second > 60 || offsetMinutes > 59) {
    return null;
  }

  const localMillis = Date.UTC(year, month, day, hour, minute, second);
  const check = new Date(localMillis);
  if (check.getUTCFullYear() !== year || check.getUTCMonth() !== month || check.getUTCDate() !== day) {
    return null;
  }

  const offsetSeconds = (sign === "-" ? -1 : 1) * (offsetHours * 3600 + offsetMinutes * 60);
  return localMillis / 1000 - offsetSeconds;
};

export const matchFileChangeLine = (line: string): MatchResult<FileChangeGroups> => {
  const match = FILE_CHANGE_PATTERN.exec(line);
  if (match === null) {
    return NOT_MATCHED;
  }

  const [, addedRaw, deletedRaw, pathRaw] = match;
  const linesAdded = Number.parseInt(addedRaw ?? "", 10);
  const linesDeleted = Number.parseInt(deletedRaw ?? "", 10);
  const path = pathRaw?.trimEnd() ?? "";
  if (!Number.isSafeInteger(linesAdded) || !Number.isSafeInteger(linesDeleted) || path.length === 0) {
    return NOT_MATCHED;
  }

  return { matched: true, groups: { linesAdded, linesDeleted, path } };
};

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

export const createTicketPattern = (projectKeys?: readonly string[]): TicketPattern => {
  const keys = (projectKeys ?? []).map((key) => key.trim()).filter((key) => key.length > 0);
  if (keys.length === 0) {
    return { projectKeys: null, expression: /[A-Z]+-\d+/ };
  }

  return {
    projectKeys: keys,
    expression: new RegExp(`(?:${keys.map(escapeRegExp).join("|")})-\\d+`),
  };
};

export const DEFAULT_TICKET_PATTERN: TicketPattern = createTicketPattern();

export const findDefectReference = (
  text: string,
  pattern: TicketPattern = DEFAULT_TICKET_PATTERN,
): MatchResult<DefectReferenceGroups> => {
  const match = pattern.expression.exec(text);
  const reference = match?.[0];
  if (reference === undefined) {
    return NOT_MATCHED;
  }

  return { matched: true, groups: { reference } };
};
