import {
  extractRepositoryHistory,
  type ExtractRepositoryHistoryInput,
  type RepositoryHistoryExtraction,
  type RepositoryHistoryProgressEvent,
} from "./application/extract-repository-history.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliHistoryProvider } from "./infrastructure/git-history-provider.js";

export {
  extractChangeRecords,
  type ExtractOptions,
  type ExtractionProgressEvent,
} from "./application/extract-change-records.js";
export type {
  ExtractRepositoryHistoryInput,
  RepositoryHistoryExtraction,
  RepositoryHistoryProgressEvent,
} from "./application/extract-repository-history.js";
export {
  splitHistoryLines,
  type GitHistoryProvider,
  type GitHistoryProgressEvent,
} from "./application/git-history-provider.js";
export {
  UNPARSED_LINE_COUNT,
  cloneCommitFields,
  completeRecord,
  createRecordDraft,
  formatRecord,
  toRecordFields,
  type ChangeRecordDraft,
  type CommitFields,
} from "./domain/change-record.js";
export {
  EMPTY_DEFECT_REFERENCE_SET,
  createDefectReferenceSet,
  type DefectReferenceSet,
} from "./domain/defect-reference-set.js";
export {
  DEFAULT_TICKET_PATTERN,
  createTicketPattern,
  findDefectReference,
  matchAuthorLine,
  matchCommitHeader,
  matchDateLine,
  matchFileChangeLine,
  parseHistoryDate,
  type MatchResult,
  type TicketPattern,
} from "./domain/log-patterns.js";
export { loadDefectReferenceSet, type DefectListLoadResult } from "./infrastructure/defect-list-loader.js";
export { GitCommandError } from "./infrastructure/git-command-client.js";
export { findCommitBoundaries, segmentBlocks, type CommitBlock } from "./parsing/block-segmenter.js";
export { parseCommitBlock, type CommitBlockContext, type ParsedCommitBlock } from "./parsing/commit-block-parser.js";

export const extractRepositoryHistoryFromGit = (
  input: ExtractRepositoryHistoryInput,
  onProgress?: (event: RepositoryHistoryProgressEvent) => void,
): RepositoryHistoryExtraction => {
  const historyProvider = new GitCliHistoryProvider(new ExecGitCommandClient());
  return extractRepositoryHistory(input, historyProvider, onProgress);
};
