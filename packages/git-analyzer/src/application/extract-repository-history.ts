import type { ExtractionResult } from "@churnlog/core";
import type { DefectReferenceSet } from "../domain/defect-reference-set.js";
import type { TicketPattern } from "../domain/log-patterns.js";
import { extractChangeRecords, type ExtractionProgressEvent } from "./extract-change-records.js";
import type { GitHistoryProvider, GitHistoryProgressEvent } from "./git-history-provider.js";

export type ExtractRepositoryHistoryInput = {
  repositoryPath: string;
  defectReferences: DefectReferenceSet | ((repository: string) => DefectReferenceSet);
  ticketPattern?: TicketPattern;
};

export type RepositoryHistoryExtraction =
  | { targetPath: string; available: false; reason: "not_git_repository" }
  | ({ targetPath: string; available: true } & ExtractionResult);

export type RepositoryHistoryProgressEvent =
  | { stage: "checking_git_repository" }
  | { stage: "not_git_repository" }
  | { stage: "repository_resolved"; repository: string }
  | { stage: "loading_commit_history" }
  | { stage: "history"; event: GitHistoryProgressEvent }
  | { stage: "extraction"; event: ExtractionProgressEvent };

export const extractRepositoryHistory = (
  input: ExtractRepositoryHistoryInput,
  historyProvider: GitHistoryProvider,
  onProgress?: (event: RepositoryHistoryProgressEvent) => void,
): RepositoryHistoryExtraction => {
  onProgress?.({ stage: "checking_git_repository" });
  if (!historyProvider.isGitRepository(input.repositoryPath)) {
    onProgress?.({ stage: "not_git_repository" });
    return {
      targetPath: input.repositoryPath,
      available: false,
      reason: "not_git_repository",
    };
  }

  const repository = historyProvider.resolveRepositoryName(input.repositoryPath);
  onProgress?.({ stage: "repository_resolved", repository });

  // the reference set is complete before the first block is parsed
  const defectReferences =
    typeof input.defectReferences === "function" ? input.defectReferences(repository) : input.defectReferences;

  onProgress?.({ stage: "loading_commit_history" });
  const lines = historyProvider.readHistoryLines(input.repositoryPath, (event) =>
    onProgress?.({ stage: "history", event }),
  );

  const result = extractChangeRecords(
    lines,
    {
      repository,
      defectReferences,
      ...(input.ticketPattern === undefined ? {} : { ticketPattern: input.ticketPattern }),
    },
    (event) => onProgress?.({ stage: "extraction", event }),
  );

  return {
    targetPath: input.repositoryPath,
    available: true,
    ...result,
  };
};
