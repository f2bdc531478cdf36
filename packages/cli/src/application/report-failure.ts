import { HistoryFormatError, formatHistoryFormatError } from "@churnlog/core";
import { GitCommandError } from "@churnlog/git-analyzer";
import type { Logger } from "./logger.js";
import { RepositoryUnavailableError } from "./run-extract-command.js";

export const EXIT_FAILURE = 1;

/**
 * Logs the failures the extract command knows how to explain. Returns false
 * for anything else so the caller can rethrow it.
 */
export const reportFailure = (error: unknown, logger: Logger): boolean => {
  if (error instanceof HistoryFormatError) {
    logger.error(formatHistoryFormatError(error));
    return true;
  }

  if (error instanceof GitCommandError) {
    logger.error(`git ${error.args.join(" ")} failed in ${error.repositoryPath}: ${error.message.trim()}`);
    return true;
  }

  if (error instanceof RepositoryUnavailableError) {
    logger.error(error.message);
    return true;
  }

  return false;
};
