import { basename } from "node:path";
import {
  splitHistoryLines,
  type GitHistoryProvider,
  type GitHistoryProgressEvent,
} from "../application/git-history-provider.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";

const NON_GIT_CODES = ["not a git repository", "not in a git directory"];

const isNotGitError = (error: GitCommandError): boolean => {
  const lower = error.message.toLowerCase();
  return NON_GIT_CODES.some((code) => lower.includes(code));
};

export class GitCliHistoryProvider implements GitHistoryProvider {
  constructor(private readonly gitClient: GitCommandClient) {}

  isGitRepository(repositoryPath: string): boolean {
    try {
      const output = this.gitClient.run(repositoryPath, ["rev-parse", "--is-inside-work-tree"]);
      return output.trim() === "true";
    } catch (error) {
      if (error instanceof GitCommandError && isNotGitError(error)) {
        return false;
      }

      throw error;
    }
  }

  resolveRepositoryName(repositoryPath: string): string {
    const topLevel = this.gitClient.run(repositoryPath, ["rev-parse", "--show-toplevel"]).trim();
    return basename(topLevel);
  }

  readHistoryLines(
    repositoryPath: string,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): readonly string[] {
    // medium format, default dates and 4-space message indent are what the block parser expects
    const output = this.gitClient.run(repositoryPath, [
      "-c",
      "core.quotepath=false",
      "log",
      "--numstat",
      "--pretty=medium",
      "--date=default",
      "--no-color",
    ]);
    onProgress?.({ stage: "git_log_received", bytes: Buffer.byteLength(output, "utf8") });
    const lines = splitHistoryLines(output);
    onProgress?.({ stage: "git_log_split", lines: lines.length });
    return lines;
  }
}
