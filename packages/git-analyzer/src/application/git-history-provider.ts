export type GitHistoryProgressEvent =
  | { stage: "git_log_received"; bytes: number }
  | { stage: "git_log_split"; lines: number };

export interface GitHistoryProvider {
  isGitRepository(repositoryPath: string): boolean;
  resolveRepositoryName(repositoryPath: string): string;
  readHistoryLines(
    repositoryPath: string,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): readonly string[];
}

export const splitHistoryLines = (rawLog: string): string[] => {
  const lines = rawLog.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }

  return lines;
};
