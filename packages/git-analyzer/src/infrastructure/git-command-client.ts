import { execFileSync } from "node:child_process";

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly repositoryPath: string;

  constructor(message: string, repositoryPath: string, args: readonly string[]) {
    super(message);
    this.name = "GitCommandError";
    this.repositoryPath = repositoryPath;
    this.args = args;
  }
}

export interface GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string;
}

export class ExecGitCommandClient implements GitCommandClient {
  constructor(private readonly maxBufferBytes: number = 1024 * 1024 * 256) {}

  run(repositoryPath: string, args: readonly string[]): string {
    try {
      return execFileSync("git", ["-C", repositoryPath, ...args], {
        encoding: "utf8",
        maxBuffer: this.maxBufferBytes,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown git execution error";
      throw new GitCommandError(message, repositoryPath, args);
    }
  }
}
