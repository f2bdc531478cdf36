import { readFile } from "node:fs/promises";
import { basename, extname, join, resolve } from "node:path";
import type { ChangeRecord, ExtractionSummary } from "@churnlog/core";
import {
  createTicketPattern,
  extractChangeRecords,
  extractRepositoryHistoryFromGit,
  loadDefectReferenceSet,
  splitHistoryLines,
  type DefectReferenceSet,
  type ExtractionProgressEvent,
  type RepositoryHistoryProgressEvent,
} from "@churnlog/git-analyzer";
import { createSilentLogger, type Logger } from "./logger.js";
import { createOutputConfig, writeOutputs } from "./write-outputs.js";

export type ExtractCommandOptions = {
  cwd?: string;
  defectsPath?: string;
  logFilePath?: string;
  repository?: string;
  outDir?: string;
  writeCsv: boolean;
  writeText: boolean;
  lineTerminator?: string;
  ticketProjects?: readonly string[];
};

export type ExtractCommandResult = {
  repository: string;
  records: readonly ChangeRecord[];
  summary: ExtractionSummary;
  writtenFiles: readonly string[];
};

export class RepositoryUnavailableError extends Error {
  readonly targetPath: string;

  constructor(targetPath: string) {
    super(`not a git repository: ${targetPath}`);
    this.name = "RepositoryUnavailableError";
    this.targetPath = targetPath;
  }
}

const resolveTargetPath = (inputPath: string | undefined, cwd: string): string =>
  resolve(cwd, inputPath ?? ".");

const createExtractionProgressReporter = (logger: Logger): ((event: ExtractionProgressEvent) => void) => {
  let lastParsedBlocks = 0;

  return (event) => {
    switch (event.stage) {
      case "blocks_segmented":
        logger.info(`history: found ${event.blocks} commit blocks`);
        break;
      case "commit_without_files":
        logger.debug(`history: commit ${event.commitId} has no file changes`);
        break;
      case "defect_classified":
        logger.debug(
          `history: commit ${event.commitId} marked as defect (${event.source}${
            event.reference === undefined ? "" : ` ${event.reference}`
          })`,
        );
        break;
      case "block_parse_progress":
        if (
          event.parsedBlocks === event.totalBlocks ||
          event.parsedBlocks === 1 ||
          event.parsedBlocks - lastParsedBlocks >= 500
        ) {
          lastParsedBlocks = event.parsedBlocks;
          const currentPercent =
            event.totalBlocks === 0 ? 100 : Math.floor((event.parsedBlocks / event.totalBlocks) * 100);
          logger.info(`history: parse progress ${event.parsedBlocks}/${event.totalBlocks} (${currentPercent}%)`);
        }
        break;
      case "records_extracted":
        logger.info(`history: extracted ${event.records} change records`);
        break;
    }
  };
};

const createRepositoryProgressReporter = (
  logger: Logger,
): ((event: RepositoryHistoryProgressEvent) => void) => {
  const reportExtraction = createExtractionProgressReporter(logger);

  return (event) => {
    switch (event.stage) {
      case "checking_git_repository":
        logger.debug("git: checking repository");
        break;
      case "not_git_repository":
        logger.warn("git: target path is not a git repository");
        break;
      case "repository_resolved":
        logger.info(`git: repository name ${event.repository}`);
        break;
      case "loading_commit_history":
        logger.info("git: loading history");
        break;
      case "history":
        if (event.event.stage === "git_log_received") {
          logger.info(`git: log loaded (${event.event.bytes} bytes)`);
        } else {
          logger.debug(`git: log split into ${event.event.lines} lines`);
        }
        break;
      case "extraction":
        reportExtraction(event.event);
        break;
    }
  };
};

const loadDefectReferences = (filePath: string, logger: Logger): DefectReferenceSet => {
  logger.debug(`loading defect commit list: ${filePath}`);
  const loaded = loadDefectReferenceSet(filePath);
  if (loaded.note === undefined) {
    logger.info(`loaded ${loaded.references.size} defect commits from ${filePath}`);
  } else {
    logger.info(`NOTE: ${loaded.note}`);
  }

  return loaded.references;
};

const repositoryNameFromLogFile = (logFilePath: string): string => basename(logFilePath, extname(logFilePath));

export const runExtractCommand = async (
  inputPath: string | undefined,
  options: ExtractCommandOptions,
  logger: Logger = createSilentLogger(),
): Promise<ExtractCommandResult> => {
  const invocationCwd = options.cwd ?? process.env["INIT_CWD"] ?? process.cwd();
  const ticketPattern = createTicketPattern(options.ticketProjects);
  if (ticketPattern.projectKeys !== null) {
    logger.info(`ticket projects: ${ticketPattern.projectKeys.join(", ")}`);
  }

  const defectsPathFor = (repository: string): string =>
    resolve(invocationCwd, options.defectsPath ?? join(invocationCwd, `${repository}.dft`));

  let repository: string;
  let records: readonly ChangeRecord[];
  let summary: ExtractionSummary;

  if (options.logFilePath !== undefined) {
    const logFilePath = resolve(invocationCwd, options.logFilePath);
    repository = options.repository ?? repositoryNameFromLogFile(logFilePath);
    logger.info(`reading history dump: ${logFilePath}`);
    const lines = splitHistoryLines(await readFile(logFilePath, "utf8"));
    const defectReferences = loadDefectReferences(defectsPathFor(repository), logger);
    ({ records, summary } = extractChangeRecords(
      lines,
      { repository, defectReferences, ticketPattern },
      createExtractionProgressReporter(logger),
    ));
  } else {
    const targetPath = resolveTargetPath(inputPath, invocationCwd);
    logger.info(`extracting history of repository: ${targetPath}`);
    const extraction = extractRepositoryHistoryFromGit(
      {
        repositoryPath: targetPath,
        defectReferences: (name) => loadDefectReferences(defectsPathFor(name), logger),
        ticketPattern,
      },
      createRepositoryProgressReporter(logger),
    );
    if (!extraction.available) {
      throw new RepositoryUnavailableError(extraction.targetPath);
    }

    repository = extraction.summary.repository;
    records = extraction.records;
    summary = extraction.summary;
  }

  const outputConfig = createOutputConfig({
    outDir: resolve(invocationCwd, options.outDir ?? "."),
    writeCsv: options.writeCsv,
    writeText: options.writeText,
    ...(options.lineTerminator === undefined ? {} : { lineTerminator: options.lineTerminator }),
  });
  const writtenFiles = await writeOutputs(records, repository, outputConfig);
  for (const filePath of writtenFiles) {
    logger.info(`written: ${filePath}`);
  }

  return { repository, records, summary, writtenFiles };
};
