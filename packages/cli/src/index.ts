import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { formatRecords, renderSummary, type OutputFormat } from "@churnlog/reporter";
import { createStderrLogger, LOG_LEVELS, parseLogLevel, type LogLevel } from "./application/logger.js";
import { EXIT_FAILURE, reportFailure } from "./application/report-failure.js";
import { runExtractCommand } from "./application/run-extract-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const { version } = JSON.parse(readFileSync(packageJsonPath, "utf8")) as { version: string };

program
  .name("churnlog")
  .description("Per-file change records with defect classification from git history")
  .version(version);

program
  .command("extract")
  .argument("[path]", "path to the repository to analyze (defaults to the current directory)")
  .option("--defects <file>", "file listing known defect commit ids, one per line (default: <repo>.dft)")
  .option("--log-file <file>", "read a captured `git log --numstat` dump instead of running git")
  .option("--repository <name>", "repository name used with --log-file (default: dump file name)")
  .option("--out-dir <dir>", "directory for the output files", ".")
  .option("--no-csv", "skip the CSV output")
  .option("--no-text", "skip the plain text output")
  .option("--ticket-project <keys...>", "only count ticket references with these project keys (e.g. JIRA)")
  .addOption(
    new Option("--stdout <format>", "also print the records to stdout: json, csv, text").choices([
      "json",
      "csv",
      "text",
    ]),
  )
  .option("--summary", "print an extraction summary to stdout")
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices([...LOG_LEVELS])
      .default(parseLogLevel(process.env["CHURNLOG_LOG_LEVEL"])),
  )
  .action(
    async (
      path: string | undefined,
      options: {
        defects?: string;
        logFile?: string;
        repository?: string;
        outDir: string;
        csv: boolean;
        text: boolean;
        ticketProject?: string[];
        stdout?: OutputFormat;
        summary?: boolean;
        logLevel: LogLevel;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      try {
        const result = await runExtractCommand(
          path,
          {
            ...(options.defects === undefined ? {} : { defectsPath: options.defects }),
            ...(options.logFile === undefined ? {} : { logFilePath: options.logFile }),
            ...(options.repository === undefined ? {} : { repository: options.repository }),
            ...(options.ticketProject === undefined ? {} : { ticketProjects: options.ticketProject }),
            outDir: options.outDir,
            writeCsv: options.csv,
            writeText: options.text,
          },
          logger,
        );

        if (options.stdout !== undefined) {
          process.stdout.write(formatRecords(result.records, options.stdout));
          if (options.stdout === "json") {
            process.stdout.write("\n");
          }
        }

        if (options.summary === true) {
          process.stdout.write(`${renderSummary(result.summary)}\n`);
        }
      } catch (error) {
        if (!reportFailure(error, logger)) {
          throw error;
        }

        process.exitCode = EXIT_FAILURE;
      }
    },
  );

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
