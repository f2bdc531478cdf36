import { mkdir, writeFile } from "node:fs/promises";
import { EOL } from "node:os";
import { join } from "node:path";
import type { ChangeRecord } from "@churnlog/core";
import { formatRecords, outputFileName, type OutputFormat } from "@churnlog/reporter";

export type OutputConfig = {
  outDir: string;
  writeCsv: boolean;
  writeText: boolean;
  lineTerminator: string;
};

export const createOutputConfig = (overrides: Partial<OutputConfig> & { outDir: string }): OutputConfig => ({
  writeCsv: true,
  writeText: true,
  lineTerminator: EOL,
  ...overrides,
});

export const selectedFormats = (config: OutputConfig): OutputFormat[] => {
  const formats: OutputFormat[] = ["json"];
  if (config.writeCsv) {
    formats.push("csv");
  }

  if (config.writeText) {
    formats.push("text");
  }

  return formats;
};

export const writeOutputs = async (
  records: readonly ChangeRecord[],
  repository: string,
  config: OutputConfig,
): Promise<string[]> => {
  await mkdir(config.outDir, { recursive: true });

  const written: string[] = [];
  for (const format of selectedFormats(config)) {
    const filePath = join(config.outDir, outputFileName(repository, format));
    const rendered = formatRecords(records, format, { lineTerminator: config.lineTerminator });
    await writeFile(filePath, rendered, "utf8");
    written.push(filePath);
  }

  return written;
};
