import type { ChangeRecord } from "@churnlog/core";
import type { CsvOptions, OutputFormat } from "./domain.js";
import { renderCsv, renderJson, renderText } from "./renderers.js";

export { OUTPUT_FORMATS, outputFileName, type CsvOptions, type OutputFormat } from "./domain.js";
export { renderCsv, renderJson, renderSummary, renderText } from "./renderers.js";

export const formatRecords = (
  records: readonly ChangeRecord[],
  format: OutputFormat,
  options: CsvOptions = {},
): string => {
  if (format === "json") {
    return renderJson(records);
  }

  if (format === "csv") {
    return renderCsv(records, options);
  }

  return renderText(records);
};
