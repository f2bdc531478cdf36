export type OutputFormat = "json" | "csv" | "text";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "csv", "text"];

export const outputFileName = (repository: string, format: OutputFormat): string => {
  switch (format) {
    case "json":
      return `${repository}.json`;
    case "csv":
      return `${repository}.csv`;
    case "text":
      return `${repository}-commit-recs.txt`;
  }
};

export type CsvOptions = {
  lineTerminator?: string;
};
