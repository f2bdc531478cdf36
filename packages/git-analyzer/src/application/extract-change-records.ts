import { HistoryFormatError, type ChangeRecord, type DefectSource, type ExtractionResult } from "@churnlog/core";
import type { DefectReferenceSet } from "../domain/defect-reference-set.js";
import type { TicketPattern } from "../domain/log-patterns.js";
import { segmentBlocks } from "../parsing/block-segmenter.js";
import { parseCommitBlock } from "../parsing/commit-block-parser.js";

export type ExtractOptions = {
  repository: string;
  defectReferences: DefectReferenceSet;
  ticketPattern?: TicketPattern;
};

export type ExtractionProgressEvent =
  | { stage: "blocks_segmented"; blocks: number; leadingLines: number }
  | { stage: "block_parse_progress"; parsedBlocks: number; totalBlocks: number }
  | { stage: "commit_without_files"; commitId: string }
  | { stage: "defect_classified"; commitId: string; source: Exclude<DefectSource, "none">; reference?: string }
  | { stage: "records_extracted"; records: number };

export const extractChangeRecords = (
  lines: readonly string[],
  options: ExtractOptions,
  onProgress?: (event: ExtractionProgressEvent) => void,
): ExtractionResult => {
  const { blocks, leadingLines } = segmentBlocks(lines);
  if (leadingLines.some((line) => line.trim().length > 0)) {
    throw new HistoryFormatError("missing_commit_header", "Unable to extract commit info from", leadingLines);
  }

  onProgress?.({ stage: "blocks_segmented", blocks: blocks.length, leadingLines: leadingLines.length });

  const records: ChangeRecord[] = [];
  const defectCommitsBySource = { reference_set: 0, message: 0 };
  let commitsWithFiles = 0;

  blocks.forEach((block, index) => {
    const parsed = parseCommitBlock(block.lines, options);
    if (parsed.records.length === 0) {
      onProgress?.({ stage: "commit_without_files", commitId: parsed.commitId });
    } else {
      commitsWithFiles += 1;
      records.push(...parsed.records);
    }

    if (parsed.defectSource !== "none") {
      defectCommitsBySource[parsed.defectSource] += 1;
      onProgress?.({
        stage: "defect_classified",
        commitId: parsed.commitId,
        source: parsed.defectSource,
        ...(parsed.defectReference === undefined ? {} : { reference: parsed.defectReference }),
      });
    }

    onProgress?.({ stage: "block_parse_progress", parsedBlocks: index + 1, totalBlocks: blocks.length });
  });

  onProgress?.({ stage: "records_extracted", records: records.length });

  return {
    records,
    summary: {
      repository: options.repository,
      totalCommits: blocks.length,
      commitsWithFiles,
      commitsWithoutFiles: blocks.length - commitsWithFiles,
      totalRecords: records.length,
      defectCommits: defectCommitsBySource.reference_set + defectCommitsBySource.message,
      defectCommitsBySource,
    },
  };
};
