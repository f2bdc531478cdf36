import { isCommitHeader } from "../domain/log-patterns.js";

export type CommitBlock = {
  start: number;
  end: number;
  lines: readonly string[];
};

export type SegmentedLog = {
  blocks: readonly CommitBlock[];
  leadingLines: readonly string[];
};

/**
 * Indices of every commit header line, followed by `lines.length` as the
 * upper bound of the last block.
 */
export const findCommitBoundaries = (lines: readonly string[]): number[] => {
  const boundaries: number[] = [];
  lines.forEach((line, index) => {
    if (isCommitHeader(line)) {
      boundaries.push(index);
    }
  });

  boundaries.push(lines.length);
  return boundaries;
};

export const segmentBlocks = (lines: readonly string[]): SegmentedLog => {
  const boundaries = findCommitBoundaries(lines);
  const blocks: CommitBlock[] = [];

  for (let index = 0; index < boundaries.length - 1; index += 1) {
    const start = boundaries[index];
    const end = boundaries[index + 1];
    if (start === undefined || end === undefined) {
      continue;
    }

    blocks.push({ start, end, lines: lines.slice(start, end) });
  }

  const firstBoundary = boundaries[0] ?? lines.length;
  return {
    blocks,
    leadingLines: lines.slice(0, firstBoundary),
  };
};
