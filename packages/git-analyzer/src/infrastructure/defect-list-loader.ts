import { readFileSync } from "node:fs";
import { createDefectReferenceSet, type DefectReferenceSet } from "../domain/defect-reference-set.js";

export type DefectListLoadResult = {
  references: DefectReferenceSet;
  note?: string;
};

const ADVISORY_CODES: Readonly<Record<string, string>> = {
  ENOENT: "No external defect commits specified.",
  EACCES: "Unable to open external defect commits file. Will use internal heuristics.",
  EPERM: "Unable to open external defect commits file. Will use internal heuristics.",
  EISDIR: "Unable to open external defect commits file. Will use internal heuristics.",
};

const errorCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }

  return typeof error.code === "string" ? error.code : undefined;
};

export const loadDefectReferenceSet = (filePath: string): DefectListLoadResult => {
  let raw: string;
  try {
    raw = readFileSync(filePath, "utf8");
  } catch (error) {
    const note = ADVISORY_CODES[errorCode(error) ?? ""];
    if (note === undefined) {
      throw error;
    }

    return { references: createDefectReferenceSet(), note };
  }

  return { references: createDefectReferenceSet(raw.split(/\r?\n/)) };
};
