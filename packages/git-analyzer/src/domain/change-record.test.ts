import { CHANGE_RECORD_FIELDS, type ChangeRecord } from "@churnlog/core";
import { describe, expect, it } from "vitest";
import {
  UNPARSED_LINE_COUNT,
  cloneCommitFields,
  completeRecord,
  createRecordDraft,
  formatRecord,
  toRecordFields,
} from "./change-record.js";

const SHA = "a".repeat(40);

const record: ChangeRecord = {
  repository: "demo",
  timestamp: 1420643700,
  commitId: SHA,
  file: "foo.txt",
  linesAdded: 10,
  linesDeleted: 2,
  author: "a@x.com",
  isDefect: true,
};

describe("change record views", () => {
  it("orders the field view canonically", () => {
    const fields = toRecordFields(record);

    expect(Object.keys(fields)).toEqual([...CHANGE_RECORD_FIELDS]);
    expect(fields).toEqual({
      repository: "demo",
      timestamp: 1420643700,
      commit_id: SHA,
      file: "foo.txt",
      lines_added: 10,
      lines_deleted: 2,
      author: "a@x.com",
      is_defect: true,
    });
  });

  it("quotes strings and booleans but not numbers in the text view", () => {
    expect(formatRecord(record)).toBe(
      `{"repository":"demo","timestamp":1420643700,"commit_id":"${SHA}","file":"foo.txt",` +
        `"lines_added":10,"lines_deleted":2,"author":"a@x.com","is_defect":"true"}`,
    );
  });
});

describe("record lifecycle", () => {
  it("starts drafts with unparsed file fields", () => {
    const draft = createRecordDraft({
      repository: "demo",
      timestamp: 1,
      commitId: SHA,
      author: "a@x.com",
      isDefect: false,
    });

    expect(draft.file).toBeNull();
    expect(draft.linesAdded).toBe(UNPARSED_LINE_COUNT);
    expect(draft.linesDeleted).toBe(UNPARSED_LINE_COUNT);
  });

  it("clones commit level fields and resets file level fields", () => {
    const clone = cloneCommitFields(record);

    expect(clone).toEqual({
      repository: "demo",
      timestamp: 1420643700,
      commitId: SHA,
      author: "a@x.com",
      isDefect: true,
      file: null,
      linesAdded: -1,
      linesDeleted: -1,
    });
  });

  it("completes a draft into a frozen record", () => {
    const completed = completeRecord(cloneCommitFields(record), {
      linesAdded: 0,
      linesDeleted: 7,
      path: "bar.txt",
    });

    expect(completed).toEqual({ ...record, file: "bar.txt", linesAdded: 0, linesDeleted: 7 });
    expect(Object.isFrozen(completed)).toBe(true);
  });
});
