import { HistoryFormatError } from "@churnlog/core";
import { describe, expect, it } from "vitest";
import { EMPTY_DEFECT_REFERENCE_SET, createDefectReferenceSet } from "../domain/defect-reference-set.js";
import { createTicketPattern } from "../domain/log-patterns.js";
import { parseCommitBlock, type CommitBlockContext } from "./commit-block-parser.js";

const SHA_A = "a".repeat(40);
const SHA_B = "b".repeat(40);

const context: CommitBlockContext = {
  repository: "widgets",
  defectReferences: EMPTY_DEFECT_REFERENCE_SET,
};

const blockB = [
  `commit ${SHA_B}`,
  "Author: Bob Builder <b@x.com>",
  "Date:   Thu Jan 8 09:00:00 2015 +0000",
  "",
  "    tidy docs",
  "",
  "1\t0\tREADME.md",
  "4\t4\tsrc/index.ts",
  "",
];

const captureError = (run: () => unknown): HistoryFormatError => {
  try {
    run();
  } catch (error) {
    if (error instanceof HistoryFormatError) {
      return error;
    }

    throw error;
  }

  throw new Error("expected a HistoryFormatError");
};

describe("parseCommitBlock", () => {
  it("expands one record per file sharing commit level fields", () => {
    const parsed = parseCommitBlock(blockB, context);

    expect(parsed.commitId).toBe(SHA_B);
    expect(parsed.defectSource).toBe("none");
    expect(parsed.records).toEqual([
      {
        repository: "widgets",
        timestamp: 1420707600,
        commitId: SHA_B,
        file: "README.md",
        linesAdded: 1,
        linesDeleted: 0,
        author: "b@x.com",
        isDefect: false,
      },
      {
        repository: "widgets",
        timestamp: 1420707600,
        commitId: SHA_B,
        file: "src/index.ts",
        linesAdded: 4,
        linesDeleted: 4,
        author: "b@x.com",
        isDefect: false,
      },
    ]);
  });

  it("classifies by ticket token in the message", () => {
    const parsed = parseCommitBlock(
      [
        `commit ${SHA_A}`,
        "Author: Ann <a@x.com>",
        "Date:   Wed Jan 7 10:15:00 2015 -0500",
        "",
        "    fix JIRA-42",
        "",
        "10\t2\tfoo.txt",
      ],
      context,
    );

    expect(parsed.defectSource).toBe("message");
    expect(parsed.defectReference).toBe("JIRA-42");
    expect(parsed.records).toEqual([
      {
        repository: "widgets",
        timestamp: 1420643700,
        commitId: SHA_A,
        file: "foo.txt",
        linesAdded: 10,
        linesDeleted: 2,
        author: "a@x.com",
        isDefect: true,
      },
    ]);
  });

  it("prefers the reference set over the message heuristic", () => {
    const parsed = parseCommitBlock(blockB, {
      ...context,
      defectReferences: createDefectReferenceSet([SHA_B]),
    });

    expect(parsed.defectSource).toBe("reference_set");
    expect(parsed.records.map((record) => record.isDefect)).toEqual([true, true]);
  });

  it("honours a restricted ticket pattern", () => {
    const lines = [...blockB.slice(0, 4), "    follow-up for OPS-3", ...blockB.slice(5)];

    expect(parseCommitBlock(lines, context).defectSource).toBe("message");
    expect(
      parseCommitBlock(lines, { ...context, ticketPattern: createTicketPattern(["JIRA"]) }).defectSource,
    ).toBe("none");
  });

  it("classifies a ticket token embedded in a word", () => {
    const lines = [...blockB.slice(0, 4), "    fixJIRA-42", ...blockB.slice(5)];
    const parsed = parseCommitBlock(lines, context);

    expect(parsed.defectSource).toBe("message");
    expect(parsed.defectReference).toBe("JIRA-42");
    expect(parsed.records.map((record) => record.isDefect)).toEqual([true, true]);
  });

  it("does not classify a key containing digits", () => {
    const lines = [...blockB.slice(0, 4), "    bump A1-2", ...blockB.slice(5)];
    const parsed = parseCommitBlock(lines, context);

    expect(parsed.defectSource).toBe("none");
    expect(parsed.records.map((record) => record.isDefect)).toEqual([false, false]);
  });

  it("takes counts and path from the matched file line", () => {
    const parsed = parseCommitBlock([...blockB.slice(0, 6), "12   3 \tdocs/my notes.md  "], context);

    expect(parsed.records).toEqual([
      {
        repository: "widgets",
        timestamp: 1420707600,
        commitId: SHA_B,
        file: "docs/my notes.md",
        linesAdded: 12,
        linesDeleted: 3,
        author: "b@x.com",
        isDefect: false,
      },
    ]);
  });

  it("yields no records for commits without file lines", () => {
    const parsed = parseCommitBlock(
      [
        `commit ${SHA_A}`,
        `Merge: 1234567 89abcde`,
        "Author: Ann <a@x.com>",
        "Date:   Wed Jan 7 10:15:00 2015 -0500",
        "",
        "    Merge branch 'JIRA-42-fix'",
        "",
      ],
      context,
    );

    expect(parsed).toEqual({ commitId: SHA_A, records: [], defectSource: "none" });
  });

  it("treats binary numstat lines as message text", () => {
    const parsed = parseCommitBlock([...blockB.slice(0, 7), "-\t-\tlogo.png"], context);

    expect(parsed.records.map((record) => record.file)).toEqual(["README.md"]);
  });

  it("only reads file lines after the date line", () => {
    const parsed = parseCommitBlock(
      [`commit ${SHA_A}`, "Author: Ann <a@x.com>", "5\t5\tearly.txt", "Date:   Wed Jan 7 10:15:00 2015 -0500", "1\t1\tlate.txt"],
      context,
    );

    expect(parsed.records.map((record) => record.file)).toEqual(["late.txt"]);
  });

  it("fails on a block that does not start with a commit header", () => {
    const error = captureError(() => parseCommitBlock(["commit 1234abc", ...blockB.slice(1)], context));

    expect(error.reason).toBe("missing_commit_header");
    expect(error.blockLines[0]).toBe("commit 1234abc");
  });

  it("fails when the author is missing", () => {
    const lines = blockB.filter((line) => !line.startsWith("Author:"));

    const error = captureError(() => parseCommitBlock(lines, context));
    expect(error.reason).toBe("missing_author");
    expect(error.blockLines).toEqual(lines);
  });

  it("fails when the date is missing or unparsable", () => {
    const withoutDate = blockB.filter((line) => !line.startsWith("Date:"));
    expect(captureError(() => parseCommitBlock(withoutDate, context)).reason).toBe("missing_date");

    const badDate = blockB.map((line) => (line.startsWith("Date:") ? "Date:   2015-01-08 09:00" : line));
    expect(captureError(() => parseCommitBlock(badDate, context)).reason).toBe("unparsable_date");
  });
});
