export interface DefectReferenceSet {
  readonly size: number;
  has(commitId: string): boolean;
}

class FrozenDefectReferenceSet implements DefectReferenceSet {
  private readonly commitIds: ReadonlySet<string>;

  constructor(commitIds: Iterable<string>) {
    this.commitIds = new Set(commitIds);
  }

  get size(): number {
    return this.commitIds.size;
  }

  has(commitId: string): boolean {
    return this.commitIds.has(commitId);
  }
}

export const createDefectReferenceSet = (lines: Iterable<string> = []): DefectReferenceSet => {
  const commitIds: string[] = [];
  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.length > 0) {
      commitIds.push(trimmed);
    }
  }

  return Object.freeze(new FrozenDefectReferenceSet(commitIds));
};

export const EMPTY_DEFECT_REFERENCE_SET: DefectReferenceSet = createDefectReferenceSet();
