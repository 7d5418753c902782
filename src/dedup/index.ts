/**
 * Near-duplicate detection on ingest: the same role re-posted under a new id
 * (company + title fuzzy match) within the dedup window.
 */

import Fuse from "fuse.js";

export interface FuzzyEntry {
  id: string;
  company: string;
  title: string;
}

interface FuzzySearchable extends FuzzyEntry {
  fuzzyKey: string;
}

export interface DuplicateMatch {
  isDuplicate: boolean;
  existingId?: string;
  similarity?: number;
}

export function buildFuzzyKey(company: string, title: string): string {
  return [company.toLowerCase().trim(), title.toLowerCase().trim()]
    .filter(Boolean)
    .join(" | ");
}

export class DuplicateIndex {
  private readonly fuse: Fuse<FuzzySearchable>;

  constructor(
    entries: FuzzyEntry[],
    private readonly similarityThreshold = 0.85,
  ) {
    this.fuse = new Fuse(
      entries.map((e) => ({ ...e, fuzzyKey: buildFuzzyKey(e.company, e.title) })),
      {
        keys: ["fuzzyKey"],
        threshold: 0.3,
        includeScore: true,
        ignoreLocation: true,
      },
    );
  }

  check(company: string, title: string): DuplicateMatch {
    const matches = this.fuse.search(buildFuzzyKey(company, title), { limit: 1 });
    const top = matches[0];
    if (!top || top.score === undefined) {
      return { isDuplicate: false };
    }

    const similarity = 1 - top.score;
    if (similarity >= this.similarityThreshold) {
      return { isDuplicate: true, existingId: top.item.id, similarity };
    }
    return { isDuplicate: false, similarity };
  }

  add(entry: FuzzyEntry): void {
    this.fuse.add({ ...entry, fuzzyKey: buildFuzzyKey(entry.company, entry.title) });
  }
}
