import { compareKey, exactKey } from "./names.js";

import type { ScrapedEntry } from "../../types/index.js";

/**
 * Name → Bulletin code lookup built during one crawl session.
 *
 * Both tiers are filled in the same pass. A name seen twice keeps the code
 * from the later page (last write wins); such collisions are only counted.
 */
export class LookupIndex {
  private readonly exact = new Map<string, number>();
  private readonly lower = new Map<string, number>();
  private collisionCount = 0;

  get size(): number {
    return this.exact.size;
  }

  /** Keys that were overwritten with a different code */
  get collisions(): number {
    return this.collisionCount;
  }

  add(entries: Iterable<ScrapedEntry>): number {
    let added = 0;

    for (const entry of entries) {
      const exact = exactKey(entry.rawName);
      if (exact === "") continue;

      const lower = compareKey(entry.rawName);
      const previous = this.lower.get(lower);
      if (previous !== undefined && previous !== entry.externalId) {
        this.collisionCount++;
      }

      this.exact.set(exact, entry.externalId);
      this.lower.set(lower, entry.externalId);
      added++;
    }

    return added;
  }

  /**
   * Exact name first, then case-insensitive
   */
  lookup(name: string): number | undefined {
    return this.exact.get(exactKey(name)) ?? this.lower.get(compareKey(name));
  }
}
