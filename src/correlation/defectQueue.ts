import { UNKNOWN_FILE, type Defect } from "../types/domain/defect.js";
import { filterPath, type PathFilter } from "./pathFilter.js";

type Bucket = {
  defClass: string;
  fileName: string;
  /** FIFO, oldest first */
  defects: Defect[];
};

function bucketKey(defClass: string, fileName: string): string {
  return JSON.stringify([defClass, fileName]);
}

/**
 * Defects filed by (checker class, filtered file name) and handed out one per
 * lookup in the order they were inserted. Line numbers and function names are
 * not part of the key.
 */
export class DefectQueue {
  private readonly buckets = new Map<string, Bucket>();
  private count = 0;

  constructor(private readonly filter: PathFilter = filterPath) {}

  insert(def: Defect): void {
    const fileName = this.filter(def.events[0]?.fileName ?? UNKNOWN_FILE);
    const key = bucketKey(def.defClass, fileName);
    const bucket = this.buckets.get(key);
    if (bucket) {
      bucket.defects.push(def);
    } else {
      this.buckets.set(key, { defClass: def.defClass, fileName, defects: [def] });
    }
    this.count += 1;
  }

  /** Removes and returns the oldest defect filed under the pair, or null. */
  lookup(defClass: string, fileName: string): Defect | null {
    const key = bucketKey(defClass, this.filter(fileName));
    const bucket = this.buckets.get(key);
    if (!bucket) return null;

    const def = bucket.defects.shift();
    if (!bucket.defects.length) {
      this.buckets.delete(key);
    }
    if (!def) return null;

    this.count -= 1;
    return def;
  }

  empty(): boolean {
    return this.buckets.size === 0;
  }

  hasClass(defClass: string): boolean {
    for (const bucket of this.buckets.values()) {
      if (bucket.defClass === defClass) return true;
    }
    return false;
  }

  get size(): number {
    return this.count;
  }

  /** Removes every remaining defect, bucket by bucket in first-insertion order. */
  drain(): Defect[] {
    const remaining: Defect[] = [];
    for (const bucket of this.buckets.values()) {
      remaining.push(...bucket.defects);
    }
    this.buckets.clear();
    this.count = 0;
    return remaining;
  }
}
