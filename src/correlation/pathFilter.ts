import { DEFAULT_BUILD_ROOT_PATTERNS } from "../config/defaults.js";

export type PathFilter = (fileName: string) => string;

export interface PathFilterOptions {
  /** keep only the base name */
  ignorePath?: boolean;
  buildRootPatterns?: string[];
}

/**
 * Builds the function that turns a file name into its matching key. Both sides
 * of a lookup must go through the same filter.
 */
export function createPathFilter(options: PathFilterOptions = {}): PathFilter {
  const buildRoots = (options.buildRootPatterns ?? DEFAULT_BUILD_ROOT_PATTERNS).map(
    (pattern) => new RegExp(pattern)
  );

  return (fileName: string) => {
    let filtered = fileName.replace(/\\/g, "/").trim().replace(/^(?:\.\/)+/, "");
    for (const re of buildRoots) {
      if (re.test(filtered)) {
        filtered = filtered.replace(re, "");
        break;
      }
    }
    if (options.ignorePath) {
      filtered = filtered.slice(filtered.lastIndexOf("/") + 1);
    }
    return filtered;
  };
}

export const filterPath: PathFilter = createPathFilter();
