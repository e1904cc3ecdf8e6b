import path from "node:path";
import fg from "fast-glob";
import { STDIN_NAME } from "../input/inStream.js";

interface DiscoverOptions {
  cwd: string;
  exclude: string[];
}

/**
 * Expands report inputs. A literal path is kept even when it does not exist;
 * only glob patterns are matched against the file system.
 */
export async function discoverInputs(patterns: string[], options: DiscoverOptions): Promise<string[]> {
  const inputs: string[] = [];
  const seen = new Set<string>();
  const push = (file: string) => {
    if (seen.has(file)) return;
    seen.add(file);
    inputs.push(file);
  };

  for (const pattern of patterns) {
    if (pattern === STDIN_NAME || !fg.isDynamicPattern(pattern)) {
      push(pattern);
      continue;
    }

    const entries = await fg(pattern, {
      cwd: options.cwd,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      ignore: options.exclude
    });
    for (const entry of entries.sort()) {
      push(path.isAbsolute(entry) ? entry : path.join(options.cwd, entry));
    }
  }

  return inputs;
}
