import type { Defect } from "../types/domain/defect.js";

export interface PostProcessor {
  apply(defect: Defect): void;
}

export const noopPostProcessor: PostProcessor = {
  apply: () => {}
};

type ClassRule = {
  suffix: RegExp;
  defClass: string;
};

// Applied to COMPILER_WARNING defects only; first match wins.
const COMPILER_CLASS_RULES: ClassRule[] = [
  { suffix: / \[-Wanalyzer-[^\]]+\]$/, defClass: "GCC_ANALYZER_WARNING" },
  { suffix: / \[clang-analyzer-[^\]]+\]$/, defClass: "CLANG_WARNING" },
  { suffix: / \[(?:bugprone|cert|performance)-[^\]]+\]$/, defClass: "CLANG_TIDY_WARNING" }
];

const CWE_SUFFIX = / \[CWE-(\d+)\]$/;

function canonicalizePath(fileName: string): string {
  const normalized = fileName.replace(/\\/g, "/");
  return normalized.startsWith("./") ? normalized.replace(/^(?:\.\/)+/, "") : normalized;
}

/**
 * Default post-processing for compiler and shell-linter diagnostics: event paths
 * are canonicalized, a trailing `[CWE-n]` moves into `cwe`, and analyzer
 * warnings are split out of the generic compiler class by their option tag.
 */
export class DiagnosticPostProcessor implements PostProcessor {
  apply(defect: Defect): void {
    for (const evt of defect.events) {
      evt.fileName = canonicalizePath(evt.fileName);

      const cwe = evt.msg.match(CWE_SUFFIX);
      if (cwe) {
        evt.msg = evt.msg.slice(0, cwe.index);
        if (!defect.cwe) defect.cwe = Number.parseInt(cwe[1], 10);
      }
    }

    if (defect.defClass !== "COMPILER_WARNING") return;
    const keyMsg = defect.events[defect.keyEventIdx]?.msg ?? "";
    const rule = COMPILER_CLASS_RULES.find((candidate) => candidate.suffix.test(keyMsg));
    if (rule) {
      defect.defClass = rule.defClass;
    }
  }
}
