import { DefectDataError } from "../../errors/parser.errors.js";
import { createDefect, createEvent, UNKNOWN_FILE, UNKNOWN_MESSAGE } from "../../types/domain/defect.js";
import type { Defect, ScanProps } from "../../types/domain/defect.js";
import type { PostProcessor } from "../postProcess.js";
import { NodeCursor, readInt, readString } from "../tree.js";
import type { TreeDecoder } from "./types.js";

export const SHELLCHECK_DEFECT_CLASS = "SHELLCHECK_WARNING";

/** Decodes `shellcheck --format=json1` output: `{ "comments": [...] }`. */
export class ShellCheckTreeDecoder implements TreeDecoder {
  readonly kind = "shellcheck";
  private cursor = new NodeCursor();

  constructor(private readonly postProc: PostProcessor) {}

  readScanProps(): ScanProps {
    return {};
  }

  readRoot(node: unknown): void {
    this.cursor = new NodeCursor(Array.isArray(node) ? node : []);
  }

  readNode(): Defect | null {
    const node = this.cursor.next();
    if (node === undefined) return null;

    const level = readString(node, "level", "");
    if (!level) {
      throw new DefectDataError('missing "level" of the comment');
    }

    const evt = createEvent({
      event: level,
      fileName: readString(node, "file", UNKNOWN_FILE),
      line: readInt(node, "line", 0),
      column: readInt(node, "column", 0),
      msg: readString(node, "message", UNKNOWN_MESSAGE)
    });

    const code = readString(node, "code", "");
    if (code) {
      evt.msg += ` [SC${code}]`;
    }

    const def = createDefect(SHELLCHECK_DEFECT_CLASS);
    def.events.push(evt);
    this.postProc.apply(def);
    return def;
  }
}
