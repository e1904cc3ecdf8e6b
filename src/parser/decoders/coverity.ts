import { DefectDataError } from "../../errors/parser.errors.js";
import { createDefect, createEvent, UNKNOWN_FILE } from "../../types/domain/defect.js";
import type { Defect, ScanProps } from "../../types/domain/defect.js";
import {
  findObject,
  NodeCursor,
  readBool,
  readInt,
  readString,
  requireArray,
  requireString
} from "../tree.js";
import type { TreeDecoder } from "./types.js";

/** Decodes the JSON export of the Coverity analyzer (`cov-format-errors --json-output-v*`). */
export class CoverityTreeDecoder implements TreeDecoder {
  readonly kind = "coverity";
  private cursor = new NodeCursor();

  readScanProps(): ScanProps {
    return {};
  }

  readRoot(node: unknown): void {
    this.cursor = new NodeCursor(Array.isArray(node) ? node : []);
  }

  readNode(): Defect | null {
    const node = this.cursor.next();
    if (node === undefined) return null;

    const def = createDefect(requireString(node, "checkerName"));
    def.function = readString(node, "functionDisplayName", "");
    def.language = readString(node, "language", "");

    const props = findObject(node, "checkerProperties");
    if (props) {
      def.cwe = readInt(props, "cweCategory", 0);
      def.imp = readString(props, "impact", "") === "High" ? 1 : 0;
    }

    let keyEventIdx: number | null = null;
    for (const evtNode of requireArray(node, "events")) {
      const main = readBool(evtNode, "main", false);
      if (main && keyEventIdx === null) {
        keyEventIdx = def.events.length;
      }

      def.events.push(
        createEvent({
          event: requireString(evtNode, "eventTag"),
          fileName: readString(
            evtNode,
            "filePathname",
            readString(evtNode, "strippedFilePathname", UNKNOWN_FILE)
          ),
          line: readInt(evtNode, "lineNumber", 0),
          column: readInt(evtNode, "columnNumber", 0),
          msg: readString(evtNode, "eventDescription", ""),
          verbosityLevel: main ? 0 : 1
        })
      );
    }

    if (!def.events.length) {
      throw new DefectDataError(`no events in ${def.defClass}`);
    }

    if (keyEventIdx === null) {
      // no event marked as main, fall back to the first one
      keyEventIdx = 0;
      def.events[0].verbosityLevel = 0;
    }
    def.keyEventIdx = keyEventIdx;
    return def;
  }
}
