import { DefectDataError } from "../../errors/parser.errors.js";
import { createDefect, createEvent, UNKNOWN_FILE } from "../../types/domain/defect.js";
import type { Defect, ScanProps } from "../../types/domain/defect.js";
import {
  findObject,
  NodeCursor,
  readInt,
  readString,
  requireArray,
  requireString
} from "../tree.js";
import type { TreeDecoder } from "./types.js";

/**
 * Decodes defkit's own JSON format, `{ "scan": {...}, "defects": [...] }`.
 * Fields pass through unchanged apart from defaults for absent optional keys.
 */
export class NativeTreeDecoder implements TreeDecoder {
  readonly kind = "native";
  private cursor = new NodeCursor();

  readScanProps(root: unknown): ScanProps {
    const scan = findObject(root, "scan");
    if (!scan) return {};

    const props: ScanProps = {};
    for (const [key, value] of Object.entries(scan)) {
      if (typeof value === "string") props[key] = value;
      else if (typeof value === "number" || typeof value === "boolean") props[key] = String(value);
    }
    return props;
  }

  readRoot(node: unknown): void {
    this.cursor = new NodeCursor(Array.isArray(node) ? node : []);
  }

  readNode(): Defect | null {
    const node = this.cursor.next();
    if (node === undefined) return null;

    const def = createDefect(requireString(node, "checker"));
    def.cwe = readInt(node, "cwe", 0);
    def.imp = readInt(node, "imp", 0);
    def.function = readString(node, "function", "");
    def.language = readString(node, "language", "");
    def.tool = readString(node, "tool", "");

    for (const evtNode of requireArray(node, "events")) {
      def.events.push(
        createEvent({
          event: requireString(evtNode, "event"),
          fileName: readString(evtNode, "file_name", UNKNOWN_FILE),
          line: readInt(evtNode, "line", 0),
          column: readInt(evtNode, "column", 0),
          msg: readString(evtNode, "message", ""),
          verbosityLevel: readInt(evtNode, "verbosity_level", 0)
        })
      );
    }

    if (!def.events.length) {
      throw new DefectDataError(`no events in ${def.defClass}`);
    }

    def.keyEventIdx = readInt(node, "key_event_idx", 0);
    if (def.keyEventIdx < 0 || def.keyEventIdx >= def.events.length) {
      throw new DefectDataError(`key event out of range: ${def.keyEventIdx}`);
    }

    return def;
  }
}
