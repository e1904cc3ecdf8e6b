import { DefectDataError } from "../../errors/parser.errors.js";
import { createDefect, createEvent, UNKNOWN_FILE, UNKNOWN_MESSAGE } from "../../types/domain/defect.js";
import type { Defect, DefEvent, ScanProps } from "../../types/domain/defect.js";
import type { PostProcessor } from "../postProcess.js";
import { findArray, findObject, NodeCursor, readInt, readString } from "../tree.js";
import type { TreeDecoder } from "./types.js";

export const GCC_DEFECT_CLASS = "COMPILER_WARNING";

function readGccEvent(node: unknown): DefEvent | null {
  // kind: error, warning, note
  const kind = readString(node, "kind", "");
  if (!kind) return null;

  const evt = createEvent({ event: kind });
  const locations = findArray(node, "locations");
  const caret = locations?.length ? findObject(locations[0], "caret") : null;
  if (caret) {
    evt.fileName = readString(caret, "file", UNKNOWN_FILE);
    evt.line = readInt(caret, "line", 0);
    evt.column = readInt(caret, "byte-column", 0);
  }

  evt.msg = readString(node, "message", UNKNOWN_MESSAGE);

  const option = readString(node, "option", "");
  if (option) {
    evt.msg += ` [${option}]`;
  }

  return evt;
}

/** Decodes the diagnostics array GCC writes with -fdiagnostics-format=json. */
export class GccTreeDecoder implements TreeDecoder {
  readonly kind = "gcc";
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

    const def = createDefect(GCC_DEFECT_CLASS);
    const keyEvent = readGccEvent(node);
    if (!keyEvent) {
      throw new DefectDataError('missing "kind" of the diagnostic');
    }
    def.events.push(keyEvent);

    for (const child of findArray(node, "children") ?? []) {
      const evt = readGccEvent(child);
      if (evt) def.events.push(evt);
    }

    const meta = findObject(node, "metadata");
    if (meta) {
      def.cwe = readInt(meta, "cwe", 0);
    }

    this.postProc.apply(def);
    return def;
  }
}
