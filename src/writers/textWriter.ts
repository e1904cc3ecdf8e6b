import type { Defect, DefEvent } from "../types/domain/defect.js";
import { AbstractWriter } from "./abstractWriter.js";

export function formatLocation(evt: DefEvent): string {
  let location = `${evt.fileName}:`;
  if (evt.line > 0) location += `${evt.line}:`;
  if (evt.line > 0 && evt.column > 0) location += `${evt.column}:`;
  return location;
}

export function formatDefectHeader(def: Defect): string {
  const cwe = def.cwe ? ` (CWE-${def.cwe})` : "";
  const imp = def.imp ? " [important]" : "";
  return `Error: ${def.defClass}${cwe}:${imp}`;
}

/**
 * Native plain-text report:
 *
 *   Error: CHECKER (CWE-n):
 *   file:line:column: event: message
 */
export class TextWriter extends AbstractWriter {
  protected readonly supportsScanProps = false;

  protected render(): string {
    return this.defects
      .map((def) => {
        const lines = [formatDefectHeader(def)];
        for (const evt of def.events) {
          lines.push(`${formatLocation(evt)} ${evt.event}: ${evt.msg}`);
        }
        return `${lines.join("\n")}\n`;
      })
      .join("\n");
  }
}
