import { isScanPropsEmpty, type Defect } from "../types/domain/defect.js";
import { AbstractWriter } from "./abstractWriter.js";

type JsonEvent = {
  file_name: string;
  line: number;
  column?: number;
  event: string;
  message: string;
  verbosity_level: number;
};

type JsonDefect = {
  checker: string;
  cwe?: number;
  imp?: number;
  function?: string;
  language?: string;
  tool?: string;
  key_event_idx: number;
  events: JsonEvent[];
};

export function toJsonDefect(def: Defect): JsonDefect {
  return {
    checker: def.defClass,
    ...(def.cwe ? { cwe: def.cwe } : {}),
    ...(def.imp ? { imp: def.imp } : {}),
    ...(def.function ? { function: def.function } : {}),
    ...(def.language ? { language: def.language } : {}),
    ...(def.tool ? { tool: def.tool } : {}),
    key_event_idx: def.keyEventIdx,
    events: def.events.map((evt) => ({
      file_name: evt.fileName,
      line: evt.line,
      ...(evt.column ? { column: evt.column } : {}),
      event: evt.event,
      message: evt.msg,
      verbosity_level: evt.verbosityLevel
    }))
  };
}

/** Native JSON report, readable again through the `defects` decoder. */
export class JsonWriter extends AbstractWriter {
  protected readonly supportsScanProps = true;

  protected render(): string {
    const scan = this.getScanProps();
    const doc = {
      ...(isScanPropsEmpty(scan) ? {} : { scan }),
      defects: this.defects.map(toJsonDefect)
    };
    return `${JSON.stringify(doc, null, 2)}\n`;
  }
}
