import type { OutputFormat } from "../config/defaults.js";
import type { Logger } from "../logging/logger.js";
import type { ScanProps } from "../types/domain/defect.js";
import type { DefectWriter } from "./abstractWriter.js";
import { JsonWriter } from "./jsonWriter.js";
import { TextWriter } from "./textWriter.js";

export function createWriter(
  format: OutputFormat | undefined,
  options: { scanProps?: ScanProps; logger?: Logger } = {}
): DefectWriter {
  const writer = format === "json" ? new JsonWriter(options.logger) : new TextWriter(options.logger);
  if (options.scanProps) {
    writer.setScanProps(options.scanProps);
  }
  return writer;
}
