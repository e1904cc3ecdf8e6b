import type { Defect, ScanProps } from "../types/domain/defect.js";
import type { RunStatus } from "../types/domain/status.js";
import type { Logger } from "../logging/logger.js";
import type { PostProcessor } from "./postProcess.js";
import type { DecoderKind } from "./decoders/types.js";

export interface DefectParser {
  /** The detected dialect, or null when nothing was detected. */
  inputFormat(): DecoderKind | null;
  /** Returns the next complete defect, or null at the end of input. */
  getNext(): Defect | null;
  getScanProps(): ScanProps;
  hasError(): boolean;
  status(): RunStatus;
}

export interface ParserOptions {
  postProcessor?: PostProcessor;
  logger?: Logger;
}
