import jsonc, { type ParseError } from "jsonc-parser";
import { DefectDataError, DocumentParseError, UnknownFormatError } from "../errors/parser.errors.js";
import type { InStream } from "../input/inStream.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { Defect, ScanProps } from "../types/domain/defect.js";
import { createStatus, type FatalCondition, type RunStatus } from "../types/domain/status.js";
import { createDecoder, type DecoderKind, type TreeDecoder } from "./decoders/index.js";
import { DiagnosticPostProcessor } from "./postProcess.js";
import { findChild, isPlainObject } from "./tree.js";
import type { DefectParser, ParserOptions } from "./types.js";

type Detection =
  | { type: "empty" }
  | { type: "unknown" }
  | { type: "decoder"; kind: DecoderKind; node: unknown };

// checked in this order; the keys do not co-occur in any supported dialect
const DISPATCH_KEYS: ReadonlyArray<readonly [string, DecoderKind]> = [
  ["defects", "native"],
  ["issues", "coverity"],
  ["runs", "sarif"],
  ["comments", "shellcheck"]
];

export function detectFormat(root: unknown): Detection {
  if (Array.isArray(root)) {
    if (!root.length) return { type: "empty" };
    // GCC writes a bare array of diagnostics
    const first = root[0];
    if (isPlainObject(first) && findChild(first, "kind") !== undefined) {
      return { type: "decoder", kind: "gcc", node: root };
    }
    return { type: "unknown" };
  }

  if (!isPlainObject(root)) return { type: "unknown" };
  if (!Object.keys(root).length) return { type: "empty" };

  for (const [key, kind] of DISPATCH_KEYS) {
    const node = findChild(root, key);
    if (node !== undefined) {
      return { type: "decoder", kind, node };
    }
  }
  return { type: "unknown" };
}

/**
 * 1-based line of the first syntax error in a document JSON.parse rejected.
 * V8 messages do not always carry a position, so the text is scanned again
 * with strict settings; the last line is used if the scan finds nothing.
 */
export function lineOfJsonError(text: string): number {
  const errors: ParseError[] = [];
  jsonc.parse(text, errors, { disallowComments: true, allowTrailingComma: false });
  const offset = errors.length ? errors[0].offset : text.length;
  return text.slice(0, offset).split("\n").length;
}

/**
 * Decoding engine for JSON reports. The dialect is detected once, from the
 * document root; defects are then pulled one at a time through `getNext`,
 * skipping (and counting) any record the decoder cannot read.
 */
export class JsonParser implements DefectParser {
  private decoder: TreeDecoder | null = null;
  private scanProps: ScanProps = {};
  private readonly fatal: FatalCondition[] = [];
  private recovered = 0;
  private yielded = 0;
  private readonly logger: Logger;

  constructor(private readonly input: InStream, options: ParserOptions = {}) {
    this.logger = options.logger ?? noopLogger;

    let root: unknown;
    try {
      root = JSON.parse(input.text);
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      this.failDocument(new DocumentParseError(err.message, lineOfJsonError(input.text)));
      return;
    }

    const detection = detectFormat(root);
    if (detection.type === "empty") return;
    if (detection.type === "unknown") {
      this.failDocument(new UnknownFormatError());
      return;
    }

    this.decoder = createDecoder(detection.kind, options.postProcessor ?? new DiagnosticPostProcessor());
    this.scanProps = this.decoder.readScanProps(root);
    this.decoder.readRoot(detection.node);
    this.logger.debug("Detected input format", {
      fileName: input.fileName,
      format: detection.kind
    });
  }

  inputFormat(): DecoderKind | null {
    return this.decoder?.kind ?? null;
  }

  getScanProps(): ScanProps {
    return this.scanProps;
  }

  getNext(): Defect | null {
    if (!this.decoder) return null;

    // error recovery loop: a malformed node is skipped and the next one read
    for (;;) {
      try {
        const def = this.decoder.readNode();
        if (def) this.yielded += 1;
        return def;
      } catch (err) {
        if (!(err instanceof DefectDataError)) throw err;
        this.dataError(err.message);
      }
    }
  }

  hasError(): boolean {
    return this.input.anyError() || this.fatal.length > 0 || this.recovered > 0;
  }

  status(): RunStatus {
    return createStatus({ fatal: this.fatal, recovered: this.recovered });
  }

  private failDocument(err: DocumentParseError | UnknownFormatError): void {
    const line = err instanceof DocumentParseError ? err.line : undefined;
    this.fatal.push({ fileName: this.input.fileName, message: err.message, line });
    this.input.handleError(err.message, line);
  }

  private dataError(message: string): void {
    this.recovered += 1;
    this.input.handleError();
    if (this.input.silent) return;

    const ordinal = this.yielded + this.recovered;
    this.logger.warn(
      `${this.input.fileName}: error: failed to read defect #${ordinal}: ${message}`,
      { fileName: this.input.fileName, defect: ordinal }
    );
  }
}
