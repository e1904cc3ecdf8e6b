import { UnsupportedInputError } from "../errors/parser.errors.js";
import type { InStream } from "../input/inStream.js";
import type { Defect, ScanProps } from "../types/domain/defect.js";
import { createStatus, type RunStatus } from "../types/domain/status.js";
import type { DecoderKind } from "./decoders/types.js";
import { JsonParser } from "./jsonParser.js";
import type { DefectParser, ParserOptions } from "./types.js";

/** Stand-in for inputs that hold no defects, or none defkit can read. */
class NullParser implements DefectParser {
  private readonly fatal: RunStatus["fatal"] = [];

  constructor(input: InStream, error?: UnsupportedInputError) {
    if (!error) return;
    this.fatal.push({ fileName: input.fileName, message: error.message });
    input.handleError(error.message);
  }

  inputFormat(): DecoderKind | null {
    return null;
  }

  getNext(): Defect | null {
    return null;
  }

  getScanProps(): ScanProps {
    return {};
  }

  hasError(): boolean {
    return this.fatal.length > 0;
  }

  status(): RunStatus {
    return createStatus({ fatal: this.fatal });
  }
}

/**
 * Picks the parser for an input document. JSON documents go to the decoding
 * engine; the plain-text report format is not read by defkit.
 */
export function createParser(input: InStream, options: ParserOptions = {}): DefectParser {
  const head = input.text.trimStart();
  if (!head) return new NullParser(input);
  if (head.startsWith("{") || head.startsWith("[")) {
    return new JsonParser(input, options);
  }
  return new NullParser(input, new UnsupportedInputError());
}
