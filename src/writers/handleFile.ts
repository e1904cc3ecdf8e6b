import { InputFileOpenError } from "../errors/input.errors.js";
import { openInStream, type InStream } from "../input/inStream.js";
import { noopLogger } from "../logging/logger.js";
import { createParser } from "../parser/createParser.js";
import type { ParserOptions } from "../parser/types.js";
import { createStatus, mergeStatus, type RunStatus } from "../types/domain/status.js";
import type { DefectWriter } from "./abstractWriter.js";

export type HandleFileOptions = ParserOptions & {
  silent?: boolean;
};

/** Reads one report into the writer and returns what went wrong on the way. */
export async function handleFile(
  writer: DefectWriter,
  fileName: string,
  options: HandleFileOptions = {}
): Promise<RunStatus> {
  const logger = options.logger ?? noopLogger;

  let input: InStream;
  try {
    input = await openInStream(fileName, { silent: options.silent, logger });
  } catch (err) {
    if (!(err instanceof InputFileOpenError)) throw err;
    logger.error(err.message);
    return createStatus({ fatal: [{ fileName, message: "failed to open input file" }] });
  }

  writer.notifyFile(fileName);
  const parser = createParser(input, options);
  const propsStatus = writer.setScanProps(parser.getScanProps());

  for (let def = parser.getNext(); def; def = parser.getNext()) {
    writer.handleDef(def);
  }

  return mergeStatus(parser.status(), propsStatus);
}
