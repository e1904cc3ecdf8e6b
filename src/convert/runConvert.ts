import { DEFAULT_EXCLUDES, type OutputFormat } from "../config/defaults.js";
import { discoverInputs } from "../fs/discover.js";
import { STDIN_NAME } from "../input/inStream.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import type { PostProcessor } from "../parser/postProcess.js";
import { mergeStatus, hasFailure, type RunStatus } from "../types/domain/status.js";
import { createWriter } from "../writers/createWriter.js";
import { handleFile } from "../writers/handleFile.js";

export interface RunConvertOptions {
  /** files or glob patterns; empty means stdin */
  inputs: string[];
  format?: OutputFormat;
  cwd?: string;
  exclude?: string[];
  silent?: boolean;
  postProcessor?: PostProcessor;
  logger?: Logger;
}

export interface ConvertResult {
  output: string;
  files: string[];
  status: RunStatus;
  exitCode: 0 | 1;
}

export async function runConvert(options: RunConvertOptions): Promise<ConvertResult> {
  const logger = options.logger ?? noopLogger;
  const patterns = options.inputs.length ? options.inputs : [STDIN_NAME];
  const files = await discoverInputs(patterns, {
    cwd: options.cwd ?? process.cwd(),
    exclude: options.exclude ?? DEFAULT_EXCLUDES
  });
  logger.debug("Resolved convert inputs", { patterns, files });

  const writer = createWriter(options.format, { logger });
  const statuses: RunStatus[] = [];
  for (const file of files) {
    statuses.push(
      await handleFile(writer, file, {
        silent: options.silent,
        postProcessor: options.postProcessor,
        logger
      })
    );
  }

  const status = mergeStatus(...statuses);
  return {
    output: writer.flush(),
    files,
    status,
    exitCode: hasFailure(status) ? 1 : 0
  };
}
