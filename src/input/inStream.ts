import { readFile } from "node:fs/promises";
import { InputFileOpenError } from "../errors/input.errors.js";
import { noopLogger, type Logger } from "../logging/logger.js";

export const STDIN_NAME = "-";

export type InStreamParams = {
  text: string;
  fileName: string;
  /** suppresses per-defect diagnostics; errors are still counted */
  silent?: boolean;
  logger?: Logger;
};

/** An input document held in memory, plus the error bookkeeping tied to its name. */
export class InStream {
  readonly text: string;
  readonly fileName: string;
  readonly silent: boolean;
  private readonly logger: Logger;
  private errorCount = 0;

  constructor(params: InStreamParams) {
    this.text = params.text;
    this.fileName = params.fileName;
    this.silent = params.silent ?? false;
    this.logger = params.logger ?? noopLogger;
  }

  /** Records an error; a message, when given, is reported as `file[:line]: error: message`. */
  handleError(message?: string, line?: number): void {
    this.errorCount += 1;
    if (this.silent || !message) return;

    const where = line ? `${this.fileName}:${line}` : this.fileName;
    this.logger.error(`${where}: error: ${message}`, { fileName: this.fileName, line });
  }

  anyError(): boolean {
    return this.errorCount > 0;
  }

  get errors(): number {
    return this.errorCount;
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf-8");
}

export async function readTextInput(fileName: string): Promise<string> {
  if (fileName === STDIN_NAME) return await readStdin();
  try {
    return await readFile(fileName, "utf-8");
  } catch (err) {
    throw new InputFileOpenError(fileName, err);
  }
}

export async function openInStream(
  fileName: string,
  options: { silent?: boolean; logger?: Logger } = {}
): Promise<InStream> {
  const text = await readTextInput(fileName);
  return new InStream({ text, fileName, silent: options.silent, logger: options.logger });
}
