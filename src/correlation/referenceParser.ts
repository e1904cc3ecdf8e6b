import { noopLogger, type Logger } from "../logging/logger.js";
import { createStatus, type RunStatus } from "../types/domain/status.js";

export type ReferenceRow = {
  id: number;
  defClass: string;
  fileName: string;
};

const MIN_FIELDS = 3;

function splitLines(text: string): string[] {
  const lines = text.split("\n");
  // a trailing newline terminates the last line, it does not start a new one
  if (lines.length && lines[lines.length - 1] === "") lines.pop();
  return lines.map((line) => (line.endsWith("\r") ? line.slice(0, -1) : line));
}

function parseId(token: string): number | null {
  if (!/^[+-]?\d+$/.test(token)) return null;
  const id = Number.parseInt(token, 10);
  return Number.isSafeInteger(id) ? id : null;
}

/**
 * Reads `id,class,file[,...]` reference lines. A malformed line is reported
 * with its 1-based number and skipped; the error stays recorded for the run.
 */
export class ReferenceParser {
  private readonly lines: string[];
  private lineno = 0;
  private errors = 0;

  constructor(
    text: string,
    private readonly logger: Logger = noopLogger,
    private readonly streamName = "-"
  ) {
    this.lines = splitLines(text);
  }

  /** Returns the next well-formed row, or null once every line is consumed. */
  getNext(): ReferenceRow | null {
    while (this.lineno < this.lines.length) {
      const row = this.parseLine(this.lines[this.lineno]);
      this.lineno += 1;
      if (row) return row;
      this.errors += 1;
    }
    return null;
  }

  hasError(): boolean {
    return this.errors > 0;
  }

  status(): RunStatus {
    return createStatus({ recovered: this.errors });
  }

  private parseLine(line: string): ReferenceRow | null {
    const lineno = this.lineno + 1;
    const tokens = line.split(",");
    if (tokens.length < MIN_FIELDS) {
      this.lineError(lineno, "not enough ',' at the line");
      return null;
    }

    const id = parseId(tokens[0]);
    if (id === null) {
      this.lineError(lineno, "failed to parse CID");
      return null;
    }

    return { id, defClass: tokens[1], fileName: tokens[2] };
  }

  private lineError(lineno: number, message: string): void {
    this.logger.error(`${this.streamName}:${lineno}: error: ${message}`, { line: lineno });
  }
}
