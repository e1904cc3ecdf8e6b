export class InputFileOpenError extends Error {
  fileName: string;

  constructor(fileName: string, cause?: unknown) {
    super(`${fileName}: failed to open input file`, { cause });
    this.name = "InputFileOpenError";
    this.fileName = fileName;
  }
}
