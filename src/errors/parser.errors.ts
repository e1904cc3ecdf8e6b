export class DocumentParseError extends Error {
  line?: number;

  constructor(message: string, line?: number) {
    super(message);
    this.name = "DocumentParseError";
    this.line = line;
  }
}

export class UnknownFormatError extends Error {
  constructor() {
    super("unknown JSON format");
    this.name = "UnknownFormatError";
  }
}

export class UnsupportedInputError extends Error {
  constructor() {
    super("unsupported input format (expected a JSON document)");
    this.name = "UnsupportedInputError";
  }
}

export class DefectDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DefectDataError";
  }
}
