export class ConfigInvalidOutputFormatError extends Error {
  constructor(value: string) {
    super(
      `Unsupported output format "${value}". Use text or json (DEFKIT_OUTPUT_FORMAT or output.format in defkit.config.json).`
    );
    this.name = "ConfigInvalidOutputFormatError";
  }
}
