export * from "./config/defaults.js";
export * from "./config/loadConfig.js";
export * from "./convert/runConvert.js";
export * from "./link/runLink.js";
export * from "./report/linkify.js";
export * from "./logging/logger.js";
export * from "./input/inStream.js";
export * from "./parser/types.js";
export * from "./parser/createParser.js";
export * from "./parser/jsonParser.js";
export * from "./parser/postProcess.js";
export * from "./parser/decoders/index.js";
export * from "./correlation/defectQueue.js";
export * from "./correlation/pathFilter.js";
export * from "./correlation/referenceParser.js";
export * from "./writers/abstractWriter.js";
export * from "./writers/createWriter.js";
export * from "./writers/handleFile.js";
export * from "./writers/jsonWriter.js";
export * from "./writers/textWriter.js";
export * from "./errors/config.errors.js";
export * from "./errors/input.errors.js";
export * from "./errors/parser.errors.js";
export * from "./types/domain/defect.js";
export * from "./types/domain/status.js";
