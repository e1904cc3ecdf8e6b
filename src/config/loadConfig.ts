import path from "node:path";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { readEnv, readFlagEnv } from "./env.js";
import {
  DEFAULT_CONFIG_FILES,
  DEFAULT_EXCLUDES,
  DEFAULT_OUTPUT_FORMAT,
  OUTPUT_FORMATS,
  type OutputFormat
} from "./defaults.js";
import { ConfigInvalidOutputFormatError } from "../errors/config.errors.js";
import { isPlainObject, type JsonObject } from "../parser/tree.js";

export interface DefkitConfig {
  cwd: string;
  defectUrlBase: string;
  checkerUrlBase: string;
  output: {
    format: OutputFormat;
  };
  input: {
    silent: boolean;
    ignorePath: boolean;
    exclude: string[];
  };
}

export interface LoadConfigParams {
  cwd: string;
  configPath?: string | null;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function normalizeOutputFormat(raw: string | null | undefined): OutputFormat {
  if (!raw) return DEFAULT_OUTPUT_FORMAT;
  const value = raw.trim().toLowerCase();
  if (!isOutputFormat(value)) {
    throw new ConfigInvalidOutputFormatError(raw);
  }
  return value;
}

function section(file: JsonObject, key: string): JsonObject {
  const value = file[key];
  return isPlainObject(value) ? value : {};
}

function stringField(node: JsonObject, key: string): string | null {
  const value = node[key];
  return typeof value === "string" ? value : null;
}

function boolField(node: JsonObject, key: string): boolean | null {
  const value = node[key];
  return typeof value === "boolean" ? value : null;
}

function stringListField(node: JsonObject, key: string): string[] | null {
  const value = node[key];
  if (!Array.isArray(value)) return null;
  return value.filter((item): item is string => typeof item === "string");
}

async function loadConfigFile(cwd: string, configPath?: string | null): Promise<JsonObject> {
  const candidates = configPath
    ? [path.resolve(cwd, configPath)]
    : DEFAULT_CONFIG_FILES.map((name) => path.resolve(cwd, name));

  for (const candidate of candidates) {
    if (!existsSync(candidate)) continue;
    const raw = await readFile(candidate, "utf-8");
    const parsed: unknown = JSON.parse(raw);
    return isPlainObject(parsed) ? parsed : {};
  }

  return {};
}

/** Environment wins over the config file, which wins over the defaults. */
export async function loadConfig(params: LoadConfigParams): Promise<DefkitConfig> {
  const configFile = await loadConfigFile(params.cwd, params.configPath);
  const output = section(configFile, "output");
  const input = section(configFile, "input");

  return {
    cwd: params.cwd,
    defectUrlBase:
      readEnv("DEFKIT_DEFECT_URL_BASE") ?? stringField(configFile, "defectUrlBase") ?? "",
    checkerUrlBase:
      readEnv("DEFKIT_CHECKER_URL_BASE") ?? stringField(configFile, "checkerUrlBase") ?? "",
    output: {
      format: normalizeOutputFormat(readEnv("DEFKIT_OUTPUT_FORMAT") ?? stringField(output, "format"))
    },
    input: {
      silent: readFlagEnv("DEFKIT_SILENT") ?? boolField(input, "silent") ?? false,
      ignorePath: readFlagEnv("DEFKIT_IGNORE_PATH") ?? boolField(input, "ignorePath") ?? false,
      exclude: stringListField(input, "exclude") ?? DEFAULT_EXCLUDES
    }
  };
}
