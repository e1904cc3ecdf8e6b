#!/usr/bin/env node
import { Command, Option } from "commander";
import pc from "picocolors";
import { OUTPUT_FORMATS } from "./config/defaults.js";
import { loadConfig, normalizeOutputFormat, type DefkitConfig } from "./config/loadConfig.js";
import { runConvert } from "./convert/runConvert.js";
import { InputFileOpenError } from "./errors/input.errors.js";
import { readTextInput, STDIN_NAME } from "./input/inStream.js";
import { runLink } from "./link/runLink.js";
import {
  createAppLogger,
  createConsoleLogger,
  noopLogger,
  type AppLogger,
  type Logger
} from "./logging/logger.js";

const program = new Command();

type GlobalOptions = {
  config?: string;
  debugLog?: string;
  verbose?: boolean;
};

type CommandContext = {
  config: DefkitConfig;
  logger: Logger;
  appLogger: AppLogger | null;
};

async function openContext(): Promise<CommandContext> {
  const globals = program.opts<GlobalOptions>();
  let appLogger: AppLogger | null = null;
  if (globals.debugLog) {
    appLogger = await createAppLogger({ filePath: globals.debugLog });
  }
  const logger = createConsoleLogger({
    sink: appLogger ?? noopLogger,
    verbose: globals.verbose ?? false
  });
  try {
    const config = await loadConfig({ cwd: process.cwd(), configPath: globals.config });
    return { config, logger, appLogger };
  } catch (err) {
    await appLogger?.close();
    throw err;
  }
}

function reportFailure(logger: Logger, err: unknown): number {
  if (err instanceof InputFileOpenError) {
    logger.error(err.message, { fileName: err.fileName });
    return 1;
  }
  const message = err instanceof Error ? err.message : String(err);
  logger.error(`Error: ${message}`);
  return 2;
}

program
  .name("defkit")
  .description("Correlate and convert static-analysis defect reports")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to defkit.config.json")
  .option("-v, --verbose", "Print debug diagnostics to stderr")
  .addOption(new Option("--debug-log <path>", "Append a JSONL debug log to this file"));

program
  .command("link")
  .description("Link tracker references read from stdin to the defects of a report, as XHTML")
  .argument("<defect-url-base>", "Prefix of a defect page, the reference id is appended")
  .argument("<checker-url-base>", "Prefix of a checker documentation page")
  .argument("<defect-file>", "Report holding the defect details (- for stdin)")
  .option("--silent", "Do not report malformed defects one by one")
  .option("--ignore-path", "Match on file base names only")
  .action(
    async (
      defectUrlBase: string,
      checkerUrlBase: string,
      defectFile: string,
      options: { silent?: boolean; ignorePath?: boolean }
    ) => {
      let ctx: CommandContext | null = null;
      try {
        ctx = await openContext();
        if (defectFile === STDIN_NAME) {
          throw new Error("the defect file and the references cannot both be read from stdin");
        }
        const references = await readTextInput(STDIN_NAME);
        const result = await runLink({
          defectFile,
          references,
          defectUrlBase: defectUrlBase || ctx.config.defectUrlBase,
          checkerUrlBase: checkerUrlBase || ctx.config.checkerUrlBase,
          silent: options.silent ?? ctx.config.input.silent,
          ignorePath: options.ignorePath ?? ctx.config.input.ignorePath,
          logger: ctx.logger
        });
        process.stdout.write(result.html);
        ctx.logger.debug("Link finished", {
          matched: result.matched,
          unmatched: result.unmatched.length,
          offsets: result.offsets.length
        });
        process.exitCode = result.exitCode;
      } catch (err) {
        process.exitCode = reportFailure(ctx?.logger ?? createConsoleLogger(), err);
      } finally {
        await ctx?.appLogger?.close();
      }
    }
  );

program
  .command("convert [inputs...]")
  .description("Convert JSON reports (GCC, SARIF, ShellCheck, Coverity, native) to one report")
  .addOption(new Option("-f, --format <format>", "Output format").choices([...OUTPUT_FORMATS]))
  .option("--silent", "Do not report malformed defects one by one")
  .action(async (inputs: string[], options: { format?: string; silent?: boolean }) => {
    let ctx: CommandContext | null = null;
    try {
      ctx = await openContext();
      const format = options.format ? normalizeOutputFormat(options.format) : ctx.config.output.format;
      const result = await runConvert({
        inputs,
        format,
        cwd: ctx.config.cwd,
        exclude: ctx.config.input.exclude,
        silent: options.silent ?? ctx.config.input.silent,
        logger: ctx.logger
      });
      process.stdout.write(result.output);
      if (result.status.conflicts && process.stderr.isTTY) {
        process.stderr.write(pc.dim(`${result.status.conflicts} scan property conflict(s) ignored\n`));
      }
      process.exitCode = result.exitCode;
    } catch (err) {
      process.exitCode = reportFailure(ctx?.logger ?? createConsoleLogger(), err);
    } finally {
      await ctx?.appLogger?.close();
    }
  });

program.parse(process.argv);
