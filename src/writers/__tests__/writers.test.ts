import assert from "node:assert/strict";
import { test } from "node:test";
import path from "node:path";
import { tmpdir } from "node:os";
import { InStream } from "../../input/inStream.js";
import type { Logger } from "../../logging/logger.js";
import { JsonParser } from "../../parser/jsonParser.js";
import { createDefect, createEvent, type Defect } from "../../types/domain/defect.js";
import { createWriter } from "../createWriter.js";
import { handleFile } from "../handleFile.js";
import { JsonWriter } from "../jsonWriter.js";
import { formatLocation, TextWriter } from "../textWriter.js";

function recordingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: (message) => lines.push(message),
    error: (message) => lines.push(message)
  };
  return { logger, lines };
}

function leakDefect(): Defect {
  const def = createDefect("RESOURCE_LEAK");
  def.cwe = 772;
  def.imp = 1;
  def.function = "main";
  def.language = "c";
  def.tool = "coverity";
  def.keyEventIdx = 1;
  def.events.push(
    createEvent({ event: "alloc_fn", fileName: "a.c", line: 5, msg: "allocated", verbosityLevel: 1 }),
    createEvent({ event: "leaked_storage", fileName: "a.c", line: 9, column: 3, msg: "leaked" })
  );
  return def;
}

test("formats event locations by what is known", () => {
  assert.equal(formatLocation(createEvent({ fileName: "a.c", line: 4, column: 2 })), "a.c:4:2:");
  assert.equal(formatLocation(createEvent({ fileName: "a.c", line: 4 })), "a.c:4:");
  assert.equal(formatLocation(createEvent({ fileName: "a.c", column: 2 })), "a.c:");
});

test("text writer renders the native plain-text report", () => {
  const writer = new TextWriter();
  const note = createDefect("COMPILER_WARNING");
  note.events.push(createEvent({ event: "note", msg: "see above" }));
  writer.handleDef(leakDefect());
  writer.handleDef(note);

  assert.equal(
    writer.flush(),
    [
      "Error: RESOURCE_LEAK (CWE-772): [important]",
      "a.c:5: alloc_fn: allocated",
      "a.c:9:3: leaked_storage: leaked",
      "",
      "Error: COMPILER_WARNING:",
      "<unknown>: note: see above",
      ""
    ].join("\n")
  );
});

test("json writer output reads back to the same defects", () => {
  const writer = createWriter("json", { scanProps: { tool: "coverity", "tool-version": "2024.6" } });
  const def = leakDefect();
  writer.handleDef(def);

  const parser = new JsonParser(new InStream({ text: writer.flush(), fileName: "out.json" }));
  assert.equal(parser.inputFormat(), "native");
  assert.deepEqual(parser.getScanProps(), { tool: "coverity", "tool-version": "2024.6" });
  assert.deepEqual(parser.getNext(), def);
  assert.equal(parser.getNext(), null);
  assert.equal(parser.hasError(), false);
});

test("json writer leaves out unset optional keys", () => {
  const writer = new JsonWriter();
  const def = createDefect("DEADCODE");
  def.events.push(createEvent({ event: "dead_error_line", fileName: "b.c", line: 2, msg: "dead" }));
  writer.handleDef(def);

  assert.deepEqual(JSON.parse(writer.flush()), {
    defects: [
      {
        checker: "DEADCODE",
        key_event_idx: 0,
        events: [{ file_name: "b.c", line: 2, event: "dead_error_line", message: "dead", verbosity_level: 0 }]
      }
    ]
  });
});

test("keeps the first scan properties and reports a different set", () => {
  const { logger, lines } = recordingLogger();
  const writer = new JsonWriter(logger);
  writer.notifyFile("first.json");

  assert.equal(writer.setScanProps({}).conflicts, 0);
  assert.equal(writer.setScanProps({ tool: "gcc" }).conflicts, 0);
  writer.notifyFile("second.json");
  assert.equal(writer.setScanProps({ tool: "gcc" }).conflicts, 0);
  writer.notifyFile("third.json");
  assert.equal(writer.setScanProps({ tool: "clang" }).conflicts, 1);

  assert.deepEqual(writer.getScanProps(), { tool: "gcc" });
  assert.deepEqual(lines, ["third.json: warning: conflicting scan properties ignored"]);
});

test("text writer has no place for scan properties", () => {
  const { logger, lines } = recordingLogger();
  const writer = createWriter(undefined, { logger });

  assert.equal(writer.setScanProps({}).conflicts, 0);
  assert.equal(writer.setScanProps({ tool: "gcc" }).conflicts, 1);
  assert.deepEqual(writer.getScanProps(), {});
  assert.deepEqual(lines, ["error: scan properties not supported by the output format"]);
});

test("handleFile reports an input it cannot open", async () => {
  const { logger, lines } = recordingLogger();
  const missing = path.join(tmpdir(), "defkit-missing-report.json");
  const writer = new TextWriter(logger);

  const status = await handleFile(writer, missing, { logger });

  assert.deepEqual(status.fatal, [{ fileName: missing, message: "failed to open input file" }]);
  assert.deepEqual(lines, [`${missing}: failed to open input file`]);
  assert.equal(writer.flush(), "");
});
