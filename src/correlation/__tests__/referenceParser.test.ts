import assert from "node:assert/strict";
import { test } from "node:test";
import type { Logger } from "../../logging/logger.js";
import { ReferenceParser, type ReferenceRow } from "../referenceParser.js";

function readAll(text: string): { rows: ReferenceRow[]; errors: string[]; parser: ReferenceParser } {
  const errors: string[] = [];
  const logger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: (message) => errors.push(message)
  };
  const parser = new ReferenceParser(text, logger);
  const rows: ReferenceRow[] = [];
  for (let row = parser.getNext(); row; row = parser.getNext()) {
    rows.push(row);
  }
  return { rows, errors, parser };
}

test("skips a line without enough fields and keeps reading", () => {
  const { rows, errors, parser } = readAll("1,CHECKER,a.c\nbad line\n2,CHECKER,b.c\n");

  assert.deepEqual(rows, [
    { id: 1, defClass: "CHECKER", fileName: "a.c" },
    { id: 2, defClass: "CHECKER", fileName: "b.c" }
  ]);
  assert.deepEqual(errors, ["-:2: error: not enough ',' at the line"]);
  assert.equal(parser.hasError(), true);
  assert.equal(parser.status().recovered, 1);
});

test("rejects an id that is not an integer", () => {
  const { rows, errors } = readAll("abc,CHECKER,a.c\n10x,CHECKER,a.c\n+7,CHECKER,a.c,extra\n");

  assert.deepEqual(rows, [{ id: 7, defClass: "CHECKER", fileName: "a.c" }]);
  assert.deepEqual(errors, [
    "-:1: error: failed to parse CID",
    "-:2: error: failed to parse CID"
  ]);
});

test("reads CRLF input and a missing final newline", () => {
  const { rows, parser } = readAll("5,UNINIT,src/f.c\r\n6,UNINIT,src/g.c");

  assert.deepEqual(rows, [
    { id: 5, defClass: "UNINIT", fileName: "src/f.c" },
    { id: 6, defClass: "UNINIT", fileName: "src/g.c" }
  ]);
  assert.equal(parser.hasError(), false);
});

test("empty input has no rows and no error", () => {
  const { rows, parser } = readAll("");
  assert.deepEqual(rows, []);
  assert.equal(parser.hasError(), false);
});
