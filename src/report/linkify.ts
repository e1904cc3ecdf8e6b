import type { ReferenceRow } from "../correlation/referenceParser.js";
import type { Defect } from "../types/domain/defect.js";

const PRE_STYLE = "white-space: pre-wrap;";

export type LinkBases = {
  /** prefix of a defect page, the reference id is appended */
  defectUrlBase?: string;
  /** prefix of a checker documentation page, the checker class is appended */
  checkerUrlBase?: string;
};

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  '"': "&quot;",
  "'": "&apos;",
  "<": "&lt;",
  ">": "&gt;"
};

export function escapeHtml(text: string): string {
  return text.replace(/[&"'<>]/g, (ch) => ESCAPES[ch] ?? ch);
}

export function docOpen(): string {
  return [
    "<?xml version='1.0' encoding='utf-8'?>",
    "<!DOCTYPE html PUBLIC '-//W3C//DTD XHTML 1.1//EN' 'http://www.w3.org/TR/xhtml11/DTD/xhtml11.dtd'>",
    "<html xmlns='http://www.w3.org/1999/xhtml'>",
    "<head><title>A List of Defects</title></head>",
    "<body>",
    `<pre style='${PRE_STYLE}'>`,
    ""
  ].join("\n");
}

export function docClose(): string {
  return "</pre>\n</body>\n</html>\n";
}

export function initSection(name: string): string {
  return `</pre>\n<h1>${escapeHtml(name)}</h1>\n<pre style='${PRE_STYLE}'>\n`;
}

function headerLine(defClass: string, id: number | null, bases: LinkBases): string {
  const checker = escapeHtml(defClass);
  let line = `Error: <b>${checker}</b>`;
  if (id !== null && bases.defectUrlBase) {
    line += ` <a href='${escapeHtml(bases.defectUrlBase)}${id}'>[ Go to <b>Integrity Manager</b> (CID ${id}) ]</a>`;
  }
  if (bases.checkerUrlBase) {
    line += ` <a href='${escapeHtml(bases.checkerUrlBase)}${checker}'>[ Go to <b>Documentation</b> ]</a>`;
  }
  return line;
}

function eventLines(def: Defect): string[] {
  return def.events.map((evt) => {
    const column = evt.column > 0 ? `${evt.column}:` : "";
    return `${escapeHtml(evt.fileName)}:${evt.line}:${column} ${escapeHtml(evt.msg)}`;
  });
}

/** A defect matched to its reference id. */
export function formatLinkedDefect(def: Defect, id: number, bases: LinkBases): string {
  return [headerLine(def.defClass, id, bases), ...eventLines(def), "", ""].join("\n");
}

/** A reference nothing in the report matched; only the reference itself is known. */
export function formatBareReference(row: ReferenceRow, bases: LinkBases): string {
  const lines = [headerLine(row.defClass, row.id, bases)];
  if (row.fileName) {
    lines.push(`${escapeHtml(row.fileName)}: [ <i>Sorry, no more details available...</i> ]`);
  }
  return [...lines, "", ""].join("\n");
}

/** A defect from the report that no reference asked for. */
export function formatUnreferencedDefect(def: Defect, bases: LinkBases): string {
  return [headerLine(def.defClass, null, bases), ...eventLines(def), "", ""].join("\n");
}
