import { LINK_SECTION_OFFSETS, LINK_SECTION_UNMATCHED } from "../config/defaults.js";
import { DefectQueue } from "../correlation/defectQueue.js";
import { createPathFilter } from "../correlation/pathFilter.js";
import { ReferenceParser, type ReferenceRow } from "../correlation/referenceParser.js";
import { openInStream, STDIN_NAME } from "../input/inStream.js";
import { noopLogger, type Logger } from "../logging/logger.js";
import { createParser } from "../parser/createParser.js";
import type { PostProcessor } from "../parser/postProcess.js";
import {
  docClose,
  docOpen,
  formatBareReference,
  formatLinkedDefect,
  formatUnreferencedDefect,
  initSection,
  type LinkBases
} from "../report/linkify.js";
import type { Defect } from "../types/domain/defect.js";
import { createStatus, hasFailure, mergeStatus, type RunStatus } from "../types/domain/status.js";

export interface RunLinkOptions extends LinkBases {
  /** report holding the full defect details */
  defectFile: string;
  /** `id,class,file` lines, one per defect known to the tracker */
  references: string;
  referencesName?: string;
  silent?: boolean;
  ignorePath?: boolean;
  postProcessor?: PostProcessor;
  logger?: Logger;
}

export interface LinkResult {
  html: string;
  status: RunStatus;
  matched: number;
  unmatched: ReferenceRow[];
  /** defects of the report that no reference asked for */
  offsets: Defect[];
  exitCode: 0 | 1;
}

/**
 * Pairs tracker references with the defects of a report and renders the pairs
 * as an XHTML page. Opening the report may throw InputFileOpenError; every
 * other problem ends up in the returned status.
 */
export async function runLink(options: RunLinkOptions): Promise<LinkResult> {
  const logger = options.logger ?? noopLogger;
  const bases: LinkBases = {
    defectUrlBase: options.defectUrlBase,
    checkerUrlBase: options.checkerUrlBase
  };

  const input = await openInStream(options.defectFile, { silent: options.silent, logger });
  const parser = createParser(input, { postProcessor: options.postProcessor, logger });
  const queue = new DefectQueue(createPathFilter({ ignorePath: options.ignorePath }));
  for (let def = parser.getNext(); def; def = parser.getNext()) {
    queue.insert(def);
  }
  logger.debug("Indexed report defects", { fileName: input.fileName, defects: queue.size });

  const refs = new ReferenceParser(options.references, logger, options.referencesName ?? STDIN_NAME);
  const parts = [docOpen()];
  const unmatched: ReferenceRow[] = [];
  let matched = 0;

  for (let row = refs.getNext(); row; row = refs.getNext()) {
    const def = queue.lookup(row.defClass, row.fileName);
    if (!def) {
      logger.warn(`${input.fileName}: warning: defect lookup failed, cid = ${row.id}`, { id: row.id });
      unmatched.push(row);
      continue;
    }
    parts.push(formatLinkedDefect(def, row.id, bases));
    matched += 1;
  }

  if (unmatched.length) {
    parts.push(initSection(LINK_SECTION_UNMATCHED));
    for (const row of unmatched) {
      parts.push(formatBareReference(row, bases));
    }
  }

  let lookupStatus = createStatus();
  const offsets = queue.drain();
  if (offsets.length) {
    logger.error(`${input.fileName}: error: offset detected`, { defects: offsets.length });
    lookupStatus = createStatus({ fatal: [{ fileName: input.fileName, message: "offset detected" }] });
    parts.push(initSection(LINK_SECTION_OFFSETS));
    for (const def of offsets) {
      parts.push(formatUnreferencedDefect(def, bases));
    }
  }

  parts.push(docClose());
  const status = mergeStatus(lookupStatus, refs.status(), parser.status());

  return {
    html: parts.join(""),
    status,
    matched,
    unmatched,
    offsets,
    exitCode: hasFailure(status) ? 1 : 0
  };
}
