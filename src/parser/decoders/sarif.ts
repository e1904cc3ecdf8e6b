import { createDefect, createEvent, UNKNOWN_FILE } from "../../types/domain/defect.js";
import type { Defect, DefEvent, ScanProps } from "../../types/domain/defect.js";
import { DefectDataError } from "../../errors/parser.errors.js";
import type { PostProcessor } from "../postProcess.js";
import {
  findArray,
  findChild,
  findObject,
  isPlainObject,
  NodeCursor,
  readInt,
  readString,
  type JsonObject
} from "../tree.js";
import { SHELLCHECK_DEFECT_CLASS } from "./shellcheck.js";
import type { TreeDecoder } from "./types.js";

export const SARIF_DEFAULT_CLASS = "UNKNOWN_SARIF_WARNING";

// CHECKER_NAME/key-event, as produced when defkit-native defects are exported
const RULE_ID_CHECKER = /^([A-Z][A-Z0-9_]*)\/(.+)$/;
const RULE_ID_SHELLCHECK = /^SC(\d+)$/;
const CWE_TAG = /^(?:external\/cwe\/)?cwe-(\d+)$/i;

type SarifEntry = {
  result: unknown;
  rules: readonly unknown[];
};

function findRule(entry: SarifEntry, ruleId: string): JsonObject | null {
  const index = readInt(entry.result, "ruleIndex", -1);
  const byIndex = index >= 0 ? entry.rules[index] : undefined;
  if (isPlainObject(byIndex)) return byIndex;
  for (const rule of entry.rules) {
    if (isPlainObject(rule) && rule.id === ruleId) return rule;
  }
  return null;
}

function readRuleCwe(rule: JsonObject | null): number {
  const props = findObject(rule, "properties");
  if (!props) return 0;

  const cwe = readInt(props, "cwe", 0);
  if (cwe) return cwe;

  for (const tag of findArray(props, "tags") ?? []) {
    if (typeof tag !== "string") continue;
    const match = tag.match(CWE_TAG);
    if (match) return Number.parseInt(match[1], 10);
  }
  return 0;
}

function readUri(artifactLocation: unknown): string {
  const uri = readString(artifactLocation, "uri", "");
  if (!uri) return UNKNOWN_FILE;
  if (!uri.startsWith("file://")) return uri;
  const filePath = uri.slice("file://".length);
  try {
    return decodeURIComponent(filePath);
  } catch (err) {
    if (err instanceof URIError) return filePath;
    throw err;
  }
}

function readLocation(evt: DefEvent, location: unknown): void {
  const physical = findObject(location, "physicalLocation");
  if (!physical) return;

  evt.fileName = readUri(findChild(physical, "artifactLocation"));
  const region = findObject(physical, "region");
  if (region) {
    evt.line = readInt(region, "startLine", 0);
    evt.column = readInt(region, "startColumn", 0);
  }
}

function readMessage(node: unknown): string {
  return readString(findChild(node, "message"), "text", "");
}

function readCodeFlowEvents(result: unknown): DefEvent[] {
  const events: DefEvent[] = [];
  for (const codeFlow of findArray(result, "codeFlows") ?? []) {
    for (const threadFlow of findArray(codeFlow, "threadFlows") ?? []) {
      for (const flowLocation of findArray(threadFlow, "locations") ?? []) {
        const location = findChild(flowLocation, "location");
        const evt = createEvent({ event: "note", msg: readMessage(location), verbosityLevel: 1 });
        readLocation(evt, location);
        events.push(evt);
      }
    }
  }
  return events;
}

/**
 * Decodes SARIF 2.1 logs. Results of every run are read, in run order; the
 * rule list of the run a result belongs to resolves its CWE.
 */
export class SarifTreeDecoder implements TreeDecoder {
  readonly kind = "sarif";
  private cursor = new NodeCursor<SarifEntry>();

  constructor(private readonly postProc: PostProcessor) {}

  readScanProps(root: unknown): ScanProps {
    const firstRun = findArray(root, "runs")?.[0];
    const driver = findObject(findObject(firstRun, "tool"), "driver");
    if (!driver) return {};

    const props: ScanProps = {};
    const name = readString(driver, "name", "");
    if (name) props.tool = name;
    const version = readString(driver, "semanticVersion", readString(driver, "version", ""));
    if (version) props["tool-version"] = version;
    const url = readString(driver, "informationUri", "");
    if (url) props["tool-url"] = url;
    return props;
  }

  readRoot(node: unknown): void {
    const entries: SarifEntry[] = [];
    for (const run of Array.isArray(node) ? node : []) {
      const rules = findArray(findObject(findObject(run, "tool"), "driver"), "rules") ?? [];
      for (const result of findArray(run, "results") ?? []) {
        entries.push({ result, rules });
      }
    }
    this.cursor = new NodeCursor(entries);
  }

  readNode(): Defect | null {
    const entry = this.cursor.next();
    if (entry === undefined) return null;

    const { result } = entry;
    if (!isPlainObject(result)) {
      throw new DefectDataError("result is not an object");
    }

    const def = createDefect(SARIF_DEFAULT_CLASS);
    const keyEvent = createEvent({ event: readString(result, "level", "") || "warning" });
    keyEvent.msg = readMessage(result);

    const ruleId = readString(result, "ruleId", "");
    const checker = ruleId.match(RULE_ID_CHECKER);
    const shellcheck = ruleId.match(RULE_ID_SHELLCHECK);
    if (checker) {
      def.defClass = checker[1];
      keyEvent.event = checker[2];
    } else if (shellcheck) {
      def.defClass = SHELLCHECK_DEFECT_CLASS;
      keyEvent.msg += ` [SC${shellcheck[1]}]`;
    } else if (ruleId) {
      keyEvent.msg += ` [${ruleId}]`;
    }

    const locations = findArray(result, "locations");
    if (locations?.length) {
      readLocation(keyEvent, locations[0]);
    }

    def.events.push(keyEvent, ...readCodeFlowEvents(result));
    def.cwe = readRuleCwe(findRule(entry, ruleId));

    this.postProc.apply(def);
    return def;
  }
}
