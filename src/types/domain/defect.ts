export const UNKNOWN_FILE = "<unknown>";
export const UNKNOWN_MESSAGE = "<unknown>";

export interface DefEvent {
  /** error, warning, note, or a checker-specific label such as "alloc_fn" */
  event: string;
  fileName: string;
  /** 0 when not available */
  line: number;
  /** 0 when not available */
  column: number;
  msg: string;
  /** 0 for key events, 1 for trace events */
  verbosityLevel: number;
}

export interface Defect {
  defClass: string;
  /** 0 when not reported */
  cwe: number;
  /** 1 when the checker marks the defect important */
  imp: number;
  keyEventIdx: number;
  function: string;
  language: string;
  tool: string;
  events: DefEvent[];
}

export type ScanProps = Record<string, string>;

export function createDefect(defClass = ""): Defect {
  return {
    defClass,
    cwe: 0,
    imp: 0,
    keyEventIdx: 0,
    function: "",
    language: "",
    tool: "",
    events: []
  };
}

export function createEvent(fields: Partial<DefEvent> = {}): DefEvent {
  return {
    event: "",
    fileName: UNKNOWN_FILE,
    line: 0,
    column: 0,
    msg: "",
    verbosityLevel: 0,
    ...fields
  };
}

export function isScanPropsEmpty(props: ScanProps): boolean {
  return Object.keys(props).length === 0;
}

export function sameScanProps(a: ScanProps, b: ScanProps): boolean {
  const keysA = Object.keys(a);
  if (keysA.length !== Object.keys(b).length) return false;
  return keysA.every((key) => b[key] === a[key]);
}
