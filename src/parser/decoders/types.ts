import type { Defect, ScanProps } from "../../types/domain/defect.js";

export type DecoderKind = "native" | "coverity" | "sarif" | "shellcheck" | "gcc";

/**
 * Pulls normalized defects out of a parsed JSON document, one node at a time.
 *
 * `readRoot` is called once, with the node the format was detected on, before
 * the first `readNode`. `readNode` returns null once the nodes are exhausted
 * and throws `DefectDataError` for a node it cannot turn into a Defect; the
 * cursor has already moved past that node, so the next call continues.
 */
export interface TreeDecoder {
  readonly kind: DecoderKind;
  readScanProps(root: unknown): ScanProps;
  readRoot(node: unknown): void;
  readNode(): Defect | null;
}
