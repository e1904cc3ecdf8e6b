import type { PostProcessor } from "../postProcess.js";
import { CoverityTreeDecoder } from "./coverity.js";
import { GccTreeDecoder } from "./gcc.js";
import { NativeTreeDecoder } from "./native.js";
import { SarifTreeDecoder } from "./sarif.js";
import { ShellCheckTreeDecoder } from "./shellcheck.js";
import type { DecoderKind, TreeDecoder } from "./types.js";

export type { DecoderKind, TreeDecoder } from "./types.js";

export function createDecoder(kind: DecoderKind, postProc: PostProcessor): TreeDecoder {
  switch (kind) {
    case "native":
      return new NativeTreeDecoder();
    case "coverity":
      return new CoverityTreeDecoder();
    case "sarif":
      return new SarifTreeDecoder(postProc);
    case "shellcheck":
      return new ShellCheckTreeDecoder(postProc);
    case "gcc":
      return new GccTreeDecoder(postProc);
    default: {
      const unreachable: never = kind;
      throw new Error(`Unhandled decoder kind: ${String(unreachable)}`);
    }
  }
}
