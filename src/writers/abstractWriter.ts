import { noopLogger, type Logger } from "../logging/logger.js";
import {
  isScanPropsEmpty,
  sameScanProps,
  type Defect,
  type ScanProps
} from "../types/domain/defect.js";
import { createStatus, type RunStatus } from "../types/domain/status.js";

export interface DefectWriter {
  notifyFile(fileName: string): void;
  handleDef(def: Defect): void;
  getScanProps(): ScanProps;
  /** Offers scan properties; the first non-empty set wins, a different later one is a conflict. */
  setScanProps(props: ScanProps): RunStatus;
  /** Renders everything handled so far. */
  flush(): string;
}

export abstract class AbstractWriter implements DefectWriter {
  protected readonly defects: Defect[] = [];
  protected readonly files: string[] = [];
  private scanProps: ScanProps = {};

  constructor(protected readonly logger: Logger = noopLogger) {}

  /** Whether the output format has a place for scan properties at all. */
  protected abstract readonly supportsScanProps: boolean;

  protected abstract render(): string;

  notifyFile(fileName: string): void {
    this.files.push(fileName);
    this.logger.debug("Reading defects", { fileName });
  }

  handleDef(def: Defect): void {
    this.defects.push(def);
  }

  getScanProps(): ScanProps {
    return this.scanProps;
  }

  setScanProps(props: ScanProps): RunStatus {
    if (isScanPropsEmpty(props)) return createStatus();

    if (!this.supportsScanProps) {
      this.logger.error("error: scan properties not supported by the output format");
      return createStatus({ conflicts: 1 });
    }

    if (isScanPropsEmpty(this.scanProps)) {
      this.scanProps = { ...props };
      return createStatus();
    }

    if (sameScanProps(this.scanProps, props)) return createStatus();

    const source = this.files[this.files.length - 1] ?? "<input>";
    this.logger.warn(`${source}: warning: conflicting scan properties ignored`, {
      kept: this.scanProps,
      ignored: props
    });
    return createStatus({ conflicts: 1 });
  }

  flush(): string {
    return this.render();
  }
}
