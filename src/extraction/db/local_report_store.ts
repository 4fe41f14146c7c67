import { mkdir, writeFile } from "fs/promises";
import path from "path";
import { getLogger } from "../../util/logger";
import type { ReportFileStore } from "../types/contracts";
import type { StoredReportFile } from "../types/domain";

export interface LocalReportStoreOptions {
  dataRoot: string;
}

/**
 * Writes report CSVs to `<dataRoot>/<reportId>/<reportId>.csv`.
 * Existing files are overwritten.
 */
export class LocalReportStore implements ReportFileStore {
  private readonly dataRoot: string;
  private readonly logger = getLogger("extraction/local_report_store");

  constructor(options: LocalReportStoreOptions) {
    this.dataRoot = path.resolve(options.dataRoot);
  }

  resolvePath(reportId: string): string {
    return path.join(this.dataRoot, reportId, `${reportId}.csv`);
  }

  async write(reportId: string, csv: string): Promise<StoredReportFile> {
    const filePath = this.resolvePath(reportId);
    const dir = path.dirname(filePath);

    // mkdir returns the first directory it created, undefined when all existed
    const firstCreated = await mkdir(dir, { recursive: true });
    const createdDirectory = firstCreated !== undefined;
    if (createdDirectory) {
      this.logger.info(
        { reportId, dir: dir.split(path.sep).slice(-3).join("/") },
        "created report directory"
      );
    }

    await writeFile(filePath, csv, "utf8");
    this.logger.debug(
      { reportId, filePath, bytes: Buffer.byteLength(csv) },
      "report file written"
    );
    return { filePath, createdDirectory };
  }
}
