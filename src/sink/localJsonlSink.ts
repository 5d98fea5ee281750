import fs from "node:fs";
import path from "node:path";
import { AppConfig } from "../config";
import { DownloadRecord, ReportLink } from "../types";
import { Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly reportsPath: string;
  private readonly downloadsPath: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string) {
    const manifestsDir = path.resolve(config.outputDirs.manifests);
    fs.mkdirSync(manifestsDir, { recursive: true });
    this.reportsPath = path.join(manifestsDir, "reports.jsonl");
    this.downloadsPath = path.join(manifestsDir, "downloads.jsonl");
    this.runId = runId;
  }

  async publishReports(region: string, reports: ReportLink[]): Promise<void> {
    await this.appendLines(
      this.reportsPath,
      reports.map((report) => ({
        runId: this.runId,
        region,
        ...report,
      })),
    );
  }

  async publishDownloads(region: string, records: DownloadRecord[]): Promise<void> {
    await this.appendLines(
      this.downloadsPath,
      records.map((record) => ({
        runId: this.runId,
        region,
        ...record,
      })),
    );
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
