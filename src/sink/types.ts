import { DownloadRecord, ReportLink } from "../types";

export interface Sink {
  publishReports(region: string, reports: ReportLink[]): Promise<void>;
  publishDownloads(region: string, records: DownloadRecord[]): Promise<void>;
}
