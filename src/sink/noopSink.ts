import { Sink } from "./types";

export class NoopSink implements Sink {
  async publishReports(): Promise<void> {}

  async publishDownloads(): Promise<void> {}
}
