export * from "./downloader";
export * from "./naming";
