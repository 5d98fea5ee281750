export * from "./attachments";
export * from "./explorer";
export * from "./htmlParser";
export * from "./matcher";
export * from "./paginator";
export * from "./reportFinder";
export * from "./sections";
export * from "./siteSearch";
