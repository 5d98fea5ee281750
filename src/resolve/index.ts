export * from "./candidates";
export * from "./searchFallback";
export * from "./siteResolver";
export * from "./verifier";
