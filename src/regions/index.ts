export * from "./region";
export * from "./regionList";
