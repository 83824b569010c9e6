export * from "./ingestion";
export * from "./termExtractor";
