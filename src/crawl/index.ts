export * from "./articleUrl";
export * from "./htmlParser";
export * from "./pageFetcher";
export * from "./pageResolver";
