export * from "./lib/storage";
export * from "./lib/file-storage";
export * from "./lib/storage-prefix-wrapper";
export * from "./lib/storage-factory";
export * from "./tests/mock-storage";
