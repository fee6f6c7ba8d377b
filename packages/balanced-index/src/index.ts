export * from "./lib/avl";
export * from "./lib/traverse";
export * from "./lib/record-format";
export * from "./lib/balanced-index";
export * from "./lib/persist";
export * from "./lib/verify";
export * from "./lib/visualize";
export * from "./lib/listing";
