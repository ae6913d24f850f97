export * from "./analysis/index.js";
export * from "./atoms/index.js";
export * from "./config/index.js";
export * from "./ingest/index.js";
export * from "./issues/index.js";
export * from "./lint/index.js";
export * from "./parser/index.js";
export * from "./report/index.js";
