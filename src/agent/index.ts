export * from "./decision";
export * from "./normalizer";
export * from "./loop";
export * from "./openai-model";
export * from "./orchestrator";
