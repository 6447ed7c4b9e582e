export * from "./types";
export * from "./embedder";
export * from "./vector-store";
export * from "./embedding-index";
export * from "./retriever";
