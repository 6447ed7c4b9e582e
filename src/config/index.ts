export * from "./schema";
export * from "./loader";
