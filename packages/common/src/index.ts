export * from "./types";
export * from "./zod";
export * from "./payload";
export * from "./sse";
export * from "./dotenv";
