export * from "./broker";
