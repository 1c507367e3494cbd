export * from "./config";
export * from "./product";
