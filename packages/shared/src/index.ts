export * from "./contracts";
export * from "./api";
export * from "./validation";
