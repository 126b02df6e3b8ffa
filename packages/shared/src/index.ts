export * from "./constants";
export * from "./schemas/creative";
export * from "./schemas/config";
export * from "./schemas/runs";
export * from "./schemas/manifest";
