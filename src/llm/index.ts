export * from "./anthropicProvider";
export * from "./factory";
export * from "./openaiProvider";
export * from "./prompts";
export * from "./schemas";
export * from "./structured";
export * from "./types";
