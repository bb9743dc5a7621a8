export * from "./vocab";
export * from "./types/journal";
export * from "./schemas";
export * from "./tradeLifecycle";
export * from "./tradeDraft";
export * from "./utils/tags";
export * from "./utils/emotions";
export { envSchema, validateEnv, type Env } from "./env";
