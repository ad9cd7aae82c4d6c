export { createLogger, childLogger } from "./logger";
export type { Logger } from "./logger";
export { createRunLogger, createMemoryRunLogger } from "./runLogger";
export type { RunEvent, RunLogger } from "./runLogger";
