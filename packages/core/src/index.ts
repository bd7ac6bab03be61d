export type { CatalogSource } from "./contracts";
export type { ConsoleLoggerOptions, Logger, LoggerMode } from "./logger";
export { createConsoleLogger } from "./logger";
export type { PaginatorState } from "./state";
export {
  canAdvance,
  canRetreat,
  createPaginatorState,
  currentTopic,
  pageIndicator,
} from "./state";
export type { Topic, TopicId } from "./topic";
export { findDuplicateIds } from "./topic";
