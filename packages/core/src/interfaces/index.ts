export type {
  DestinationOwnership,
  DestinationProvider,
  DestinationRenderContext,
  DestinationRenderResult,
} from "./destination-provider";
export type { LogMetadata, Logger, LoggerConfig } from "./logger";
export {
  ConsoleLogger,
  createDefaultLogger,
  resolveLogLevel,
  StructuredLogger,
} from "./logger";
