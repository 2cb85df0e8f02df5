export {
  BaseService,
  RngLive,
  RngFrom,
  BaseFrom,
  BasePreset,
  BaseFromSpec,
  BaseScrambled,
} from "./layers.js";

export {
  prettyLogger,
  loggerLayer,
  withSpan,
  parseLogLevel,
  isLogLevelName,
  LOG_LEVELS,
  type LogLevelName,
} from "./logging.js";
