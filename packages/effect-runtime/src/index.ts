export {
  CheckpointFrom,
  LedgerFrom,
} from "./layers.js";

export {
  prettyLogger,
  PrettyLoggerLive,
  withSpan,
  parseLogLevel,
  runLogged,
} from "./logging.js";
