export {
  parseKV,
  positionals,
  requireArg,
  intArg,
  floatArg,
  strArg,
  boolArg,
  choiceArg,
  loadConfig,
} from "./parse.js";
export { loadEnvFile } from "./env.js";
export { formatBreakdown, formatReport } from "./commands/score.js";
export { formatRunRow, formatRunDetail } from "./commands/runs.js";
export { sampleAndScore, formatSample, type SampleResult } from "./commands/sample.js";
export { starterTemplate } from "./commands/create-template.js";
