export { Template, score, scoreDetailed, rulesEqual, type RuleScore, type ScoreBreakdown, type TemplateInit } from "./template.js";
export { evaluateWithExplanations, interpretScore, type RuleReport, type TemplateReport } from "./explain.js";
export {
  loadTemplate,
  templateFromDocument,
  templateToDocument,
  dumpTemplate,
  readTemplateFile,
  writeTemplateFile,
} from "./serializer.js";
