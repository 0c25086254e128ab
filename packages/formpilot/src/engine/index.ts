/**
 * Engine module: extraction, matching, coercion, execution and reporting.
 */

export * from './types';
export * from './errors';
export { FieldExtractor, extractFields, buildDescriptors, classifyElement, cleanLabel, type ExtractOptions } from './FieldExtractor';
export { FieldMatcher, buildFillPlan, isKindCompatible, type BuildPlanOptions } from './FieldMatcher';
export { coerceValue, describeCoercedValue, type CoercionConfig } from './ValueCoercer';
export { parseProfileDate, formatDate, inferDateFormat, type DateParts } from './dates';
export { normalizeText, normalizeOptionText, tokenize, similarity, scoreOption, degreeLevel, AliasScorer } from './textMatch';
export {
  VerificationEngine,
  matchesReadback,
  normalizeForComparison,
  type VerificationResult,
} from './VerificationEngine';
export {
  FillExecutor,
  executeFillPlan,
  withPageLock,
  isPageLocked,
  classifyFailure,
  toInstruction,
  type ExecuteOptions,
} from './FillExecutor';
export { buildRunReport, formatRunReport, type RunReport, type FieldReportLine } from './RunReport';
export {
  FormFillEngine,
  type FormFillEvents,
  type RunOptions,
  type PlanOptions,
  type PlanResult,
  type FormQuestion,
} from './FormFillEngine';
