export { FunctionTest, createFunctionTest } from './function-test';
export { describeFault, isStructuredFault } from './fault';
export type { StructuredFault } from './fault';
export {
  formatFailure,
  formatFailureDetail,
  formatFault,
  formatLabel,
  formatPass
} from './report';
export type { LabelOptions } from './report';
export {
  DEFAULT_FILL_CHAR,
  DEFAULT_OUTPUT_LINE_LENGTH,
  FunctionTestOptionsSchema
} from './options';
export {
  UNSPECIFIED_STRINGIFIER_MARKER,
  listStringifier,
  placeholderStringifier,
  primitiveStringifier,
  sameValueEquality,
  shallowArrayEquality,
  strictEquality,
  structuralEquality,
  valueStringifier
} from './strategies';
export { findMismatches, hasMismatch } from './differ';
export type { Mismatch, MismatchOptions } from './differ';
export type {
  Clock,
  Comparator,
  ConfigurationMode,
  FaultDescription,
  FunctionTestOptions,
  OutputSink,
  Stringifier,
  TestedFunction,
  TestOutcome,
  Verdict
} from './types';
