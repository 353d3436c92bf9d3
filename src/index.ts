export type {
  FilterType,
  Comparator,
  BoolComparator,
  NumericalComparator,
  LiteralComparator,
  LiteralListComparator,
  ModificationComparator,
  ComparatorsByType,
  Modification,
  ScopeId,
  ScalarValue,
  FilterValue,
  TargetValue,
  FilterDescriptor,
} from "./spi/types.js";
export { COMPARATORS_BY_TYPE, ALL_COMPARATORS } from "./spi/types.js";
export {
  boolValue,
  numberValue,
  stringValue,
  collectionOf,
  stringList,
  modificationList,
  scopedValue,
  refineByScope,
} from "./spi/values.js";
export {
  EngineConfiguration,
  loadEngineConfig,
  DEFAULT_MASS_TOLERANCE,
} from "./spi/configuration.js";
export type { Configuration, ValidationMode } from "./spi/configuration.js";

export { Filter } from "./core/Filter.js";
export { createFilter, isComparator } from "./core/FilterFactory.js";
export type { FilterOptions } from "./core/FilterFactory.js";
export { evaluate, evaluateDetailed, satisfiesFilter } from "./core/Evaluator.js";
export type { FilterOutcome, EvaluationErrorReason } from "./core/Evaluator.js";
export { satisfiesFilterList, filterRecords, explainFilterList } from "./core/FilterList.js";
export type { FilterVerdict } from "./core/FilterList.js";
export { DescriptorRegistry } from "./core/DescriptorRegistry.js";
export { FilterConfigurationError, UnknownDescriptorError, FilterSpecSyntaxError } from "./core/errors.js";

export type { FilterSpec } from "./filter/spec.js";
export { spec, not, formatFilterSpec } from "./filter/spec.js";
export { parseFilterText, parseFilterSpec, parseFilterList } from "./filter/parse.js";
export { buildFilter, buildFilterList, buildOptionsFrom, configureFromEnv } from "./filter/build.js";
export type { BuildOptions } from "./filter/build.js";

export type { PsmRecord, PeptideRecord, ProteinRecord, ReportRecord, RecordKind } from "./domain/records.js";
export { isReportRecord } from "./domain/records.js";
export { BUILTIN_DESCRIPTORS, createDefaultRegistry, defineDescriptor } from "./domain/descriptors.js";

export { getLog, configureLogging } from "./utils/logger.js";
export type { LoggerConfig, LogLevel, LogOptions } from "./utils/logger.js";
