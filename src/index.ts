// Profile construction
export {
  buildProfile,
  PerformanceProfile,
  noData,
  isNoData,
  describeIdentity,
  identityKey,
  identityLabel,
} from './profile/index.js'
export type {
  BuildProfileOptions,
  ComboRef,
  InstanceRef,
  InstanceOutcome,
  CurvePoint,
  RatioBounds,
  NoData,
  NoDataReason,
  IdentityInfo,
  ComboInfo,
  InstanceInfo,
} from './profile/index.js'

// Types
export type {
  FieldValue,
  MeasurementRecord,
  BenchmarkRun,
  Missing,
  MetricValue,
  InstanceIdentity,
  ComboIdentity,
  Comparator,
  Aggregator,
  RecordPredicate,
  Criterion,
  ProfileConfig,
  ProfileConfigOptions,
} from './types/index.js'
export { MISSING, isMissing } from './types/index.js'

// Criteria
export {
  CRITERION_DIRECTIONS,
  lowerIsBetter,
  higherIsBetter,
  comparatorFor,
  defineCriterion,
  fieldCriterion,
  readNumericField,
} from './criterion/index.js'
export type { CriterionDirection, FieldCriterionOptions } from './criterion/index.js'

// Aggregators
export {
  AGGREGATOR_NAMES,
  getAggregator,
  isAggregatorName,
  meanAggregator,
  logGeometricMean,
} from './aggregation/index.js'
export type { AggregatorName } from './aggregation/index.js'

// Configuration
export {
  createProfileConfig,
  successfulRunWith,
  validateProfileKeys,
  ProfileDefinitionSchema,
  ProfileDefinitionFileSchema,
  configFromDefinition,
  parseProfileDefinition,
  parseProfileDefinitionFile,
  loadDefaultProfileDefinitions,
} from './config/index.js'
export type { ProfileDefinition, ProfileDefinitionInput } from './config/index.js'
export { ProfileConfigBuilder } from './builder/profile-config-builder.js'

// Registry
export {
  ProfileRegistry,
  DEFAULT_CPU_PROFILE,
  DEFAULT_ITERATIONS_PROFILE,
  bootstrapDefaultProfiles,
  createDefaultRegistry,
  getDefaultProfileConfigs,
  analyzeFromRegistry,
  parseComboSpecs,
  profileFromRegistry,
} from './registry/index.js'
export type { RegistryAnalysisOptions } from './registry/index.js'

// Analysis
export {
  analyzeProfile,
  computeProfileStats,
  formatAnalysisMarkdown,
  renderNoDataNotice,
  DEFAULT_ANALYSIS_OPTIONS,
} from './analysis/index.js'
export type {
  AnalysisOptions,
  ComboPerformance,
  ProfileAnalysis,
  ProfileStats,
} from './analysis/index.js'

// Errors
export {
  ProfileEngineError,
  NotFoundError,
  DuplicateNameError,
  InvalidParameterError,
  ConfigurationError,
  BuilderSequenceError,
  isProfileEngineError,
} from './utils/errors.js'

// Logging
export {
  LOG_LEVELS,
  createConsoleLogger,
  defaultLogger,
  createSilentLogger,
  createPrefixedLogger,
} from './utils/logger.js'
export type { Logger, LogLevel } from './utils/logger.js'
