export type {
  FieldValue,
  MeasurementRecord,
  BenchmarkRun,
  Missing,
  MetricValue,
  InstanceIdentity,
  ComboIdentity,
} from './record.js'
export { MISSING, isMissing } from './record.js'

export type {
  Comparator,
  Aggregator,
  RecordPredicate,
  Criterion,
  ProfileConfig,
  ProfileConfigOptions,
} from './config.js'
