export {
  AGGREGATOR_NAMES,
  isAggregatorName,
  getAggregator,
  meanAggregator,
  logGeometricMean,
} from './aggregators.js'
export type { AggregatorName } from './aggregators.js'
