/**
 * Performance profile construction and queries
 * @module profile
 */

export { buildProfile } from './profile-builder.js'
export type { BuildProfileOptions } from './profile-builder.js'

export { PerformanceProfile } from './performance-profile.js'
export type {
  ComboRef,
  InstanceRef,
  InstanceOutcome,
  CurvePoint,
  RatioBounds,
} from './performance-profile.js'

export { noData, isNoData } from './no-data.js'
export type { NoData, NoDataReason } from './no-data.js'

export { describeIdentity, identityKey, identityLabel } from './identity.js'
export type { IdentityInfo, ComboInfo, InstanceInfo } from './identity.js'
