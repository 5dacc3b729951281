import { describe, it, expect, vi } from 'vitest'
import {
  buildProfile,
  createSilentLogger,
  defineCriterion,
  fieldCriterion,
  isNoData,
  MISSING,
  PerformanceProfile,
  ProfileConfigBuilder,
} from '../../../src/index.js'
import type {
  BenchmarkRun,
  MeasurementRecord,
  NoData,
  ProfileConfig,
} from '../../../src/index.js'
import {
  createRun,
  crossedRuns,
  mixedRuns,
  timedRun,
} from '../../fixtures/benchmark-runs.js'

const cpuTime = fieldCriterion({ name: 'CPU time', path: 'benchmark.time' })

function cpuConfig(): ProfileConfig<BenchmarkRun> {
  return new ProfileConfigBuilder<BenchmarkRun>()
    .groupBy('problem', 'grid_size')
    .compareBy('model', 'solver')
    .criterion(cpuTime)
    .build()
}

function recordConfig(): ProfileConfig {
  return new ProfileConfigBuilder()
    .groupBy('problem', 'grid_size')
    .compareBy('model', 'solver')
    .criterion(cpuTime)
    .build()
}

const silent = { logger: createSilentLogger() }

function expectProfile<R extends MeasurementRecord>(
  result: PerformanceProfile<R> | NoData
): PerformanceProfile<R> {
  if (isNoData(result)) {
    throw new Error(`expected a profile, got no data (${result.reason})`)
  }
  return result
}

function expectNoData<R extends MeasurementRecord>(
  result: PerformanceProfile<R> | NoData
): NoData {
  if (!isNoData(result)) {
    throw new Error('expected no data, got a profile')
  }
  return result
}

describe('buildProfile', () => {
  describe('ratios', () => {
    it('gives each combo ratio 1 where it wins and 2 where it is twice as slow', () => {
      const profile = expectProfile(buildProfile(crossedRuns(), cpuConfig(), silent))

      expect(profile.totalInstances).toBe(2)
      expect(profile.ratiosFor(['JuMP', 'ipopt'])).toEqual([1, 2])
      expect(profile.ratiosFor(['ADNLP', 'ipopt'])).toEqual([1, 2])
      expect(profile.winCount(['JuMP', 'ipopt'])).toBe(1)
      expect(profile.winCount(['ADNLP', 'ipopt'])).toBe(1)
    })

    it('divides every comparable value by the best value of its instance', () => {
      const profile = expectProfile(buildProfile(mixedRuns(), cpuConfig(), silent))

      expect(profile.ratiosFor(['JuMP', 'ipopt'])).toEqual([1, 2, 5])
      expect(profile.ratiosFor(['ADNLP', 'ipopt'])).toEqual([1, 2, 50])
      expect(profile.ratiosFor(['ADNLP', 'madnlp'])).toEqual([1, 4])
      expect(profile.ratioBounds).toEqual({ min: 1, max: 50 })
    })

    it('keeps every ratio at or above 1 with a winner on each instance', () => {
      const profile = expectProfile(buildProfile(mixedRuns(), cpuConfig(), silent))

      for (const combo of profile.combos) {
        for (const ratio of profile.ratiosFor(combo)) {
          expect(ratio).toBeGreaterThanOrEqual(1)
        }
      }
      for (const instance of profile.instances) {
        expect(profile.winnersOf(instance).length).toBeGreaterThan(0)
      }
    })

    it('gives every tied combo ratio 1', () => {
      const runs = [
        timedRun('beam', 'JuMP', 'ipopt', 3),
        timedRun('beam', 'ADNLP', 'ipopt', 3),
        timedRun('beam', 'ADNLP', 'madnlp', 6),
      ]
      const profile = expectProfile(buildProfile(runs, cpuConfig(), silent))

      expect(profile.winnersOf(['beam', 100]).map((c) => c.label)).toEqual([
        '(JuMP, ipopt)',
        '(ADNLP, ipopt)',
      ])
      expect(profile.ratioOf(['beam', 100], ['ADNLP', 'madnlp'])).toBe(2)
    })

    it('divides the best value by the others when higher is better', () => {
      const throughput = fieldCriterion({
        name: 'Throughput',
        path: 'throughput',
        direction: 'higher',
      })
      const config = new ProfileConfigBuilder<BenchmarkRun>()
        .groupBy('problem', 'grid_size')
        .compareBy('model', 'solver')
        .criterion(throughput)
        .build()
      const runs = [
        createRun({ model: 'JuMP', throughput: 10 }),
        createRun({ model: 'ADNLP', throughput: 5 }),
      ]
      const profile = expectProfile(buildProfile(runs, config, silent))

      expect(profile.bestValueOf(['beam', 100])).toBe(10)
      expect(profile.ratioOf(['beam', 100], ['JuMP', 'ipopt'])).toBe(1)
      expect(profile.ratioOf(['beam', 100], ['ADNLP', 'ipopt'])).toBe(2)
    })
  })

  describe('aggregation', () => {
    const runs = [
      timedRun('beam', 'JuMP', 'ipopt', 1),
      timedRun('beam', 'JuMP', 'ipopt', 3),
      timedRun('beam', 'ADNLP', 'ipopt', 4),
    ]

    it('averages repeated runs by default', () => {
      const profile = expectProfile(buildProfile(runs, cpuConfig(), silent))

      expect(profile.bestValueOf(['beam', 100])).toBe(2)
      expect(profile.ratioOf(['beam', 100], ['ADNLP', 'ipopt'])).toBe(2)
    })

    it('uses the configured aggregator', () => {
      const config = new ProfileConfigBuilder<BenchmarkRun>()
        .groupBy('problem', 'grid_size')
        .compareBy('model', 'solver')
        .criterion(cpuTime)
        .aggregate('min')
        .build()
      const profile = expectProfile(buildProfile(runs, config, silent))

      expect(profile.bestValueOf(['beam', 100])).toBe(1)
      expect(profile.ratioOf(['beam', 100], ['ADNLP', 'ipopt'])).toBe(4)
    })

    it('ignores failed repetitions when aggregating', () => {
      const withFailure = [...runs, timedRun('beam', 'ADNLP', 'ipopt', 100, { success: false })]
      const profile = expectProfile(buildProfile(withFailure, cpuConfig(), silent))

      expect(profile.ratioOf(['beam', 100], ['ADNLP', 'ipopt'])).toBe(2)
    })
  })

  describe('censoring', () => {
    it('excludes a failed combo from the ratios but keeps the denominator', () => {
      const runs = [
        timedRun('beam', 'JuMP', 'ipopt', 5),
        timedRun('beam', 'ADNLP', 'ipopt', 1, { success: false }),
      ]
      const profile = expectProfile(buildProfile(runs, cpuConfig(), silent))

      expect(profile.ratiosFor(['JuMP', 'ipopt'])).toEqual([1])
      expect(profile.ratiosFor(['ADNLP', 'ipopt'])).toEqual([])
      expect(profile.totalInstances).toBe(1)
      for (const tau of [1, 2, 100, Infinity]) {
        expect(profile.fractionWithin(['ADNLP', 'ipopt'], tau)).toBe(0)
      }
    })

    it('drops instances on which no combo has a comparable value', () => {
      const profile = expectProfile(buildProfile(mixedRuns(), cpuConfig(), silent))

      expect(profile.attemptedInstanceCount).toBe(4)
      expect(profile.totalInstances).toBe(3)
      expect(profile.censoredInstances.map((i) => i.label)).toEqual(['(rocket, 100)'])
      expect(profile.outcomeOf(['rocket', 100])).toBeUndefined()
    })

    it('treats missing, zero and non-finite values as censored', () => {
      const runs = [
        timedRun('beam', 'JuMP', 'ipopt', 2),
        createRun({ model: 'ADNLP', benchmark: null }),
        timedRun('beam', 'ExaModels', 'ipopt', 0),
        timedRun('beam', 'Other', 'ipopt', Infinity),
      ]
      const config = new ProfileConfigBuilder<BenchmarkRun>()
        .groupBy('problem', 'grid_size')
        .compareBy('model', 'solver')
        .criterion(cpuTime)
        .include((run) => run.success)
        .build()
      const profile = expectProfile(buildProfile(runs, config, silent))

      expect(profile.comparablePairCount).toBe(1)
      expect(profile.combos).toHaveLength(4)
      expect(profile.solvedCount(['ADNLP', 'ipopt'])).toBe(0)
      expect(profile.solvedCount(['ExaModels', 'ipopt'])).toBe(0)
      expect(profile.solvedCount(['Other', 'ipopt'])).toBe(0)
    })
  })

  describe('record handling', () => {
    it('drops records missing a group or combo key', () => {
      const runs: BenchmarkRun[] = [
        ...crossedRuns(),
        { ...timedRun('beam', 'Broken', 'ipopt', 0.1), grid_size: Number.NaN },
      ]
      const profile = expectProfile(buildProfile(runs, cpuConfig(), silent))

      expect(profile.combos.map((c) => c.label)).toEqual([
        '(JuMP, ipopt)',
        '(ADNLP, ipopt)',
      ])
      expect(profile.ratiosFor(['JuMP', 'ipopt'])).toEqual([1, 2])
    })

    it('distinguishes numeric and string key values', () => {
      const runs: MeasurementRecord[] = [
        createRun({ model: 'JuMP', benchmark: { time: 1 } }),
        { ...createRun({ model: 'ADNLP', benchmark: { time: 2 } }), grid_size: '100' },
      ]
      const profile = expectProfile(buildProfile(runs, recordConfig(), silent))

      expect(profile.totalInstances).toBe(2)
      expect(profile.instances.map((i) => i.key)).toEqual(['["beam",100]', '["beam","100"]'])
    })

    it('orders combos and instances by first appearance', () => {
      const profile = expectProfile(buildProfile(mixedRuns(), cpuConfig(), silent))

      expect(profile.combos.map((c) => c.label)).toEqual([
        '(JuMP, ipopt)',
        '(ADNLP, ipopt)',
        '(ADNLP, madnlp)',
      ])
      expect(profile.instances.map((i) => i.label)).toEqual([
        '(beam, 100)',
        '(glider, 100)',
        '(robot, 100)',
      ])
    })

    it('applies the row filter together with the inclusion predicate', () => {
      const config = new ProfileConfigBuilder<BenchmarkRun>()
        .groupBy('problem', 'grid_size')
        .compareBy('model', 'solver')
        .criterion(cpuTime)
        .filter((run) => run.problem !== 'robot')
        .build()
      const profile = expectProfile(buildProfile(mixedRuns(), config, silent))

      expect(profile.instances.map((i) => i.label)).toEqual(['(beam, 100)', '(glider, 100)'])
      expect(profile.ratiosFor(['ADNLP', 'madnlp'])).toEqual([4])
    })

    it('does not mutate the records', () => {
      const runs = mixedRuns()
      const before = JSON.stringify(runs)

      buildProfile(runs, cpuConfig(), silent)

      expect(JSON.stringify(runs)).toBe(before)
    })

    it('returns identical profiles for identical inputs', () => {
      const first = expectProfile(buildProfile(mixedRuns(), cpuConfig(), silent))
      const second = expectProfile(buildProfile(mixedRuns(), cpuConfig(), silent))

      for (const combo of first.combos) {
        expect(second.ratiosFor(combo)).toEqual(first.ratiosFor(combo))
        expect(second.curve(combo)).toEqual(first.curve(combo))
      }
      expect(second.instances).toEqual(first.instances)
    })
  })

  describe('allowedCombos', () => {
    it('restricts the profile to the allowed combos', () => {
      const profile = expectProfile(
        buildProfile(mixedRuns(), cpuConfig(), {
          ...silent,
          allowedCombos: [
            ['JuMP', 'ipopt'],
            ['ADNLP', 'madnlp'],
          ],
        })
      )

      expect(profile.combos.map((c) => c.label)).toEqual(['(JuMP, ipopt)', '(ADNLP, madnlp)'])
      expect(profile.ratiosFor(['JuMP', 'ipopt'])).toEqual([1, 1, 5])
      expect(profile.ratiosFor(['ADNLP', 'madnlp'])).toEqual([1, 4])
      expect(profile.hasCombo(['ADNLP', 'ipopt'])).toBe(false)
    })

    it('returns no data when no allowed combo appears in the data', () => {
      const result = expectNoData(
        buildProfile(crossedRuns(), cpuConfig(), {
          ...silent,
          allowedCombos: [['Missing', 'solver']],
        })
      )

      expect(result.reason).toBe('no-allowed-combos')
    })

    it('allows nothing when the allowed set is empty', () => {
      const result = expectNoData(
        buildProfile(crossedRuns(), cpuConfig(), { ...silent, allowedCombos: [] })
      )

      expect(result.reason).toBe('no-allowed-combos')
    })
  })

  describe('no data', () => {
    it('returns no data for empty input', () => {
      const result = expectNoData(
        buildProfile([], cpuConfig(), { ...silent, benchmarkId: 'core-ubuntu' })
      )

      expect(result).toEqual({
        kind: 'no-data',
        reason: 'empty-input',
        benchmarkId: 'core-ubuntu',
      })
    })

    it('returns no data when every record is malformed', () => {
      const runs: MeasurementRecord[] = [{ problem: 'beam' }, { model: 'JuMP', solver: 'ipopt' }]
      const result = expectNoData(buildProfile(runs, recordConfig(), silent))

      expect(result.reason).toBe('no-well-formed-records')
    })

    it('returns no data when every run failed', () => {
      const runs: BenchmarkRun[] = crossedRuns().map((run) => ({ ...run, success: false }))
      const result = expectNoData(buildProfile(runs, cpuConfig(), silent))

      expect(result.reason).toBe('no-included-records')
    })

    it('returns no data when included runs have no comparable value', () => {
      const missing = defineCriterion<BenchmarkRun>('Objective', () => MISSING)
      const config = new ProfileConfigBuilder<BenchmarkRun>()
        .groupBy('problem', 'grid_size')
        .compareBy('model', 'solver')
        .criterion(missing)
        .include(() => true)
        .build()
      const result = expectNoData(buildProfile(crossedRuns(), config, silent))

      expect(result.reason).toBe('no-comparable-values')
    })
  })

  describe('logging', () => {
    it('reports no data at info through the given logger', () => {
      const info = vi.fn()
      const logger = { ...createSilentLogger(), info }

      buildProfile([], cpuConfig(), { logger, benchmarkId: 'core-ubuntu' })

      expect(info).toHaveBeenCalledTimes(1)
      expect(info).toHaveBeenCalledWith(
        '[profile-builder] No usable data for performance profile',
        { benchmarkId: 'core-ubuntu', reason: 'empty-input', records: 0 }
      )
    })

    it('reports the build counts at debug', () => {
      const debug = vi.fn()
      const info = vi.fn()

      buildProfile(mixedRuns(), cpuConfig(), {
        logger: { ...createSilentLogger(), debug, info },
        benchmarkId: 'core-ubuntu',
      })

      expect(info).not.toHaveBeenCalled()
      expect(debug).toHaveBeenCalledWith('[profile-builder] Built performance profile', {
        benchmarkId: 'core-ubuntu',
        records: 11,
        wellFormed: 11,
        included: 8,
        instances: 3,
        censored: 1,
        combos: 3,
      })
    })

    it('writes nothing to the console without a logger', () => {
      const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
      const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})

      buildProfile([], cpuConfig())
      buildProfile(mixedRuns(), cpuConfig())

      expect(logSpy).not.toHaveBeenCalled()
      expect(warnSpy).not.toHaveBeenCalled()
      logSpy.mockRestore()
      warnSpy.mockRestore()
    })
  })
})
