import { describe, expect, it } from 'vitest'

import { Severity } from '../../types/severity.enum'
import { record, result } from '../../__tests__/fixtures'
import { confidenceStats, sessionStats, summarize, trendSeries } from '../analytics-engine'

describe('summarize', () => {
  it('reports no data for an empty sequence', () => {
    const summary = summarize([])

    expect(summary).toEqual({
      count: 0,
      confidence: null,
      severityCounts: { High: 0, Medium: 0, Low: 0 },
      classCounts: {},
      trend: null,
      status: 'Safe',
    })
  })

  it('keeps a zero-confidence detection apart from no detections', () => {
    const summary = summarize([record(0, Severity.LOW)])

    expect(summary.count).toBe(1)
    expect(summary.confidence).toEqual({ mean: 0, median: 0, min: 0, max: 0, std: 0 })
    expect(summary.severityCounts).toEqual({ High: 0, Medium: 0, Low: 1 })
    expect(summary.status).toBe('Critical')
  })

  it('tallies severities and classes from the records as given', () => {
    const summary = summarize([
      record(0.9, Severity.HIGH, 'crack'),
      // severity is not recomputed from confidence
      record(0.9, Severity.LOW, 'spalling'),
      record(0.6, Severity.MEDIUM, 'crack'),
    ])

    expect(summary.severityCounts).toEqual({ High: 1, Medium: 1, Low: 1 })
    expect(summary.classCounts).toEqual({ crack: 2, spalling: 1 })
    expect(summary.confidence?.max).toBe(0.9)
    expect(summary.confidence?.min).toBe(0.6)
    expect(summary.confidence?.median).toBe(0.9)
  })

  it('computes the trend against a prior result', () => {
    const prior = result([record(0.5, Severity.MEDIUM), record(0.6, Severity.MEDIUM), record(0.7, Severity.MEDIUM)])
    const summary = summarize([record(0.9, Severity.HIGH), record(0.6, Severity.MEDIUM)], prior)

    expect(summary.trend?.countDelta).toBe(-1)
    expect(summary.trend?.meanConfidenceDelta).toBeCloseTo(0.15, 10)
  })

  it('has no mean delta when either run is empty', () => {
    const fromEmpty = summarize([record(0.8, Severity.HIGH), record(0.8, Severity.HIGH)], result([]))
    expect(fromEmpty.trend).toEqual({ countDelta: 2, meanConfidenceDelta: null })

    const toEmpty = summarize([], result([record(0.8, Severity.HIGH)]))
    expect(toEmpty.trend).toEqual({ countDelta: -1, meanConfidenceDelta: null })
  })

  it('does not depend on anything but its arguments', () => {
    const records = [record(0.9, Severity.HIGH), record(0.3, Severity.LOW)]
    expect(summarize(records)).toEqual(summarize([...records]))
  })
})

describe('confidenceStats', () => {
  it('returns null for no values', () => {
    expect(confidenceStats([])).toBeNull()
  })

  it('averages the middle pair for an even count', () => {
    const stats = confidenceStats([0.4, 0.2])
    expect(stats?.median).toBeCloseTo(0.3, 10)
    expect(stats?.mean).toBeCloseTo(0.3, 10)
    expect(stats?.std).toBeCloseTo(0.1, 10)
  })
})

describe('sessionStats', () => {
  it('reports no averages for an empty session', () => {
    expect(sessionStats([])).toEqual({
      totalScans: 0,
      totalDetections: 0,
      scansWithDetections: 0,
      averagePerScan: null,
      detectionRate: null,
    })
  })

  it('aggregates counts across scans', () => {
    const stats = sessionStats([
      result([record(0.9, Severity.HIGH), record(0.6, Severity.MEDIUM)]),
      result([]),
      result([record(0.3, Severity.LOW)]),
      result([]),
    ])

    expect(stats).toEqual({
      totalScans: 4,
      totalDetections: 3,
      scansWithDetections: 2,
      averagePerScan: 0.75,
      detectionRate: 75,
    })
  })
})

describe('trendSeries', () => {
  it('emits one point per result in order', () => {
    const series = trendSeries([
      result([record(0.8, Severity.HIGH)], '2026-01-01T10:00:00.000Z'),
      result([], '2026-01-01T10:05:00.000Z'),
    ])

    expect(series).toEqual([
      { timestamp: '2026-01-01T10:00:00.000Z', count: 1, meanConfidence: 0.8 },
      { timestamp: '2026-01-01T10:05:00.000Z', count: 0, meanConfidence: null },
    ])
  })
})
