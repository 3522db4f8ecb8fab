import { describe, expect, it } from 'vitest'

import { applyNMS, calculateIoU, decodeYoloOutput, pickDetOutput, YoloOutput } from '../yolo-output'

// anchors as [cx, cy, w, h, score0, score1]
const anchors = [
  [50, 50, 20, 20, 0.9, 0.1],
  [10, 10, 0, 5, 0.95, 0.0], // zero width
  [30, 40, 10, 20, 0.2, 0.6],
  [70, 70, 10, 10, 0.0, 0.0], // no score
]

function channelLast(rows: number[][]): YoloOutput {
  return { data: Float32Array.from(rows.flat()), dims: [1, rows.length, rows[0].length] }
}

function channelFirst(rows: number[][]): YoloOutput {
  const channels = rows[0].length
  const data = new Float32Array(channels * rows.length)
  rows.forEach((row, i) => row.forEach((v, ch) => (data[ch * rows.length + i] = v)))
  return { data, dims: [1, channels, rows.length] }
}

describe('decodeYoloOutput', () => {
  it.each([
    ['[1, N, 4+C]', channelLast(anchors)],
    ['[1, 4+C, N]', channelFirst(anchors)],
  ])('decodes %s layouts into corner boxes in anchor order', (_, output) => {
    const decoded = decodeYoloOutput(output, 2, 0)

    expect(decoded).toHaveLength(2)
    expect(decoded[0].classId).toBe(0)
    expect(decoded[0].confidence).toBeCloseTo(0.9, 6)
    expect(decoded[0].box).toEqual({ x1: 40, y1: 40, x2: 60, y2: 60 })
    expect(decoded[1].classId).toBe(1)
    expect(decoded[1].confidence).toBeCloseTo(0.6, 6)
    expect(decoded[1].box).toEqual({ x1: 25, y1: 30, x2: 35, y2: 50 })
  })

  it('drops candidates under the minimum confidence', () => {
    const decoded = decodeYoloOutput(channelLast(anchors), 2, 0.7)
    expect(decoded.map((c) => c.classId)).toEqual([0])
  })

  it('rejects shapes that do not match the class count', () => {
    expect(() => decodeYoloOutput(channelLast(anchors), 3, 0)).toThrow('Unexpected output shape: 1x4x6 for 3 classes')
  })
})

describe('applyNMS', () => {
  it('suppresses overlapping boxes of the same class only', () => {
    const kept = applyNMS(
      [
        { classId: 0, confidence: 0.6, box: { x1: 0, y1: 0, x2: 10, y2: 10 } },
        { classId: 0, confidence: 0.9, box: { x1: 1, y1: 0, x2: 11, y2: 10 } },
        { classId: 1, confidence: 0.5, box: { x1: 0, y1: 0, x2: 10, y2: 10 } },
        { classId: 0, confidence: 0.4, box: { x1: 50, y1: 50, x2: 60, y2: 60 } },
      ],
      0.45,
    )

    expect(kept.map((c) => `${c.classId}:${c.confidence}`)).toEqual(['0:0.9', '1:0.5', '0:0.4'])
  })
})

describe('calculateIoU', () => {
  it('is 1 for identical boxes and 0 for disjoint ones', () => {
    const box = { x1: 0, y1: 0, x2: 10, y2: 10 }
    expect(calculateIoU(box, box)).toBe(1)
    expect(calculateIoU(box, { x1: 20, y1: 20, x2: 30, y2: 30 })).toBe(0)
  })

  it('divides intersection by union', () => {
    // overlap 5x10 = 50, union 100 + 100 - 50
    expect(calculateIoU({ x1: 0, y1: 0, x2: 10, y2: 10 }, { x1: 5, y1: 0, x2: 15, y2: 10 })).toBeCloseTo(1 / 3, 10)
  })
})

describe('pickDetOutput', () => {
  it('prefers the output whose shape matches the class count', () => {
    const protos = { data: new Float32Array(4), dims: [1, 32, 2, 2] }
    const det = channelFirst(anchors)
    expect(pickDetOutput({ output1: protos, output0: det }, 2)).toBe(det)
  })

  it('falls back to the first output', () => {
    const only = { data: new Float32Array(4), dims: [4] }
    expect(pickDetOutput({ only }, 2)).toBe(only)
  })

  it('throws when there is nothing to pick', () => {
    expect(() => pickDetOutput({}, 2)).toThrow('Model produced no float32 outputs')
  })
})
