import sharp from 'sharp'

import type { InferOptions, LoadOptions, ModelInput, ModelLoader, WeightsHandle } from '../models/weights-handle'
import type { DetectionRecord, DetectionResult, RawCandidate } from '../types/detection.types'
import { Severity } from '../types/severity.enum'

export async function solidPng(width: number, height: number, rgb = { r: 255, g: 0, b: 0 }): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: rgb } }).png().toBuffer()
}

export function candidate(classId: number, confidence: number, box = { x1: 4, y1: 4, x2: 20, y2: 20 }): RawCandidate {
  return { classId, confidence, box }
}

export class FakeModel implements WeightsHandle {
  readonly calls: Array<{ input: ModelInput; options: InferOptions }> = []

  constructor(
    private readonly output: RawCandidate[] | Error,
    readonly classNames: readonly string[] = ['crack', 'spalling', 'corrosion'],
    readonly inputSize = 64,
    readonly weightsPath = 'models/fake/best.onnx',
  ) {}

  async infer(input: ModelInput, options: InferOptions): Promise<RawCandidate[]> {
    this.calls.push({ input, options })
    if (this.output instanceof Error) throw this.output
    return this.output
  }
}

export class CountingLoader implements ModelLoader {
  readonly loads: string[] = []
  readonly options: LoadOptions[] = []

  constructor(private readonly make: (weightsPath: string, options: LoadOptions) => WeightsHandle | Error) {}

  async load(weightsPath: string, options: LoadOptions): Promise<WeightsHandle> {
    this.loads.push(weightsPath)
    this.options.push(options)
    await new Promise((resolve) => setTimeout(resolve, 5))
    const made = this.make(weightsPath, options)
    if (made instanceof Error) throw made
    return made
  }
}

export function record(confidence: number, severity: Severity, classLabel = 'crack'): DetectionRecord {
  return { classLabel, confidence, severity, boundingBox: { x1: 0, y1: 0, x2: 10, y2: 10 } }
}

export function result(records: DetectionRecord[], timestamp = '2026-01-01T00:00:00.000Z'): DetectionResult {
  return {
    records,
    image: { width: 64, height: 64 },
    threshold: 0.25,
    timestamp,
    weightsPath: 'models/fake/best.onnx',
  }
}
