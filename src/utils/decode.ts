import type { Detection } from './types'
import { nonMaxSuppression } from './nms'
import { DetectorError } from './errors'

/** Placement of the source frame inside the square model input. */
export interface Letterbox {
  scale: number
  padX: number
  padY: number
  width: number
  height: number
}

export interface DecodeOptions {
  labels: string[]
  confidenceThreshold: number
  iouThreshold: number
}

export function computeLetterbox(width: number, height: number, inputSize: number): Letterbox {
  const scale = Math.min(inputSize / width, inputSize / height)
  const scaledWidth = Math.round(width * scale)
  const scaledHeight = Math.round(height * scale)

  return {
    scale,
    padX: (inputSize - scaledWidth) / 2,
    padY: (inputSize - scaledHeight) / 2,
    width,
    height
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max)
}

function toSourceBox(
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  letterbox: Letterbox
) {
  const { scale, padX, padY, width, height } = letterbox
  return {
    x1: clamp((x1 - padX) / scale, 0, width),
    y1: clamp((y1 - padY) / scale, 0, height),
    x2: clamp((x2 - padX) / scale, 0, width),
    y2: clamp((y2 - padY) / scale, 0, height)
  }
}

function labelFor(labels: string[], classId: number): string {
  return labels[classId] ?? `class_${classId}`
}

/**
 * Turns a raw YOLO output tensor into detections in source frame pixels.
 *
 * Accepted layouts:
 * - `[1, N, 6]`: end-to-end models emitting `x1, y1, x2, y2, score, class`
 * - `[1, 4 + C, N]` or `[1, N, 4 + C]`: center-format boxes with per-class scores
 * - `[N, 4 + C]`
 */
export function decodeOutput(
  data: Float32Array,
  dims: readonly number[],
  options: DecodeOptions,
  letterbox: Letterbox
): Detection[] {
  const { labels, confidenceThreshold, iouThreshold } = options

  if (dims.length === 3 && dims[2] === 6 && dims[1] > 6) {
    const detections: Detection[] = []
    for (let i = 0; i < dims[1]; i++) {
      const base = i * 6
      const confidence = data[base + 4]
      if (!(confidence > confidenceThreshold)) continue

      const classId = Math.round(data[base + 5])
      detections.push({
        ...toSourceBox(data[base], data[base + 1], data[base + 2], data[base + 3], letterbox),
        confidence,
        class: classId,
        label: labelFor(labels, classId)
      })
    }
    return detections.sort((a, b) => b.confidence - a.confidence)
  }

  let numBoxes: number
  let values: number
  let isTransposed: boolean

  if (dims.length === 3) {
    if (dims[1] > dims[2]) {
      // [1, num_boxes, num_classes + 4]
      numBoxes = dims[1]
      values = dims[2]
      isTransposed = false
    } else {
      // [1, num_classes + 4, num_boxes]
      numBoxes = dims[2]
      values = dims[1]
      isTransposed = true
    }
  } else if (dims.length === 2) {
    numBoxes = dims[0]
    values = dims[1]
    isTransposed = false
  } else {
    throw new DetectorError(`Unexpected output shape [${dims.join(', ')}]`)
  }

  const numClasses = values - 4
  if (numClasses < 1) {
    throw new DetectorError(`Output shape [${dims.join(', ')}] carries no class scores`)
  }

  const at = isTransposed
    ? (box: number, value: number) => data[value * numBoxes + box]
    : (box: number, value: number) => data[box * values + value]

  const candidates: Detection[] = []

  for (let i = 0; i < numBoxes; i++) {
    let maxConfidence = 0
    let bestClass = -1
    for (let c = 0; c < numClasses; c++) {
      const score = at(i, 4 + c)
      if (score > maxConfidence) {
        maxConfidence = score
        bestClass = c
      }
    }

    if (bestClass === -1 || !(maxConfidence > confidenceThreshold)) continue

    const cx = at(i, 0)
    const cy = at(i, 1)
    const w = at(i, 2)
    const h = at(i, 3)

    candidates.push({
      ...toSourceBox(cx - w / 2, cy - h / 2, cx + w / 2, cy + h / 2, letterbox),
      confidence: maxConfidence,
      class: bestClass,
      label: labelFor(labels, bestClass)
    })
  }

  return nonMaxSuppression(candidates, iouThreshold)
}
