import type { BoundingBox, Detection } from './types'

export function calculateIoU(box1: BoundingBox, box2: BoundingBox): number {
  const x1 = Math.max(box1.x1, box2.x1)
  const y1 = Math.max(box1.y1, box2.y1)
  const x2 = Math.min(box1.x2, box2.x2)
  const y2 = Math.min(box1.y2, box2.y2)

  const intersectionWidth = Math.max(0, x2 - x1)
  const intersectionHeight = Math.max(0, y2 - y1)
  const intersectionArea = intersectionWidth * intersectionHeight

  const box1Area = Math.max(0, box1.x2 - box1.x1) * Math.max(0, box1.y2 - box1.y1)
  const box2Area = Math.max(0, box2.x2 - box2.x1) * Math.max(0, box2.y2 - box2.y1)

  const unionArea = box1Area + box2Area - intersectionArea

  return unionArea <= 0 ? 0 : intersectionArea / unionArea
}

/**
 * Greedy class-wise non-max suppression. Returns the kept boxes in
 * descending confidence order.
 */
export function nonMaxSuppression(
  boxes: Detection[],
  iouThreshold: number = 0.45
): Detection[] {
  if (boxes.length === 0) return []

  let candidates = [...boxes].sort((a, b) => b.confidence - a.confidence)
  const selected: Detection[] = []

  while (candidates.length > 0) {
    const [current, ...rest] = candidates
    selected.push(current)

    candidates = rest.filter(
      box => box.class !== current.class || calculateIoU(current, box) < iouThreshold
    )
  }

  return selected
}
