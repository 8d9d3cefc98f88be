import { createCanvas, loadImage } from '@napi-rs/canvas'
import type { Detection } from './types'

const JPEG_QUALITY = 90

export function colorForClass(classId: number): string {
  const hue = (classId * 137) % 360
  return `hsl(${hue}, 70%, 50%)`
}

export function captionFor(detection: Detection): string {
  return `${detection.label} ${(detection.confidence * 100).toFixed(1)}%`
}

/**
 * Draws one box and caption per detection on top of a JPEG frame and
 * returns the re-encoded JPEG.
 */
export async function drawDetections(jpeg: Buffer, detections: Detection[]): Promise<Buffer> {
  const image = await loadImage(jpeg)
  const canvas = createCanvas(image.width, image.height)
  const ctx = canvas.getContext('2d')

  ctx.drawImage(image, 0, 0, image.width, image.height)

  detections.forEach((detection) => {
    const { x1, y1, x2, y2 } = detection
    const boxWidth = x2 - x1
    const boxHeight = y2 - y1
    const color = colorForClass(detection.class)

    ctx.strokeStyle = color
    ctx.lineWidth = 2
    ctx.strokeRect(x1, y1, boxWidth, boxHeight)

    // Keep the caption inside the frame for boxes touching the top edge
    const labelY = y1 >= 20 ? y1 - 20 : y1
    ctx.fillStyle = color
    ctx.fillRect(x1, labelY, boxWidth, 20)

    ctx.fillStyle = 'white'
    ctx.font = '14px sans-serif'
    ctx.fillText(captionFor(detection), x1 + 4, labelY + 15)
  })

  return canvas.encode('jpeg', JPEG_QUALITY)
}
