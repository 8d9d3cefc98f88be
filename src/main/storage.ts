import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { drawDetections } from '../utils/annotate'
import { describeError, PersistenceError } from '../utils/errors'
import type { CapturedFrame, Detection } from '../utils/types'
import type { CameraConfig } from './config'

export type Annotator = (jpeg: Buffer, detections: Detection[]) => Promise<Buffer>

const MAX_NAME_ATTEMPTS = 100

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0')
}

/** Local time as `YYYYMMDD_HHMMSS_mmm`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `${day}_${time}_${pad(date.getMilliseconds(), 3)}`
}

export function frameFilename(camera: string, date: Date, attempt: number = 0): string {
  const suffix = attempt > 0 ? `_${attempt}` : ''
  return `${camera}_${formatTimestamp(date)}${suffix}.jpg`
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST'
}

export class FrameStore {
  private annotator: Annotator

  constructor(annotator: Annotator = drawDetections) {
    this.annotator = annotator
  }

  /**
   * Writes the frame into the camera's output folder and returns the path.
   * Existing files are never overwritten.
   */
  async save(camera: CameraConfig, frame: CapturedFrame, detections: Detection[]): Promise<string> {
    const folder = camera.outputFolder
    if (!folder) {
      throw new PersistenceError(`Camera ${camera.name} has no output folder`)
    }

    let image = frame.data
    if (camera.annotate && detections.length > 0) {
      try {
        image = await this.annotator(frame.data, detections)
      } catch (error) {
        console.warn(`[CAM:${camera.name}] Could not draw detections, saving raw frame: ${describeError(error)}`)
      }
    }

    try {
      await mkdir(folder, { recursive: true })
    } catch (error) {
      throw new PersistenceError(`Failed to create directory ${folder}`, { cause: error })
    }

    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const path = join(folder, frameFilename(camera.name, frame.capturedAt, attempt))
      try {
        await writeFile(path, image, { flag: 'wx' })
        return path
      } catch (error) {
        if (isAlreadyExists(error)) continue
        throw new PersistenceError(`Failed to save frame ${path}`, { cause: error })
      }
    }

    throw new PersistenceError(`No free file name for ${camera.name} in ${folder}`)
  }
}
