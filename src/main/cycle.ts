import { describeError } from '../utils/errors'
import type { CapturedFrame, Detection, FrameDetector } from '../utils/types'
import type { FrameSource } from './capture'
import type { CameraConfig } from './config'
import type { Publisher } from './mqtt'
import { buildStatePayload } from './payload'

export interface FrameSink {
  save(camera: CameraConfig, frame: CapturedFrame, detections: Detection[]): Promise<string>
}

export interface CycleContext {
  frames: FrameSource
  detector: FrameDetector
  store: FrameSink
  publisher: Publisher
}

export type CycleOutcome = 'published' | 'skipped' | 'publish-failed'

export interface CycleResult {
  camera: string
  outcome: CycleOutcome
  detections: number
  savedTo?: string
}

/**
 * Capture, detect, persist and publish for one camera. Never throws: every
 * failure is logged and reported through the outcome.
 */
export async function runCycle(camera: CameraConfig, context: CycleContext): Promise<CycleResult> {
  const tag = `[CAM:${camera.name}]`

  let frame: CapturedFrame
  try {
    frame = await context.frames.grab(camera)
  } catch (error) {
    console.error(`${tag} Frame capture failed, skipping: ${describeError(error)}`)
    return { camera: camera.name, outcome: 'skipped', detections: 0 }
  }

  let detections: Detection[]
  try {
    detections = await context.detector.detect(frame)
  } catch (error) {
    console.error(`${tag} Detection failed, skipping: ${describeError(error)}`)
    return { camera: camera.name, outcome: 'skipped', detections: 0 }
  }

  let savedTo: string | undefined
  if (detections.length > 0 && camera.outputFolder) {
    try {
      savedTo = await context.store.save(camera, frame, detections)
      console.log(`${tag} Saved frame to ${savedTo}`)
    } catch (error) {
      console.error(`${tag} ${describeError(error)}`)
    }
  }

  const payload = buildStatePayload(camera.name, detections, frame.capturedAt)
  try {
    await context.publisher.publishState(camera, payload)
    console.log(`${tag} Published to ${camera.stateTopic}: ${payload.state} (${payload.count})`)
  } catch (error) {
    console.error(`${tag} ${describeError(error)}`)
    return { camera: camera.name, outcome: 'publish-failed', detections: detections.length, savedTo }
  }

  return { camera: camera.name, outcome: 'published', detections: detections.length, savedTo }
}

/** One pass over every camera, in order. Stops between cameras once `signal` aborts. */
export async function runSweep(
  cameras: readonly CameraConfig[],
  context: CycleContext,
  signal?: AbortSignal
): Promise<CycleResult[]> {
  const results: CycleResult[] = []
  for (const camera of cameras) {
    if (signal?.aborted) break
    results.push(await runCycle(camera, context))
  }
  return results
}

export type LoopState = 'idle' | 'processing' | 'stopped'

export interface LoopSettings {
  cameras: readonly CameraConfig[]
  /** Seconds between sweep starts */
  interval: number
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve()
      return
    }

    const done = () => {
      clearTimeout(timer)
      signal.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal.addEventListener('abort', done, { once: true })
  })
}

/**
 * Publishes discovery once, then sweeps every camera each `interval`
 * seconds until stopped.
 */
export class DetectionLoop {
  private settings: LoopSettings
  private context: CycleContext
  private controller: AbortController | null = null
  private discoveryPublished = false
  private currentState: LoopState = 'idle'
  private sweepCount = 0
  private onSweep?: (results: CycleResult[]) => void

  constructor(
    settings: LoopSettings,
    context: CycleContext,
    onSweep?: (results: CycleResult[]) => void
  ) {
    if (!(settings.interval > 0)) {
      throw new RangeError(`interval must be positive, got ${settings.interval}`)
    }
    this.settings = settings
    this.context = context
    this.onSweep = onSweep
  }

  get state(): LoopState {
    return this.currentState
  }

  get sweeps(): number {
    return this.sweepCount
  }

  private async publishDiscovery(): Promise<void> {
    if (this.discoveryPublished) return
    this.discoveryPublished = true

    for (const camera of this.settings.cameras) {
      try {
        await this.context.publisher.publishDiscovery(camera)
      } catch (error) {
        console.error(`[CAM:${camera.name}] Discovery publish failed: ${describeError(error)}`)
      }
    }
  }

  async start(): Promise<void> {
    if (this.controller) {
      throw new Error('Detection loop is already running')
    }
    const controller = new AbortController()
    this.controller = controller
    this.currentState = 'idle'

    try {
      await this.publishDiscovery()

      const intervalMs = this.settings.interval * 1000
      while (!controller.signal.aborted) {
        const startedAt = Date.now()

        this.currentState = 'processing'
        const results = await runSweep(this.settings.cameras, this.context, controller.signal)
        this.currentState = 'idle'
        this.sweepCount++

        if (this.onSweep) {
          this.onSweep(results)
        }

        const elapsed = Date.now() - startedAt
        await sleep(Math.max(0, intervalMs - elapsed), controller.signal)
      }
    } finally {
      this.currentState = 'stopped'
      this.controller = null
    }
  }

  stop(): void {
    this.controller?.abort()
  }
}
