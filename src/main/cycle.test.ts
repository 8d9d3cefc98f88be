import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CaptureError, DetectorError, PersistenceError, PublishError } from '../utils/errors'
import type { CapturedFrame, Detection } from '../utils/types'
import type { CameraConfig } from './config'
import { type CycleContext, DetectionLoop, runCycle, runSweep } from './cycle'
import type { StatePayload } from './payload'

const capturedAt = new Date('2024-05-01T12:30:00.000Z')

function cameraNamed(name: string, outputFolder?: string): CameraConfig {
  return {
    name,
    url: `rtsp://${name}.local/stream`,
    outputFolder,
    stateTopic: `objectdetection/${name}`,
    annotate: true
  }
}

function detection(label: string, confidence: number, classId = 0): Detection {
  return { x1: 0, y1: 0, x2: 10, y2: 10, confidence, class: classId, label }
}

function fakeContext(detections: Detection[] = []) {
  const frames = {
    grab: vi.fn(async (camera: CameraConfig): Promise<CapturedFrame> => ({
      camera: camera.name,
      data: Buffer.from('jpeg'),
      capturedAt
    }))
  }
  const detector = {
    detect: vi.fn(async (_frame: CapturedFrame) => detections)
  }
  const store = {
    save: vi.fn(async (camera: CameraConfig, _frame: CapturedFrame, _detections: Detection[]) =>
      `${camera.outputFolder}/${camera.name}.jpg`
    )
  }
  const publisher = {
    publishDiscovery: vi.fn(async (_camera: CameraConfig) => {}),
    publishState: vi.fn(async (_camera: CameraConfig, _payload: StatePayload) => {})
  }
  return { frames, detector, store, publisher } satisfies CycleContext
}

function deferred() {
  let resolve: () => void = () => {}
  const promise = new Promise<void>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  vi.spyOn(console, 'error').mockImplementation(() => {})
})

afterEach(() => {
  vi.useRealTimers()
  vi.restoreAllMocks()
})

describe('runCycle', () => {
  it('publishes detections in model order', async () => {
    const context = fakeContext([detection('person', 0.9), detection('car', 0.4, 2)])
    const camera = cameraNamed('front_door')

    const result = await runCycle(camera, context)

    expect(result).toEqual({ camera: 'front_door', outcome: 'published', detections: 2, savedTo: undefined })
    expect(context.publisher.publishState).toHaveBeenCalledWith(camera, {
      state: 'person, car',
      count: 2,
      detections: [
        { object: 'person', confidence: 0.9 },
        { object: 'car', confidence: 0.4 }
      ],
      camera: 'front_door',
      timestamp: '2024-05-01T12:30:00.000Z'
    })
  })

  it('publishes "none" and saves nothing for an empty frame', async () => {
    const context = fakeContext([])
    const camera = cameraNamed('front_door', '/captures')

    await runCycle(camera, context)

    expect(context.store.save).not.toHaveBeenCalled()
    expect(context.publisher.publishState.mock.calls[0][1]).toMatchObject({ state: 'none', count: 0, detections: [] })
  })

  it('saves frames with detections when an output folder is set', async () => {
    const detections = [detection('dog', 0.8, 16)]
    const context = fakeContext(detections)
    const camera = cameraNamed('yard', '/captures')

    const result = await runCycle(camera, context)

    expect(context.store.save).toHaveBeenCalledWith(camera, expect.objectContaining({ camera: 'yard' }), detections)
    expect(result.savedTo).toBe('/captures/yard.jpg')
  })

  it('does not save without an output folder', async () => {
    const context = fakeContext([detection('dog', 0.8, 16)])

    await runCycle(cameraNamed('yard'), context)

    expect(context.store.save).not.toHaveBeenCalled()
  })

  it('still publishes when saving fails', async () => {
    const context = fakeContext([detection('dog', 0.8, 16)])
    context.store.save.mockRejectedValueOnce(new PersistenceError('Failed to save frame'))

    const result = await runCycle(cameraNamed('yard', '/captures'), context)

    expect(result.outcome).toBe('published')
    expect(context.publisher.publishState).toHaveBeenCalledTimes(1)
  })

  it('skips the camera when capture fails', async () => {
    const context = fakeContext([detection('person', 0.9)])
    context.frames.grab.mockRejectedValueOnce(new CaptureError('Stream produced no frame'))

    const result = await runCycle(cameraNamed('front_door', '/captures'), context)

    expect(result).toEqual({ camera: 'front_door', outcome: 'skipped', detections: 0 })
    expect(context.detector.detect).not.toHaveBeenCalled()
    expect(context.store.save).not.toHaveBeenCalled()
    expect(context.publisher.publishState).not.toHaveBeenCalled()
  })

  it('skips the camera when detection fails', async () => {
    const context = fakeContext()
    context.detector.detect.mockRejectedValueOnce(new DetectorError('Inference failed'))

    const result = await runCycle(cameraNamed('front_door'), context)

    expect(result.outcome).toBe('skipped')
    expect(context.publisher.publishState).not.toHaveBeenCalled()
  })

  it('reports a failed publish', async () => {
    const context = fakeContext([detection('person', 0.9)])
    context.publisher.publishState.mockRejectedValueOnce(new PublishError('Not connected'))

    const result = await runCycle(cameraNamed('front_door'), context)

    expect(result).toEqual({ camera: 'front_door', outcome: 'publish-failed', detections: 1, savedTo: undefined })
  })
})

describe('runSweep', () => {
  it('continues with the next camera after a failure', async () => {
    const context = fakeContext([detection('person', 0.9)])
    context.frames.grab.mockRejectedValueOnce(new CaptureError('Connection refused'))
    const cameras = [cameraNamed('front_door'), cameraNamed('yard')]

    const results = await runSweep(cameras, context)

    expect(results.map(r => [r.camera, r.outcome])).toEqual([
      ['front_door', 'skipped'],
      ['yard', 'published']
    ])
    expect(context.publisher.publishState).toHaveBeenCalledTimes(1)
    expect(context.publisher.publishState.mock.calls[0][0]).toBe(cameras[1])
  })

  it('stops between cameras once aborted', async () => {
    const context = fakeContext()
    const controller = new AbortController()
    context.frames.grab.mockImplementationOnce(async (camera: CameraConfig) => {
      controller.abort()
      return { camera: camera.name, data: Buffer.from('jpeg'), capturedAt }
    })

    const results = await runSweep([cameraNamed('front_door'), cameraNamed('yard')], context, controller.signal)

    expect(results.map(r => r.camera)).toEqual(['front_door'])
  })
})

describe('DetectionLoop', () => {
  it('rejects a non-positive interval', () => {
    expect(() => new DetectionLoop({ cameras: [], interval: 0 }, fakeContext())).toThrow(RangeError)
  })

  it('publishes discovery once per camera however many sweeps run', async () => {
    vi.useFakeTimers()
    const context = fakeContext([detection('person', 0.9)])
    const cameras = [cameraNamed('front_door'), cameraNamed('yard')]
    const loop: DetectionLoop = new DetectionLoop({ cameras, interval: 10 }, context, () => {
      if (loop.sweeps === 3) loop.stop()
    })

    const done = loop.start()
    await vi.advanceTimersByTimeAsync(25_000)
    await done

    expect(loop.sweeps).toBe(3)
    expect(context.publisher.publishDiscovery.mock.calls.map(call => call[0])).toEqual(cameras)
    expect(context.publisher.publishState).toHaveBeenCalledTimes(6)
    expect(loop.state).toBe('stopped')
  })

  it('starts sweeps one interval apart regardless of processing time', async () => {
    vi.useFakeTimers()
    const context = fakeContext()
    context.detector.detect.mockImplementation(
      () => new Promise<Detection[]>(resolve => setTimeout(() => resolve([]), 3_000))
    )
    const sweepStarts: number[] = []
    context.frames.grab.mockImplementation(async (camera: CameraConfig) => {
      if (camera.name === 'front_door') sweepStarts.push(Date.now())
      return { camera: camera.name, data: Buffer.from('jpeg'), capturedAt }
    })
    const loop: DetectionLoop = new DetectionLoop(
      { cameras: [cameraNamed('front_door'), cameraNamed('yard')], interval: 10 },
      context,
      () => {
        if (loop.sweeps === 3) loop.stop()
      }
    )

    const done = loop.start()
    await vi.advanceTimersByTimeAsync(30_000)
    await done

    expect(sweepStarts).toHaveLength(3)
    expect(sweepStarts[1] - sweepStarts[0]).toBe(10_000)
    expect(sweepStarts[2] - sweepStarts[1]).toBe(10_000)
  })

  it('reports processing while a sweep runs and idle in between', async () => {
    const context = fakeContext()
    const states: string[] = []
    context.frames.grab.mockImplementation(async (camera: CameraConfig) => {
      states.push(loop.state)
      return { camera: camera.name, data: Buffer.from('jpeg'), capturedAt }
    })
    const loop: DetectionLoop = new DetectionLoop({ cameras: [cameraNamed('front_door')], interval: 60 }, context, () => {
      states.push(loop.state)
      loop.stop()
    })

    await loop.start()

    expect(states).toEqual(['processing', 'idle'])
    expect(loop.state).toBe('stopped')
  })

  it('stops during the wait between sweeps', async () => {
    vi.useFakeTimers()
    const context = fakeContext()
    const firstSweep = deferred()
    const loop = new DetectionLoop({ cameras: [cameraNamed('front_door')], interval: 300 }, context, firstSweep.resolve)

    const done = loop.start()
    await firstSweep.promise
    loop.stop()
    await done

    expect(loop.sweeps).toBe(1)
    expect(vi.getTimerCount()).toBe(0)
  })

  it('keeps going when discovery fails', async () => {
    const context = fakeContext()
    context.publisher.publishDiscovery.mockRejectedValueOnce(new PublishError('Not connected'))
    const loop: DetectionLoop = new DetectionLoop({ cameras: [cameraNamed('front_door')], interval: 60 }, context, () =>
      loop.stop()
    )

    await loop.start()

    expect(loop.sweeps).toBe(1)
    expect(context.publisher.publishState).toHaveBeenCalledTimes(1)
  })

  it('refuses to start twice', async () => {
    const context = fakeContext()
    const loop = new DetectionLoop({ cameras: [cameraNamed('front_door')], interval: 60 }, context)

    const done = loop.start()
    await expect(loop.start()).rejects.toThrow('Detection loop is already running')
    loop.stop()
    await done
  })
})
