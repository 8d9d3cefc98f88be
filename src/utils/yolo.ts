import * as ort from 'onnxruntime-web'
import { readFile } from 'node:fs/promises'
import { createCanvas, loadImage, type Image } from '@napi-rs/canvas'
import type { CapturedFrame, Detection, FrameDetector, ModelConfig } from './types'
import { DetectorError } from './errors'
import { computeLetterbox, decodeOutput, type Letterbox } from './decode'

// Node runs the wasm backend on the calling thread
ort.env.wasm.numThreads = 1

// Grey used by YOLO training pipelines for letterbox padding
const LETTERBOX_FILL = 'rgb(114, 114, 114)'

export class YOLODetector implements FrameDetector {
  private session: ort.InferenceSession | null = null
  private config: ModelConfig
  private activeProvider: string | null = null
  private onStatusUpdate?: (status: string) => void

  constructor(config: ModelConfig, onStatusUpdate?: (status: string) => void) {
    this.config = config
    this.onStatusUpdate = onStatusUpdate
  }

  private updateStatus(status: string) {
    if (this.onStatusUpdate) {
      this.onStatusUpdate(status)
    }
    console.log('[YOLO]', status)
  }

  async initialize(): Promise<void> {
    this.updateStatus(`Loading model from ${this.config.modelPath}...`)

    let model: Buffer
    try {
      model = await readFile(this.config.modelPath)
    } catch (error) {
      throw new DetectorError(`Cannot read model file ${this.config.modelPath}`, { cause: error })
    }

    let lastError: unknown = null

    for (const provider of this.config.executionProviders) {
      try {
        this.updateStatus(`Trying ${provider.toUpperCase()} provider...`)

        const options: ort.InferenceSession.SessionOptions = {
          executionProviders: [provider],
          graphOptimizationLevel: 'all'
        }

        this.session = await ort.InferenceSession.create(model, options)
        this.activeProvider = provider

        this.updateStatus(`Model loaded successfully with ${provider.toUpperCase()}`)
        console.log('[YOLO] Input names:', this.session.inputNames)
        console.log('[YOLO] Output names:', this.session.outputNames)
        return
      } catch (error) {
        console.warn(`[YOLO] Failed to initialize with ${provider}:`, error)
        lastError = error
      }
    }

    throw new DetectorError('Failed to initialize model with any provider', { cause: lastError })
  }

  async detect(frame: CapturedFrame): Promise<Detection[]> {
    const session = this.session
    if (!session) {
      throw new DetectorError('Model not initialized')
    }

    try {
      const image = await loadImage(frame.data)
      const { input, letterbox } = this.preprocessImage(image)

      const startTime = performance.now()
      const outputs = await session.run({ [session.inputNames[0]]: input })
      const output = outputs[session.outputNames[0]]
      const inferenceTime = performance.now() - startTime

      if (!output || !(output.data instanceof Float32Array)) {
        throw new DetectorError(`Model output ${session.outputNames[0]} is not a float32 tensor`)
      }

      const detections = decodeOutput(
        output.data,
        output.dims,
        {
          labels: this.config.labels,
          confidenceThreshold: this.config.confidenceThreshold,
          iouThreshold: this.config.iouThreshold
        },
        letterbox
      )

      console.log(
        `[YOLO] ${frame.camera}: ${detections.length} detection(s) in ${inferenceTime.toFixed(0)}ms`
      )
      return detections
    } catch (error) {
      if (error instanceof DetectorError) throw error
      throw new DetectorError(`Inference failed for ${frame.camera}`, { cause: error })
    }
  }

  private preprocessImage(image: Image): { input: ort.Tensor; letterbox: Letterbox } {
    const size = this.config.inputSize
    const letterbox = computeLetterbox(image.width, image.height, size)

    const canvas = createCanvas(size, size)
    const ctx = canvas.getContext('2d')
    ctx.fillStyle = LETTERBOX_FILL
    ctx.fillRect(0, 0, size, size)
    ctx.drawImage(
      image,
      letterbox.padX,
      letterbox.padY,
      size - 2 * letterbox.padX,
      size - 2 * letterbox.padY
    )

    const pixels = ctx.getImageData(0, 0, size, size).data
    const plane = size * size
    const preprocessed = new Float32Array(3 * plane)

    // RGBA interleaved -> planar RGB
    for (let i = 0; i < plane; i++) {
      preprocessed[i] = pixels[i * 4] / 255.0
      preprocessed[i + plane] = pixels[i * 4 + 1] / 255.0
      preprocessed[i + 2 * plane] = pixels[i * 4 + 2] / 255.0
    }

    return {
      input: new ort.Tensor('float32', preprocessed, [1, 3, size, size]),
      letterbox
    }
  }

  getActiveProvider(): string | null {
    return this.activeProvider
  }

  async dispose(): Promise<void> {
    if (this.session) {
      const session = this.session
      this.session = null
      try {
        await session.release()
        console.log('[YOLO] Session released')
      } catch (error) {
        console.warn('[YOLO] Error releasing session:', error)
      }
    }
  }
}
