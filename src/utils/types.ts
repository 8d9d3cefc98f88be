export interface BoundingBox {
  x1: number
  y1: number
  x2: number
  y2: number
}

// Coordinates are in source frame pixels
export interface Detection extends BoundingBox {
  confidence: number
  class: number
  label: string
}

export type ExecutionProvider = 'wasm' | 'cpu' | 'webgpu' | 'webnn'

export interface ModelConfig {
  modelPath: string
  labels: string[]
  inputSize: number
  confidenceThreshold: number
  iouThreshold: number
  executionProviders: ExecutionProvider[]
}

export interface CapturedFrame {
  camera: string
  // JPEG bytes as delivered by the frame source
  data: Buffer
  capturedAt: Date
}

export interface FrameDetector {
  detect(frame: CapturedFrame): Promise<Detection[]>
}
