import { readFile } from 'node:fs/promises'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { ConfigError } from '../utils/errors'
import type { ModelConfig } from '../utils/types'

export const DEFAULT_CONFIG_PATH = 'config/config.json'
export const DEFAULT_LABELS_PATH = fileURLToPath(
  new URL('../../config/coco-labels.json', import.meta.url)
)

// Camera names end up in MQTT topics and Home Assistant entity ids
const CAMERA_NAME = /^[A-Za-z0-9_-]+$/
const MQTT_WILDCARDS = /[+#]/

const topicSchema = z
  .string()
  .min(1)
  .refine(topic => !MQTT_WILDCARDS.test(topic), 'must not contain MQTT wildcards')

const cameraSchema = z.object({
  name: z.string().regex(CAMERA_NAME, 'may only contain letters, digits, "_" and "-"'),
  url: z.string().min(1),
  output_folder: z.string().min(1).optional(),
  topic: topicSchema.optional(),
  annotate: z.boolean().default(true)
})

export const configSchema = z.object({
  cameras: z
    .array(cameraSchema)
    .min(1)
    .superRefine((cameras, ctx) => {
      const seen = new Set<string>()
      cameras.forEach((camera, index) => {
        if (seen.has(camera.name)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'name'],
            message: `duplicate camera name "${camera.name}"`
          })
        }
        seen.add(camera.name)
      })
    }),
  model_path: z.string().min(1),
  labels_path: z.string().min(1).optional(),
  input_size: z.number().int().positive().multipleOf(32).default(640),
  confidence: z.number().min(0).max(1).default(0.5),
  iou_threshold: z.number().min(0).max(1).default(0.45),
  execution_providers: z.array(z.enum(['wasm', 'cpu', 'webgpu', 'webnn'])).min(1).default(['wasm']),
  interval: z.number().int().positive(),
  capture: z
    .object({
      ffmpeg_path: z.string().min(1).default('ffmpeg'),
      warmup_frames: z.number().int().min(0).default(5),
      timeout: z.number().positive().default(30)
    })
    .default({}),
  mqtt: z.object({
    broker: z.string().min(1),
    port: z.number().int().min(1).max(65535).default(1883),
    user: z.string().nullish(),
    pass: z.string().nullish(),
    client_id: z.string().min(1).optional(),
    discovery_prefix: topicSchema.default('homeassistant'),
    base_topic: topicSchema.default('objectdetection'),
    count_sensor: z.boolean().default(true),
    binary_sensor: z.boolean().default(false)
  })
})

export type ConfigFile = z.infer<typeof configSchema>

export interface CameraConfig {
  readonly name: string
  readonly url: string
  readonly outputFolder?: string
  readonly stateTopic: string
  readonly annotate: boolean
}

export interface CaptureConfig {
  readonly ffmpegPath: string
  readonly warmupFrames: number
  readonly timeoutMs: number
}

export interface MqttConfig {
  readonly broker: string
  readonly port: number
  readonly username?: string
  readonly password?: string
  readonly clientId?: string
  readonly discoveryPrefix: string
  readonly baseTopic: string
  readonly countSensor: boolean
  readonly binarySensor: boolean
}

export interface RunConfig {
  readonly cameras: readonly CameraConfig[]
  readonly model: Readonly<ModelConfig>
  readonly labelsPath: string
  /** Seconds between sweep starts */
  readonly interval: number
  readonly capture: CaptureConfig
  readonly mqtt: MqttConfig
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ')
}

export function parseConfig(raw: unknown): ConfigFile {
  const result = configSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`)
  }
  return result.data
}

export function toRunConfig(file: ConfigFile, labels: string[]): RunConfig {
  const baseTopic = file.mqtt.base_topic.replace(/\/+$/, '')
  // Credentials are only sent as a pair
  const hasCredentials = Boolean(file.mqtt.user && file.mqtt.pass)

  const cameras = file.cameras.map(camera =>
    Object.freeze({
      name: camera.name,
      url: camera.url,
      outputFolder: camera.output_folder,
      stateTopic: camera.topic ?? `${baseTopic}/${camera.name}`,
      annotate: camera.annotate
    })
  )

  return Object.freeze({
    cameras: Object.freeze(cameras),
    model: Object.freeze({
      modelPath: file.model_path,
      labels: [...labels],
      inputSize: file.input_size,
      confidenceThreshold: file.confidence,
      iouThreshold: file.iou_threshold,
      executionProviders: [...file.execution_providers]
    }),
    labelsPath: file.labels_path ?? DEFAULT_LABELS_PATH,
    interval: file.interval,
    capture: Object.freeze({
      ffmpegPath: file.capture.ffmpeg_path,
      warmupFrames: file.capture.warmup_frames,
      timeoutMs: file.capture.timeout * 1000
    }),
    mqtt: Object.freeze({
      broker: file.mqtt.broker,
      port: file.mqtt.port,
      username: hasCredentials ? file.mqtt.user ?? undefined : undefined,
      password: hasCredentials ? file.mqtt.pass ?? undefined : undefined,
      clientId: file.mqtt.client_id,
      discoveryPrefix: file.mqtt.discovery_prefix.replace(/\/+$/, ''),
      baseTopic,
      countSensor: file.mqtt.count_sensor,
      binarySensor: file.mqtt.binary_sensor
    })
  })
}

async function readJson(path: string, what: string): Promise<unknown> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigError(`Cannot read ${what} ${path}`, { cause: error })
  }

  try {
    return JSON.parse(text)
  } catch (error) {
    throw new ConfigError(`${what} ${path} is not valid JSON`, { cause: error })
  }
}

const labelsSchema = z.array(z.string()).min(1)

export async function loadLabels(path: string): Promise<string[]> {
  const result = labelsSchema.safeParse(await readJson(path, 'labels file'))
  if (!result.success) {
    throw new ConfigError(`Labels file ${path} must be a non-empty JSON array of strings`)
  }
  return result.data
}

export async function loadConfig(path: string = DEFAULT_CONFIG_PATH): Promise<RunConfig> {
  const file = parseConfig(await readJson(path, 'configuration file'))
  const labels = await loadLabels(file.labels_path ?? DEFAULT_LABELS_PATH)
  return toRunConfig(file, labels)
}
