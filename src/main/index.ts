import { describeError } from '../utils/errors'
import { YOLODetector } from '../utils/yolo'
import { FfmpegFrameSource } from './capture'
import { DEFAULT_CONFIG_PATH, loadConfig, type RunConfig } from './config'
import { DetectionLoop } from './cycle'
import { connectPublisher, type MqttPublisher } from './mqtt'
import { FrameStore } from './storage'

async function main(): Promise<number> {
  const configPath = process.env['CONFIG_PATH'] || DEFAULT_CONFIG_PATH

  let config: RunConfig
  try {
    config = await loadConfig(configPath)
  } catch (error) {
    console.error(`[MAIN] ${describeError(error)}`)
    return 1
  }
  console.log(`[MAIN] Loaded ${config.cameras.length} camera(s) from ${configPath}`)
  console.log(`[MAIN] Using ${config.model.labels.length} labels from ${config.labelsPath}`)

  // 1. Load the model once at startup
  const detector = new YOLODetector(config.model)
  try {
    await detector.initialize()
  } catch (error) {
    console.error(`[MAIN] Failed to load model: ${describeError(error)}`)
    return 1
  }

  // 2. Connect to the broker
  let publisher: MqttPublisher
  try {
    publisher = await connectPublisher(config.mqtt)
  } catch (error) {
    console.error(`[MAIN] ${describeError(error)}`)
    await detector.dispose()
    return 1
  }

  // 3. Discovery, then sweep until a termination signal
  const loop = new DetectionLoop(config, {
    frames: new FfmpegFrameSource(config.capture),
    detector,
    store: new FrameStore(),
    publisher
  })

  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`[MAIN] Received ${signal}, stopping after the current camera...`)
    loop.stop()
  }
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)

  console.log(`[MAIN] Starting loop. Capturing every ${config.interval} seconds.`)
  await loop.start()

  await publisher.close()
  await detector.dispose()
  console.log('[MAIN] Stopped')
  return 0
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (error) => {
    console.error('[MAIN] Fatal error:', error)
    process.exitCode = 1
  }
)
