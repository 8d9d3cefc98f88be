import { spawn } from 'node:child_process'
import type { Readable } from 'node:stream'
import { CaptureError } from '../utils/errors'
import type { CapturedFrame } from '../utils/types'
import type { CameraConfig, CaptureConfig } from './config'

export interface FrameSource {
  grab(camera: CameraConfig): Promise<CapturedFrame>
}

/** The part of a child process the frame source relies on. */
export interface CaptureProcess {
  stdout: Readable
  stderr: Readable
  kill(signal?: NodeJS.Signals): boolean
  on(event: 'error', listener: (error: Error) => void): this
  on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this
}

export type SpawnCapture = (command: string, args: string[]) => CaptureProcess

const STDERR_TAIL = 2000

const spawnFfmpeg: SpawnCapture = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] })

/**
 * ffmpeg arguments that open the stream, skip `warmupFrames` decoded frames
 * and write the next one to stdout as a single JPEG.
 */
export function buildFfmpegArgs(url: string, warmupFrames: number): string[] {
  const args = ['-hide_banner', '-loglevel', 'error']

  if (/^rtsps?:\/\//i.test(url)) {
    args.push('-rtsp_transport', 'tcp')
  }
  args.push('-i', url)

  if (warmupFrames > 0) {
    args.push('-vf', `select=gte(n\\,${warmupFrames})`)
  }

  args.push('-frames:v', '1', '-f', 'image2pipe', '-vcodec', 'mjpeg', '-q:v', '2', 'pipe:1')
  return args
}

// Credentials embedded in stream URLs stay out of logs and errors. Passwords
// may hold "/" or "@", so the user info runs up to the last "@" of the URL.
export function redactUrl(url: string): string {
  return url.replace(/([a-z][a-z0-9+.-]*:\/\/)\S*@/gi, '$1***@')
}

export class FfmpegFrameSource implements FrameSource {
  private config: CaptureConfig
  private spawnProcess: SpawnCapture

  constructor(config: CaptureConfig, spawnProcess: SpawnCapture = spawnFfmpeg) {
    this.config = config
    this.spawnProcess = spawnProcess
  }

  grab(camera: CameraConfig): Promise<CapturedFrame> {
    const args = buildFfmpegArgs(camera.url, this.config.warmupFrames)
    const source = redactUrl(camera.url)

    return new Promise<CapturedFrame>((resolve, reject) => {
      const chunks: Buffer[] = []
      let stderr = ''
      let settled = false
      let timedOut = false

      const settle = (fn: () => void) => {
        if (settled) return
        settled = true
        clearTimeout(timer)
        fn()
      }

      let child: CaptureProcess
      try {
        child = this.spawnProcess(this.config.ffmpegPath, args)
      } catch (error) {
        reject(new CaptureError(`Could not start ${this.config.ffmpegPath}`, { cause: error }))
        return
      }

      const timer = setTimeout(() => {
        timedOut = true
        child.kill('SIGKILL')
      }, this.config.timeoutMs)

      child.stdout.on('data', (chunk: Buffer) => {
        chunks.push(chunk)
      })
      child.stderr.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL)
      })

      child.on('error', (error) => {
        settle(() => reject(new CaptureError(`Could not start ${this.config.ffmpegPath}`, { cause: error })))
      })

      child.on('close', (code, signal) => {
        settle(() => {
          if (timedOut) {
            reject(new CaptureError(`Timed out after ${this.config.timeoutMs}ms reading ${source}`))
            return
          }
          if (code !== 0) {
            const reason = stderr.trim() || (signal ? `killed by ${signal}` : `exit code ${code}`)
            reject(new CaptureError(`Could not read a frame from ${source}: ${redactUrl(reason)}`))
            return
          }

          const data = Buffer.concat(chunks)
          if (data.length === 0) {
            reject(new CaptureError(`Stream ${source} produced no frame`))
            return
          }

          resolve({ camera: camera.name, data, capturedAt: new Date() })
        })
      })
    })
  }
}
