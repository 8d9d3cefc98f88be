import { randomBytes } from 'node:crypto'
import { connectAsync, type IClientOptions, type IClientPublishOptions, type MqttClient } from 'mqtt'
import { PublishError } from '../utils/errors'
import type { CameraConfig, MqttConfig } from './config'
import { discoveryMessages, type StatePayload } from './payload'

/** The part of an MQTT client the publisher relies on. */
export interface MessageClient {
  readonly connected: boolean
  publishAsync(topic: string, message: string, opts?: IClientPublishOptions): Promise<unknown>
  endAsync(): Promise<void>
}

export interface Publisher {
  publishDiscovery(camera: CameraConfig): Promise<void>
  publishState(camera: CameraConfig, payload: StatePayload): Promise<void>
}

const DISCOVERY_OPTIONS: IClientPublishOptions = { qos: 1, retain: true }
const STATE_OPTIONS: IClientPublishOptions = { qos: 0, retain: false }

export function brokerUrl(broker: string): string {
  return broker.includes('://') ? broker : `mqtt://${broker}`
}

export class MqttPublisher implements Publisher {
  private client: MessageClient
  private config: MqttConfig

  constructor(client: MessageClient, config: MqttConfig) {
    this.client = client
    this.config = config
  }

  private async publish(topic: string, payload: object, options: IClientPublishOptions): Promise<void> {
    // A disconnected client queues publishes until it reconnects; fail fast instead
    if (!this.client.connected) {
      throw new PublishError(`Not connected to MQTT broker, dropping message for ${topic}`)
    }

    try {
      await this.client.publishAsync(topic, JSON.stringify(payload), options)
    } catch (error) {
      throw new PublishError(`Failed to publish to ${topic}`, { cause: error })
    }
  }

  /** Retained, so publishing again on every start leaves subscribers unchanged. */
  async publishDiscovery(camera: CameraConfig): Promise<void> {
    for (const message of discoveryMessages(camera, this.config)) {
      await this.publish(message.topic, message.payload, DISCOVERY_OPTIONS)
      console.log(`[MQTT] Published discovery for ${camera.name} to ${message.topic}`)
    }
  }

  async publishState(camera: CameraConfig, payload: StatePayload): Promise<void> {
    await this.publish(camera.stateTopic, payload, STATE_OPTIONS)
  }

  async close(): Promise<void> {
    await this.client.endAsync()
    console.log('[MQTT] Connection closed')
  }
}

function attachLogging(client: MqttClient): void {
  client.on('error', (error) => {
    console.error('[MQTT] Client error:', error.message)
  })
  client.on('offline', () => {
    console.warn('[MQTT] Broker connection lost')
  })
  client.on('reconnect', () => {
    console.log('[MQTT] Reconnecting to broker...')
  })
  client.on('connect', () => {
    console.log('[MQTT] Connected to broker')
  })
}

/**
 * Opens the broker connection. Rejects with a PublishError when the first
 * connection attempt fails; later drops are retried by the client.
 */
export async function connectPublisher(config: MqttConfig): Promise<MqttPublisher> {
  const url = brokerUrl(config.broker)
  const options: IClientOptions = {
    port: config.port,
    username: config.username,
    password: config.password,
    clientId: config.clientId ?? `rtsp-object-detection-${randomBytes(4).toString('hex')}`,
    connectTimeout: 10_000,
    reconnectPeriod: 5_000
  }

  let client: MqttClient
  try {
    client = await connectAsync(url, options, false)
  } catch (error) {
    throw new PublishError(`MQTT connection to ${url}:${config.port} failed`, { cause: error })
  }

  console.log('[MQTT] Connected to broker')
  attachLogging(client)
  return new MqttPublisher(client, config)
}
