import type { CameraConfig, MqttConfig } from './config'

export interface DetectionEntry {
  object: string
  confidence: number
}

export interface DetectionPayload {
  state: string
  detections: DetectionEntry[]
  count: number
}

export interface StatePayload extends DetectionPayload {
  camera: string
  timestamp: string
}

interface LabeledResult {
  label: string
  confidence: number
}

export const NO_DETECTIONS = 'none'

export function roundConfidence(confidence: number): number {
  return Math.round(confidence * 100) / 100
}

export function buildDetectionPayload(results: readonly LabeledResult[]): DetectionPayload {
  const detections = results.map(result => ({
    object: result.label,
    confidence: roundConfidence(result.confidence)
  }))

  return {
    state: detections.length === 0 ? NO_DETECTIONS : detections.map(d => d.object).join(', '),
    detections,
    count: detections.length
  }
}

export function buildStatePayload(
  camera: string,
  results: readonly LabeledResult[],
  capturedAt: Date
): StatePayload {
  return {
    ...buildDetectionPayload(results),
    camera,
    timestamp: capturedAt.toISOString()
  }
}

// Home Assistant MQTT discovery

interface DiscoveryDevice {
  identifiers: string[]
  name: string
  model: string
  manufacturer: string
}

interface EntityDiscovery {
  name: string
  object_id: string
  default_entity_id: string
  unique_id: string
  state_topic: string
  value_template: string
  json_attributes_topic: string
  json_attributes_template: string
  icon?: string
  device_class?: string
  state_class?: string
  payload_on?: string
  payload_off?: string
  device: DiscoveryDevice
}

export interface DiscoveryMessage {
  topic: string
  payload: EntityDiscovery
}

const ID_PREFIX = 'objectdetection'

function deviceFor(camera: CameraConfig): DiscoveryDevice {
  return {
    identifiers: [`${ID_PREFIX}_${camera.name}`],
    name: `Object Detection Camera - ${camera.name}`,
    model: 'YOLO Object Detection',
    manufacturer: 'Custom'
  }
}

/** Sensor whose state is the detected labels; entity id `sensor.<camera>_detections`. */
export function sensorDiscovery(camera: CameraConfig, discoveryPrefix: string): DiscoveryMessage {
  return {
    topic: `${discoveryPrefix}/sensor/${camera.name}/config`,
    payload: {
      name: `${camera.name} Detections`,
      object_id: `${camera.name}_detections`,
      default_entity_id: `sensor.${camera.name}_detections`,
      unique_id: `${ID_PREFIX}_${camera.name}_detections`,
      state_topic: camera.stateTopic,
      value_template: '{{ value_json.state }}',
      json_attributes_topic: camera.stateTopic,
      json_attributes_template: '{{ value_json | tojson }}',
      icon: 'mdi:cctv',
      device: deviceFor(camera)
    }
  }
}

/** Numeric sensor holding the number of objects seen in the last frame. */
export function countSensorDiscovery(camera: CameraConfig, discoveryPrefix: string): DiscoveryMessage {
  return {
    topic: `${discoveryPrefix}/sensor/${camera.name}_count/config`,
    payload: {
      name: `${camera.name} Detection Count`,
      object_id: `${camera.name}_detection_count`,
      default_entity_id: `sensor.${camera.name}_detection_count`,
      unique_id: `${ID_PREFIX}_${camera.name}_count`,
      state_topic: camera.stateTopic,
      value_template: '{{ value_json.count }}',
      json_attributes_topic: camera.stateTopic,
      json_attributes_template: '{{ value_json | tojson }}',
      icon: 'mdi:counter',
      state_class: 'measurement',
      device: deviceFor(camera)
    }
  }
}

/** Binary sensor that is ON while the last sweep saw at least one object. */
export function binarySensorDiscovery(camera: CameraConfig, discoveryPrefix: string): DiscoveryMessage {
  return {
    topic: `${discoveryPrefix}/binary_sensor/${camera.name}/config`,
    payload: {
      name: `${camera.name} Object Detected`,
      object_id: `${camera.name}_object_detected`,
      default_entity_id: `binary_sensor.${camera.name}_object_detected`,
      unique_id: `${ID_PREFIX}_${camera.name}_object_detected`,
      state_topic: camera.stateTopic,
      value_template: "{{ 'ON' if value_json.count > 0 else 'OFF' }}",
      json_attributes_topic: camera.stateTopic,
      json_attributes_template: '{{ value_json | tojson }}',
      device_class: 'motion',
      payload_on: 'ON',
      payload_off: 'OFF',
      device: deviceFor(camera)
    }
  }
}

export function discoveryMessages(camera: CameraConfig, mqtt: MqttConfig): DiscoveryMessage[] {
  const messages = [sensorDiscovery(camera, mqtt.discoveryPrefix)]
  if (mqtt.countSensor) {
    messages.push(countSensorDiscovery(camera, mqtt.discoveryPrefix))
  }
  if (mqtt.binarySensor) {
    messages.push(binarySensorDiscovery(camera, mqtt.discoveryPrefix))
  }
  return messages
}
