export { ShiftBridge } from './bridge.js';
export type { GearChange, ShiftBridgeOptions } from './bridge.js';
export { loadConfig, parseConfig, DEFAULT_CONFIG_FILE } from './config.js';
export type { AppConfig, BluetoothSettings, RawConfig } from './config.js';
export { GearState, chainringCogFor } from './gear-state.js';
export { resistanceFor, targetPowerFor, gradeFor, commandFor, describeCommand } from './resistance-mapper.js';
export { ClickButtonTracker, decodeButtonStatus } from './click-protocol.js';
export { buildTrainerCommand, parseControlPointResponse, parseIndoorBikeData } from './ftms-commands.js';
export type { ControlPointResponse, IndoorBikeData } from './ftms-commands.js';
export { matchesName, formatScannedDevice, sortScannedDevices } from './device-connector.js';
export type { DeviceConnector, DeviceLink, NotificationListener, ScannedDevice } from './device-connector.js';
export { NobleConnector } from './noble-connector.js';
export {
  ConfigurationError,
  DeviceNotFoundError,
  ConnectionError,
  NotificationDecodeError,
  TrainerWriteError
} from './errors.js';
export { BridgeState } from './state-machine.js';
export { Logger } from './logger.js';
export { formatHex, normalizeLogLevel, type LogLevel } from './utils.js';
export type * from './types.js';
