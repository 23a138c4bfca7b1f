/**
 * @module @plugin-host/plugin-contracts
 *
 * Types, protocol and error contracts shared by every plugin host package.
 */

export type { JsonPrimitive, JsonValue, JsonObject } from './json.js';
export { jsonValueSchema } from './json.js';

export type {
  PluginName,
  PluginId,
  PluginDescription,
  PluginKind,
  RunningPlugin,
} from './types.js';

export type { PluginHostErrorCode, SerializedError, SandboxStage } from './errors.js';
export {
  PluginHostError,
  ManifestError,
  SandboxError,
  ChannelDecodeError,
  UnsupportedRequestError,
  LockContentionError,
  ConfigError,
  isPluginHostError,
  isKnownErrorCode,
  normalizeError,
} from './errors.js';

export type {
  PluginNotification,
  PluginNotificationMethod,
  StartLspServerParams,
} from './notifications.js';
export {
  pluginNotificationSchema,
  startLspServerParamsSchema,
  decodeNotification,
  decodeNotificationParts,
} from './notifications.js';

export type { LspServerRegistry } from './dispatcher.js';
export { Dispatcher, Guarded } from './dispatcher.js';
