// Runtime facade
export { PanelRuntime, createRuntimeFromEnv } from './panel-runtime.js';
export type { PanelRuntimeConfig, RuntimeNotification, DiscoveryResult, Credentials } from './panel-runtime.js';

// Configuration
export { loadConfig } from './config.js';
export type { RuntimeConfig, LoadConfigOptions } from './config.js';

// Logger & error types
export {
  createLogger,
  errorMessage,
  AuthError,
  TransportError,
  ValidationError,
  RemoteRejection,
  ReconciliationWarning,
} from './edge-logger.js';
export type { Logger, AuthFailureReason } from './edge-logger.js';

// Session & commands
export { SessionManager, SESSION_COOKIE, extractPanelMessage } from './session-manager.js';
export type { CredentialStore, HttpMethod, PanelRequest, SessionManagerConfig } from './session-manager.js';
export {
  CommandClient,
  resolveOverrideMinutes,
  TEMP_CODE_PREFIX,
  LOG_PLAN_NAME,
} from './command-client.js';
export type {
  CommandClientConfig,
  PanelDoor,
  OverrideRequest,
  OverrideOutcome,
  ExecutePlanOptions,
  TempCodeInput,
  TempCodeWindow,
  OtrScheduleInput,
} from './command-client.js';

// Push channel
export { EventStream, createWsSocket } from './event-stream.js';
export type {
  EventStreamConfig,
  HubSocket,
  HubSocketFactory,
  HubSocketOptions,
  DoorStatusSource,
  ConnectionStateCallback,
} from './event-stream.js';
export {
  RECORD_SEPARATOR,
  HubMessageType,
  decodeFrames,
  encodeHandshake,
  encodeInvocation,
  encodePing,
} from './signalr.js';
export type { HubMessage, InvocationMessage, CompletionMessage, DecodedFrame, DecodeResult } from './signalr.js';

// Normalization
export { codecFor, detectDialect, protectorNetCodec, odysseyCodec } from './dialects.js';
export type { DialectCodec, DoorStatusReading } from './dialects.js';
export { DoorDirectory, buildDirectory, normalizeName, stripReaderSuffix } from './door-directory.js';
export type { DirectorySource, DirectorySnapshot, NotificationOrigin } from './door-directory.js';
export { EventNormalizer, extractAccessName, extractActionName } from './event-normalizer.js';
export type { NormalizerConfig, NormalizeResult, PanelNotification } from './event-normalizer.js';

// State
export { DoorStateStore } from './state-store.js';
export { Dispatcher, entityKey } from './dispatcher.js';
export type { Listener, Unsubscribe } from './dispatcher.js';
export { ScheduleCache } from './schedule-cache.js';
export type { ScheduleCacheConfig, ScheduleSource } from './schedule-cache.js';

// Panel time
export { parseUtc, toPanelTime, toIsoUtc, minutesUntil } from './panel-time.js';
