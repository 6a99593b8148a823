export { Bridge, type BridgeOptions } from './bridge.js';
export { createApp, type AppOptions } from './app.js';
export { startServer, type RunningServer } from './server.js';
export { loadConfig, loadConfigFromEnvFile, type BridgeConfig } from './config.js';

export type {
  ChatPresence,
  MessageStore,
  OutboundContent,
  ProtocolSession,
  ProtocolSessionEvents,
  UploadedMedia
} from './core/interfaces.js';
export * from './core/errors.js';
export type * from './dto/events.js';
export * from './dto/messages.js';

export { createMessageStore, MemoryMessageStore, RedisMessageStore, type StoreHandle } from './storage/index.js';

export { ChatLedger } from './services/chatLedger.js';
export { ChatQueries } from './services/chatQueries.js';
export { ContactDirectory } from './services/contactDirectory.js';
export { EventDispatcher, toStoredMessage, type DispatcherEvents } from './services/eventDispatcher.js';
export { InferenceClient, type TextChatResponse, type VoiceCompleteResponse } from './services/inferenceClient.js';
export { MediaTranscoder, estimateDuration, type CommandRunner } from './services/mediaTranscoder.js';
export { Messenger } from './services/messenger.js';
export { PresenceSignaler } from './services/presenceSignaler.js';
export { TextHandler, classifyText } from './services/textHandler.js';
export { UploadRetryManager } from './services/uploadRetryManager.js';
export {
  VoicePipeline,
  type VoiceOutcome,
  type VoicePipelineReport,
  type VoiceState
} from './services/voicePipeline.js';
