export { SandboxEngine, DEFAULT_HOST_NAMESPACE, INITIALIZE_EXPORT } from './engine.js';
export type { SandboxEngineOptions } from './engine.js';
export { SandboxPlugin } from './sandbox-plugin.js';
export { ObjectChannel } from './channel.js';
export type { ChannelReader, ChannelWriter } from './channel.js';
export { FilePipe, PipePair } from './pipe.js';
export type { PipeDirection } from './pipe.js';
export { createHostImports, hostHandleNotification } from './host-bridge.js';
export type { SandboxEnv } from './host-bridge.js';
