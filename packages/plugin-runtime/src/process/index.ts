export { ProcessPlugin } from './process-plugin.js';
export type { PluginProcess, InitializeParams, ProcessPluginOptions } from './process-plugin.js';
export { LineMessageReader, LineMessageWriter } from './line-transport.js';
