/**
 * @module @plugin-host/plugin-contracts/notifications
 *
 * Guest-to-host notification protocol.
 *
 * Wire shape: `{"method": "<snake_case_name>", "params": {...}}`. The method
 * discriminator determines the params shape; anything else (unknown method,
 * missing params, wrong field types) is a decode failure.
 */

import { z } from 'zod';
import { jsonValueSchema } from './json.js';
import { ChannelDecodeError } from './errors.js';

export const startLspServerParamsSchema = z.object({
  exec_path: z.string(),
  language_id: z.string(),
  // absent and null both mean "no options"
  options: jsonValueSchema.optional().transform((options) => options ?? null),
});

export const pluginNotificationSchema = z.discriminatedUnion('method', [
  z.object({
    method: z.literal('start_lsp_server'),
    params: startLspServerParamsSchema,
  }),
]);

export type StartLspServerParams = z.output<typeof startLspServerParamsSchema>;

export type PluginNotification = z.output<typeof pluginNotificationSchema>;

export type PluginNotificationMethod = PluginNotification['method'];

/**
 * Decode an already-parsed JSON value into a notification.
 *
 * @throws ChannelDecodeError when the value does not match any variant
 */
export function decodeNotification(value: unknown): PluginNotification {
  const result = pluginNotificationSchema.safeParse(value);
  if (!result.success) {
    throw new ChannelDecodeError('Invalid plugin notification', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    });
  }
  return result.data;
}

/**
 * Build a notification from a method name and params, as delivered by an RPC
 * peer that has already split the envelope.
 */
export function decodeNotificationParts(method: string, params: unknown): PluginNotification {
  return decodeNotification({ method, params });
}
