/**
 * @entry Notify 通知出口
 */

export type { MailMessage, ChatMessage, NotificationTransport } from './types.js'
export {
  createOutboxTransport,
  formatChatText,
  type OutboxEntry,
  type OutboxTransportOptions,
} from './createOutboxTransport.js'
export { sendLarkWebhookText } from './sendLarkWebhook.js'
