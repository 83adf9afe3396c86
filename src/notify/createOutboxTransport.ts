/**
 * 默认通知出口
 *
 * - 邮件：以 JSON Lines 追加到 outbox 文件，由外部 mailer 投递
 * - 聊天：channel 配置了 webhook 时推送到飞书，否则只写日志
 */

import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { now } from '../shared/formatTime.js'
import { appendJsonLine } from '../store/readWriteJson.js'
import { sendLarkWebhookText } from './sendLarkWebhook.js'
import type { ChatMessage, MailMessage, NotificationTransport } from './types.js'

const logger = createLogger('notify')

export interface OutboxTransportOptions {
  outboxFile: string
  fromEmail: string
  /** channel -> webhook URL */
  webhooks: Record<string, string>
}

/** outbox 文件中的一行 */
export interface OutboxEntry {
  queuedAt: string
  from: string
  to: string[]
  subject: string
  body: string
}

export function formatChatText(message: ChatMessage): string {
  return message.detail ? `${message.text}\n${message.detail}` : message.text
}

export function createOutboxTransport(options: OutboxTransportOptions): NotificationTransport {
  return {
    async sendMail(message: MailMessage) {
      if (message.to.length === 0) {
        logger.debug(`No recipients for "${message.subject}", skipped`)
        return false
      }
      const entry: OutboxEntry = {
        queuedAt: now(),
        from: options.fromEmail,
        to: message.to,
        subject: message.subject,
        body: message.body,
      }
      try {
        appendJsonLine(options.outboxFile, entry)
        logger.info(`Queued mail "${message.subject}" → ${message.to.join(', ')}`)
        return true
      } catch (error) {
        logger.error(`Failed to queue mail "${message.subject}": ${getErrorMessage(error)}`)
        return false
      }
    },

    async sendChat(message: ChatMessage) {
      const webhookUrl = options.webhooks[message.channel]
      if (!webhookUrl) {
        logger.warn(`[${message.channel}] ${message.text}`)
        return false
      }
      const sent = await sendLarkWebhookText(webhookUrl, formatChatText(message))
      if (sent) logger.info(`Sent chat alert to ${message.channel}`)
      return sent
    },
  }
}
