/**
 * 飞书/Lark 自定义机器人 webhook
 */

import { z } from 'zod'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'

const logger = createLogger('lark-webhook')

const webhookResponseSchema = z.object({
  code: z.number().optional(),
  msg: z.string().optional(),
})

/**
 * 发送文本消息，失败只记录日志
 */
export async function sendLarkWebhookText(webhookUrl: string, text: string): Promise<boolean> {
  try {
    const response = await fetch(webhookUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ msg_type: 'text', content: { text } }),
    })

    if (!response.ok) {
      const body = await response.text()
      logger.error(`Failed to send Lark webhook: ${response.status} ${body}`)
      return false
    }

    const result = webhookResponseSchema.safeParse(await response.json())
    if (!result.success || (result.data.code !== undefined && result.data.code !== 0)) {
      logger.error(`Lark webhook error: ${result.success ? result.data.msg : 'unexpected response'}`)
      return false
    }

    return true
  } catch (error) {
    logger.error(`Failed to send Lark webhook: ${getErrorMessage(error)}`)
    return false
  }
}
