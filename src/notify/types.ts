export interface MailMessage {
  to: string[]
  subject: string
  body: string
}

export interface ChatMessage {
  channel: string
  text: string
  detail?: string
}

/**
 * 通知出口。返回 false 表示投递失败（已记录日志），不抛错
 */
export interface NotificationTransport {
  sendMail(message: MailMessage): Promise<boolean>
  sendChat(message: ChatMessage): Promise<boolean>
}
