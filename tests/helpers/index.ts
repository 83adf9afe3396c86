/**
 * 测试辅助：内存数据库、记录型通知出口、可控时钟
 */

import { SqliteCheckerStore } from '../../src/store/SqliteCheckerStore.js'
import { createCheckerRegistry, type RegisterOptions } from '../../src/checker/registry.js'
import type { CheckFunction, RegisteredChecker } from '../../src/types/checker.js'
import type { ChatMessage, MailMessage, NotificationTransport } from '../../src/notify/types.js'

export function createTestStore(): SqliteCheckerStore {
  return new SqliteCheckerStore(':memory:')
}

export interface RecordingTransport extends NotificationTransport {
  mails: MailMessage[]
  chats: ChatMessage[]
}

export function createRecordingTransport(): RecordingTransport {
  const mails: MailMessage[] = []
  const chats: ChatMessage[] = []
  return {
    mails,
    chats,
    async sendMail(message) {
      mails.push(message)
      return true
    },
    async sendChat(message) {
      chats.push(message)
      return true
    },
  }
}

/**
 * 每次调用前进一分钟，从 2024-01-01T00:00:00Z 开始
 */
export function createTestClock(start: string = '2024-01-01T00:00:00.000Z'): () => string {
  let current = new Date(start).getTime()
  return () => {
    const stamp = new Date(current).toISOString()
    current += 60_000
    return stamp
  }
}

export function registerTestChecker(check: CheckFunction, options: RegisterOptions = {}): RegisteredChecker {
  return createCheckerRegistry().register(check, options)
}
