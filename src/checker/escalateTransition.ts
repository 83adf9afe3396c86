/**
 * 通知升级策略
 *
 * 只在状态实际迁移时调用一次：
 * | 新状态      | 动作                                  | HIGH 额外          |
 * | ERRORED    | 邮件 owner + admins，附异常堆栈          | 邮件 paging 地址   |
 * | FAILING    | 聊天告警 + admin 邮件，取本次 run 第一条 failure | 邮件 paging 地址 |
 * | SUCCEEDING | admin 邮件                            | -                |
 * | NEW/IGNORED | -                                    | -                |
 *
 * 投递失败只记录日志，不影响 run 结果。
 */

import { createLogger, logError } from '../shared/logger.js'
import { assertNever } from '../shared/error.js'
import { fromPromise } from '../shared/result.js'
import type { Checker, CheckerFailure, CheckerRun, CheckerStatus } from '../types/checker.js'
import type { MailMessage, NotificationTransport } from '../notify/types.js'
import { renderErrorBody, renderFailureBody, renderRecoveryBody } from './renderMessages.js'

const logger = createLogger('escalator')

export interface EscalatorOptions {
  transport: NotificationTransport
  adminEmails: string[]
  pagingEmail?: string
  siteUrl: string
  alertChannel: string
}

export interface EscalationContext {
  /** 已更新为新状态的 checker */
  checker: Checker
  previousStatus: CheckerStatus
  run: CheckerRun
  /** 本次 run 持久化的 failure，按插入顺序 */
  failures: CheckerFailure[]
}

export interface Escalator {
  /** 返回成功投递的消息数 */
  escalate(context: EscalationContext): Promise<number>
}

function unique(addresses: (string | null | undefined)[]): string[] {
  return [...new Set(addresses.filter((address): address is string => Boolean(address)))]
}

export function createEscalator(options: EscalatorOptions): Escalator {
  const { transport, adminEmails, pagingEmail, siteUrl, alertChannel } = options

  async function deliver(label: string, send: () => Promise<boolean>): Promise<number> {
    const result = await fromPromise(Promise.resolve().then(send))
    if (!result.ok) {
      logError(logger, `Failed to deliver ${label}`, result.error)
      return 0
    }
    return result.value ? 1 : 0
  }

  function mail(label: string, message: MailMessage): Promise<number> {
    if (message.to.length === 0) return Promise.resolve(0)
    return deliver(label, () => transport.sendMail(message))
  }

  async function onErrored({ checker, run }: EscalationContext): Promise<number> {
    const subject = `Error while running ${checker.name}`
    const body = renderErrorBody(checker, run.data?.exception ?? 'No trace recorded', siteUrl)
    let sent = await mail('error mail', { to: unique([checker.owner, ...adminEmails]), subject, body })
    if (checker.severity === 'HIGH' && pagingEmail) {
      sent += await mail('error page', { to: [pagingEmail], subject, body })
    }
    return sent
  }

  async function onFailing({ checker, run, failures }: EscalationContext): Promise<number> {
    const dossier = failures[0]
    if (!dossier) {
      logger.warn(`${checker.name} is failing but run ${run.id} has no persisted failures`)
      return 0
    }
    const body = renderFailureBody(checker, dossier, siteUrl)
    let sent = await deliver('chat alert', () =>
      transport.sendChat({ channel: alertChannel, text: dossier.text, detail: dossier.subtext || undefined })
    )
    sent += await mail('failure mail', { to: unique(adminEmails), subject: dossier.text, body })
    if (checker.severity === 'HIGH' && pagingEmail) {
      sent += await mail('failure page', { to: [pagingEmail], subject: dossier.text, body })
    }
    return sent
  }

  function onSucceeding({ checker }: EscalationContext): Promise<number> {
    return mail('recovery mail', {
      to: unique(adminEmails),
      subject: `${checker.name} is now succeeding`,
      body: renderRecoveryBody(checker, siteUrl),
    })
  }

  return {
    async escalate(context) {
      const status = context.checker.status
      logger.info(`${context.checker.name}: ${context.previousStatus} → ${status}`)
      switch (status) {
        case 'ERRORED':
          return onErrored(context)
        case 'FAILING':
          return onFailing(context)
        case 'SUCCEEDING':
          return onSucceeding(context)
        case 'NEW':
        case 'IGNORED':
          return 0
        default:
          return assertNever(status)
      }
    },
  }
}
