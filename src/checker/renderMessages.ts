/**
 * 通知正文
 */

import type { Checker, CheckerFailure } from '../types/checker.js'

export function checkerUrl(siteUrl: string, name: string): string {
  return `${siteUrl.replace(/\/+$/, '')}/checkers/${encodeURIComponent(name)}`
}

function footer(checker: Checker, siteUrl: string): string[] {
  return [
    `Checker: ${checker.name} (${checker.section})`,
    `Severity: ${checker.severity}`,
    `Details: ${checkerUrl(siteUrl, checker.name)}`,
  ]
}

export function renderFailureBody(checker: Checker, failure: CheckerFailure, siteUrl: string): string {
  const lines = [failure.text]
  if (failure.subtext) lines.push('', failure.subtext)
  if (failure.data) {
    lines.push('')
    for (const [key, value] of Object.entries(failure.data)) {
      lines.push(`  ${key}: ${String(value)}`)
    }
  }
  lines.push('', ...footer(checker, siteUrl))
  return lines.join('\n')
}

export function renderErrorBody(checker: Checker, trace: string, siteUrl: string): string {
  return [`${checker.name} raised an error:`, '', trace, '', ...footer(checker, siteUrl)].join('\n')
}

export function renderRecoveryBody(checker: Checker, siteUrl: string): string {
  return [`${checker.name} is now succeeding.`, '', ...footer(checker, siteUrl)].join('\n')
}
