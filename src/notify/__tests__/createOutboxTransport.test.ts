import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, existsSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { createOutboxTransport, formatChatText } from '../createOutboxTransport.js'

const WEBHOOK = 'https://open.feishu.cn/open-apis/bot/v2/hook/test-token'

let dir: string
let outboxFile: string

function readOutbox(): unknown[] {
  return readFileSync(outboxFile, 'utf-8')
    .trim()
    .split('\n')
    .map(line => JSON.parse(line))
}

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'checkwatch-outbox-'))
  outboxFile = join(dir, 'spool', 'outbox.jsonl')
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
  vi.unstubAllGlobals()
})

function transport() {
  return createOutboxTransport({
    outboxFile,
    fromEmail: 'checkwatch@example.com',
    webhooks: { '#alerts': WEBHOOK },
  })
}

describe('createOutboxTransport', () => {
  it('appends one JSON line per mail', async () => {
    const sender = transport()

    expect(await sender.sendMail({ to: ['a@example.com'], subject: 'first', body: 'one' })).toBe(true)
    expect(await sender.sendMail({ to: ['b@example.com', 'c@example.com'], subject: 'second', body: 'two' })).toBe(true)

    const entries = readOutbox()
    expect(entries).toHaveLength(2)
    expect(entries[0]).toMatchObject({
      from: 'checkwatch@example.com',
      to: ['a@example.com'],
      subject: 'first',
      body: 'one',
    })
    expect(entries[1]).toMatchObject({ to: ['b@example.com', 'c@example.com'], subject: 'second' })
  })

  it('skips mail without recipients', async () => {
    expect(await transport().sendMail({ to: [], subject: 'nobody', body: '' })).toBe(false)
    expect(existsSync(outboxFile)).toBe(false)
  })

  it('posts chat alerts to the channel webhook', async () => {
    const fetchMock = vi.fn(async () => new Response(JSON.stringify({ code: 0, msg: 'success' }), { status: 200 }))
    vi.stubGlobal('fetch', fetchMock)

    const sent = await transport().sendChat({ channel: '#alerts', text: 'Disk almost full', detail: '/var at 97%' })

    expect(sent).toBe(true)
    expect(fetchMock).toHaveBeenCalledWith(WEBHOOK, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ msg_type: 'text', content: { text: 'Disk almost full\n/var at 97%' } }),
    })
  })

  it('returns false when the webhook reports an error code', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response(JSON.stringify({ code: 19021, msg: 'sign match fail' }), { status: 200 }))
    )

    expect(await transport().sendChat({ channel: '#alerts', text: 'x' })).toBe(false)
  })

  it('returns false when the request fails', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new Error('network down')
      })
    )

    expect(await transport().sendChat({ channel: '#alerts', text: 'x' })).toBe(false)
  })

  it('does not post to channels without a webhook', async () => {
    const fetchMock = vi.fn()
    vi.stubGlobal('fetch', fetchMock)

    expect(await transport().sendChat({ channel: '#elsewhere', text: 'x' })).toBe(false)
    expect(fetchMock).not.toHaveBeenCalled()
  })
})

describe('formatChatText', () => {
  it('appends the detail on its own line', () => {
    expect(formatChatText({ channel: '#a', text: 'title' })).toBe('title')
    expect(formatChatText({ channel: '#a', text: 'title', detail: 'more' })).toBe('title\nmore')
  })
})
