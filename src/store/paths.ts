/**
 * 统一存储路径常量
 *
 * 数据目录优先级：
 * 1. 环境变量 CHECKWATCH_DATA_DIR
 * 2. 默认值 .checkwatch-data
 */

import { join } from 'path'

const DEFAULT_DATA_DIR_NAME = '.checkwatch-data'

function getDataDir(): string {
  const envDir = process.env.CHECKWATCH_DATA_DIR
  if (envDir) {
    return envDir.startsWith('/') ? envDir : join(process.cwd(), envDir)
  }
  return join(process.cwd(), DEFAULT_DATA_DIR_NAME)
}

/** 主数据目录 */
export const DATA_DIR = getDataDir()

/** SQLite 数据库 */
export const DB_FILE = join(DATA_DIR, 'checkwatch.db')

/** 运行锁目录（daemon 锁 + 每个 checker 的锁） */
export const LOCKS_DIR = join(DATA_DIR, 'locks')

/** 邮件待发队列（JSON Lines，由外部 mailer 消费） */
export const DEFAULT_OUTBOX_FILE = join(DATA_DIR, 'outbox.jsonl')
