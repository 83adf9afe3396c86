/**
 * 任务队列
 * 按入队顺序出队，同一 id 在队列中只保留一份
 */

export interface QueueItem<T> {
  id: string
  data: T
}

export interface Queue<T> {
  // 入队，id 已在队列中时返回 false
  enqueue(id: string, data: T): boolean
  // 出队（最早入队的任务）
  dequeue(): QueueItem<T> | null
  size(): number
  clear(): void
}

export function createQueue<T>(): Queue<T> {
  // Map 保持插入顺序
  const items = new Map<string, QueueItem<T>>()

  return {
    enqueue(id: string, data: T): boolean {
      if (items.has(id)) return false
      items.set(id, { id, data })
      return true
    },

    dequeue(): QueueItem<T> | null {
      for (const item of items.values()) {
        items.delete(item.id)
        return item
      }
      return null
    },

    size(): number {
      return items.size
    },

    clear(): void {
      items.clear()
    },
  }
}
