/**
 * ============================================================================
 * 追加日志抽象：StreamLog
 * ============================================================================
 *
 * 事件总线只依赖这组 Redis Streams 语义：
 *   XADD(MAXLEN ~) / XGROUP CREATE(MKSTREAM) / XREADGROUP(BLOCK) / XACK /
 *   XRANGE / XREVRANGE / XDEL / XLEN / XPENDING
 *
 * 两个实现：
 *   - RedisStreamLog（server/lib/clients/redis.client.ts）：生产
 *   - MemoryStreamLog（本文件）：未配置 Redis 时的开发降级 + 单元测试
 */

export interface StreamEntry {
  id: string;
  fields: Record<string, string>;
  /** 仅出现在待确认重读中：条目已被 MAXLEN/XDEL 删除，只剩待确认记录，fields 为空 */
  trimmed?: boolean;
}

export interface ReadGroupOptions {
  count: number;
  /** 阻塞毫秒数；仅在 fromId 为 '>' 时生效 */
  blockMs?: number;
  /** '>' 读取新消息（默认）；'0' 等具体 ID 读取本消费者的待确认消息 */
  fromId?: string;
}

export interface PendingSummary {
  count: number;
  minId: string | null;
  maxId: string | null;
  consumers: Array<{ name: string; pending: number }>;
}

/**
 * 阻塞读取器。每个消费循环独占一个，close() 会让进行中的阻塞读立即返回。
 */
export interface StreamReader {
  readGroup(group: string, consumer: string, stream: string, options: ReadGroupOptions): Promise<StreamEntry[]>;
  close(): Promise<void>;
}

export interface StreamLog {
  append(stream: string, fields: Record<string, string>, maxLen?: number): Promise<string>;
  /** 创建消费者组；组已存在时返回 false */
  createGroup(stream: string, group: string, startId?: string): Promise<boolean>;
  openReader(name: string): StreamReader;
  ack(stream: string, group: string, ids: string[]): Promise<number>;
  range(stream: string, start?: string, end?: string, count?: number): Promise<StreamEntry[]>;
  revRange(stream: string, end?: string, start?: string, count?: number): Promise<StreamEntry[]>;
  delete(stream: string, ids: string[]): Promise<number>;
  length(stream: string): Promise<number>;
  pending(stream: string, group: string): Promise<PendingSummary>;
  close(): Promise<void>;
}

// ============================================================================
// 流 ID
// ============================================================================

interface ParsedId {
  ms: number;
  seq: number;
}

export function parseStreamId(id: string): ParsedId {
  if (id === '-') return { ms: 0, seq: 0 };
  if (id === '+') return { ms: Number.MAX_SAFE_INTEGER, seq: Number.MAX_SAFE_INTEGER };
  const [ms, seq] = id.split('-');
  return { ms: Number(ms), seq: seq === undefined ? 0 : Number(seq) };
}

export function compareStreamIds(a: string, b: string): number {
  const pa = parseStreamId(a);
  const pb = parseStreamId(b);
  if (pa.ms !== pb.ms) return pa.ms < pb.ms ? -1 : 1;
  if (pa.seq !== pb.seq) return pa.seq < pb.seq ? -1 : 1;
  return 0;
}

// ============================================================================
// 内存实现
// ============================================================================

interface PendingEntry {
  consumer: string;
  deliveries: number;
}

interface MemoryGroup {
  lastDeliveredId: string;
  pending: Map<string, PendingEntry>;
}

interface MemoryStream {
  entries: StreamEntry[];
  lastId: ParsedId;
  groups: Map<string, MemoryGroup>;
  waiters: Set<() => void>;
}

export class MemoryStreamLog implements StreamLog {
  private streams = new Map<string, MemoryStream>();
  private closed = false;

  async append(stream: string, fields: Record<string, string>, maxLen?: number): Promise<string> {
    if (this.closed) throw new Error('MemoryStreamLog is closed');
    const s = this.ensureStream(stream);

    const now = Date.now();
    const next: ParsedId = now > s.lastId.ms
      ? { ms: now, seq: 0 }
      : { ms: s.lastId.ms, seq: s.lastId.seq + 1 };
    s.lastId = next;

    const id = `${next.ms}-${next.seq}`;
    s.entries.push({ id, fields: { ...fields } });

    if (maxLen !== undefined && s.entries.length > maxLen) {
      s.entries.splice(0, s.entries.length - maxLen);
    }

    const waiters = [...s.waiters];
    s.waiters.clear();
    for (const wake of waiters) wake();

    return id;
  }

  async createGroup(stream: string, group: string, startId: string = '$'): Promise<boolean> {
    const s = this.ensureStream(stream);
    if (s.groups.has(group)) return false;
    const lastDeliveredId = startId === '$' ? `${s.lastId.ms}-${s.lastId.seq}` : startId;
    s.groups.set(group, { lastDeliveredId, pending: new Map() });
    return true;
  }

  openReader(_name: string): StreamReader {
    return new MemoryStreamReader(this);
  }

  /** @internal 供 MemoryStreamReader 调用 */
  readGroupOnce(group: string, consumer: string, stream: string, count: number, fromId: string): StreamEntry[] {
    const s = this.streams.get(stream);
    const g = s?.groups.get(group);
    if (!s || !g) {
      throw new Error(`NOGROUP No such key '${stream}' or consumer group '${group}'`);
    }

    if (fromId !== '>') {
      // 重读本消费者的待确认消息；已被删除的条目以 trimmed 返回，与 XREADGROUP 的 nil 一致
      const ids = [...g.pending.entries()]
        .filter(([id, p]) => p.consumer === consumer && compareStreamIds(id, fromId) > 0)
        .map(([id]) => id)
        .sort(compareStreamIds)
        .slice(0, count);
      const byId = new Map(s.entries.map(e => [e.id, e]));
      return ids.map((id) => {
        const p = g.pending.get(id);
        if (p) p.deliveries++;
        const entry = byId.get(id);
        return entry ? { id, fields: { ...entry.fields } } : { id, fields: {}, trimmed: true };
      });
    }

    const result: StreamEntry[] = [];
    for (const entry of s.entries) {
      if (result.length >= count) break;
      if (compareStreamIds(entry.id, g.lastDeliveredId) <= 0) continue;
      g.pending.set(entry.id, { consumer, deliveries: 1 });
      g.lastDeliveredId = entry.id;
      result.push({ id: entry.id, fields: { ...entry.fields } });
    }
    return result;
  }

  /** @internal 等待下一次 append，返回取消函数 */
  waitForAppend(stream: string, wake: () => void): () => void {
    const s = this.ensureStream(stream);
    s.waiters.add(wake);
    return () => {
      s.waiters.delete(wake);
    };
  }

  async ack(stream: string, group: string, ids: string[]): Promise<number> {
    const g = this.streams.get(stream)?.groups.get(group);
    if (!g) return 0;
    let acked = 0;
    for (const id of ids) {
      if (g.pending.delete(id)) acked++;
    }
    return acked;
  }

  async range(stream: string, start: string = '-', end: string = '+', count?: number): Promise<StreamEntry[]> {
    const entries = this.streams.get(stream)?.entries ?? [];
    const result = entries.filter(e => compareStreamIds(e.id, start) >= 0 && compareStreamIds(e.id, end) <= 0);
    return (count === undefined ? result : result.slice(0, count)).map(e => ({ id: e.id, fields: { ...e.fields } }));
  }

  async revRange(stream: string, end: string = '+', start: string = '-', count?: number): Promise<StreamEntry[]> {
    const forward = await this.range(stream, start, end);
    const reversed = forward.reverse();
    return count === undefined ? reversed : reversed.slice(0, count);
  }

  async delete(stream: string, ids: string[]): Promise<number> {
    const s = this.streams.get(stream);
    if (!s) return 0;
    const targets = new Set(ids);
    const before = s.entries.length;
    s.entries = s.entries.filter(e => !targets.has(e.id));
    return before - s.entries.length;
  }

  async length(stream: string): Promise<number> {
    return this.streams.get(stream)?.entries.length ?? 0;
  }

  async pending(stream: string, group: string): Promise<PendingSummary> {
    const g = this.streams.get(stream)?.groups.get(group);
    if (!g || g.pending.size === 0) {
      return { count: 0, minId: null, maxId: null, consumers: [] };
    }
    const ids = [...g.pending.keys()].sort(compareStreamIds);
    const perConsumer = new Map<string, number>();
    for (const p of g.pending.values()) {
      perConsumer.set(p.consumer, (perConsumer.get(p.consumer) ?? 0) + 1);
    }
    return {
      count: ids.length,
      minId: ids[0] ?? null,
      maxId: ids[ids.length - 1] ?? null,
      consumers: [...perConsumer.entries()].map(([name, pending]) => ({ name, pending })),
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const s of this.streams.values()) {
      const waiters = [...s.waiters];
      s.waiters.clear();
      for (const wake of waiters) wake();
    }
  }

  private ensureStream(stream: string): MemoryStream {
    let s = this.streams.get(stream);
    if (!s) {
      s = { entries: [], lastId: { ms: 0, seq: 0 }, groups: new Map(), waiters: new Set() };
      this.streams.set(stream, s);
    }
    return s;
  }
}

class MemoryStreamReader implements StreamReader {
  private closed = false;
  private cancelWaits = new Set<() => void>();

  constructor(private readonly log: MemoryStreamLog) {}

  async readGroup(group: string, consumer: string, stream: string, options: ReadGroupOptions): Promise<StreamEntry[]> {
    if (this.closed) return [];
    const fromId = options.fromId ?? '>';
    const first = this.log.readGroupOnce(group, consumer, stream, options.count, fromId);
    if (first.length > 0 || fromId !== '>' || !options.blockMs) return first;

    await new Promise<void>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const finish = () => {
        if (timer) clearTimeout(timer);
        unsubscribe();
        this.cancelWaits.delete(finish);
        resolve();
      };
      const unsubscribe = this.log.waitForAppend(stream, finish);
      this.cancelWaits.add(finish);
      timer = setTimeout(finish, options.blockMs);
    });

    if (this.closed) return [];
    return this.log.readGroupOnce(group, consumer, stream, options.count, fromId);
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const cancel of [...this.cancelWaits]) cancel();
  }
}
