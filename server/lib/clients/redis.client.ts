/**
 * Redis 客户端服务
 * 连接管理 + Redis Streams 日志实现（事件总线的持久化层）
 *
 * 与旧版缓存客户端不同，这里的流操作不吞错误：
 * 发布失败必须以 TransportError 传给调用方。
 */

import Redis from 'ioredis';
import { z } from 'zod';
import type { AppConfig } from '../../core/config';
import { TransportError, errorMessage } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import type {
  PendingSummary,
  ReadGroupOptions,
  StreamEntry,
  StreamLog,
  StreamReader,
} from '../../platform/events/stream-log';

const log = createModuleLogger('redis');

// ============ 连接 ============

/**
 * 流日志所需的最小命令接口（ioredis 的 Redis 实例天然满足）
 */
export interface StreamCommandClient {
  call(command: string, ...args: (string | number)[]): Promise<unknown>;
  duplicate(): StreamCommandClient;
  quit(): Promise<unknown>;
  disconnect(): void;
}

/**
 * 按配置创建 ioredis 连接（REDIS_URL 优先，否则 host/port）
 */
export function createRedisConnection(cfg: AppConfig['redis']): Redis {
  const retryStrategy = (times: number): number | null => {
    if (times > cfg.maxConnectionAttempts) {
      log.error('[Redis] Max connection attempts reached');
      return null;
    }
    return Math.min(times * cfg.retryDelayMs, 3000);
  };

  const client = cfg.url
    ? new Redis(cfg.url, {
        keyPrefix: cfg.keyPrefix || undefined,
        maxRetriesPerRequest: cfg.maxRetriesPerRequest,
        retryStrategy,
      })
    : new Redis({
        host: cfg.host,
        port: cfg.port,
        password: cfg.password,
        db: cfg.db,
        keyPrefix: cfg.keyPrefix || undefined,
        maxRetriesPerRequest: cfg.maxRetriesPerRequest,
        retryStrategy,
      });

  client.on('connect', () => {
    log.debug('[Redis] Connected to Redis server');
  });

  client.on('error', (err: Error) => {
    log.error('[Redis] Connection error:', err.message);
  });

  client.on('close', () => {
    log.debug('[Redis] Connection closed');
  });

  return client;
}

// ============ 回复解析 ============

const flatFieldsSchema = z.array(z.string()).nullable();
const rawEntrySchema = z.tuple([z.string(), flatFieldsSchema]);
const rawEntriesSchema = z.array(rawEntrySchema).nullable();
const readGroupReplySchema = z.array(z.tuple([z.string(), z.array(rawEntrySchema)])).nullable();
const pendingReplySchema = z.tuple([
  z.number(),
  z.string().nullable(),
  z.string().nullable(),
  z.array(z.tuple([z.string(), z.union([z.string(), z.number()])])).nullable(),
]);

function toFields(flat: string[]): Record<string, string> {
  const fields: Record<string, string> = {};
  for (let i = 0; i + 1 < flat.length; i += 2) {
    fields[flat[i]] = flat[i + 1];
  }
  return fields;
}

/** 已被 MAXLEN 截断的待确认条目，XREADGROUP 返回 nil 字段，标记为 trimmed 交给调用方确认 */
function toEntries(raw: Array<[string, string[] | null]>): StreamEntry[] {
  return raw.map(([id, flat]) => (flat ? { id, fields: toFields(flat) } : { id, fields: {}, trimmed: true }));
}

// ============ Redis Streams 日志 ============

export class RedisStreamLog implements StreamLog {
  private readers = new Set<RedisStreamReader>();

  constructor(private readonly client: StreamCommandClient) {}

  /**
   * XADD：追加消息
   * @param maxLen 可选 MAXLEN 近似截断（~）
   */
  async append(stream: string, fields: Record<string, string>, maxLen?: number): Promise<string> {
    const args: (string | number)[] = [stream];
    if (maxLen !== undefined) {
      args.push('MAXLEN', '~', maxLen);
    }
    args.push('*');
    for (const [k, v] of Object.entries(fields)) {
      args.push(k, v);
    }
    const id = await this.exec('XADD', args);
    if (typeof id !== 'string') {
      throw new TransportError('redis', `XADD returned unexpected reply for ${stream}`);
    }
    return id;
  }

  /**
   * XGROUP CREATE ... MKSTREAM：BUSYGROUP 视为已存在
   */
  async createGroup(stream: string, group: string, startId: string = '$'): Promise<boolean> {
    try {
      await this.client.call('XGROUP', 'CREATE', stream, group, startId, 'MKSTREAM');
      return true;
    } catch (error) {
      if (errorMessage(error).includes('BUSYGROUP')) {
        return false;
      }
      throw new TransportError('redis', `XGROUP CREATE failed: ${errorMessage(error)}`, { stream, group });
    }
  }

  /**
   * 阻塞读使用独立连接，避免 BLOCK 期间占住共享连接上的 XADD/XACK
   */
  openReader(name: string): StreamReader {
    const reader = new RedisStreamReader(name, this.client.duplicate(), () => this.readers.delete(reader));
    this.readers.add(reader);
    return reader;
  }

  async ack(stream: string, group: string, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const acked = await this.exec('XACK', [stream, group, ...ids]);
    return typeof acked === 'number' ? acked : 0;
  }

  async range(stream: string, start: string = '-', end: string = '+', count?: number): Promise<StreamEntry[]> {
    const args: (string | number)[] = [stream, start, end];
    if (count !== undefined) args.push('COUNT', count);
    return this.parseEntries('XRANGE', await this.exec('XRANGE', args));
  }

  async revRange(stream: string, end: string = '+', start: string = '-', count?: number): Promise<StreamEntry[]> {
    const args: (string | number)[] = [stream, end, start];
    if (count !== undefined) args.push('COUNT', count);
    return this.parseEntries('XREVRANGE', await this.exec('XREVRANGE', args));
  }

  async delete(stream: string, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const deleted = await this.exec('XDEL', [stream, ...ids]);
    return typeof deleted === 'number' ? deleted : 0;
  }

  async length(stream: string): Promise<number> {
    const len = await this.exec('XLEN', [stream]);
    return typeof len === 'number' ? len : 0;
  }

  async pending(stream: string, group: string): Promise<PendingSummary> {
    const raw = await this.exec('XPENDING', [stream, group]);
    const parsed = pendingReplySchema.safeParse(raw);
    if (!parsed.success) {
      return { count: 0, minId: null, maxId: null, consumers: [] };
    }
    const [count, minId, maxId, consumers] = parsed.data;
    return {
      count,
      minId,
      maxId,
      consumers: (consumers ?? []).map(([name, pending]) => ({ name, pending: Number(pending) })),
    };
  }

  async close(): Promise<void> {
    for (const reader of [...this.readers]) {
      await reader.close();
    }
    await this.client.quit();
    log.debug('[Redis] Stream log closed');
  }

  private async exec(command: string, args: (string | number)[]): Promise<unknown> {
    try {
      return await this.client.call(command, ...args);
    } catch (error) {
      throw new TransportError('redis', `${command} failed: ${errorMessage(error)}`, { stream: args[0] });
    }
  }

  private parseEntries(command: string, raw: unknown): StreamEntry[] {
    const parsed = rawEntriesSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TransportError('redis', `${command} returned unexpected reply`);
    }
    return toEntries(parsed.data ?? []).filter(entry => !entry.trimmed);
  }
}

class RedisStreamReader implements StreamReader {
  private closed = false;

  constructor(
    private readonly name: string,
    private readonly connection: StreamCommandClient,
    private readonly onClose: () => void,
  ) {}

  /**
   * XREADGROUP GROUP g c COUNT n [BLOCK ms] STREAMS s id
   */
  async readGroup(group: string, consumer: string, stream: string, options: ReadGroupOptions): Promise<StreamEntry[]> {
    if (this.closed) return [];
    const fromId = options.fromId ?? '>';
    const args: (string | number)[] = ['GROUP', group, consumer, 'COUNT', options.count];
    if (options.blockMs !== undefined && fromId === '>') {
      args.push('BLOCK', options.blockMs);
    }
    args.push('STREAMS', stream, fromId);

    let raw: unknown;
    try {
      raw = await this.connection.call('XREADGROUP', ...args);
    } catch (error) {
      // close() 断开连接会让阻塞中的读取以错误返回
      if (this.closed) return [];
      throw new TransportError('redis', `XREADGROUP failed: ${errorMessage(error)}`, { stream, group, reader: this.name });
    }

    const parsed = readGroupReplySchema.safeParse(raw);
    if (!parsed.success) {
      throw new TransportError('redis', 'XREADGROUP returned unexpected reply', { stream, group });
    }
    const entries: StreamEntry[] = [];
    for (const [, streamEntries] of parsed.data ?? []) {
      entries.push(...toEntries(streamEntries));
    }
    return entries;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.connection.disconnect();
    this.onClose();
  }
}
