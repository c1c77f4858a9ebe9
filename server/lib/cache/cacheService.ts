import { errorMessage } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
const log = createModuleLogger('cacheService');

/**
 * 多级缓存服务
 * 实现 L1 (内存 LRU) + L2 (Redis) 缓存策略，查询总线的结果缓存
 *
 * L2 是尽力而为的：Redis 出错时记录警告并按未命中处理，不影响查询本身。
 */

// 缓存配置

export interface CacheConfig {
  l1: {
    maxSize: number;
    ttl: number; // 秒
  };
  l2: {
    enabled: boolean;
    ttl: number; // 秒
    keyPrefix: string;
  };
  /** 清理过期条目的周期(ms) */
  cleanupIntervalMs: number;
}

/** L2 需要的最小命令接口（ioredis 实例天然满足） */
export interface CacheCommandClient {
  call(command: string, ...args: (string | number)[]): Promise<unknown>;
}

// 缓存条目
interface CacheEntry<T> {
  value: T;
  expireAt: number;
  createdAt: number;
  hits: number;
}

// 缓存统计
export interface CacheStats {
  l1Hits: number;
  l1Misses: number;
  l2Hits: number;
  l2Misses: number;
  l1Size: number;
  l1HitRate: number;
  l2HitRate: number;
  totalHitRate: number;
}

/** glob（仅 *）转锚定正则 */
function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.split('*').map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'));
  return new RegExp(`^${escaped.join('.*')}$`);
}

/**
 * LRU 缓存实现
 */
export class LRUCache<T> {
  private cache: Map<string, CacheEntry<T>> = new Map();

  constructor(
    private readonly maxSize: number,
    private readonly defaultTTL: number,
  ) {}

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) return undefined;

    if (Date.now() >= entry.expireAt) {
      this.cache.delete(key);
      return undefined;
    }

    // 更新访问顺序（Map 保持插入顺序）
    this.cache.delete(key);
    entry.hits++;
    this.cache.set(key, entry);

    return entry.value;
  }

  set(key: string, value: T, ttl?: number): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    const now = Date.now();
    this.cache.set(key, {
      value,
      expireAt: now + (ttl ?? this.defaultTTL) * 1000,
      createdAt: now,
      hits: 0,
    });
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  clear(): void {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }

  // 清理过期条目
  cleanup(): number {
    const now = Date.now();
    let cleaned = 0;
    for (const [key, entry] of this.cache) {
      if (now >= entry.expireAt) {
        this.cache.delete(key);
        cleaned++;
      }
    }
    return cleaned;
  }

  keys(): string[] {
    return Array.from(this.cache.keys());
  }

  getStats(): { size: number; entries: Array<{ key: string; hits: number; age: number }> } {
    const now = Date.now();
    const entries = Array.from(this.cache.entries()).map(([key, entry]) => ({
      key,
      hits: entry.hits,
      age: Math.floor((now - entry.createdAt) / 1000),
    }));

    return {
      size: this.cache.size,
      entries: entries.sort((a, b) => b.hits - a.hits).slice(0, 20),
    };
  }
}

/**
 * 多级缓存服务
 */
export class MultiLevelCache {
  private l1Cache: LRUCache<unknown>;
  private config: CacheConfig;
  private l2Client: CacheCommandClient | null;
  private stats = {
    l1Hits: 0,
    l1Misses: 0,
    l2Hits: 0,
    l2Misses: 0,
  };
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(config?: { l1?: Partial<CacheConfig['l1']>; l2?: Partial<CacheConfig['l2']>; cleanupIntervalMs?: number }, l2Client?: CacheCommandClient) {
    this.config = {
      l1: {
        maxSize: config?.l1?.maxSize ?? 10000,
        ttl: config?.l1?.ttl ?? 60,
      },
      l2: {
        enabled: config?.l2?.enabled ?? false,
        ttl: config?.l2?.ttl ?? 300,
        keyPrefix: config?.l2?.keyPrefix ?? 'cache:',
      },
      cleanupIntervalMs: config?.cleanupIntervalMs ?? 60000,
    };

    if (this.config.l2.enabled && !l2Client) {
      log.warn('[Cache] L2 enabled without a Redis client, running L1 only');
    }
    this.l2Client = this.config.l2.enabled ? l2Client ?? null : null;

    this.l1Cache = new LRUCache(this.config.l1.maxSize, this.config.l1.ttl);
    this.startCleanup();
  }

  get l2Enabled(): boolean {
    return this.l2Client !== null;
  }

  /**
   * 获取缓存值，未命中返回 undefined
   */
  async get(key: string): Promise<unknown> {
    const l1Value = this.l1Cache.get(key);
    if (l1Value !== undefined) {
      this.stats.l1Hits++;
      return l1Value;
    }
    this.stats.l1Misses++;

    if (!this.l2Client) return undefined;

    const raw = await this.l2Call('GET', [this.l2Key(key)]);
    if (typeof raw !== 'string') {
      this.stats.l2Misses++;
      return undefined;
    }

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch (err) {
      log.warn(`[Cache] Dropping undecodable L2 entry ${key}: ${errorMessage(err)}`);
      this.stats.l2Misses++;
      return undefined;
    }

    this.stats.l2Hits++;
    // 回填 L1
    this.l1Cache.set(key, value);
    return value;
  }

  /**
   * 设置缓存值
   * @param options.l1TTL / l2TTL 秒
   */
  async set(key: string, value: unknown, options?: { l1TTL?: number; l2TTL?: number }): Promise<void> {
    if (value === undefined) return;
    this.l1Cache.set(key, value, options?.l1TTL);

    if (this.l2Client) {
      const ttl = options?.l2TTL ?? options?.l1TTL ?? this.config.l2.ttl;
      await this.l2Call('SET', [this.l2Key(key), JSON.stringify(value), 'EX', Math.max(1, Math.ceil(ttl))]);
    }
  }

  async delete(key: string): Promise<void> {
    this.l1Cache.delete(key);
    if (this.l2Client) {
      await this.l2Call('DEL', [this.l2Key(key)]);
    }
  }

  /**
   * 批量删除（glob 模式，仅支持 *）
   * @returns L1 中删除的条目数
   */
  async deletePattern(pattern: string): Promise<number> {
    const regex = globToRegExp(pattern);
    let deleted = 0;

    for (const key of this.l1Cache.keys()) {
      if (regex.test(key)) {
        this.l1Cache.delete(key);
        deleted++;
      }
    }

    if (this.l2Client) {
      await this.deleteL2Pattern(this.l2Key(pattern));
    }

    return deleted;
  }

  async has(key: string): Promise<boolean> {
    return (await this.get(key)) !== undefined;
  }

  async clear(): Promise<void> {
    this.l1Cache.clear();
    if (this.l2Client) {
      await this.deleteL2Pattern(`${this.config.l2.keyPrefix}*`);
    }
  }

  /**
   * 获取或设置缓存（带回调）
   */
  async getOrSet<T>(
    key: string,
    factory: () => Promise<T>,
    isValue: (cached: unknown) => cached is T,
    options?: { l1TTL?: number; l2TTL?: number },
  ): Promise<T> {
    const cached = await this.get(key);
    if (cached !== undefined && isValue(cached)) {
      return cached;
    }

    const value = await factory();
    await this.set(key, value, options);
    return value;
  }

  getStats(): CacheStats {
    const totalL1 = this.stats.l1Hits + this.stats.l1Misses;
    const totalL2 = this.stats.l2Hits + this.stats.l2Misses;

    return {
      l1Hits: this.stats.l1Hits,
      l1Misses: this.stats.l1Misses,
      l2Hits: this.stats.l2Hits,
      l2Misses: this.stats.l2Misses,
      l1Size: this.l1Cache.size(),
      l1HitRate: totalL1 > 0 ? this.stats.l1Hits / totalL1 : 0,
      l2HitRate: totalL2 > 0 ? this.stats.l2Hits / totalL2 : 0,
      totalHitRate: totalL1 > 0 ? (this.stats.l1Hits + this.stats.l2Hits) / totalL1 : 0,
    };
  }

  resetStats(): void {
    this.stats = {
      l1Hits: 0,
      l1Misses: 0,
      l2Hits: 0,
      l2Misses: 0,
    };
  }

  /** 立即清理一次过期条目 */
  cleanup(): number {
    return this.l1Cache.cleanup();
  }

  /**
   * 停止服务
   */
  stop(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }

  getL1Details(): { size: number; entries: Array<{ key: string; hits: number; age: number }> } {
    return this.l1Cache.getStats();
  }

  // ============ 内部方法 ============

  private startCleanup(): void {
    this.cleanupInterval = setInterval(() => {
      const cleaned = this.l1Cache.cleanup();
      if (cleaned > 0) log.debug(`[Cache] Cleaned ${cleaned} expired entries`);
    }, this.config.cleanupIntervalMs);
    this.cleanupInterval.unref();
  }

  private l2Key(key: string): string {
    return `${this.config.l2.keyPrefix}${key}`;
  }

  private async l2Call(command: string, args: (string | number)[]): Promise<unknown> {
    if (!this.l2Client) return null;
    try {
      return await this.l2Client.call(command, ...args);
    } catch (err) {
      log.warn(`[Cache] L2 ${command} failed: ${errorMessage(err)}`);
      return null;
    }
  }

  private async deleteL2Pattern(match: string): Promise<void> {
    let cursor = '0';
    do {
      const reply = await this.l2Call('SCAN', [cursor, 'MATCH', match, 'COUNT', 100]);
      if (!Array.isArray(reply) || reply.length !== 2) return;
      const [next, keys] = reply;
      cursor = typeof next === 'string' ? next : '0';
      const names = Array.isArray(keys) ? keys.filter((k): k is string => typeof k === 'string') : [];
      if (names.length > 0) {
        await this.l2Call('DEL', names);
      }
    } while (cursor !== '0');
  }
}
