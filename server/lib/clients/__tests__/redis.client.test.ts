/**
 * RedisStreamLog 测试：脚本化的 ioredis 替身，校验命令参数与回复解析
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../../core/logger', () => ({
  createModuleLogger: () => ({ info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn() }),
}));

import { TransportError } from '../../../core/errors';
import { RedisStreamLog, type StreamCommandClient } from '../redis.client';

class FakeRedis implements StreamCommandClient {
  readonly call = vi.fn(async (_command: string, ..._args: (string | number)[]): Promise<unknown> => null);
  readonly quit = vi.fn(async (): Promise<unknown> => 'OK');
  readonly disconnect = vi.fn();
  readonly duplicates: FakeRedis[] = [];

  duplicate(): FakeRedis {
    const copy = new FakeRedis();
    this.duplicates.push(copy);
    return copy;
  }
}

describe('RedisStreamLog', () => {
  let client: FakeRedis;
  let log: RedisStreamLog;

  beforeEach(() => {
    client = new FakeRedis();
    log = new RedisStreamLog(client);
  });

  it('append 发送 XADD MAXLEN ~ 并返回条目 ID', async () => {
    client.call.mockResolvedValueOnce('1700000000000-0');

    const id = await log.append('events:chat', { event: '{}', type: 'chat.message.received' }, 100);

    expect(id).toBe('1700000000000-0');
    expect(client.call).toHaveBeenCalledWith(
      'XADD', 'events:chat', 'MAXLEN', '~', 100, '*', 'event', '{}', 'type', 'chat.message.received',
    );
  });

  it('append 失败包装为 TransportError', async () => {
    client.call.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const err = await log.append('events:chat', { event: '{}' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TransportError);
    expect(err).toHaveProperty('message', "Transport 'redis': XADD failed: ECONNREFUSED");
  });

  it('append 回复不是字符串时报错', async () => {
    client.call.mockResolvedValueOnce(null);
    await expect(log.append('s', { event: '{}' })).rejects.toThrow('XADD returned unexpected reply for s');
  });

  it('createGroup 使用 MKSTREAM，BUSYGROUP 视为已存在', async () => {
    expect(await log.createGroup('events:chat', 'workers', '0')).toBe(true);
    expect(client.call).toHaveBeenCalledWith('XGROUP', 'CREATE', 'events:chat', 'workers', '0', 'MKSTREAM');

    client.call.mockRejectedValueOnce(new Error('BUSYGROUP Consumer Group name already exists'));
    expect(await log.createGroup('events:chat', 'workers', '0')).toBe(false);

    client.call.mockRejectedValueOnce(new Error('WRONGTYPE'));
    await expect(log.createGroup('events:chat', 'workers')).rejects.toThrow('XGROUP CREATE failed: WRONGTYPE');
  });

  it('range 解析扁平字段并丢弃已删除条目', async () => {
    client.call.mockResolvedValueOnce([
      ['1-0', ['event', '{"a":1}', 'type', 'cache.invalidated']],
      ['2-0', null],
    ]);

    const entries = await log.range('events:cache', '-', '+', 10);

    expect(client.call).toHaveBeenCalledWith('XRANGE', 'events:cache', '-', '+', 'COUNT', 10);
    expect(entries).toEqual([{ id: '1-0', fields: { event: '{"a":1}', type: 'cache.invalidated' } }]);
  });

  it('revRange 参数顺序为 end start', async () => {
    client.call.mockResolvedValueOnce([]);
    await log.revRange('events:dlq', '+', '-', 5);
    expect(client.call).toHaveBeenCalledWith('XREVRANGE', 'events:dlq', '+', '-', 'COUNT', 5);
  });

  it('range 回复格式异常时报错', async () => {
    client.call.mockResolvedValueOnce('garbage');
    await expect(log.range('s')).rejects.toThrow('XRANGE returned unexpected reply');
  });

  it('ack / delete 空列表不发命令', async () => {
    expect(await log.ack('s', 'g', [])).toBe(0);
    expect(await log.delete('s', [])).toBe(0);
    expect(client.call).not.toHaveBeenCalled();

    client.call.mockResolvedValueOnce(2);
    expect(await log.ack('s', 'g', ['1-0', '2-0'])).toBe(2);
    expect(client.call).toHaveBeenCalledWith('XACK', 's', 'g', '1-0', '2-0');
  });

  it('pending 解析 XPENDING 汇总', async () => {
    client.call.mockResolvedValueOnce([3, '1-0', '3-0', [['worker-a', '2'], ['worker-b', '1']]]);
    expect(await log.pending('s', 'g')).toEqual({
      count: 3,
      minId: '1-0',
      maxId: '3-0',
      consumers: [{ name: 'worker-a', pending: 2 }, { name: 'worker-b', pending: 1 }],
    });
  });

  it('pending 无待确认消息', async () => {
    client.call.mockResolvedValueOnce([0, null, null, null]);
    expect(await log.pending('s', 'g')).toEqual({ count: 0, minId: null, maxId: null, consumers: [] });
  });

  describe('读取器', () => {
    it('使用独立连接执行 XREADGROUP BLOCK', async () => {
      const reader = log.openReader('worker:chat');
      const connection = client.duplicates[0];
      connection.call.mockResolvedValueOnce([['events:chat', [['5-0', ['event', '{}']]]]]);

      const entries = await reader.readGroup('g', 'worker', 'events:chat', { count: 10, blockMs: 1000 });

      expect(entries).toEqual([{ id: '5-0', fields: { event: '{}' } }]);
      expect(connection.call).toHaveBeenCalledWith(
        'XREADGROUP', 'GROUP', 'g', 'worker', 'COUNT', 10, 'BLOCK', 1000, 'STREAMS', 'events:chat', '>',
      );
      expect(client.call).not.toHaveBeenCalled();
    });

    it('读取待确认消息时不带 BLOCK', async () => {
      const reader = log.openReader('worker:chat');
      const connection = client.duplicates[0];
      connection.call.mockResolvedValueOnce(null);

      expect(await reader.readGroup('g', 'worker', 'events:chat', { count: 5, blockMs: 1000, fromId: '0' })).toEqual([]);
      expect(connection.call).toHaveBeenCalledWith(
        'XREADGROUP', 'GROUP', 'g', 'worker', 'COUNT', 5, 'STREAMS', 'events:chat', '0',
      );
    });

    it('待确认重读中已被截断的条目标记为 trimmed', async () => {
      const reader = log.openReader('worker:chat');
      const connection = client.duplicates[0];
      connection.call.mockResolvedValueOnce([['events:chat', [['1-0', null], ['2-0', null], ['3-0', ['event', '{}']]]]]);

      const entries = await reader.readGroup('g', 'worker', 'events:chat', { count: 10, fromId: '0' });

      expect(entries).toEqual([
        { id: '1-0', fields: {}, trimmed: true },
        { id: '2-0', fields: {}, trimmed: true },
        { id: '3-0', fields: { event: '{}' } },
      ]);
    });

    it('关闭过程中的读取错误返回空结果', async () => {
      const reader = log.openReader('worker:chat');
      const connection = client.duplicates[0];
      let fail: (err: Error) => void = () => undefined;
      connection.call.mockImplementationOnce(() => new Promise<unknown>((_resolve, reject) => {
        fail = reject;
      }));

      const read = reader.readGroup('g', 'worker', 'events:chat', { count: 10, blockMs: 60000 });
      await reader.close();
      fail(new Error('Connection is closed.'));

      expect(await read).toEqual([]);
      expect(connection.disconnect).toHaveBeenCalledTimes(1);
    });

    it('未关闭时的读取错误包装为 TransportError', async () => {
      const reader = log.openReader('worker:chat');
      client.duplicates[0].call.mockRejectedValueOnce(new Error('NOGROUP'));
      await expect(reader.readGroup('g', 'worker', 's', { count: 1 })).rejects.toThrow('XREADGROUP failed: NOGROUP');
    });

    it('close() 关闭所有读取器并退出主连接', async () => {
      log.openReader('a');
      log.openReader('b');

      await log.close();

      expect(client.duplicates.map(d => d.disconnect.mock.calls.length)).toEqual([1, 1]);
      expect(client.quit).toHaveBeenCalledTimes(1);
    });
  });
});
