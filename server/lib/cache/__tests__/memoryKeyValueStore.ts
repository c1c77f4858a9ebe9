/**
 * 进程内 L2 替身：实现 MultiLevelCache 用到的 GET / SET EX / DEL / SCAN
 */
import type { CacheCommandClient } from '../cacheService';

export class MemoryKeyValueStore implements CacheCommandClient {
  readonly data = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  readonly commands: string[] = [];
  failing = false;

  async call(command: string, ...args: (string | number)[]): Promise<unknown> {
    this.commands.push(command);
    if (this.failing) throw new Error('LOADING Redis is loading the dataset in memory');

    switch (command) {
      case 'GET':
        return this.data.get(String(args[0])) ?? null;
      case 'SET': {
        const key = String(args[0]);
        this.data.set(key, String(args[1]));
        if (args[2] === 'EX') this.ttls.set(key, Number(args[3]));
        return 'OK';
      }
      case 'DEL': {
        let removed = 0;
        for (const key of args) {
          if (this.data.delete(String(key))) removed++;
        }
        return removed;
      }
      case 'SCAN': {
        const pattern = String(args[2]);
        const regex = new RegExp(`^${pattern.split('*').map(p => p.replace(/[.+?^${}()|[\]\\]/g, '\\$&')).join('.*')}$`);
        return ['0', [...this.data.keys()].filter(key => regex.test(key))];
      }
      default:
        throw new Error(`ERR unknown command '${command}'`);
    }
  }
}
