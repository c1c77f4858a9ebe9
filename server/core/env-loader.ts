/**
 * dotenv 分层加载器
 *
 * 加载优先级（后加载的覆盖先加载的）：
 *   1. .env.development / .env.production（按 NODE_ENV 选择）
 *   2. .env.local（个人覆盖，不提交到 Git）
 *   3. .env（通用默认值）
 *   进程启动时已存在的环境变量始终优先，不会被文件覆盖。
 *
 * 注意：此文件必须在 config.ts 之前执行（side-effect import）。
 */

import { parse } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '../../');

/**
 * 按顺序合并 .env 文件并写入目标环境表，返回实际加载的文件列表。
 */
export function loadEnvFiles(
  root: string = ROOT,
  target: Record<string, string | undefined> = process.env,
): string[] {
  const nodeEnv = target.NODE_ENV || 'development';
  const candidates = [`.env.${nodeEnv}`, '.env.local', '.env'];
  const preset = new Set(Object.keys(target).filter(key => target[key] !== undefined));
  const merged: Record<string, string> = {};
  const loaded: string[] = [];

  for (const file of candidates) {
    const fullPath = resolve(root, file);
    if (!existsSync(fullPath)) continue;
    Object.assign(merged, parse(readFileSync(fullPath)));
    loaded.push(file);
  }

  for (const [key, value] of Object.entries(merged)) {
    if (!preset.has(key)) target[key] = value;
  }

  return loaded;
}

const loaded = loadEnvFiles();

// logger 尚未初始化，这里直接用 console
if (loaded.length > 0 && process.env.LOG_LEVEL === 'debug') {
  console.debug(`[env-loader] Loaded config files: ${loaded.join(' → ')}`);
}

export { loaded as loadedEnvFiles };
