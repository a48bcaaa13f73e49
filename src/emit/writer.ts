import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { GenerationMode, OutputStatus } from '../types.js';
import { withoutTimestamp } from './header.js';

/**
 * 写出（或在 check 模式下比对）一个生成文件。
 *
 * 写出时整体覆盖，必要时创建父目录；比对时忽略时间戳行。
 */
export function emitFile(file: string, content: string, mode: GenerationMode): OutputStatus {
  if (mode === 'check') {
    if (!existsSync(file)) return { file, state: 'missing' };
    const current = readFileSync(file, 'utf8');
    const upToDate = withoutTimestamp(current) === withoutTimestamp(content);
    return { file, state: upToDate ? 'up-to-date' : 'stale' };
  }

  mkdirSync(dirname(file), { recursive: true });
  writeFileSync(file, content, 'utf8');
  return { file, state: 'written' };
}
