import { resolve } from 'node:path';
import { ConfigService } from '../config/config-service.js';
import { resolveGenerationPaths } from '../config/paths.js';
import type { GeneratorContext } from '../types.js';

/**
 * 构造一次运行的上下文。`root` 缺省时取 TYIPA_GEN_ROOT 或当前目录。
 */
export function createGeneratorContext(root?: string, now: Date = new Date()): GeneratorContext {
  const projectRoot = root ? resolve(root) : ConfigService.getInstance().projectRoot;
  return {
    root: projectRoot,
    paths: resolveGenerationPaths(projectRoot),
    now,
  };
}
