/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **设计目标**：
 * - 单一数据源：所有配置从 ConfigService 获取，避免散落的 process.env 访问
 * - 类型安全：提供强类型配置接口
 * - 可测试性：支持测试环境下重置配置
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const root = ConfigService.getInstance().projectRoot;
 * ```
 */

import { resolve } from 'node:path';
import { LogLevel } from '../utils/logger.js';

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 WARN，设置 LOG_LEVEL=debug 可查看生成细节） */
  readonly logLevel: LogLevel;

  /** 包根目录（默认当前工作目录，可由 TYIPA_GEN_ROOT 覆盖） */
  readonly projectRoot: string;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.projectRoot = resolve(process.env.TYIPA_GEN_ROOT || process.cwd());
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值，无法识别时回落到 WARN。
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.WARN;
    const upper = raw.toUpperCase();
    switch (upper) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.WARN;
    }
  }

  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
