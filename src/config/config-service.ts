/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * if (config.traceLines) {
 *   // 逐行输出深度统计
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 是否在构建查询时逐行记录深度与拆分标记（SQLINDENT_TRACE_LINES=1 启用） */
  readonly traceLines: boolean;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.traceLines = process.env.SQLINDENT_TRACE_LINES === '1';
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值，无法识别时回落到 INFO。
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
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
