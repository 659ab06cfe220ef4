import { ConfigService } from '../config/config-service.js';

/** 阈值级别；WARN / ERROR 只用于 LOG_LEVEL 静默库与 CLI 的输出 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

/**
 * 以 JSON 行写入 stderr 的结构化日志。stdout 只承载格式化后的 SQL。
 */
export class Logger {
  constructor(private readonly component: string, private readonly minLevel: LogLevel = LogLevel.INFO) {}

  debug(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.write(LogLevel.INFO, message, meta);
  }

  private write(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (level < this.minLevel) return;
    console.error(
      JSON.stringify({
        level: LogLevel[level],
        timestamp: new Date().toISOString(),
        component: this.component,
        message,
        ...meta,
      })
    );
  }
}

export interface PerformanceMetrics {
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

export function logPerformance(metrics: PerformanceMetrics): void {
  createLogger(metrics.component).info(`${metrics.operation} completed`, {
    duration_ms: metrics.duration,
    ...metrics.metadata,
  });
}

export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
