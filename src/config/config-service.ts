/**
 * @module config-service
 *
 * 统一配置管理服务：集中读取环境变量。
 *
 * - `LOG_LEVEL`：日志级别（DEBUG / INFO / WARN / ERROR，默认 INFO）
 * - `CST_TRACE_BUILDER`：设置为 `1` 时，构建器在 DEBUG 级别记录每个事件
 *
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * if (ConfigService.getInstance().traceBuilder) {
 *   // ...
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

/**
 * 配置服务单例类。
 *
 * 首次调用 getInstance() 时读取环境变量，之后保持只读。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 是否记录构建器事件（默认 false，设置 CST_TRACE_BUILDER=1 启用） */
  readonly traceBuilder: boolean;

  private constructor() {
    this.logLevel = ConfigService.parseLogLevel(process.env.LOG_LEVEL);
    this.traceBuilder = process.env.CST_TRACE_BUILDER === '1';
  }

  /**
   * 解析 LOG_LEVEL 环境变量，无法识别的值回退为 INFO。
   */
  static parseLogLevel(raw: string | undefined): LogLevel {
    if (!raw) return LogLevel.INFO;
    switch (raw.trim().toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'INFO':
        return LogLevel.INFO;
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
