/**
 * 结构化诊断日志记录器
 *
 * 记录日志管道自身的运行情况（连接句柄创建、关闭、次要失败），
 * 与写入日志文件和数据库的调用记录相互独立，输出到标准错误。
 *
 * @fileoverview 结构化诊断日志记录器实现
 * @since 1.0.0
 */

import { CallLoggerError } from '../types.js';

/**
 * 日志级别枚举
 */
export enum LogLevel {
  /** 调试信息（最详细） */
  DEBUG = 'debug',
  /** 一般信息 */
  INFO = 'info',
  /** 警告信息 */
  WARN = 'warn',
  /** 错误信息 */
  ERROR = 'error',
  /** 关闭输出 */
  SILENT = 'silent'
}

/**
 * 日志配置接口
 */
export interface LogConfig {
  /** 日志级别 */
  level: LogLevel;
  /** 日志格式 */
  format: 'json' | 'text';
  /** 是否显示时间戳 */
  enableTimestamp: boolean;
  /** 敏感字段列表（会被过滤） */
  sensitiveFields: string[];
}

/**
 * 日志条目接口
 */
export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  category: string;
  metadata?: Record<string, unknown>;
  error?: Error;
}

/**
 * 日志回调函数类型
 */
export type LogCallback = (entry: LogEntry) => void;

/**
 * 日志级别权重（用于过滤）
 */
const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
  [LogLevel.SILENT]: 100
};

/**
 * 把环境变量中的级别名解析为 LogLevel，无法识别时返回 undefined
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}

/**
 * 结构化日志记录器
 *
 * @class StructuredLogger
 * @since 1.0.0
 */
export class StructuredLogger {
  private config: LogConfig;
  private callbacks: Set<LogCallback> = new Set();
  private readonly category: string;

  /**
   * 默认配置
   */
  private static readonly DEFAULT_CONFIG: LogConfig = {
    level: LogLevel.WARN,
    format: 'text',
    enableTimestamp: true,
    sensitiveFields: ['password', 'databasePassword', 'token', 'secret']
  };

  /**
   * 全局实例
   */
  private static instance: StructuredLogger | undefined;

  /**
   * 获取全局日志实例
   *
   * @param {Partial<LogConfig>} [config] - 日志配置
   * @returns {StructuredLogger} 日志实例
   */
  public static getInstance(config?: Partial<LogConfig>): StructuredLogger {
    if (!StructuredLogger.instance) {
      StructuredLogger.instance = new StructuredLogger(config);
    } else if (config) {
      StructuredLogger.instance.updateConfig(config);
    }
    return StructuredLogger.instance;
  }

  constructor(config?: Partial<LogConfig>, category: string = 'default') {
    this.config = { ...StructuredLogger.DEFAULT_CONFIG, ...config };
    this.category = category;
  }

  /**
   * 就地更新配置，子日志记录器共享同一配置对象，随之生效
   */
  public updateConfig(config: Partial<LogConfig>): void {
    Object.assign(this.config, config);
  }

  public getLevel(): LogLevel {
    return this.config.level;
  }

  public addCallback(callback: LogCallback): void {
    this.callbacks.add(callback);
  }

  public removeCallback(callback: LogCallback): void {
    this.callbacks.delete(callback);
  }

  public debug(message: string, category?: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, category, metadata);
  }

  public info(message: string, category?: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, category, metadata);
  }

  public warn(message: string, category?: string, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, category, metadata);
  }

  public error(message: string, category?: string, error?: Error, metadata?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, category, metadata, error);
  }

  /**
   * 记录结构化日志
   *
   * 低于配置级别的条目直接丢弃，回调也不会收到。
   */
  public log(
    level: LogLevel,
    message: string,
    category?: string,
    metadata?: Record<string, unknown>,
    error?: Error
  ): void {
    if (level === LogLevel.SILENT || LEVEL_WEIGHTS[level] < LEVEL_WEIGHTS[this.config.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      category: category || this.category,
      message,
      metadata: this.maskSensitiveFields(metadata),
      error
    };

    process.stderr.write(`${this.formatLogEntry(entry)}\n`);
    this.invokeCallbacks(entry);
  }

  /**
   * 创建子日志记录器，共享配置与回调，默认分类固定为 category
   */
  public child(category: string): StructuredLogger {
    const childLogger = new StructuredLogger(undefined, category);
    childLogger.config = this.config;
    childLogger.callbacks = this.callbacks;
    return childLogger;
  }

  private formatLogEntry(entry: LogEntry): string {
    return this.config.format === 'json' ? this.formatJson(entry) : this.formatText(entry);
  }

  private formatJson(entry: LogEntry): string {
    return JSON.stringify({
      timestamp: entry.timestamp.toISOString(),
      level: entry.level,
      category: entry.category,
      message: entry.message,
      ...(entry.metadata && { metadata: entry.metadata }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          ...(entry.error instanceof CallLoggerError && { category: entry.error.category })
        }
      })
    });
  }

  private formatText(entry: LogEntry): string {
    const timestamp = this.config.enableTimestamp ? `[${entry.timestamp.toISOString()}] ` : '';
    const error = entry.error ? ` Error: ${entry.error.message}` : '';
    let result = `${timestamp}[${entry.level.toUpperCase()}] [${entry.category}] ${entry.message}${error}`;

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      result += ` ${JSON.stringify(entry.metadata)}`;
    }

    return result;
  }

  private invokeCallbacks(entry: LogEntry): void {
    this.callbacks.forEach(callback => {
      try {
        callback(entry);
      } catch (error) {
        process.stderr.write(`Error in log callback: ${String(error)}\n`);
      }
    });
  }

  /**
   * 掩码敏感字段
   */
  private maskSensitiveFields(metadata?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!metadata) {
      return metadata;
    }

    const masked = { ...metadata };
    for (const field of this.config.sensitiveFields) {
      if (field in masked && masked[field] !== null && masked[field] !== undefined) {
        masked[field] = '***';
      }
    }
    return masked;
  }
}
