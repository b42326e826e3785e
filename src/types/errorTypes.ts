/**
 * 错误处理相关类型定义
 *
 * @fileoverview 错误分类、严重级别以及日志记录器抛出的错误类
 * @since 1.0.0
 */

/**
 * 错误严重级别
 */
export enum ErrorSeverity {
  INFO = 'info',
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

/**
 * 错误分类枚举
 */
export enum ErrorCategory {
  CONFIGURATION_ERROR = 'configuration_error',
  CONNECTION_ERROR = 'connection_error',
  DATABASE_UNAVAILABLE = 'database_unavailable',
  SCHEMA_ERROR = 'schema_error',
  INSERT_ERROR = 'insert_error',
  UNKNOWN = 'unknown'
}

/**
 * 日志记录器错误基类
 *
 * 所有由日志管道本身产生的错误都继承自该类；被包装函数抛出的错误
 * 不会被转换成它，而是原样重新抛出。
 */
export class CallLoggerError extends Error {
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly originalError?: Error;
  public readonly recoverable: boolean;
  public readonly timestamp: Date;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.MEDIUM,
    originalError?: Error
  ) {
    super(message);
    this.name = 'CallLoggerError';
    this.category = category;
    this.severity = severity;
    this.originalError = originalError;
    this.timestamp = new Date();

    // 配置错误需要人工修正，其余错误下一次调用时可能恢复
    this.recoverable = category !== ErrorCategory.CONFIGURATION_ERROR;

    // 保持堆栈跟踪
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      category: this.category,
      severity: this.severity,
      recoverable: this.recoverable,
      timestamp: this.timestamp,
      stack: this.stack,
      originalError: this.originalError?.message
    };
  }
}

/**
 * 配置错误：凭据缺失、方言非法或表名缺失。立即失败，不重试。
 */
export class ConfigurationError extends CallLoggerError {
  constructor(message: string, originalError?: Error) {
    super(message, ErrorCategory.CONFIGURATION_ERROR, ErrorSeverity.HIGH, originalError);
    this.name = 'ConfigurationError';
  }
}

/**
 * 连接错误：构建或打开数据库连接句柄失败
 */
export class ConnectionError extends CallLoggerError {
  constructor(message: string, originalError?: Error) {
    super(message, ErrorCategory.CONNECTION_ERROR, ErrorSeverity.HIGH, originalError);
    this.name = 'ConnectionError';
  }
}

/**
 * 连通性校验失败，数据库接收端放弃本次写入
 */
export class DatabaseUnavailableError extends CallLoggerError {
  constructor(message: string, originalError?: Error) {
    super(message, ErrorCategory.DATABASE_UNAVAILABLE, ErrorSeverity.HIGH, originalError);
    this.name = 'DatabaseUnavailableError';
  }
}

/**
 * 建表 DDL 执行失败
 */
export class SchemaError extends CallLoggerError {
  constructor(message: string, originalError?: Error) {
    super(message, ErrorCategory.SCHEMA_ERROR, ErrorSeverity.MEDIUM, originalError);
    this.name = 'SchemaError';
  }
}

/**
 * 日志行插入失败
 */
export class InsertError extends CallLoggerError {
  constructor(message: string, originalError?: Error) {
    super(message, ErrorCategory.INSERT_ERROR, ErrorSeverity.MEDIUM, originalError);
    this.name = 'InsertError';
  }
}
