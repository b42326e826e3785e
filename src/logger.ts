/**
 * 诊断日志入口
 *
 * 日志管道内部使用的全局结构化日志记录器。级别取自环境变量
 * LOG_DIAGNOSTICS_LEVEL，默认为 warn。
 *
 * @fileoverview 诊断日志记录器实例
 * @since 1.0.0
 */

import { config } from 'dotenv';
import { StringConstants } from './constants.js';
import { LogLevel, StructuredLogger, parseLogLevel } from './logging/structuredLogger.js';

// 加载环境变量配置
config();

/**
 * 全局结构化日志记录器实例
 *
 * @example
 * logger.warn('连接句柄已关闭', 'connection');
 * const schemaLogger = logger.child('schema');
 */
export const logger: StructuredLogger = StructuredLogger.getInstance({
  level: parseLogLevel(process.env[StringConstants.ENV_DIAGNOSTICS_LEVEL]) ?? LogLevel.WARN
});

export { StructuredLogger, LogLevel };
export type { LogEntry, LogCallback, LogConfig } from './logging/structuredLogger.js';
