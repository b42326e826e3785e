/**
 * 调用日志记录器
 *
 * 为函数与方法记录入口、参数、耗时、返回值与异常，写入日志文件，
 * 并可选写入 SQL Server 或 MySQL 日志表。
 *
 * @fileoverview 包入口
 * @since 1.0.0
 */

export { CallLogger } from './callLogger.js';
export { LoggerConfiguration } from './config.js';
export { ConnectionManager } from './connection.js';
export type { ConnectionStats } from './connection.js';
export { SchemaManager } from './schemaManager.js';
export { FileSink, formatLogLine } from './sinks/fileSink.js';
export { DatabaseSink } from './sinks/databaseSink.js';
export { resolveDialect, validateTableName, buildMySqlUri, buildMssqlConfig } from './dialects.js';
export type { DialectAdapter } from './dialects.js';
export {
  positionalArguments,
  trailingNamedArguments,
  runWithCallLogging,
  withCallLogging,
  wrapWithCallLogging
} from './utils/decorators.js';
export { ErrorHandler } from './errorHandler.js';
export type { ErrorDetails } from './errorHandler.js';
export { logger, StructuredLogger, LogLevel } from './logger.js';
export { DefaultConfig, LogTableSchema } from './constants.js';
export * from './types.js';
