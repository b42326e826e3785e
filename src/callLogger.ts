/**
 * 调用日志记录器 - 日志门面
 *
 * 对外的唯一入口：`logging` 把一条消息写入日志文件，并按需写入数据库；
 * `wrap` 与 `log` 为函数和方法加上调用记录。一个实例持有一份不可变配置、
 * 一个文件接收端和至多一个数据库连接句柄，可在多个被包装函数之间共享。
 *
 * @fileoverview 日志门面与包装器入口
 * @since 1.0.0
 */

import { LoggerConfiguration } from './config.js';
import { ConnectionManager, ConnectionStats } from './connection.js';
import { DefaultConfig } from './constants.js';
import { logger } from './logger.js';
import { SchemaManager } from './schemaManager.js';
import { DatabaseSink } from './sinks/databaseSink.js';
import { FileSink } from './sinks/fileSink.js';
import {
  CallLoggingOptions,
  DatabaseHandle,
  InstrumentationDefaults,
  InstrumentationHost,
  LoggerOptions
} from './types.js';
import { withCallLogging, wrapWithCallLogging } from './utils/decorators.js';
import { ensureDirectoryExistsSync } from './utils/fileUtils.js';

/**
 * 调用日志记录器
 *
 * @class CallLogger
 * @since 1.0.0
 *
 * @example
 * const callLogger = new CallLogger({ logFileName: 'Orders' });
 *
 * const add = callLogger.wrap((a: number, b: number) => a + b);
 * await add(5, 3);
 *
 * class OrderService {
 *   @callLogger.log({ logLevel: 'DEBUG' })
 *   async cancel(orderId: string): Promise<void> { ... }
 * }
 *
 * await callLogger.logging('Nightly export finished', 'INFO');
 * await callLogger.close();
 */
export class CallLogger implements InstrumentationHost {
  public readonly configuration: LoggerConfiguration;

  private readonly fileSink: FileSink;
  private readonly connectionManager: ConnectionManager;
  private readonly schemaManager: SchemaManager;
  private readonly databaseSink: DatabaseSink;

  /** 预留的 AI 输入输出记录标志 */
  private aiLogging: boolean = false;

  /**
   * @param {LoggerOptions} [options] - 构造选项，缺省项取环境变量或默认值
   * @throws {ConfigurationError} 选项类型不正确
   */
  constructor(options: LoggerOptions = {}) {
    this.configuration = new LoggerConfiguration(options);
    ensureDirectoryExistsSync(this.configuration.logDir);

    this.fileSink = new FileSink(this.configuration.logToConsole);
    this.connectionManager = new ConnectionManager(this.configuration.database);
    this.schemaManager = new SchemaManager(this.connectionManager);
    this.databaseSink = new DatabaseSink(
      this.connectionManager,
      this.schemaManager,
      this.configuration.table,
      this.fileSink,
      this.configuration.logFilePath
    );

    logger.debug('调用日志记录器已创建', 'call-logger', this.configuration.toObject());
  }

  public get defaults(): InstrumentationDefaults {
    return this.configuration.defaults;
  }

  public get logFilePath(): string {
    return this.configuration.logFilePath;
  }

  public get aiLoggingEnabled(): boolean {
    return this.aiLogging;
  }

  public enableAiLogging(): void {
    this.aiLogging = true;
  }

  /**
   * 写入一条日志
   *
   * 只取一次时间戳，文件与数据库使用同一时间点。文件总是先写；数据库写入
   * 失败时错误向外抛出，此时文件中已经有这条记录，失败说明也写入同一文件。
   *
   * @param {string} message - 日志消息
   * @param {string} [level='INFO'] - 日志级别
   * @param {string} [filePath] - 目标文件，默认 <logDir>/<logFileName>.log
   * @param {boolean} [includeDatabase=false] - 是否同时写入数据库
   */
  public async logging(
    message: string,
    level: string = DefaultConfig.LOG_LEVEL,
    filePath: string = this.configuration.logFilePath,
    includeDatabase: boolean = false
  ): Promise<void> {
    const timestamp = new Date();
    await this.fileSink.write(message, level, timestamp, filePath);
    if (includeDatabase) {
      await this.databaseSink.record(message, level, timestamp, filePath);
    }
  }

  /**
   * 包装独立函数
   */
  public wrap<TArgs extends unknown[], TResult>(
    fn: (...args: TArgs) => TResult,
    options: CallLoggingOptions = {}
  ): (...args: TArgs) => Promise<Awaited<TResult>> {
    return wrapWithCallLogging(fn, this, options);
  }

  /**
   * 方法装饰器工厂
   */
  public log(options: CallLoggingOptions = {}): (
    target: unknown,
    propertyKey: string,
    descriptor: PropertyDescriptor
  ) => PropertyDescriptor {
    return withCallLogging(this, options);
  }

  /**
   * 获取（必要时创建）缓存的数据库连接句柄
   */
  public getConnection(): Promise<DatabaseHandle> {
    return this.connectionManager.getConnection();
  }

  /**
   * 确保配置的日志表存在
   */
  public ensureTable(): Promise<void> {
    return this.schemaManager.ensureTable(this.configuration.table);
  }

  public getConnectionStats(): ConnectionStats {
    return this.connectionManager.getStats();
  }

  /**
   * 释放数据库连接池
   */
  public async close(): Promise<void> {
    await this.connectionManager.close();
  }
}
