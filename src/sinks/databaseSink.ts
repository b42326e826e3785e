/**
 * 数据库接收端
 *
 * 写入流程：连通性校验 → 表名校验 → 按需建表 → 参数化插入。
 * 任一步失败都会先向日志文件补写一条 ERROR 记录，再把错误抛给调用方；
 * 补写本身失败只报告给诊断日志，不会掩盖原始错误。
 *
 * @fileoverview 日志记录写入数据库
 * @since 1.0.0
 */

import { ConnectionManager } from '../connection.js';
import { DefaultConfig, StringConstants, formatMessage } from '../constants.js';
import { requireTableName } from '../dialects.js';
import { ErrorHandler } from '../errorHandler.js';
import { logger } from '../logger.js';
import { SchemaManager } from '../schemaManager.js';
import { ConfigurationError, DatabaseUnavailableError, InsertError, TableDescriptor } from '../types.js';
import { FileSink } from './fileSink.js';

const sinkLogger = logger.child('database-sink');

export class DatabaseSink {
  constructor(
    private readonly connectionManager: ConnectionManager,
    private readonly schemaManager: SchemaManager,
    private readonly table: TableDescriptor,
    private readonly fileSink: FileSink,
    private readonly logFilePath: string
  ) {}

  /**
   * 写入一条日志记录
   *
   * @param {string} message - 日志消息
   * @param {string} level - 日志级别
   * @param {Date} timestamp - 与文件记录相同的时间点
   * @param {string} [notePath] - 失败说明写入的文件，默认为日志记录器的日志文件
   * @throws {ConfigurationError} 凭据、方言或表名配置有误
   * @throws {DatabaseUnavailableError} 连通性校验失败，未尝试插入
   * @throws {SchemaError} 建表失败
   * @throws {InsertError} 插入失败
   */
  public async record(
    message: string,
    level: string,
    timestamp: Date,
    notePath: string = this.logFilePath
  ): Promise<void> {
    try {
      await this.connectionManager.verifyConnectivity();
    } catch (error) {
      if (error instanceof ConfigurationError) {
        throw error;
      }
      const reason = this.describeFailure(error);
      const text = formatMessage(StringConstants.MSG_DATABASE_UNAVAILABLE, { reason });
      await this.noteFailure(text, notePath);
      throw new DatabaseUnavailableError(text, ErrorHandler.toError(error));
    }

    const tableName = requireTableName(this.table);

    try {
      if (this.table.createTableIfNotExists) {
        await this.schemaManager.ensureTable(this.table);
      }
      await this.insert(tableName, message, level, timestamp);
    } catch (error) {
      await this.noteFailure(
        formatMessage(StringConstants.MSG_DATABASE_WRITE_FAILED, { reason: this.describeFailure(error) }),
        notePath
      );
      throw error;
    }
  }

  private async insert(tableName: string, message: string, level: string, timestamp: Date): Promise<void> {
    const sql = this.connectionManager.getDialect().buildInsertSql(tableName);
    const handle = await this.connectionManager.getConnection();
    try {
      await handle.executeWithParams(sql, [timestamp, level, message]);
    } catch (error) {
      throw new InsertError(
        formatMessage(StringConstants.MSG_INSERT_FAILED, {
          table: tableName,
          reason: ErrorHandler.describeError(error).message
        }),
        ErrorHandler.toError(error)
      );
    }
  }

  /**
   * 向日志文件补写 ERROR 记录；失败时只报告给诊断日志
   */
  private async noteFailure(text: string, notePath: string): Promise<void> {
    try {
      await this.fileSink.write(text, DefaultConfig.ERROR_LEVEL, new Date(), notePath);
    } catch (noteError) {
      sinkLogger.error('无法向日志文件补写数据库失败记录', undefined, ErrorHandler.toError(noteError), {
        note: text
      });
    }
  }

  private describeFailure(error: unknown): string {
    return ErrorHandler.describeError(error).message;
  }
}
