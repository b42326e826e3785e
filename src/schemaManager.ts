/**
 * 日志表结构管理
 *
 * 按方言执行幂等的建表 DDL。已确认存在的表会被记住，同一管理器上
 * 再次调用不会重复执行 DDL。
 *
 * @fileoverview 日志表自动创建
 * @since 1.0.0
 */

import { ConnectionManager } from './connection.js';
import { StringConstants, formatMessage } from './constants.js';
import { requireTableName } from './dialects.js';
import { ErrorHandler } from './errorHandler.js';
import { logger } from './logger.js';
import { SchemaError, TableDescriptor } from './types.js';

const schemaLogger = logger.child('schema');

/**
 * 日志表结构管理器
 *
 * @class SchemaManager
 * @since 1.0.0
 */
export class SchemaManager {
  /** 已确认存在的表 */
  private readonly ensuredTables: Set<string> = new Set();

  constructor(private readonly connectionManager: ConnectionManager) {}

  /**
   * 确保日志表存在
   *
   * @param {TableDescriptor} descriptor - 日志表描述符
   * @throws {ConfigurationError} 表名缺失、格式非法或方言非法
   * @throws {SchemaError} DDL 执行失败
   */
  public async ensureTable(descriptor: TableDescriptor): Promise<void> {
    const name = requireTableName(descriptor);
    if (this.ensuredTables.has(name)) {
      return;
    }

    const dialect = this.connectionManager.getDialect();
    const ddl = dialect.buildCreateTableSql(name);
    const handle = await this.connectionManager.getConnection();

    try {
      await handle.execute(ddl);
    } catch (error) {
      throw new SchemaError(
        formatMessage(StringConstants.MSG_SCHEMA_FAILED, {
          table: name,
          reason: ErrorHandler.describeError(error).message
        }),
        ErrorHandler.toError(error)
      );
    }

    this.ensuredTables.add(name);
    schemaLogger.debug('日志表已确认存在', undefined, { table: name, dialect: dialect.name });
  }

  /**
   * 清除已确认记录，下一次 ensureTable 会重新执行 DDL
   */
  public reset(): void {
    this.ensuredTables.clear();
  }
}
