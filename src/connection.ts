/**
 * 数据库连接管理器
 *
 * 每个日志记录器实例拥有一个连接管理器，连接句柄在首次使用时才构建，
 * 构建成功后缓存到实例生命周期结束（或显式关闭）。构建过程由 AsyncLock
 * 保护：并发调用者等待同一次初始化，只有一个初始化者生效。
 *
 * 构建失败不会缓存任何句柄，下一次调用会重新尝试；管理器本身不做自动重试。
 *
 * @fileoverview 懒加载、带缓存的数据库连接管理
 * @since 1.0.0
 */

import AsyncLock from 'async-lock';
import { StringConstants, formatMessage } from './constants.js';
import { DialectAdapter, resolveDialect } from './dialects.js';
import { logger } from './logger.js';
import { ConfigurationError, DatabaseCredentials, DatabaseHandle, DatabaseSettings } from './types.js';

const connectionLogger = logger.child('connection');

/**
 * 连接管理器统计信息
 */
export interface ConnectionStats {
  /** 已发起的句柄构建次数（含失败） */
  constructionAttempts: number;
  connected: boolean;
  dialect: string;
}

/**
 * 连接管理器
 *
 * @class ConnectionManager
 * @since 1.0.0
 *
 * @example
 * const manager = new ConnectionManager(configuration.database);
 * const handle = await manager.getConnection();
 * await handle.execute('SELECT 1');
 */
export class ConnectionManager {
  /** 缓存的连接句柄 */
  private handle: DatabaseHandle | null = null;

  /** 保护句柄初始化的异步锁 */
  private readonly lock: AsyncLock = new AsyncLock();

  private constructionAttempts: number = 0;

  constructor(private readonly settings: DatabaseSettings) {}

  /**
   * 获取连接句柄
   *
   * 已有句柄时原样返回；否则校验凭据与方言后构建新句柄。
   *
   * @returns {Promise<DatabaseHandle>} 缓存的连接句柄
   * @throws {ConfigurationError} 凭据不完整或方言非法，此时不会发起任何网络请求
   * @throws {ConnectionError} 驱动构建或连接失败
   */
  public async getConnection(): Promise<DatabaseHandle> {
    if (this.handle) {
      return this.handle;
    }

    return this.lock.acquire<DatabaseHandle>(StringConstants.CONNECTION_LOCK_KEY, async () => {
      // 等锁期间可能已被其他调用者初始化
      if (this.handle) {
        return this.handle;
      }

      const credentials = this.requireCredentials();
      const adapter = this.getDialect();

      this.constructionAttempts++;
      const handle = await adapter.createHandle(credentials);
      this.handle = handle;

      connectionLogger.debug('数据库连接句柄已创建', undefined, {
        dialect: adapter.name,
        server: credentials.server,
        database: credentials.name
      });
      return handle;
    });
  }

  /**
   * 执行一次探活查询，验证连通性
   */
  public async verifyConnectivity(): Promise<void> {
    const handle = await this.getConnection();
    await handle.execute(StringConstants.PING_SQL);
  }

  /**
   * 获取配置的方言适配器
   *
   * @throws {ConfigurationError} 方言标记无法识别
   */
  public getDialect(): DialectAdapter {
    return resolveDialect(this.settings.dialect);
  }

  /**
   * 关闭并丢弃缓存的句柄，之后的调用会重新构建
   */
  public async close(): Promise<void> {
    await this.lock.acquire<void>(StringConstants.CONNECTION_LOCK_KEY, async () => {
      if (!this.handle) {
        return;
      }
      const handle = this.handle;
      this.handle = null;
      await handle.close();
      connectionLogger.debug('数据库连接句柄已关闭', undefined, { dialect: handle.dialect });
    });
  }

  public isConnected(): boolean {
    return this.handle !== null;
  }

  public getStats(): ConnectionStats {
    return {
      constructionAttempts: this.constructionAttempts,
      connected: this.handle !== null,
      dialect: this.settings.dialect
    };
  }

  /**
   * 校验四项凭据均非空
   */
  private requireCredentials(): DatabaseCredentials {
    const { server, name, username, password } = this.settings;
    const missing: string[] = [];
    if (!server) missing.push('server');
    if (!name) missing.push('name');
    if (!username) missing.push('username');
    if (!password) missing.push('password');

    if (!server || !name || !username || !password) {
      throw new ConfigurationError(
        formatMessage(StringConstants.MSG_MISSING_CREDENTIALS, { fields: missing.join(', ') })
      );
    }

    return {
      server,
      name,
      username,
      password,
      port: this.settings.port,
      trustServerCertificate: this.settings.trustServerCertificate
    };
  }
}
