/**
 * 日志记录器配置
 *
 * 合并构造选项与环境变量，生成构造后不可变的配置对象。构造时只校验
 * 选项类型；数据库凭据、方言和表名等在首次写入数据库时才校验。
 *
 * @fileoverview 日志记录器配置管理
 * @since 1.0.0
 */

import path from 'path';
import { config } from 'dotenv';
import { z } from 'zod';
import { DefaultConfig, StringConstants, formatMessage } from './constants.js';
import {
  ConfigurationError,
  DatabaseSettings,
  InstrumentationDefaults,
  LoggerOptions,
  TableDescriptor
} from './types.js';

// 加载环境变量配置
config();

const nullableString = z.string().nullable().optional();

/**
 * 构造选项的结构校验
 */
const loggerOptionsSchema = z
  .object({
    logFileName: z.string().min(1).optional(),
    logDir: z.string().min(1).optional(),
    logToConsole: z.boolean().optional(),
    databaseUsername: nullableString,
    databasePassword: nullableString,
    databaseServer: nullableString,
    databaseName: nullableString,
    databasePort: z.number().int().min(1).max(65535).optional(),
    databaseType: z.string().optional(),
    trustServerCertificate: z.boolean().optional(),
    includeDuration: z.boolean().optional(),
    includeTraceback: z.boolean().optional(),
    includeFunctionArgs: z.boolean().optional(),
    includeDatabase: z.boolean().optional(),
    table: z
      .object({
        tableName: z.string().nullable().optional(),
        createTableIfNotExists: z.boolean().optional()
      })
      .strict()
      .optional()
  })
  .strict();

/**
 * 日志记录器配置
 *
 * 选项优先，其次环境变量，最后默认值。
 *
 * @class LoggerConfiguration
 * @since 1.0.0
 *
 * @example
 * const configuration = new LoggerConfiguration({ logFileName: 'Orders', logToConsole: true });
 * configuration.logFilePath; // 'logs/Orders.log'
 */
export class LoggerConfiguration {
  public readonly logFileName: string;
  public readonly logDir: string;
  public readonly logToConsole: boolean;
  public readonly database: DatabaseSettings;
  public readonly defaults: InstrumentationDefaults;
  public readonly table: TableDescriptor;

  constructor(options: LoggerOptions = {}, env: NodeJS.ProcessEnv = process.env) {
    const parsed = loggerOptionsSchema.safeParse(options);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(formatMessage(StringConstants.MSG_INVALID_OPTIONS, { details }));
    }
    const opts = parsed.data;

    this.logFileName = opts.logFileName ?? env[StringConstants.ENV_LOG_FILE_NAME] ?? DefaultConfig.LOG_FILE_NAME;
    this.logDir = opts.logDir ?? env[StringConstants.ENV_LOG_DIR] ?? DefaultConfig.LOG_DIR;
    this.logToConsole = opts.logToConsole ?? LoggerConfiguration.parseBoolean(env[StringConstants.ENV_LOG_TO_CONSOLE], false);

    this.database = Object.freeze({
      server: LoggerConfiguration.pick(opts.databaseServer, env[StringConstants.ENV_DB_SERVER]),
      name: LoggerConfiguration.pick(opts.databaseName, env[StringConstants.ENV_DB_NAME]),
      username: LoggerConfiguration.pick(opts.databaseUsername, env[StringConstants.ENV_DB_USERNAME]),
      password: LoggerConfiguration.pick(opts.databasePassword, env[StringConstants.ENV_DB_PASSWORD]),
      port: opts.databasePort ?? LoggerConfiguration.parsePort(env[StringConstants.ENV_DB_PORT]),
      dialect: opts.databaseType ?? env[StringConstants.ENV_DB_TYPE] ?? DefaultConfig.DATABASE_TYPE,
      trustServerCertificate:
        opts.trustServerCertificate ??
        LoggerConfiguration.parseBoolean(env[StringConstants.ENV_DB_TRUST_SERVER_CERTIFICATE], false)
    });

    this.defaults = Object.freeze({
      includeDuration: opts.includeDuration ?? DefaultConfig.INCLUDE_DURATION,
      includeTraceback: opts.includeTraceback ?? DefaultConfig.INCLUDE_TRACEBACK,
      includeFunctionArgs: opts.includeFunctionArgs ?? DefaultConfig.INCLUDE_FUNCTION_ARGS,
      includeDatabase: opts.includeDatabase ?? DefaultConfig.INCLUDE_DATABASE
    });

    this.table = Object.freeze({
      tableName: opts.table?.tableName !== undefined ? opts.table.tableName : env[StringConstants.ENV_DB_TABLE] ?? null,
      createTableIfNotExists:
        opts.table?.createTableIfNotExists ??
        LoggerConfiguration.parseBoolean(env[StringConstants.ENV_DB_CREATE_TABLE], false)
    });

    Object.freeze(this);
  }

  /**
   * 默认日志文件路径：<logDir>/<logFileName>.log
   */
  public get logFilePath(): string {
    return path.join(this.logDir, `${this.logFileName}${DefaultConfig.LOG_FILE_EXTENSION}`);
  }

  /**
   * 导出配置用于诊断，密码被掩码
   */
  public toObject(): Record<string, unknown> {
    return {
      logFileName: this.logFileName,
      logDir: this.logDir,
      logToConsole: this.logToConsole,
      database: {
        ...this.database,
        password: this.database.password ? '***' : null
      },
      defaults: { ...this.defaults },
      table: { ...this.table }
    };
  }

  /**
   * 选项中显式给出的值（包括 null）优先于环境变量
   */
  private static pick(option: string | null | undefined, envValue: string | undefined): string | null {
    if (option !== undefined) {
      return option;
    }
    return envValue ?? null;
  }

  private static parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined || value.trim() === '') {
      return defaultValue;
    }
    return value.trim().toLowerCase() === StringConstants.TRUE_STRING;
  }

  /**
   * 解析端口号，超出 1-65535 时抛出配置错误
   */
  private static parsePort(value: string | undefined): number | undefined {
    if (value === undefined || value.trim() === '') {
      return undefined;
    }
    const port = parseInt(value, 10);
    if (isNaN(port) || port < 1 || port > 65535) {
      throw new ConfigurationError(
        formatMessage(StringConstants.MSG_INVALID_OPTIONS, {
          details: `${StringConstants.ENV_DB_PORT}: expected a port between 1 and 65535, got '${value}'`
        })
      );
    }
    return port;
  }
}
