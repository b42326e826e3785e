/**
 * 日志记录器相关类型定义
 *
 * @fileoverview 配置选项、表描述符、连接句柄与调用点描述等类型
 * @since 1.0.0
 */

/**
 * 支持的数据库方言标记
 */
export type DatabaseDialect = 'mssql' | 'mysql';

/**
 * 日志表描述符
 *
 * 在构造时不做校验，首次写入数据库时才检查表名。
 */
export interface TableDescriptor {
  /** 目标日志表名，可带 schema 前缀（如 dbo.Logs） */
  readonly tableName: string | null;
  /** 写入前是否自动建表 */
  readonly createTableIfNotExists: boolean;
}

/**
 * 日志记录器构造选项
 *
 * @example
 * const options: LoggerOptions = {
 *   logFileName: 'Orders',
 *   databaseType: 'mysql',
 *   databaseServer: 'localhost',
 *   databaseName: 'app_logs',
 *   databaseUsername: 'app_logger',
 *   databasePassword: 'change-me',
 *   table: { tableName: 'Logs', createTableIfNotExists: true }
 * };
 */
export interface LoggerOptions {
  /** 日志文件名（不含扩展名），默认 System */
  logFileName?: string;
  /** 日志目录，默认 logs */
  logDir?: string;
  /** 是否同时输出到控制台 */
  logToConsole?: boolean;
  databaseUsername?: string | null;
  databasePassword?: string | null;
  databaseServer?: string | null;
  databaseName?: string | null;
  databasePort?: number;
  /** 方言标记，未知值在首次连接时报错 */
  databaseType?: string;
  /** 仅对 mssql 生效 */
  trustServerCertificate?: boolean;
  includeDuration?: boolean;
  includeTraceback?: boolean;
  includeFunctionArgs?: boolean;
  includeDatabase?: boolean;
  table?: Partial<TableDescriptor>;
}

/**
 * 数据库连接设置（未经校验）
 */
export interface DatabaseSettings {
  readonly server: string | null;
  readonly name: string | null;
  readonly username: string | null;
  readonly password: string | null;
  readonly port?: number;
  readonly dialect: string;
  readonly trustServerCertificate: boolean;
}

/**
 * 经过校验的数据库凭据，四个字段均非空
 */
export interface DatabaseCredentials {
  readonly server: string;
  readonly name: string;
  readonly username: string;
  readonly password: string;
  readonly port?: number;
  readonly trustServerCertificate: boolean;
}

/**
 * 可绑定的 SQL 参数值
 */
export type SqlParameter = string | number | Date | null;

/**
 * 数据库连接句柄
 *
 * 由连接管理器按日志记录器实例缓存，底层为驱动的连接池。
 */
export interface DatabaseHandle {
  readonly dialect: DatabaseDialect;
  /** 执行无参数语句（DDL、探活查询） */
  execute(sql: string): Promise<void>;
  /** 执行参数化语句 */
  executeWithParams(sql: string, params: readonly SqlParameter[]): Promise<void>;
  close(): Promise<void>;
}

/**
 * 包装器默认开关
 */
export interface InstrumentationDefaults {
  readonly includeDuration: boolean;
  readonly includeTraceback: boolean;
  readonly includeFunctionArgs: boolean;
  readonly includeDatabase: boolean;
}

/**
 * 调用点描述：函数名加上位置参数与命名参数
 */
export interface CallSite {
  readonly name: string;
  readonly positional: readonly unknown[];
  readonly named: Readonly<Record<string, unknown>>;
}

/**
 * 参数适配器：把实际传入的参数拆分为位置参数与命名参数
 */
export type ArgumentAdapter = (args: readonly unknown[]) => Pick<CallSite, 'positional' | 'named'>;

/**
 * 包装器选项
 */
export interface CallLoggingOptions {
  /** 非错误记录使用的日志级别，默认 INFO */
  logLevel?: string;
  /** 预留的 AI 输入输出记录开关，目前只设置日志记录器上的标志 */
  includeAi?: boolean;
  includeDuration?: boolean;
  includeTraceback?: boolean;
  includeFunctionArgs?: boolean;
  includeDatabase?: boolean;
  /** 覆盖记录中的函数名 */
  name?: string;
  describeArguments?: ArgumentAdapter;
}

/**
 * 包装器依赖的日志门面
 */
export interface InstrumentationHost {
  readonly defaults: InstrumentationDefaults;
  logging(message: string, level?: string, filePath?: string, includeDatabase?: boolean): Promise<void>;
  enableAiLogging(): void;
}
