/**
 * 日志记录器常量 - 中央配置管理
 *
 * 默认配置、环境变量名、日志表结构和记录模板的集中定义。
 *
 * @fileoverview 日志记录器常量
 * @since 1.0.0
 */

/**
 * 默认配置常量
 *
 * 所有值均可被构造选项或环境变量覆盖。
 */
export const DefaultConfig = {
  LOG_FILE_NAME: 'System',
  LOG_DIR: 'logs',
  LOG_FILE_EXTENSION: '.log',
  LOG_LEVEL: 'INFO',
  ERROR_LEVEL: 'ERROR',
  DATABASE_TYPE: 'mssql',

  INCLUDE_DURATION: true,
  INCLUDE_TRACEBACK: true,
  INCLUDE_FUNCTION_ARGS: true,
  INCLUDE_DATABASE: false,

  /** MySQL 连接池上限 */
  CONNECTION_LIMIT: 5,
  /** mssql 连接池上限 */
  MSSQL_POOL_MAX: 5,
  /** 连接超时（秒） */
  CONNECT_TIMEOUT: 15,

  /** 耗时输出保留的小数位 */
  DURATION_PRECISION: 4,
  /** 参数与返回值格式化时的对象深度 */
  INSPECT_DEPTH: 4
} as const;

/**
 * 日志表结构
 */
export const LogTableSchema = {
  ID_COLUMN: 'LogID',
  TIME_COLUMN: 'LogTime',
  LEVEL_COLUMN: 'LogLevel',
  MESSAGE_COLUMN: 'LogMessage',
  LEVEL_MAX_LENGTH: 50,
  /** 表名：一个标识符，或 schema.table */
  TABLE_NAME_PATTERN: /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/
} as const;

/**
 * 字符串常量
 */
export const StringConstants = {
  // 环境变量名
  ENV_LOG_FILE_NAME: 'LOG_FILE_NAME',
  ENV_LOG_DIR: 'LOG_DIR',
  ENV_LOG_TO_CONSOLE: 'LOG_TO_CONSOLE',
  ENV_DB_SERVER: 'LOG_DB_SERVER',
  ENV_DB_NAME: 'LOG_DB_NAME',
  ENV_DB_USERNAME: 'LOG_DB_USERNAME',
  ENV_DB_PASSWORD: 'LOG_DB_PASSWORD',
  ENV_DB_PORT: 'LOG_DB_PORT',
  ENV_DB_TYPE: 'LOG_DB_TYPE',
  ENV_DB_TABLE: 'LOG_DB_TABLE',
  ENV_DB_CREATE_TABLE: 'LOG_DB_CREATE_TABLE',
  ENV_DB_TRUST_SERVER_CERTIFICATE: 'LOG_DB_TRUST_SERVER_CERTIFICATE',
  ENV_DIAGNOSTICS_LEVEL: 'LOG_DIAGNOSTICS_LEVEL',

  TRUE_STRING: 'true',
  CONNECTION_LOCK_KEY: 'database-connection',
  PING_SQL: 'SELECT 1',

  // 包装器记录模板
  MSG_CALLING_FUNCTION: 'Calling function: ',
  MSG_POSITIONAL_ARGUMENTS: 'Positional arguments: ',
  MSG_KEYWORD_ARGUMENTS: 'Keyword arguments: ',
  MSG_EXECUTION_TIME: 'Execution time: ',
  MSG_EXECUTION_TIME_BEFORE_ERROR: 'Execution time before error: ',
  MSG_SECONDS_SUFFIX: ' seconds',
  MSG_RETURN_VALUE: 'Return value: ',
  MSG_EXCEPTION_OCCURRED: 'Exception occurred in ',
  MSG_EXCEPTION_TYPE: 'Exception type: ',
  MSG_EXCEPTION_MESSAGE: 'Exception message: ',
  MSG_TRACEBACK: 'Traceback:',

  // 错误消息
  MSG_MISSING_CREDENTIALS:
    'Database credentials are incomplete (missing: {fields}). Provide all of them or turn off include_database.',
  MSG_UNSUPPORTED_DIALECT: "Unsupported database type '{dialect}'. Expected one of: mssql, mysql.",
  MSG_MISSING_TABLE_NAME:
    'No log table configured. Set table.tableName to a table with four columns: ' +
    'LogID (auto-increment integer primary key), LogTime (timestamp defaulting to now), ' +
    'LogLevel (text, 50 characters) and LogMessage (unbounded text), ' +
    'or set table.createTableIfNotExists to create it.',
  MSG_INVALID_TABLE_NAME: "Invalid table name '{table}'. Use letters, digits and underscores, optionally as schema.table.",
  MSG_INVALID_OPTIONS: 'Invalid logger options: {details}',
  MSG_CONNECTION_FAILED: 'Failed to create {dialect} connection to {server}/{database}: {reason}',
  MSG_DATABASE_UNAVAILABLE: 'Database connection failed: {reason}',
  MSG_SCHEMA_FAILED: "Failed to ensure log table '{table}': {reason}",
  MSG_INSERT_FAILED: "Failed to insert log record into '{table}': {reason}",
  MSG_DATABASE_WRITE_FAILED: 'Database logging failed: {reason}'
} as const;

/**
 * 按名称替换模板中的 {占位符}
 */
export function formatMessage(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match: string, key: string) => values[key] ?? match);
}
