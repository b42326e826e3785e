/**
 * 数据库接收端测试
 *
 * @description 测试连通性校验、按需建表、参数化插入以及失败时向日志文件补写记录
 * @since 1.0.0
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConnectionManager } from '../src/connection.js';
import { LogEntry, logger } from '../src/logger.js';
import { SchemaManager } from '../src/schemaManager.js';
import { DatabaseSink } from '../src/sinks/databaseSink.js';
import { FileSink } from '../src/sinks/fileSink.js';
import {
  ConfigurationError,
  DatabaseSettings,
  DatabaseUnavailableError,
  InsertError,
  SchemaError,
  TableDescriptor
} from '../src/types.js';

// 模拟 mysql2
jest.mock('mysql2/promise', () => ({
  createPool: jest.fn()
}));

const { createPool } = jest.requireMock('mysql2/promise') as { createPool: jest.Mock };

const LINE_PREFIX = String.raw`^\d{2} [A-Z][a-z]+ \d{4} \d{2}:\d{2}:\d{2}\.\d{3} - ERROR - `;

describe('DatabaseSink', () => {
  const timestamp = new Date(2024, 2, 5, 14, 3, 9, 42);
  let tempDir: string;
  let logFile: string;
  let mockPool: { query: jest.Mock; execute: jest.Mock; end: jest.Mock };

  const createSink = (
    table: TableDescriptor = { tableName: 'Logs', createTableIfNotExists: false },
    overrides: Partial<DatabaseSettings> = {},
    notePath: string = logFile
  ): DatabaseSink => {
    const connectionManager = new ConnectionManager({
      server: 'db.local',
      name: 'app_logs',
      username: 'app_logger',
      password: 'test-secret',
      dialect: 'mysql',
      trustServerCertificate: false,
      ...overrides
    });
    return new DatabaseSink(connectionManager, new SchemaManager(connectionManager), table, new FileSink(), notePath);
  };

  const readLog = (): string => (fs.existsSync(logFile) ? fs.readFileSync(logFile, 'utf8') : '');

  beforeEach(() => {
    jest.clearAllMocks();
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'database-sink-'));
    logFile = path.join(tempDir, 'System.log');

    mockPool = {
      query: jest.fn().mockResolvedValue([[], []]),
      execute: jest.fn().mockResolvedValue([{}, []]),
      end: jest.fn().mockResolvedValue(undefined)
    };
    createPool.mockReturnValue(mockPool);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('成功写入', () => {
    test('应该先校验连通性再插入一行', async () => {
      await createSink().record('hello', 'INFO', timestamp);

      expect(mockPool.query.mock.calls).toEqual([['SELECT 1']]);
      expect(mockPool.execute).toHaveBeenCalledWith(
        'INSERT INTO `Logs` (`LogTime`, `LogLevel`, `LogMessage`) VALUES (?, ?, ?)',
        [timestamp, 'INFO', 'hello']
      );
      expect(readLog()).toBe('');
    });

    test('开启自动建表时应该在插入前执行 DDL，且只执行一次', async () => {
      const sink = createSink({ tableName: 'Logs', createTableIfNotExists: true });
      await sink.record('first', 'INFO', timestamp);
      await sink.record('second', 'INFO', timestamp);

      const statements = mockPool.query.mock.calls.map(call => String(call[0]));
      expect(statements.filter(sql => sql.startsWith('CREATE TABLE'))).toHaveLength(1);
      expect(statements.filter(sql => sql === 'SELECT 1')).toHaveLength(2);
      expect(mockPool.execute).toHaveBeenCalledTimes(2);
    });
  });

  describe('配置错误', () => {
    test('凭据缺失应该直接抛出且不补写日志文件', async () => {
      await expect(createSink(undefined, { password: null }).record('hello', 'INFO', timestamp)).rejects.toThrow(
        ConfigurationError
      );
      expect(createPool).not.toHaveBeenCalled();
      expect(readLog()).toBe('');
    });

    test('缺少表名时应该抛出配置错误且不插入', async () => {
      const sink = createSink({ tableName: null, createTableIfNotExists: true });
      await expect(sink.record('hello', 'INFO', timestamp)).rejects.toThrow(/No log table configured/);
      expect(mockPool.execute).not.toHaveBeenCalled();
    });
  });

  describe('数据库失败', () => {
    test('连通性校验失败应该补写 ERROR 记录并放弃插入', async () => {
      mockPool.query.mockRejectedValueOnce(new Error('connect ETIMEDOUT'));

      const failure = createSink().record('hello', 'INFO', timestamp);
      await expect(failure).rejects.toThrow(DatabaseUnavailableError);
      await expect(failure).rejects.toThrow('Database connection failed: connect ETIMEDOUT');

      expect(mockPool.execute).not.toHaveBeenCalled();
      expect(readLog()).toMatch(new RegExp(`${LINE_PREFIX}Database connection failed: connect ETIMEDOUT\\n$`));
    });

    test('插入失败应该抛出插入错误并补写 ERROR 记录', async () => {
      mockPool.execute.mockRejectedValueOnce(new Error('Data too long'));

      const failure = createSink().record('hello', 'INFO', timestamp);
      await expect(failure).rejects.toThrow(InsertError);
      await expect(failure).rejects.toThrow("Failed to insert log record into 'Logs': Data too long");

      expect(readLog()).toMatch(
        new RegExp(`${LINE_PREFIX}Database logging failed: Failed to insert log record into 'Logs': Data too long\\n$`)
      );
    });

    test('建表失败应该抛出结构错误、补写 ERROR 记录且不插入', async () => {
      mockPool.query.mockImplementation((sql: string) =>
        sql.startsWith('CREATE TABLE')
          ? Promise.reject(new Error('CREATE command denied'))
          : Promise.resolve([[], []])
      );

      const failure = createSink({ tableName: 'Logs', createTableIfNotExists: true }).record('hello', 'INFO', timestamp);
      await expect(failure).rejects.toThrow(SchemaError);
      await expect(failure).rejects.toThrow("Failed to ensure log table 'Logs': CREATE command denied");

      expect(mockPool.execute).not.toHaveBeenCalled();
      expect(readLog()).toMatch(
        new RegExp(`${LINE_PREFIX}Database logging failed: Failed to ensure log table 'Logs': CREATE command denied\\n$`)
      );
    });

    test('失败说明应该写入调用方给出的文件', async () => {
      mockPool.execute.mockRejectedValueOnce(new Error('Data too long'));
      const auditFile = path.join(tempDir, 'Audit.log');

      await expect(createSink().record('hello', 'INFO', timestamp, auditFile)).rejects.toThrow(InsertError);

      expect(readLog()).toBe('');
      expect(fs.readFileSync(auditFile, 'utf8')).toMatch(
        new RegExp(`${LINE_PREFIX}Database logging failed: Failed to insert log record into 'Logs': Data too long\\n$`)
      );
    });

    test('补写失败时应该报告给诊断日志并仍然抛出原始错误', async () => {
      const entries: LogEntry[] = [];
      const callback = (entry: LogEntry): void => {
        entries.push(entry);
      };
      logger.addCallback(callback);
      mockPool.execute.mockRejectedValueOnce(new Error('Data too long'));

      try {
        const unreachable = path.join(tempDir, 'missing', 'System.log');
        await expect(
          createSink(undefined, {}, unreachable).record('hello', 'INFO', timestamp)
        ).rejects.toThrow(InsertError);
      } finally {
        logger.removeCallback(callback);
      }

      expect(entries).toHaveLength(1);
      expect(entries[0].category).toBe('database-sink');
      expect(entries[0].metadata).toEqual({
        note: "Database logging failed: Failed to insert log record into 'Logs': Data too long"
      });
    });
  });
});
