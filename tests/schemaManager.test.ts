/**
 * 日志表结构管理测试
 *
 * @description 测试建表 DDL 执行、已确认表缓存、表名校验与 DDL 失败
 * @since 1.0.0
 */

import { ConnectionManager } from '../src/connection.js';
import { SchemaManager } from '../src/schemaManager.js';
import { ConfigurationError, SchemaError } from '../src/types.js';

// 模拟 mysql2
jest.mock('mysql2/promise', () => ({
  createPool: jest.fn()
}));

const { createPool } = jest.requireMock('mysql2/promise') as { createPool: jest.Mock };

describe('SchemaManager', () => {
  let mockPool: { query: jest.Mock; execute: jest.Mock; end: jest.Mock };
  let schemaManager: SchemaManager;

  beforeEach(() => {
    jest.clearAllMocks();

    mockPool = {
      query: jest.fn().mockResolvedValue([[], []]),
      execute: jest.fn(),
      end: jest.fn()
    };
    createPool.mockReturnValue(mockPool);

    schemaManager = new SchemaManager(
      new ConnectionManager({
        server: 'db.local',
        name: 'app_logs',
        username: 'app_logger',
        password: 'test-secret',
        dialect: 'mysql',
        trustServerCertificate: false
      })
    );
  });

  test('应该执行方言的建表语句', async () => {
    await schemaManager.ensureTable({ tableName: 'Logs', createTableIfNotExists: true });

    expect(mockPool.query).toHaveBeenCalledTimes(1);
    expect(mockPool.query.mock.calls[0][0]).toMatch(/^CREATE TABLE IF NOT EXISTS `Logs` \(/);
  });

  test('同一张表应该只执行一次 DDL，reset 后重新执行', async () => {
    const table = { tableName: 'Logs', createTableIfNotExists: true };
    await schemaManager.ensureTable(table);
    await schemaManager.ensureTable(table);
    expect(mockPool.query).toHaveBeenCalledTimes(1);

    schemaManager.reset();
    await schemaManager.ensureTable(table);
    expect(mockPool.query).toHaveBeenCalledTimes(2);
  });

  test('缺少表名时应该抛出配置错误且不执行 DDL', async () => {
    await expect(schemaManager.ensureTable({ tableName: null, createTableIfNotExists: true })).rejects.toThrow(
      ConfigurationError
    );
    expect(createPool).not.toHaveBeenCalled();
  });

  test('DDL 失败应该抛出结构错误且不记为已确认', async () => {
    mockPool.query.mockRejectedValueOnce(new Error('CREATE command denied'));
    const table = { tableName: 'Logs', createTableIfNotExists: true };

    const failure = schemaManager.ensureTable(table);
    await expect(failure).rejects.toThrow(SchemaError);
    await expect(failure).rejects.toThrow("Failed to ensure log table 'Logs': CREATE command denied");

    await schemaManager.ensureTable(table);
    expect(mockPool.query).toHaveBeenCalledTimes(2);
  });
});
