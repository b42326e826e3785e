/**
 * 测试环境设置
 *
 * @description 清除会影响配置的环境变量，静默诊断日志与 console.error
 * @since 1.0.0
 */

import { jest } from '@jest/globals';

// 设置测试环境变量
process.env.NODE_ENV = 'test';
for (const key of Object.keys(process.env)) {
  if (key.startsWith('LOG_')) {
    delete process.env[key];
  }
}

// 全局测试设置
beforeAll(() => {
  // 静默 console.error 与诊断日志输出
  jest.spyOn(console, 'error').mockImplementation(() => {});
  jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
});

afterAll(() => {
  jest.restoreAllMocks();
});
