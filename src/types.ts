/**
 * 统一类型定义入口
 *
 * @fileoverview 汇总导出错误类型与日志记录器类型
 * @since 1.0.0
 */

// 错误处理相关类型
export * from './types/errorTypes.js';

// 日志记录器相关类型
export * from './types/loggerTypes.js';
