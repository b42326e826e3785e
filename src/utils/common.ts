/**
 * 通用工具函数
 *
 * 提供时间戳格式化、耗时计算与值格式化等工具函数。
 *
 * @fileoverview 通用工具函数集合
 * @since 1.0.0
 */

import { performance } from 'perf_hooks';
import { inspect } from 'util';
import { DefaultConfig } from '../constants.js';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December'
] as const;

/**
 * 时间相关工具函数
 */
export class TimeUtils {
  /**
   * 获取高精度单调时间（毫秒）
   */
  static now(): number {
    return performance.now();
  }

  /**
   * 计算自 startTime 起经过的秒数
   */
  static getDurationInSeconds(startTime: number, endTime: number = TimeUtils.now()): number {
    return (endTime - startTime) / 1000;
  }

  /**
   * 秒数保留四位小数
   */
  static formatSeconds(seconds: number): string {
    return seconds.toFixed(DefaultConfig.DURATION_PRECISION);
  }

  /**
   * 格式化日志时间戳
   *
   * 本地时间，格式为 `DD Month YYYY HH:MM:SS.mmm`，月份固定为英文全称，
   * 不受运行环境 locale 影响。
   *
   * @example
   * TimeUtils.formatLogTimestamp(new Date(2024, 2, 5, 14, 3, 9, 42)); // '05 March 2024 14:03:09.042'
   */
  static formatLogTimestamp(date: Date): string {
    const day = String(date.getDate()).padStart(2, '0');
    const month = MONTH_NAMES[date.getMonth()];
    const hours = String(date.getHours()).padStart(2, '0');
    const minutes = String(date.getMinutes()).padStart(2, '0');
    const seconds = String(date.getSeconds()).padStart(2, '0');
    const millis = String(date.getMilliseconds()).padStart(3, '0');
    return `${day} ${month} ${date.getFullYear()} ${hours}:${minutes}:${seconds}.${millis}`;
  }
}

/**
 * 值格式化工具函数
 */
export class FormatUtils {
  /**
   * 把任意值转换为单行字符串；字符串原样返回
   */
  static formatValue(value: unknown): string {
    if (typeof value === 'string') {
      return value;
    }
    return inspect(value, { depth: DefaultConfig.INSPECT_DEPTH, breakLength: Infinity });
  }

  /**
   * 格式化位置参数列表
   *
   * @example
   * FormatUtils.formatArguments([5, 3]); // '[ 5, 3 ]'
   */
  static formatArguments(args: readonly unknown[]): string {
    return inspect(args, { depth: DefaultConfig.INSPECT_DEPTH, breakLength: Infinity });
  }

  /**
   * 判断是否为普通对象（字面量或无原型对象）
   */
  static isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) {
      return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
  }
}
