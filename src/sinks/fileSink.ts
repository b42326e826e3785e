/**
 * 文件接收端
 *
 * 每条记录追加一行 `<时间戳> - <级别> - <消息>`。文件不存在时创建，从不截断。
 * I/O 错误不做捕获，直接抛给调用方。
 *
 * @fileoverview 日志文件追加写入
 * @since 1.0.0
 */

import { TimeUtils } from '../utils/common.js';
import { appendLine } from '../utils/fileUtils.js';

/**
 * 组装一行日志（不含换行符）
 *
 * @example
 * formatLogLine('Calling function: add', 'INFO', new Date(2024, 2, 5, 14, 3, 9, 42));
 * // '05 March 2024 14:03:09.042 - INFO - Calling function: add'
 */
export function formatLogLine(message: string, level: string, timestamp: Date): string {
  return `${TimeUtils.formatLogTimestamp(timestamp)} - ${level} - ${message}`;
}

export class FileSink {
  constructor(private readonly logToConsole: boolean = false) {}

  /**
   * 追加一条记录；开启控制台回显时同一行也输出到 console.log
   */
  public async write(message: string, level: string, timestamp: Date, filePath: string): Promise<void> {
    const line = formatLogLine(message, level, timestamp);
    await appendLine(filePath, line);
    if (this.logToConsole) {
      console.log(line);
    }
  }
}
