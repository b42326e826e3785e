/**
 * 文件操作工具函数
 *
 * @fileoverview 日志目录创建与追加写入
 * @since 1.0.0
 */

import { mkdirSync } from 'fs';
import fs from 'fs/promises';

/**
 * 确保目录存在
 *
 * 创建目录（包括必要的父目录），如果目录已存在则不执行任何操作；
 * 路径被普通文件占用时抛出错误。
 *
 * @param dirPath - 要确保存在的目录路径
 *
 * @example
 * ensureDirectoryExistsSync('./logs');
 */
export function ensureDirectoryExistsSync(dirPath: string): void {
  // 目录已存在时 recursive 不报错；同名文件占位时抛出 EEXIST
  mkdirSync(dirPath, { recursive: true });
}

/**
 * 以追加模式写入一行文本，文件不存在时创建
 *
 * @param filePath - 目标文件
 * @param line - 不含换行符的一行内容
 */
export async function appendLine(filePath: string, line: string): Promise<void> {
  await fs.appendFile(filePath, `${line}\n`, { encoding: 'utf8', flag: 'a' });
}
