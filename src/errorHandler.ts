/**
 * 错误处理工具
 *
 * 从任意抛出值中提取类型、消息与堆栈，并在驱动错误写入日志文件前
 * 掩码其中的凭据。
 *
 * @fileoverview 错误描述与敏感信息掩码
 * @since 1.0.0
 */

/**
 * 错误描述
 */
export interface ErrorDetails {
  /** 错误类型名：Error 子类取构造函数名，其余取 typeof */
  kind: string;
  message: string;
  stack?: string;
}

/**
 * 错误处理器工具类
 */
export class ErrorHandler {
  /**
   * 描述任意抛出值
   *
   * @example
   * class ValueError extends Error {}
   * ErrorHandler.describeError(new ValueError('boom')); // { kind: 'ValueError', message: 'boom', stack: '...' }
   * ErrorHandler.describeError('boom'); // { kind: 'string', message: 'boom' }
   */
  public static describeError(error: unknown): ErrorDetails {
    if (error instanceof Error) {
      const kind = error.constructor.name || error.name;
      return { kind, message: error.message, stack: error.stack };
    }
    if (error === null) {
      return { kind: 'null', message: 'null' };
    }
    return { kind: typeof error, message: String(error) };
  }

  /**
   * 把任意抛出值规整为 Error 实例，Error 原样返回
   */
  public static toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(ErrorHandler.describeError(error).message);
  }

  /**
   * 掩码敏感信息
   *
   * 替换给定的密钥值以及 `password=...`、`pwd=...` 形式的片段。
   *
   * @param {string} message - 原始消息
   * @param {Array<string | null | undefined>} [secrets] - 需要隐藏的具体值
   * @returns {string} 掩码后的消息
   */
  public static maskSensitiveInfo(message: string, secrets: ReadonlyArray<string | null | undefined> = []): string {
    let masked = message;
    for (const secret of secrets) {
      if (secret) {
        masked = masked.split(secret).join('***');
        const encoded = encodeURIComponent(secret);
        if (encoded !== secret) {
          masked = masked.split(encoded).join('***');
        }
      }
    }
    return masked.replace(/\b(password|pwd)\s*[=:]\s*[^;\s]+/gi, '$1=***');
  }
}
