/**
 * 调用记录装饰器
 *
 * 在被包装函数周围记录入口、参数、耗时、返回值与异常。被包装函数的
 * 返回值与抛出的错误原样传给调用方：错误只被观察和记录，不会被转换或吞掉。
 *
 * 每次调用依次经过：记录入口 → 执行 → 记录成功或失败 → 返回或重新抛出。
 *
 * @fileoverview 方法装饰器与函数包装器
 * @since 1.0.0
 */

import { DefaultConfig, StringConstants } from '../constants.js';
import { ErrorHandler } from '../errorHandler.js';
import { logger } from '../logger.js';
import {
  ArgumentAdapter,
  CallLoggingOptions,
  CallSite,
  InstrumentationDefaults,
  InstrumentationHost
} from '../types.js';
import { FormatUtils, TimeUtils } from './common.js';

const instrumentationLogger = logger.child('instrumentation');

/**
 * 单次调用生效的开关
 */
interface ResolvedCallLoggingOptions extends InstrumentationDefaults {
  logLevel: string;
}

/**
 * 默认参数适配器：所有参数都视为位置参数
 */
export const positionalArguments: ArgumentAdapter = args => ({ positional: args, named: {} });

/**
 * 末尾普通对象视为命名参数
 *
 * @example
 * trailingNamedArguments(['Bob', { greeting: 'Hi' }]);
 * // { positional: ['Bob'], named: { greeting: 'Hi' } }
 */
export const trailingNamedArguments: ArgumentAdapter = args => {
  const last = args[args.length - 1];
  if (args.length > 0 && FormatUtils.isPlainObject(last)) {
    return { positional: args.slice(0, -1), named: last };
  }
  return { positional: args, named: {} };
};

function resolveOptions(defaults: InstrumentationDefaults, options: CallLoggingOptions): ResolvedCallLoggingOptions {
  return {
    logLevel: options.logLevel ?? DefaultConfig.LOG_LEVEL,
    includeDuration: options.includeDuration ?? defaults.includeDuration,
    includeTraceback: options.includeTraceback ?? defaults.includeTraceback,
    includeFunctionArgs: options.includeFunctionArgs ?? defaults.includeFunctionArgs,
    includeDatabase: options.includeDatabase ?? defaults.includeDatabase
  };
}

/**
 * 记录一次调用
 *
 * 入口记录写入失败时目标函数不会执行；成功路径上的记录失败会在目标函数
 * 执行之后抛出。失败路径上的记录失败只报告给诊断日志，调用方始终收到
 * 目标函数抛出的原始错误。
 *
 * @param host - 日志门面
 * @param site - 调用点描述
 * @param invoke - 执行目标函数
 * @param options - 包装器选项
 * @returns 目标函数的返回值
 */
export async function runWithCallLogging<T>(
  host: InstrumentationHost,
  site: CallSite,
  invoke: () => T | PromiseLike<T>,
  options: CallLoggingOptions = {}
): Promise<Awaited<T>> {
  const settings = resolveOptions(host.defaults, options);
  const log = (message: string, level: string = settings.logLevel): Promise<void> =>
    host.logging(message, level, undefined, settings.includeDatabase);

  await log(`${StringConstants.MSG_CALLING_FUNCTION}${site.name}`);

  if (settings.includeFunctionArgs) {
    if (site.positional.length > 0) {
      await log(`${StringConstants.MSG_POSITIONAL_ARGUMENTS}${FormatUtils.formatArguments(site.positional)}`);
    }
    if (Object.keys(site.named).length > 0) {
      await log(`${StringConstants.MSG_KEYWORD_ARGUMENTS}${FormatUtils.formatValue(site.named)}`);
    }
  }

  const startTime = TimeUtils.now();
  let result: Awaited<T>;
  try {
    result = await invoke();
  } catch (error) {
    const elapsed = TimeUtils.getDurationInSeconds(startTime);
    await reportFailure(log, site, error, elapsed, settings);
    throw error;
  }

  const elapsed = TimeUtils.getDurationInSeconds(startTime);
  if (settings.includeDuration) {
    await log(`${StringConstants.MSG_EXECUTION_TIME}${TimeUtils.formatSeconds(elapsed)}${StringConstants.MSG_SECONDS_SUFFIX}`);
  }
  await log(`${StringConstants.MSG_RETURN_VALUE}${FormatUtils.formatValue(result)}`);

  return result;
}

async function reportFailure(
  log: (message: string, level?: string) => Promise<void>,
  site: CallSite,
  error: unknown,
  elapsed: number,
  settings: ResolvedCallLoggingOptions
): Promise<void> {
  const details = ErrorHandler.describeError(error);
  const level = DefaultConfig.ERROR_LEVEL;

  try {
    await log(`${StringConstants.MSG_EXCEPTION_OCCURRED}${site.name}`, level);
    await log(`${StringConstants.MSG_EXCEPTION_TYPE}${details.kind}`, level);
    await log(`${StringConstants.MSG_EXCEPTION_MESSAGE}${details.message}`, level);

    if (settings.includeDuration) {
      await log(
        `${StringConstants.MSG_EXECUTION_TIME_BEFORE_ERROR}${TimeUtils.formatSeconds(elapsed)}${StringConstants.MSG_SECONDS_SUFFIX}`,
        level
      );
    }

    if (settings.includeTraceback) {
      await log(StringConstants.MSG_TRACEBACK, level);
      await log(details.stack ?? `${details.kind}: ${details.message}`, level);
    }
  } catch (loggingError) {
    instrumentationLogger.error(
      `记录 ${site.name} 的异常时失败，原始错误将继续抛出`,
      undefined,
      ErrorHandler.toError(loggingError),
      { originalKind: details.kind, originalMessage: details.message }
    );
  }
}

/**
 * 方法调用记录装饰器
 *
 * 被装饰的方法变为异步方法，声明的返回类型应为 Promise。
 *
 * @example
 * class OrderService {
 *   @withCallLogging(callLogger, { includeDatabase: true })
 *   async placeOrder(orderId: string): Promise<boolean> { ... }
 * }
 */
export function withCallLogging(host: InstrumentationHost, options: CallLoggingOptions = {}) {
  if (options.includeAi) {
    host.enableAiLogging();
  }

  return function (_target: unknown, propertyKey: string, descriptor: PropertyDescriptor) {
    const originalMethod: unknown = descriptor.value;
    if (typeof originalMethod !== 'function') {
      throw new TypeError(`@withCallLogging can only decorate methods, '${propertyKey}' is not a function`);
    }

    const name = options.name ?? propertyKey;
    const describe = options.describeArguments ?? positionalArguments;

    descriptor.value = function (this: unknown, ...args: unknown[]) {
      const site: CallSite = { name, ...describe(args) };
      return runWithCallLogging(host, site, (): unknown => originalMethod.apply(this, args), options);
    };

    return descriptor;
  };
}

/**
 * 函数调用记录包装器
 *
 * 用于包装独立函数；同步函数包装后返回 Promise。
 *
 * @example
 * const add = wrapWithCallLogging((a: number, b: number) => a + b, callLogger);
 * await add(5, 3); // 8
 */
export function wrapWithCallLogging<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => TResult,
  host: InstrumentationHost,
  options: CallLoggingOptions = {}
): (...args: TArgs) => Promise<Awaited<TResult>> {
  if (options.includeAi) {
    host.enableAiLogging();
  }

  const name = options.name ?? (fn.name || 'anonymous');
  const describe = options.describeArguments ?? positionalArguments;

  return (...args: TArgs) => {
    const site: CallSite = { name, ...describe(args) };
    return runWithCallLogging(host, site, () => fn(...args), options);
  };
}
