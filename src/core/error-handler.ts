/**
 * 错误处理模块
 * 提供统一的错误类型、错误生成和格式化方法。
 * 织入过程中的任何错误都是致命的：第一个错误即中止整个运行。
 */

import type { WeaveLogger } from "../types";

// 错误类别枚举
export enum ErrorCategory {
  CONFIG = "CONFIG", // 配置错误
  ANALYSIS = "ANALYSIS", // 外部分析工具错误
  ARTIFACT = "ARTIFACT", // 分析产物解析错误
  POSITION = "POSITION", // 位置解析错误
  FILE_OPERATION = "FILE_OPERATION", // 文件操作错误
  UNKNOWN = "UNKNOWN", // 未知错误
}

// 错误严重级别
export enum ErrorSeverity {
  WARNING = "WARNING", // 警告，不会中断处理
  FATAL = "FATAL", // 致命错误，中断整个织入流程
}

// 预定义错误代码和对应信息
interface ErrorDefinition {
  code: string;
  category: ErrorCategory;
  messageTemplate: string;
  severity: ErrorSeverity;
  suggestionTemplate?: string;
}

export interface WeaveErrorOptions {
  filePath?: string;
  line?: number;
  column?: number;
  originalError?: Error;
}

// 错误定义集
const errorDefinitions: Record<string, ErrorDefinition> = {
  // 配置错误
  CONFIG001: {
    code: "CONFIG001",
    category: ErrorCategory.CONFIG,
    messageTemplate: "配置无效: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请检查 aspect.config.json 的格式，特别是 {0}",
  },
  CONFIG002: {
    code: "CONFIG002",
    category: ErrorCategory.CONFIG,
    messageTemplate: "找不到指定的文件: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请在项目根目录下运行，或通过 --root / --config 指定正确的路径",
  },
  CONFIG003: {
    code: "CONFIG003",
    category: ErrorCategory.CONFIG,
    messageTemplate: "不再支持 TOML 配置文件: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请把其中的 name 与切入点改写为 JSON 并保存到 {1}",
  },

  // 外部分析错误
  ANALYSIS001: {
    code: "ANALYSIS001",
    category: ErrorCategory.ANALYSIS,
    messageTemplate: "无法启动分析命令: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认 {1} 已安装并位于 PATH 中",
  },
  ANALYSIS002: {
    code: "ANALYSIS002",
    category: ErrorCategory.ANALYSIS,
    messageTemplate: "分析命令执行失败: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请检查切入点条件 {1} 是否能被分析工具接受",
  },
  ANALYSIS003: {
    code: "ANALYSIS003",
    category: ErrorCategory.ANALYSIS,
    messageTemplate: "分析命令没有产生任何产物: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认 analysis.outputDir 与 analysis.artifactSuffix 配置与分析工具一致",
  },

  // 产物解析错误
  ARTIFACT001: {
    code: "ARTIFACT001",
    category: ErrorCategory.ARTIFACT,
    messageTemplate: "匹配记录头部格式不正确: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "记录头部应为 <文件路径>:<行>:<列>: <结束行>:<结束列>",
  },
  ARTIFACT002: {
    code: "ARTIFACT002",
    category: ErrorCategory.ARTIFACT,
    messageTemplate: "匹配区间起点位于终点之后: {0}",
    severity: ErrorSeverity.FATAL,
  },
  ARTIFACT003: {
    code: "ARTIFACT003",
    category: ErrorCategory.ARTIFACT,
    messageTemplate: "同一文件中的匹配区间重叠: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "如需沿用分析工具的结果而不做检查，请设置 options.allowOverlap: true",
  },
  ARTIFACT004: {
    code: "ARTIFACT004",
    category: ErrorCategory.ARTIFACT,
    messageTemplate: "匹配记录指向源码目录之外的文件: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "只有 {1} 下的文件会在运行结束后恢复，请调整 snapshot.sourceDir",
  },

  // 位置错误
  POSITION001: {
    code: "POSITION001",
    category: ErrorCategory.POSITION,
    messageTemplate: "找不到第 {0} 行第 {1} 列",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate:
      "分析工具与织入器对制表符宽度、编码或换行符的理解可能不一致，也可能源文件在分析后被修改",
  },

  // 文件操作错误
  FILE001: {
    code: "FILE001",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "读取文件失败: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认文件存在且有读取权限",
  },
  FILE002: {
    code: "FILE002",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "写入文件失败: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请确认目标目录存在且有写入权限",
  },
  FILE003: {
    code: "FILE003",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "目录操作失败: {0}",
    severity: ErrorSeverity.FATAL,
    suggestionTemplate: "请检查 {1} 是否被其他进程占用，必要时手动恢复源码目录",
  },
  FILE004: {
    code: "FILE004",
    category: ErrorCategory.FILE_OPERATION,
    messageTemplate: "删除分析产物失败: {0}",
    severity: ErrorSeverity.WARNING,
  },

  // 通用错误
  GENERAL001: {
    code: "GENERAL001",
    category: ErrorCategory.UNKNOWN,
    messageTemplate: "未知错误: {0}",
    severity: ErrorSeverity.FATAL,
  },
};

/**
 * 织入错误
 */
export class WeaveError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly details?: string;
  readonly filePath?: string;
  readonly line?: number;
  readonly column?: number;
  readonly suggestion?: string;
  readonly originalError?: Error;

  constructor(
    definition: ErrorDefinition,
    message: string,
    suggestion: string,
    options: WeaveErrorOptions
  ) {
    super(message);
    this.name = "WeaveError";
    this.code = definition.code;
    this.category = definition.category;
    this.severity = definition.severity;
    this.details = options.originalError?.message;
    this.filePath = options.filePath;
    this.line = options.line;
    this.column = options.column;
    this.suggestion = suggestion || undefined;
    this.originalError = options.originalError;
  }
}

/**
 * 创建格式化的错误对象
 */
export function createWeaveError(
  errorCode: string,
  params: Array<string | number> = [],
  options: WeaveErrorOptions = {}
): WeaveError {
  const definition = errorDefinitions[errorCode] ?? errorDefinitions.GENERAL001;

  // 替换消息模板中的参数
  let message = definition.messageTemplate;
  let suggestion = definition.suggestionTemplate ?? "";

  params.forEach((param, index) => {
    message = message.replace(`{${index}}`, String(param));
    suggestion = suggestion.replace(`{${index}}`, String(param));
  });

  // 参数不足时不输出建议
  if (/\{\d+\}/.test(suggestion)) {
    suggestion = "";
  }

  return new WeaveError(definition, message, suggestion, options);
}

/**
 * 把任意抛出值转换为 WeaveError，已经是 WeaveError 的原样返回
 */
export function toWeaveError(
  error: unknown,
  fallbackCode = "GENERAL001",
  options: WeaveErrorOptions = {}
): WeaveError {
  if (error instanceof WeaveError) {
    return error;
  }
  const originalError = error instanceof Error ? error : undefined;
  const reason = originalError ? originalError.message : String(error);
  return createWeaveError(fallbackCode, [reason], { ...options, originalError });
}

/**
 * 格式化错误为用户友好的消息
 */
export function formatError(error: WeaveError): string {
  let formattedMessage = `[${error.code}] ${error.message}`;

  if (error.filePath) {
    formattedMessage += `\n文件: ${error.filePath}`;
    if (error.line) {
      formattedMessage += `:${error.line}`;
      if (error.column) {
        formattedMessage += `:${error.column}`;
      }
    }
  }

  if (error.details && error.details !== error.message) {
    formattedMessage += `\n详情: ${error.details}`;
  }

  if (error.suggestion) {
    formattedMessage += `\n建议: ${error.suggestion}`;
  }

  return formattedMessage;
}

/**
 * 记录错误
 */
export function logError(error: WeaveError, logger: WeaveLogger = console): void {
  const formattedError = formatError(error);

  if (error.severity === ErrorSeverity.WARNING) {
    logger.warn(formattedError);
  } else {
    logger.error(formattedError);
  }
}
