/**
 * 配置检测工具 - 专门用于配置验证和问题诊断
 * 不修改传入的配置，只进行验证和报告问题
 */

import type { AspectConfig } from "../types";
import { findLayoutConflicts } from "../workspace/source-snapshot";
import { CONFIG_DEFAULTS } from "./config-manager";

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOr(value: unknown, fallback: string): string {
  return typeof value === "string" ? value : fallback;
}

function checkOptionalString(
  section: UnknownRecord,
  sectionName: string,
  field: string,
  errors: string[]
): void {
  const value = section[field];
  if (value !== undefined && (typeof value !== "string" || value.length === 0)) {
    errors.push(`${sectionName}.${field} 必须是非空字符串`);
  }
}

/**
 * 配置检测工具类
 * 专门负责配置的验证、检查和问题报告
 */
export class ConfigDetector {
  /**
   * 验证配置是否有效
   * 不会修改原配置，只返回验证结果
   */
  static validateConfig(raw: unknown): {
    valid: boolean;
    errors: string[];
    warnings: string[];
  } {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!isRecord(raw)) {
      return { valid: false, errors: ["配置必须是一个 JSON 对象"], warnings };
    }

    // 基本验证
    if (typeof raw.name !== "string" || raw.name.length === 0) {
      errors.push("缺少必要的系统名称 (name)");
    }

    const placeholder = isRecord(raw.options) ? raw.options.placeholder : undefined;
    const placeholderChar = typeof placeholder === "string" ? placeholder : "$";

    if (!Array.isArray(raw.pointcuts)) {
      errors.push("缺少必要的切入点列表 (pointcuts)");
    } else {
      if (raw.pointcuts.length === 0) {
        warnings.push("切入点列表为空，本次运行不会修改任何文件");
      }
      raw.pointcuts.forEach((pointcut: unknown, index: number) => {
        if (!isRecord(pointcut)) {
          errors.push(`pointcuts[${index}] 必须是对象`);
          return;
        }
        if (typeof pointcut.condition !== "string" || pointcut.condition.length === 0) {
          errors.push(`pointcuts[${index}].condition 必须是非空字符串`);
        }
        if (typeof pointcut.advice !== "string") {
          errors.push(`pointcuts[${index}].advice 必须是字符串`);
        } else if (pointcut.advice.length === 0) {
          warnings.push(`pointcuts[${index}].advice 为空，匹配到的源码将被删除`);
        } else if (!pointcut.advice.includes(placeholderChar)) {
          warnings.push(`pointcuts[${index}].advice 未使用占位符，匹配到的源码将被替换`);
        }
      });
    }

    // 织入选项
    if (raw.options !== undefined) {
      if (!isRecord(raw.options)) {
        errors.push("options 必须是对象");
      } else {
        const { argumentOrder, allowOverlap } = raw.options;
        if (
          placeholder !== undefined &&
          (typeof placeholder !== "string" || [...placeholder].length !== 1)
        ) {
          errors.push("options.placeholder 必须是单个字符");
        }
        if (
          argumentOrder !== undefined &&
          argumentOrder !== "longest-first" &&
          argumentOrder !== "report"
        ) {
          errors.push('options.argumentOrder 只能是 "longest-first" 或 "report"');
        }
        if (allowOverlap !== undefined && typeof allowOverlap !== "boolean") {
          errors.push("options.allowOverlap 必须是布尔值");
        }
      }
    }

    // 分析工具配置
    if (raw.analysis !== undefined) {
      if (!isRecord(raw.analysis)) {
        errors.push("analysis 必须是对象");
      } else {
        checkOptionalString(raw.analysis, "analysis", "command", errors);
        checkOptionalString(raw.analysis, "analysis", "outputDir", errors);
        checkOptionalString(raw.analysis, "analysis", "artifactSuffix", errors);
        const { args } = raw.analysis;
        if (
          args !== undefined &&
          (!Array.isArray(args) || !args.every((arg) => typeof arg === "string"))
        ) {
          errors.push("analysis.args 必须是字符串数组");
        } else if (Array.isArray(args) && !args.some((arg) => String(arg).includes("{condition}"))) {
          warnings.push("analysis.args 未包含 {condition}，所有切入点将使用相同的分析参数");
        }
      }
    }

    // 快照目录配置
    if (raw.snapshot !== undefined) {
      if (!isRecord(raw.snapshot)) {
        errors.push("snapshot 必须是对象");
      } else {
        const before = errors.length;
        checkOptionalString(raw.snapshot, "snapshot", "sourceDir", errors);
        checkOptionalString(raw.snapshot, "snapshot", "savedDir", errors);
        checkOptionalString(raw.snapshot, "snapshot", "modifiedDir", errors);
        if (errors.length === before) {
          const { sourceDir, savedDir, modifiedDir } = CONFIG_DEFAULTS.snapshot;
          // 三个目录都相对项目根目录解析，这里只比较它们之间的相对关系
          errors.push(
            ...findLayoutConflicts({
              sourceDir: stringOr(raw.snapshot.sourceDir, sourceDir),
              savedDir: stringOr(raw.snapshot.savedDir, savedDir),
              modifiedDir: stringOr(raw.snapshot.modifiedDir, modifiedDir),
            })
          );
        }
      }
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
    };
  }

  /**
   * 配置是否满足 AspectConfig 结构
   */
  static isAspectConfig(raw: unknown): raw is AspectConfig {
    return ConfigDetector.validateConfig(raw).valid;
  }
}
