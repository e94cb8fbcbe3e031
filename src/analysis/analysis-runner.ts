/**
 * 外部分析工具调用
 *
 * 织入引擎只依赖 AnalysisRunner 接口：给定条件表达式，返回分析产物的路径列表。
 * 默认实现同步调用命令行工具（默认 `cargo +AOP rustc -- -Z aop-inspect="..."`），
 * 然后在构建输出目录下递归查找产物文件。
 */

import fs from "fs";
import path from "path";
import { spawnSync } from "child_process";
import { globSync } from "glob";
import { createWeaveError } from "../core/error-handler";

export interface AnalysisRunner {
  /**
   * 对一个条件表达式运行分析，返回产物文件的绝对路径
   */
  runAnalysis(condition: string): string[];
}

export interface CommandAnalysisRunnerOptions {
  /** 运行命令的工作目录（项目根目录） */
  cwd: string;
  command: string;
  /** 其中的 `{condition}` 会被替换为条件表达式 */
  args: string[];
  /** 产物所在目录（绝对路径） */
  outputDir: string;
  artifactSuffix: string;
}

/**
 * 在 outputDir 下递归查找以 suffix 结尾的文件，结果按路径排序
 */
export function findArtifacts(outputDir: string, suffix: string): string[] {
  if (!fs.existsSync(outputDir)) {
    return [];
  }
  return globSync(`**/*${suffix}`, {
    cwd: outputDir,
    absolute: true,
    nodir: true,
    dot: true,
  }).sort();
}

/**
 * 把参数模板中的 {condition} 替换为条件表达式
 */
export function buildAnalysisArgs(args: string[], condition: string): string[] {
  return args.map((arg) => arg.split("{condition}").join(condition));
}

export class CommandAnalysisRunner implements AnalysisRunner {
  constructor(private readonly options: CommandAnalysisRunnerOptions) {}

  runAnalysis(condition: string): string[] {
    const { cwd, command, outputDir, artifactSuffix } = this.options;
    const args = buildAnalysisArgs(this.options.args, condition);
    const commandLine = [command, ...args].join(" ");

    const result = spawnSync(command, args, { cwd, stdio: "inherit" });

    if (result.error) {
      throw createWeaveError("ANALYSIS001", [commandLine, command], {
        originalError: result.error,
      });
    }
    if (result.status !== 0) {
      const reason = result.signal
        ? `${commandLine} (signal ${result.signal})`
        : `${commandLine} (exit code ${result.status})`;
      throw createWeaveError("ANALYSIS002", [reason, condition]);
    }

    const artifacts = findArtifacts(outputDir, artifactSuffix);
    if (artifacts.length === 0) {
      throw createWeaveError("ANALYSIS003", [path.join(outputDir, `**/*${artifactSuffix}`)]);
    }
    return artifacts;
  }
}
