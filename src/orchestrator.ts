/**
 * 织入流程编排
 *
 * 严格按顺序处理切入点：调用分析工具 → 解析每个产物 → 逐文件读取、织入、写回 → 删除产物。
 * 每个切入点都重新从磁盘读取源文件，因此后面的切入点总能看到前面切入点的织入结果。
 * 任何错误都会立即中止整个运行。
 */

import fs from "fs";
import path from "path";
import type { WeaveLogger, WeaveSummary } from "./types";
import type { ResolvedAspectConfig } from "./config";
import type { AnalysisRunner } from "./analysis/analysis-runner";
import { CommandAnalysisRunner } from "./analysis/analysis-runner";
import { createWeaveError, logError } from "./core/error-handler";
import { readTextFile, weaveFile } from "./core/file-weaver";
import { formatPosition } from "./core/position-resolver";
import { parseMatchReport } from "./core/report-parser";
import { isInsideDirectory, withSourceSnapshot } from "./workspace/source-snapshot";

export interface RunWeavingOptions {
  /** 外部分析工具，默认按配置创建 CommandAnalysisRunner */
  runner?: AnalysisRunner;
  logger?: WeaveLogger;
  /** 输出每个匹配的详细信息 */
  verbose?: boolean;
}

/**
 * 删除已消费的产物，失败只记录警告
 */
function removeArtifact(artifactPath: string, logger: WeaveLogger): void {
  try {
    fs.rmSync(artifactPath, { force: true });
  } catch (error) {
    logError(
      createWeaveError("FILE004", [artifactPath], {
        filePath: artifactPath,
        originalError: error instanceof Error ? error : undefined,
      }),
      logger
    );
  }
}

export function createAnalysisRunner(config: ResolvedAspectConfig): AnalysisRunner {
  return new CommandAnalysisRunner({
    cwd: config.root,
    ...config.analysis,
  });
}

/**
 * 对工作目录中的源码执行全部切入点的织入（不做快照）
 */
export function runWeaving(
  config: ResolvedAspectConfig,
  options: RunWeavingOptions = {}
): WeaveSummary {
  const logger = options.logger ?? console;
  const runner = options.runner ?? createAnalysisRunner(config);
  const summary: WeaveSummary = {
    systemName: config.name,
    pointcuts: 0,
    artifacts: 0,
    files: 0,
    matches: 0,
  };

  config.pointcuts.forEach((pointcut, index) => {
    logger.log(`[${index + 1}/${config.pointcuts.length}] 切入点: ${pointcut.condition}`);
    const artifacts = runner.runAnalysis(pointcut.condition);

    for (const artifactPath of artifacts) {
      const report = parseMatchReport(readTextFile(artifactPath));
      logger.log(`  产物 ${path.relative(config.root, artifactPath)}: ${report.size} 个文件`);

      // 快照只保护源码目录，先确认整个产物都不越界再动任何文件
      for (const sourceFile of report.keys()) {
        const filePath = path.resolve(config.root, sourceFile);
        if (!isInsideDirectory(config.snapshot.sourceDir, filePath)) {
          throw createWeaveError("ARTIFACT004", [sourceFile, config.snapshot.sourceDir], {
            filePath,
          });
        }
      }

      for (const [sourceFile, matches] of report) {
        const filePath = path.resolve(config.root, sourceFile);
        if (options.verbose) {
          matches.forEach((match) =>
            logger.log(
              `    ${sourceFile}:${formatPosition(match.start)}-${formatPosition(match.end)} ${match.matchedText}`
            )
          );
        }
        weaveFile(filePath, matches, pointcut, config.options);
        logger.log(`    ${sourceFile}: 织入 ${matches.length} 处`);
        summary.files++;
        summary.matches += matches.length;
      }

      removeArtifact(artifactPath, logger);
      summary.artifacts++;
    }
    summary.pointcuts++;
  });

  return summary;
}

/**
 * 在源码快照保护下执行织入：结束后织入结果位于 snapshot.modifiedDir，
 * 源码目录恢复为运行前的内容
 */
export function runWithSnapshot(
  config: ResolvedAspectConfig,
  options: RunWeavingOptions = {}
): WeaveSummary {
  return withSourceSnapshot(
    config.snapshot,
    () => runWeaving(config, options),
    options.logger ?? console
  );
}
