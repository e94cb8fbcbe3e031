import { findProjectRoot, loadAspectConfig } from "./config";
import type { ResolvedAspectConfig } from "./config";
import { runWithSnapshot } from "./orchestrator";
import type { RunWeavingOptions } from "./orchestrator";
import type { WeaveSummary } from "./types";

// 导出核心模块
export {
  comparePositions,
  formatPosition,
  positionAt,
  resolveOffset,
  parseMatchReport,
  parseRecordBlock,
  splitRecordBlocks,
  RECORD_MARKER,
  expandAdvice,
  orderArgumentKeys,
  DEFAULT_PLACEHOLDER,
  weaveText,
  weaveFile,
  ErrorCategory,
  ErrorSeverity,
  WeaveError,
  createWeaveError,
  formatError,
  toWeaveError,
} from "./core";
export type { ExpandOptions } from "./core";

// 导出配置系统
export { ConfigDetector, CONFIG_DEFAULTS, resolveConfig, findProjectRoot, loadAspectConfig } from "./config";
export type { ResolvedAspectConfig } from "./config";

export { CommandAnalysisRunner, findArtifacts, buildAnalysisArgs } from "./analysis/analysis-runner";
export type { AnalysisRunner, CommandAnalysisRunnerOptions } from "./analysis/analysis-runner";
export {
  SourceSnapshot,
  withSourceSnapshot,
  findLayoutConflicts,
  isInsideDirectory,
} from "./workspace/source-snapshot";
export type { SnapshotLayout } from "./workspace/source-snapshot";
export { runWeaving, runWithSnapshot, createAnalysisRunner } from "./orchestrator";
export type { RunWeavingOptions } from "./orchestrator";

export type {
  Position,
  MatchRecord,
  Pointcut,
  PerFileMatchSet,
  ArgumentOrder,
  WeaveOptions,
  AnalysisConfig,
  SnapshotConfig,
  AspectConfig,
  WeaveLogger,
  WeaveSummary,
} from "./types";

/**
 * 统一的织入主函数：定位项目、加载配置并在快照保护下执行全部切入点
 */
export function weaveProject(
  cwd: string = process.cwd(),
  options: RunWeavingOptions & { configPath?: string } = {}
): { config: ResolvedAspectConfig; summary: WeaveSummary } {
  const { configPath, ...runOptions } = options;
  const root = findProjectRoot(cwd);
  const config = loadAspectConfig(root, configPath, runOptions.logger);
  return { config, summary: runWithSnapshot(config, runOptions) };
}

export default weaveProject;
