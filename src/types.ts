/**
 * 源码位置，行列均从 1 开始
 * A source position, both line and column are 1-based.
 */
export interface Position {
  /** 行号 */
  line: number;
  /** 列号（按字符计数） */
  column: number;
}

/**
 * 一条匹配记录：分析工具报告的一个位置，以及当时匹配到的原文和命名捕获
 * One reported location plus the verbatim text found there and its named captures.
 */
export interface MatchRecord {
  /** 源文件路径（按分析工具报告的原样保留） */
  sourceFile: string;
  /** 匹配位置上的原始源码片段 */
  matchedText: string;
  start: Position;
  end: Position;
  /**
   * 命名捕获，按报告中出现的顺序插入
   * Named captures, inserted in the order they appear in the report.
   */
  capturedArgs: Map<string, string>;
}

/**
 * 切入点：条件表达式（交给外部分析工具解释）+ 通知模板
 */
export interface Pointcut {
  /**
   * The condition expression handed to the analysis pass. Opaque to the weaver.
   * 条件表达式，对织入引擎不透明。
   */
  condition: string;
  /**
   * The advice template inserted at every match.
   * 在每个匹配处插入的通知模板。
   */
  advice: string;
}

/**
 * 同一文件的匹配集合，已按起始位置降序排列
 */
export type PerFileMatchSet = MatchRecord[];

/**
 * 捕获参数的替换顺序
 * - "longest-first"：较长的键优先，长度相同时按字典序
 * - "report"：按报告中出现的顺序
 */
export type ArgumentOrder = "longest-first" | "report";

/**
 * Options controlling how advice is expanded and spliced.
 * 控制通知展开与拼接的选项。
 */
export interface WeaveOptions {
  /**
   * Single character replaced by the matched source text.
   * Default is "$".
   * 被替换为匹配原文的占位字符，默认 "$"。
   */
  placeholder?: string;

  /**
   * Order in which argument keys are tried at each template position.
   * Default is "longest-first".
   * @default "longest-first"
   */
  argumentOrder?: ArgumentOrder;

  /**
   * 是否信任分析工具报告、不检查同一文件内的匹配区间是否重叠。
   * Whether overlapping match ranges in one file are applied without a check.
   * 默认 false（发现重叠立即失败）。
   */
  allowOverlap?: boolean;
}

/**
 * Configuration of the external analysis pass.
 * 外部分析工具的调用配置。
 */
export interface AnalysisConfig {
  /** 可执行命令，默认 "cargo" */
  command?: string;
  /**
   * 命令参数，其中的 `{condition}` 会被替换为切入点的条件表达式
   * Arguments; every `{condition}` is replaced by the pointcut condition.
   */
  args?: string[];
  /** 分析产物所在的构建输出目录（相对项目根目录），默认 "target" */
  outputDir?: string;
  /** 分析产物文件名后缀，默认 "RUST_ASPECT_OUTPUT.txt" */
  artifactSuffix?: string;
}

/**
 * 源码快照目录配置（均相对项目根目录）
 */
export interface SnapshotConfig {
  /** 被织入的源码目录，默认 "src" */
  sourceDir?: string;
  /** 织入前的备份目录，默认 "src-saved" */
  savedDir?: string;
  /** 织入结果的保存目录，默认 "src-modified" */
  modifiedDir?: string;
}

/**
 * User-facing configuration, as written in aspect.config.json.
 * 用户配置文件 aspect.config.json 的结构。
 */
export interface AspectConfig {
  /** 系统名称 */
  name: string;
  /** 按顺序执行的切入点列表 */
  pointcuts: Pointcut[];
  options?: WeaveOptions;
  analysis?: AnalysisConfig;
  snapshot?: SnapshotConfig;
}

/**
 * 织入过程使用的日志接口，默认为 console
 */
export interface WeaveLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * 一次完整织入的统计结果
 */
export interface WeaveSummary {
  systemName: string;
  pointcuts: number;
  artifacts: number;
  files: number;
  matches: number;
}
