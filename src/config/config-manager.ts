/**
 * 配置管理器 - 统一处理用户配置和默认值
 * 将用户配置文件中的原始内容与内部使用的配置完全分离
 */

import path from "path";
import type { ArgumentOrder, AspectConfig, Pointcut } from "../types";

const DEFAULT_ARGUMENT_ORDER: ArgumentOrder = "longest-first";

/**
 * 默认配置
 */
export const CONFIG_DEFAULTS = {
  configFile: "aspect.config.json",
  legacyConfigFile: "Aspect.toml",
  projectMarker: "Cargo.toml",
  placeholder: "$",
  argumentOrder: DEFAULT_ARGUMENT_ORDER,
  allowOverlap: false,
  analysis: {
    command: "cargo",
    args: ["+AOP", "rustc", "--", "-Z", 'aop-inspect="{condition}"'],
    outputDir: "target",
    artifactSuffix: "RUST_ASPECT_OUTPUT.txt",
  },
  snapshot: {
    sourceDir: "src",
    savedDir: "src-saved",
    modifiedDir: "src-modified",
  },
};

/**
 * 完整的内部配置接口 - 所有配置项都有默认值，目录均为绝对路径
 */
export interface ResolvedAspectConfig {
  /** 项目根目录 */
  root: string;
  name: string;
  pointcuts: Pointcut[];
  options: {
    placeholder: string;
    argumentOrder: ArgumentOrder;
    allowOverlap: boolean;
  };
  analysis: {
    command: string;
    args: string[];
    outputDir: string;
    artifactSuffix: string;
  };
  snapshot: {
    sourceDir: string;
    savedDir: string;
    modifiedDir: string;
  };
}

/**
 * 解析用户配置，返回完整的内部配置
 * @param userConfig 已通过 ConfigDetector 验证的用户配置
 * @param root 项目根目录
 */
export function resolveConfig(userConfig: AspectConfig, root: string): ResolvedAspectConfig {
  const absRoot = path.resolve(root);
  const fromRoot = (dir: string) => path.resolve(absRoot, dir);
  const { options = {}, analysis = {}, snapshot = {} } = userConfig;

  return {
    root: absRoot,
    name: userConfig.name,
    pointcuts: userConfig.pointcuts.map(({ condition, advice }) => ({ condition, advice })),
    options: {
      placeholder: options.placeholder ?? CONFIG_DEFAULTS.placeholder,
      argumentOrder: options.argumentOrder ?? CONFIG_DEFAULTS.argumentOrder,
      allowOverlap: options.allowOverlap ?? CONFIG_DEFAULTS.allowOverlap,
    },
    analysis: {
      command: analysis.command ?? CONFIG_DEFAULTS.analysis.command,
      args: analysis.args ?? [...CONFIG_DEFAULTS.analysis.args],
      outputDir: fromRoot(analysis.outputDir ?? CONFIG_DEFAULTS.analysis.outputDir),
      artifactSuffix: analysis.artifactSuffix ?? CONFIG_DEFAULTS.analysis.artifactSuffix,
    },
    snapshot: {
      sourceDir: fromRoot(snapshot.sourceDir ?? CONFIG_DEFAULTS.snapshot.sourceDir),
      savedDir: fromRoot(snapshot.savedDir ?? CONFIG_DEFAULTS.snapshot.savedDir),
      modifiedDir: fromRoot(snapshot.modifiedDir ?? CONFIG_DEFAULTS.snapshot.modifiedDir),
    },
  };
}
