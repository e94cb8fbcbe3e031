/**
 * 配置加载 - 定位项目根目录并读取 aspect.config.json
 */

import fs from "fs";
import path from "path";
import type { WeaveLogger } from "../types";
import { createWeaveError } from "../core/error-handler";
import { ConfigDetector } from "./config-detector";
import { CONFIG_DEFAULTS, resolveConfig } from "./config-manager";
import type { ResolvedAspectConfig } from "./config-manager";

/**
 * 确认 cwd 是项目根目录（包含 marker 文件），返回其绝对路径
 */
export function findProjectRoot(
  cwd: string = process.cwd(),
  marker: string = CONFIG_DEFAULTS.projectMarker
): string {
  const root = path.resolve(cwd);
  const markerPath = path.join(root, marker);
  if (!fs.existsSync(markerPath) || !fs.statSync(markerPath).isFile()) {
    throw createWeaveError("CONFIG002", [markerPath], { filePath: markerPath });
  }
  return root;
}

/**
 * 读取、验证并解析配置文件
 * @param configPath 配置文件路径，相对路径按 root 解析
 */
export function loadAspectConfig(
  root: string,
  configPath: string = CONFIG_DEFAULTS.configFile,
  logger: WeaveLogger = console
): ResolvedAspectConfig {
  const filePath = path.resolve(root, configPath);
  if (!fs.existsSync(filePath)) {
    const legacyPath = path.resolve(root, CONFIG_DEFAULTS.legacyConfigFile);
    if (fs.existsSync(legacyPath)) {
      throw createWeaveError("CONFIG003", [legacyPath, filePath], { filePath: legacyPath });
    }
    throw createWeaveError("CONFIG002", [filePath], { filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath).toString("utf8"));
  } catch (error) {
    throw createWeaveError("CONFIG001", ["JSON 格式错误"], {
      filePath,
      originalError: error instanceof Error ? error : undefined,
    });
  }

  const validation = ConfigDetector.validateConfig(raw);
  validation.warnings.forEach((warning) => logger.warn(`配置警告: ${warning}`));
  if (!ConfigDetector.isAspectConfig(raw)) {
    throw createWeaveError("CONFIG001", [validation.errors.join("; ")], { filePath });
  }

  return resolveConfig(raw, root);
}
