/**
 * 配置系统入口
 */
export { ConfigDetector } from "./config-detector";
export { CONFIG_DEFAULTS, resolveConfig } from "./config-manager";
export type { ResolvedAspectConfig } from "./config-manager";
export { findProjectRoot, loadAspectConfig } from "./config-loader";
