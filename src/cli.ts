#!/usr/bin/env node

import { Command } from 'commander';
import path from 'path';
import { findProjectRoot, loadAspectConfig } from './config';
import { formatError, toWeaveError } from './core/error-handler';
import { runWithSnapshot } from './orchestrator';

const program = new Command();

program
  .name('aspect-weave')
  .description('按切入点配置把通知模板织入源码')
  .version('1.0.0')
  .option('-c, --config <file>', '配置文件路径 (JSON 格式，默认: aspect.config.json，不再读取 Aspect.toml)')
  .option('-r, --root <dir>', '项目根目录 (默认: 当前目录)')
  .option('-v, --verbose', '输出每个匹配位置')
  .action((cmdOptions: { config?: string; root?: string; verbose?: boolean }) => {
    try {
      const root = findProjectRoot(path.resolve(cmdOptions.root ?? process.cwd()));
      const config = loadAspectConfig(root, cmdOptions.config);

      console.log(`=== ${config.name} ===`);
      console.log(`项目根目录: ${config.root}`);
      console.log(`切入点数量: ${config.pointcuts.length}`);

      const summary = runWithSnapshot(config, { verbose: cmdOptions.verbose ?? false });

      console.log(`处理了 ${summary.pointcuts} 个切入点、${summary.artifacts} 个分析产物`);
      console.log(`织入了 ${summary.files} 个文件中的 ${summary.matches} 处匹配`);
      console.log(`织入结果已保存到 ${config.snapshot.modifiedDir}`);
    } catch (error) {
      console.error(formatError(toWeaveError(error)));
      process.exit(1);
    }
  });

program.parse();
