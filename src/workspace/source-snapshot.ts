/**
 * 源码快照
 *
 * 织入前把源码目录完整复制一份；运行结束后（无论成功失败）把织入后的目录
 * 移到 modifiedDir，再把备份移回原位，使工作目录恢复为运行前的状态。
 */

import fs from "fs";
import path from "path";
import type { WeaveLogger } from "../types";
import { createWeaveError, logError, toWeaveError } from "../core/error-handler";

export interface SnapshotLayout {
  sourceDir: string;
  savedDir: string;
  modifiedDir: string;
}

const LAYOUT_FIELDS = ["sourceDir", "savedDir", "modifiedDir"] as const;

/**
 * target 是否位于 dir 之内（不含 dir 本身）
 */
export function isInsideDirectory(dir: string, target: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(target));
  return (
    relative !== "" && relative.split(path.sep)[0] !== ".." && !path.isAbsolute(relative)
  );
}

/**
 * 三个目录必须互不相同且互不嵌套，返回发现的冲突
 */
export function findLayoutConflicts(layout: SnapshotLayout): string[] {
  const conflicts: string[] = [];
  LAYOUT_FIELDS.forEach((field, index) => {
    for (const other of LAYOUT_FIELDS.slice(index + 1)) {
      const a = path.resolve(layout[field]);
      const b = path.resolve(layout[other]);
      if (a === b || isInsideDirectory(a, b) || isInsideDirectory(b, a)) {
        conflicts.push(`snapshot.${field} 与 snapshot.${other} 不能相同或互相嵌套`);
      }
    }
  });
  return conflicts;
}

function runDirectoryOperation(description: string, target: string, operation: () => void): void {
  try {
    operation();
  } catch (error) {
    throw createWeaveError("FILE003", [description, target], {
      filePath: target,
      originalError: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * 移动目录；跨设备时退化为复制后删除
 */
function moveDirectory(from: string, to: string): void {
  try {
    fs.renameSync(from, to);
  } catch (error) {
    if (!(error instanceof Error) || !("code" in error) || error.code !== "EXDEV") {
      throw error;
    }
    fs.cpSync(from, to, { recursive: true });
    fs.rmSync(from, { recursive: true, force: true });
  }
}

export class SourceSnapshot {
  private acquired = false;

  constructor(private readonly layout: SnapshotLayout) {
    const conflicts = findLayoutConflicts(layout);
    if (conflicts.length > 0) {
      throw createWeaveError("CONFIG001", [conflicts.join("; ")]);
    }
  }

  get isAcquired(): boolean {
    return this.acquired;
  }

  /**
   * 备份源码目录，先清除上次遗留的备份
   */
  acquire(): void {
    const { sourceDir, savedDir } = this.layout;
    if (!fs.existsSync(sourceDir)) {
      throw createWeaveError("FILE003", [`源码目录不存在 ${sourceDir}`, sourceDir], {
        filePath: sourceDir,
      });
    }
    runDirectoryOperation(`清除旧备份 ${savedDir}`, savedDir, () =>
      fs.rmSync(savedDir, { recursive: true, force: true })
    );
    runDirectoryOperation(`备份 ${sourceDir} -> ${savedDir}`, sourceDir, () =>
      fs.cpSync(sourceDir, savedDir, { recursive: true })
    );
    this.acquired = true;
  }

  /**
   * 保存织入结果并恢复原始源码
   */
  release(): void {
    if (!this.acquired) return;
    const { sourceDir, savedDir, modifiedDir } = this.layout;

    runDirectoryOperation(`清除旧的织入结果 ${modifiedDir}`, modifiedDir, () =>
      fs.rmSync(modifiedDir, { recursive: true, force: true })
    );
    if (fs.existsSync(sourceDir)) {
      runDirectoryOperation(`保存织入结果 ${sourceDir} -> ${modifiedDir}`, sourceDir, () =>
        moveDirectory(sourceDir, modifiedDir)
      );
    }
    runDirectoryOperation(`恢复源码 ${savedDir} -> ${sourceDir}`, savedDir, () =>
      moveDirectory(savedDir, sourceDir)
    );
    this.acquired = false;
  }
}

/**
 * 在快照保护下执行 task，任何退出路径都会恢复源码目录
 */
export function withSourceSnapshot<T>(
  layout: SnapshotLayout,
  task: () => T,
  logger: WeaveLogger = console
): T {
  const snapshot = new SourceSnapshot(layout);
  snapshot.acquire();

  let result: T;
  try {
    result = task();
  } catch (error) {
    try {
      snapshot.release();
    } catch (releaseError) {
      logError(toWeaveError(releaseError), logger);
    }
    throw error;
  }

  snapshot.release();
  return result;
}
