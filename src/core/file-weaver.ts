/**
 * 文件织入器
 * 按起点降序把一个文件内的所有匹配替换为展开后的通知。
 * 从后向前应用，已替换的区域不会影响尚未处理的匹配的下标。
 */

import fs from "fs";
import type { PerFileMatchSet, Pointcut, WeaveOptions } from "../types";
import { createWeaveError } from "./error-handler";
import { formatPosition, resolveOffset } from "./position-resolver";
import { expandAdvice } from "./template-expander";

/**
 * 在内存中织入一个文件的文本
 * @param matches 已按执行顺序（起点降序）排列的匹配集合
 */
export function weaveText(
  originalText: string,
  matches: PerFileMatchSet,
  pointcut: Pointcut,
  options: WeaveOptions = {},
  filePath?: string
): string {
  let out = originalText;
  let lowerBound = Number.POSITIVE_INFINITY;

  for (const match of matches) {
    const from = resolveOffset(out, match.start, filePath);
    const to = resolveOffset(out, match.end, filePath);

    if (!options.allowOverlap && to > lowerBound) {
      throw createWeaveError(
        "ARTIFACT003",
        [`${match.sourceFile}:${formatPosition(match.start)}: ${formatPosition(match.end)}`],
        { filePath, line: match.start.line, column: match.start.column }
      );
    }
    lowerBound = from;

    const advice = expandAdvice(pointcut.advice, match, options);
    out = out.slice(0, from) + advice + out.slice(to);
  }

  return out;
}

/**
 * 读取文本文件（按 UTF-8 有损解码）
 */
export function readTextFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath).toString("utf8");
  } catch (error) {
    throw createWeaveError("FILE001", [filePath], {
      filePath,
      originalError: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * 覆盖写入文本文件
 */
export function writeTextFile(filePath: string, content: string): void {
  try {
    fs.writeFileSync(filePath, content, "utf8");
  } catch (error) {
    throw createWeaveError("FILE002", [filePath], {
      filePath,
      originalError: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * 读取文件、织入并原地写回，返回写入的文本
 */
export function weaveFile(
  filePath: string,
  matches: PerFileMatchSet,
  pointcut: Pointcut,
  options: WeaveOptions = {}
): string {
  const original = readTextFile(filePath);
  const woven = weaveText(original, matches, pointcut, options, filePath);
  writeTextFile(filePath, woven);
  return woven;
}
