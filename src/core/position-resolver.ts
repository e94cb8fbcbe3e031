/**
 * 位置解析器 - 在文本中把 (行, 列) 换算为字符串下标
 *
 * 行列从 (1, 1) 开始，每个字符（按 Unicode 码点计）列号加一，
 * 遇到换行符时行号加一、列号重置为 1。换行符本身占据所在行的最后一列。
 */

import type { Position } from "../types";
import { createWeaveError } from "./error-handler";

/**
 * 按行优先、列其次的顺序比较两个位置
 */
export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  return a.column - b.column;
}

export function formatPosition(pos: Position): string {
  return `${pos.line}:${pos.column}`;
}

/**
 * 返回第一个行列等于 `pos` 的字符的下标（JavaScript 字符串下标）
 * 扫描到文本末尾仍未找到时抛出 POSITION001
 */
export function resolveOffset(text: string, pos: Position, filePath?: string): number {
  let line = 1;
  let column = 1;
  let offset = 0;

  for (const ch of text) {
    if (line === pos.line && column === pos.column) {
      return offset;
    }
    if (ch === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
    offset += ch.length;
  }

  throw createWeaveError("POSITION001", [pos.line, pos.column], {
    filePath,
    line: pos.line,
    column: pos.column,
  });
}

/**
 * resolveOffset 的逆运算：统计 offset 之前的换行符和字符数
 */
export function positionAt(text: string, offset: number): Position {
  let line = 1;
  let column = 1;

  for (const ch of text.slice(0, offset)) {
    if (ch === "\n") {
      line++;
      column = 1;
    } else {
      column++;
    }
  }

  return { line, column };
}
