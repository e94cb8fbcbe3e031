/**
 * 匹配报告解析器
 * 把分析工具输出的文本解析为按文件分组的匹配记录。
 *
 * 报告由若干记录块组成，每块以 `Found {` 开头，形如：
 *
 *   Found {
 *       span: src/main.rs:3:5: 3:18 (#0),
 *       src: "foo(a, b)",
 *       args: {
 *           "ARG1": "a",
 *       },
 *   }
 */

import type { MatchRecord, PerFileMatchSet, Position } from "../types";
import { createWeaveError } from "./error-handler";
import { comparePositions, formatPosition } from "./position-resolver";

export const RECORD_MARKER = "Found {";

const HEADER_PATTERN = /(\S+):(\d+):(\d+):\s+(\d+):(\d+)/;
const SOURCE_MARKER = "src:";
const ARGS_MARKER = "args:";

/**
 * 去掉字符串两端属于 chars 的字符
 */
function trimChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value[start])) start++;
  while (end > start && chars.includes(value[end - 1])) end--;
  return value.slice(start, end);
}

function cleanValue(raw: string): string {
  return trimChars(raw, ' ",').split("\\").join("");
}

/**
 * 把报告文本切分为记录块，最后一块延伸到文本末尾
 */
export function splitRecordBlocks(artifactText: string): string[] {
  const starts: number[] = [];
  let index = artifactText.indexOf(RECORD_MARKER);
  while (index !== -1) {
    starts.push(index);
    index = artifactText.indexOf(RECORD_MARKER, index + RECORD_MARKER.length);
  }

  return starts.map((from, i) =>
    artifactText.slice(from, i + 1 < starts.length ? starts[i + 1] : artifactText.length)
  );
}

/**
 * 解析单个记录块
 */
export function parseRecordBlock(block: string): MatchRecord {
  const header = HEADER_PATTERN.exec(block);
  if (!header) {
    const preview = block.split(/\r?\n/, 2).join(" ").trim();
    throw createWeaveError("ARTIFACT001", [preview]);
  }

  const sourceFile = header[1];
  const start: Position = { line: Number(header[2]), column: Number(header[3]) };
  const end: Position = { line: Number(header[4]), column: Number(header[5]) };

  if (comparePositions(start, end) > 0) {
    throw createWeaveError(
      "ARTIFACT002",
      [`${sourceFile}:${formatPosition(start)}: ${formatPosition(end)}`],
      { filePath: sourceFile, line: start.line, column: start.column }
    );
  }

  const lines = block.split(/\r?\n/);

  let matchedText = "";
  const sourceLine = lines.find((l) => l.includes(SOURCE_MARKER));
  if (sourceLine !== undefined) {
    matchedText = cleanValue(sourceLine.slice(sourceLine.indexOf(":") + 1));
  }

  const capturedArgs = new Map<string, string>();
  let inArgs = false;
  for (const line of lines) {
    if (line.includes(ARGS_MARKER)) {
      inArgs = true;
      continue;
    }
    if (!inArgs) continue;

    const split = line.indexOf(":");
    if (split === -1) continue;
    const key = trimChars(line.slice(0, split), ' "');
    capturedArgs.set(key, cleanValue(line.slice(split + 1)));
  }

  return { sourceFile, matchedText, start, end, capturedArgs };
}

/**
 * 执行顺序：起点大的在前；起点相同时区间更宽的在前；
 * 区间完全相同时后报告的在前，使最终文本中的展开结果保持报告顺序
 */
function compareForWeaving(
  a: { record: MatchRecord; order: number },
  b: { record: MatchRecord; order: number }
): number {
  return (
    comparePositions(b.record.start, a.record.start) ||
    comparePositions(b.record.end, a.record.end) ||
    b.order - a.order
  );
}

/**
 * 解析整个报告文本，返回 文件 → 按执行顺序排列的匹配集合
 */
export function parseMatchReport(artifactText: string): Map<string, PerFileMatchSet> {
  const grouped = new Map<string, Array<{ record: MatchRecord; order: number }>>();

  splitRecordBlocks(artifactText).forEach((block, order) => {
    const record = parseRecordBlock(block);
    const entries = grouped.get(record.sourceFile) ?? [];
    entries.push({ record, order });
    grouped.set(record.sourceFile, entries);
  });

  const result = new Map<string, PerFileMatchSet>();
  for (const [file, entries] of grouped) {
    result.set(
      file,
      entries.sort(compareForWeaving).map((entry) => entry.record)
    );
  }
  return result;
}
