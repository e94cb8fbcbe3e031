import { expect, test, describe } from "vitest";
import {
  comparePositions,
  positionAt,
  resolveOffset,
} from "../src/core/position-resolver";
import { catchWeaveError } from "./test-helpers";

describe("位置解析", () => {
  const text = "ab\ncd\n";

  test("should resolve the first character of each line", () => {
    expect(resolveOffset(text, { line: 1, column: 1 })).toBe(0);
    expect(resolveOffset(text, { line: 2, column: 1 })).toBe(3);
    expect(resolveOffset(text, { line: 2, column: 2 })).toBe(4);
  });

  test("newline occupies the last column of its line", () => {
    expect(resolveOffset(text, { line: 1, column: 3 })).toBe(2);
    expect(text[resolveOffset(text, { line: 2, column: 3 })]).toBe("\n");
  });

  test("should fail with POSITION001 when the position is past the end", () => {
    const error = catchWeaveError(() =>
      resolveOffset(text, { line: 3, column: 1 }, "src/main.rs")
    );
    expect(error.code).toBe("POSITION001");
    expect(error.message).toBe("找不到第 3 行第 1 列");
    expect(error.filePath).toBe("src/main.rs");
    expect(error.line).toBe(3);
    expect(error.column).toBe(1);
  });

  test("should fail when the column is beyond the line", () => {
    expect(() => resolveOffset(text, { line: 1, column: 4 })).toThrow("找不到第 1 行第 4 列");
  });

  test("counts characters, not UTF-16 units", () => {
    const unicode = "é😀x\n";
    expect(resolveOffset(unicode, { line: 1, column: 3 })).toBe(3);
    expect(unicode.slice(resolveOffset(unicode, { line: 1, column: 3 }))).toBe("x\n");
    expect(positionAt(unicode, 3)).toEqual({ line: 1, column: 3 });
  });

  test("resolveOffset and positionAt are inverse for every character", () => {
    const source = "fn f() {}\n  let x = 1;\n\n}\n";
    for (let offset = 0; offset < source.length; offset++) {
      const pos = positionAt(source, offset);
      expect(resolveOffset(source, pos)).toBe(offset);
    }
  });

  test("compares line first, then column", () => {
    expect(comparePositions({ line: 1, column: 9 }, { line: 2, column: 1 })).toBeLessThan(0);
    expect(comparePositions({ line: 2, column: 5 }, { line: 2, column: 3 })).toBeGreaterThan(0);
    expect(comparePositions({ line: 4, column: 4 }, { line: 4, column: 4 })).toBe(0);
  });
});
