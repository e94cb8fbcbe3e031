import { expect, test, describe, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { weaveFile, weaveText } from "../src/core/file-weaver";
import { parseMatchReport } from "../src/core/report-parser";
import type { MatchRecord, Pointcut } from "../src/types";
import {
  catchWeaveError,
  createTempProject,
  formatFound,
  removeTempProject,
} from "./test-helpers";

function match(
  start: [number, number],
  end: [number, number],
  matchedText = "",
  args: Record<string, string> = {}
): MatchRecord {
  return {
    sourceFile: "src/main.rs",
    matchedText,
    start: { line: start[0], column: start[1] },
    end: { line: end[0], column: end[1] },
    capturedArgs: new Map(Object.entries(args)),
  };
}

const pointcut = (advice: string): Pointcut => ({ condition: "call", advice });

const tempRoots: string[] = [];
afterEach(() => {
  tempRoots.forEach(removeTempProject);
  tempRoots.length = 0;
});

describe("文件织入", () => {
  test("inserts advice at a zero-width position", () => {
    const woven = weaveText("fn f() {}\n", [match([1, 9], [1, 9])], pointcut("/*X*/$"));
    expect(woven).toBe("fn f() {/*X*/}\n");
  });

  test("an empty match set leaves the text unchanged", () => {
    const original = "fn main() {\n    work();\n}\n";
    expect(weaveText(original, [], pointcut("log($)"))).toBe(original);
  });

  test("applies several matches from the end towards the start", () => {
    const original = "let a = foo(1);\nlet b = foo(2);\n";
    const woven = weaveText(
      original,
      [match([2, 9], [2, 15], "foo(2)"), match([1, 9], [1, 15], "foo(1)")],
      pointcut("trace($)")
    );
    expect(woven).toBe("let a = trace(foo(1));\nlet b = trace(foo(2));\n");
    expect(woven.startsWith("let a = ")).toBe(true);
    expect(woven.endsWith(";\n")).toBe(true);
  });

  test("replaces ranges spanning several lines", () => {
    const original = "a(\n  1,\n  2\n);\nrest\n";
    const woven = weaveText(original, [match([1, 1], [4, 2], "a(1, 2)")], pointcut("wrap($)"));
    expect(woven).toBe("wrap(a(1, 2));\nrest\n");
  });

  test("uses captured arguments from the report", () => {
    const report = parseMatchReport(
      formatFound({
        file: "src/main.rs",
        start: { line: 2, column: 5 },
        end: { line: 2, column: 11 },
        src: "work()",
        args: { FN: "work" },
      })
    );
    const woven = weaveText(
      "fn main() {\n    work();\n}\n",
      report.get("src/main.rs") ?? [],
      pointcut('enter("FN"); $')
    );
    expect(woven).toBe('fn main() {\n    enter("work"); work();\n}\n');
  });

  test("equal starts keep report order in the output", () => {
    const text = [
      'Found {\n    span: a.rs:2:1: 2:1,\n    src: "A",\n}\n',
      'Found {\n    span: a.rs:2:1: 2:5,\n    src: "B",\n}\n',
      'Found {\n    span: a.rs:2:1: 2:1,\n    src: "C",\n}\n',
    ].join("");
    const matches = parseMatchReport(text).get("a.rs") ?? [];
    expect(weaveText("line1\nabcdefg\n", matches, pointcut("[$]"))).toBe(
      "line1\n[A][C][B]efg\n"
    );
  });

  test("rejects overlapping ranges", () => {
    const error = catchWeaveError(() =>
      weaveText(
        "abcdefghijkl\n",
        [match([1, 5], [1, 10]), match([1, 1], [1, 7])],
        pointcut("X")
      )
    );
    expect(error.code).toBe("ARTIFACT003");
    expect(error.message).toBe("同一文件中的匹配区间重叠: src/main.rs:1:1: 1:7");
  });

  test("applies overlapping ranges when allowOverlap is set", () => {
    const woven = weaveText(
      "abcdefghijkl\n",
      [match([1, 5], [1, 10]), match([1, 1], [1, 7])],
      pointcut("X"),
      { allowOverlap: true }
    );
    expect(woven).toBe("Xkl\n");
  });

  test("fails with POSITION001 for a position that does not exist", () => {
    const error = catchWeaveError(() =>
      weaveText("short\n", [match([5, 1], [5, 2])], pointcut("$"), {}, "src/main.rs")
    );
    expect(error.code).toBe("POSITION001");
    expect(error.filePath).toBe("src/main.rs");
  });

  test("weaveFile rewrites the file in place", () => {
    const root = createTempProject({ "src/main.rs": "fn f() {}\n" });
    tempRoots.push(root);
    const filePath = path.join(root, "src/main.rs");

    const woven = weaveFile(filePath, [match([1, 9], [1, 9])], pointcut("/*X*/$"));

    expect(woven).toBe("fn f() {/*X*/}\n");
    expect(fs.readFileSync(filePath, "utf8")).toBe("fn f() {/*X*/}\n");
  });

  test("weaveFile fails with FILE001 for a missing file", () => {
    const root = createTempProject();
    tempRoots.push(root);
    const filePath = path.join(root, "missing.rs");

    const error = catchWeaveError(() => weaveFile(filePath, [], pointcut("$")));
    expect(error.code).toBe("FILE001");
    expect(error.message).toBe(`读取文件失败: ${filePath}`);
  });
});
