import { expect, test, describe, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  findLayoutConflicts,
  isInsideDirectory,
  SourceSnapshot,
  withSourceSnapshot,
} from "../src/workspace/source-snapshot";
import type { SnapshotLayout } from "../src/workspace/source-snapshot";
import {
  catchWeaveError,
  createRecordingLogger,
  createTempProject,
  removeTempProject,
  silentLogger,
} from "./test-helpers";

const tempRoots: string[] = [];
afterEach(() => {
  tempRoots.forEach(removeTempProject);
  tempRoots.length = 0;
});

function setup(files: Record<string, string>): { root: string; layout: SnapshotLayout } {
  const root = createTempProject(files);
  tempRoots.push(root);
  return {
    root,
    layout: {
      sourceDir: path.join(root, "src"),
      savedDir: path.join(root, "src-saved"),
      modifiedDir: path.join(root, "src-modified"),
    },
  };
}

const read = (root: string, relPath: string) => fs.readFileSync(path.join(root, relPath), "utf8");

describe("源码快照", () => {
  test("acquire copies the source directory aside", () => {
    const { root, layout } = setup({
      "src/main.rs": "fn main() {}\n",
      "src/util/mod.rs": "pub fn util() {}\n",
      "src-saved/stale.rs": "old\n",
    });
    const snapshot = new SourceSnapshot(layout);

    snapshot.acquire();

    expect(snapshot.isAcquired).toBe(true);
    expect(read(root, "src-saved/main.rs")).toBe("fn main() {}\n");
    expect(read(root, "src-saved/util/mod.rs")).toBe("pub fn util() {}\n");
    expect(fs.existsSync(path.join(root, "src-saved/stale.rs"))).toBe(false);
  });

  test("release keeps the woven output and restores the original", () => {
    const { root, layout } = setup({
      "src/main.rs": "fn main() {}\n",
      "src-modified/leftover.rs": "old\n",
    });
    const snapshot = new SourceSnapshot(layout);
    snapshot.acquire();
    fs.writeFileSync(path.join(root, "src/main.rs"), "fn main() { woven(); }\n");

    snapshot.release();

    expect(snapshot.isAcquired).toBe(false);
    expect(read(root, "src/main.rs")).toBe("fn main() {}\n");
    expect(read(root, "src-modified/main.rs")).toBe("fn main() { woven(); }\n");
    expect(fs.existsSync(path.join(root, "src-modified/leftover.rs"))).toBe(false);
    expect(fs.existsSync(path.join(root, "src-saved"))).toBe(false);
  });

  test("release without acquire does nothing", () => {
    const { root, layout } = setup({ "src/main.rs": "x\n" });
    new SourceSnapshot(layout).release();
    expect(read(root, "src/main.rs")).toBe("x\n");
    expect(fs.existsSync(path.join(root, "src-modified"))).toBe(false);
  });

  test("acquire fails with FILE003 when the source directory is missing", () => {
    const { layout } = setup({});
    const error = catchWeaveError(() => new SourceSnapshot(layout).acquire());
    expect(error.code).toBe("FILE003");
  });

  test("withSourceSnapshot returns the task result and restores the tree", () => {
    const { root, layout } = setup({ "src/main.rs": "a\n" });

    const result = withSourceSnapshot(
      layout,
      () => {
        fs.writeFileSync(path.join(root, "src/main.rs"), "b\n");
        return 42;
      },
      silentLogger
    );

    expect(result).toBe(42);
    expect(read(root, "src/main.rs")).toBe("a\n");
    expect(read(root, "src-modified/main.rs")).toBe("b\n");
  });

  test("withSourceSnapshot restores the tree when the task throws", () => {
    const { root, layout } = setup({ "src/main.rs": "a\n" });
    const logger = createRecordingLogger();

    expect(() =>
      withSourceSnapshot(
        layout,
        () => {
          fs.writeFileSync(path.join(root, "src/main.rs"), "half\n");
          throw new Error("analysis exploded");
        },
        logger
      )
    ).toThrow("analysis exploded");

    expect(read(root, "src/main.rs")).toBe("a\n");
    expect(read(root, "src-modified/main.rs")).toBe("half\n");
    expect(fs.existsSync(path.join(root, "src-saved"))).toBe(false);
    expect(logger.lines).toEqual([]);
  });

  test("withSourceSnapshot reports a release failure after a successful task", () => {
    const { root, layout } = setup({ "src/main.rs": "a\n" });

    const error = catchWeaveError(() =>
      withSourceSnapshot(
        layout,
        () => {
          fs.rmSync(layout.savedDir, { recursive: true, force: true });
          return 1;
        },
        silentLogger
      )
    );

    expect(error.code).toBe("FILE003");
    expect(error.message).toBe(`目录操作失败: 恢复源码 ${layout.savedDir} -> ${layout.sourceDir}`);
    expect(read(root, "src-modified/main.rs")).toBe("a\n");
  });

  test("withSourceSnapshot logs a release failure and rethrows the task error", () => {
    const { layout } = setup({ "src/main.rs": "a\n" });
    const logger = createRecordingLogger();

    expect(() =>
      withSourceSnapshot(
        layout,
        () => {
          fs.rmSync(layout.savedDir, { recursive: true, force: true });
          throw new Error("analysis exploded");
        },
        logger
      )
    ).toThrow("analysis exploded");

    expect(logger.lines).toHaveLength(1);
    expect(logger.lines[0].startsWith(
      `error:[FILE003] 目录操作失败: 恢复源码 ${layout.savedDir} -> ${layout.sourceDir}\n`
    )).toBe(true);
  });
});

describe("快照目录布局", () => {
  test("isInsideDirectory only accepts strict descendants", () => {
    expect(isInsideDirectory("/p/src", "/p/src/main.rs")).toBe(true);
    expect(isInsideDirectory("/p/src", "/p/src/a/b.rs")).toBe(true);
    expect(isInsideDirectory("/p/src", "/p/src")).toBe(false);
    expect(isInsideDirectory("/p/src", "/p/src-saved/main.rs")).toBe(false);
    expect(isInsideDirectory("/p/src", "/p/build.rs")).toBe(false);
    expect(isInsideDirectory("/p/src", "/p/src/../build.rs")).toBe(false);
  });

  test("findLayoutConflicts lists every clashing pair", () => {
    expect(
      findLayoutConflicts({ sourceDir: "/p/src", savedDir: "/p/src-saved", modifiedDir: "/p/out" })
    ).toEqual([]);
    expect(
      findLayoutConflicts({ sourceDir: "/p/src", savedDir: "/p/out", modifiedDir: "/p/out" })
    ).toEqual(["snapshot.savedDir 与 snapshot.modifiedDir 不能相同或互相嵌套"]);
    expect(
      findLayoutConflicts({ sourceDir: "/p/src", savedDir: "/p/src/saved", modifiedDir: "/p" })
    ).toEqual([
      "snapshot.sourceDir 与 snapshot.savedDir 不能相同或互相嵌套",
      "snapshot.sourceDir 与 snapshot.modifiedDir 不能相同或互相嵌套",
      "snapshot.savedDir 与 snapshot.modifiedDir 不能相同或互相嵌套",
    ]);
  });

  test("SourceSnapshot refuses an overlapping layout before touching the disk", () => {
    const { root, layout } = setup({ "src/main.rs": "a\n" });

    const error = catchWeaveError(
      () => new SourceSnapshot({ ...layout, savedDir: layout.sourceDir })
    );

    expect(error.code).toBe("CONFIG001");
    expect(error.message).toBe("配置无效: snapshot.sourceDir 与 snapshot.savedDir 不能相同或互相嵌套");
    expect(read(root, "src/main.rs")).toBe("a\n");
  });
});
