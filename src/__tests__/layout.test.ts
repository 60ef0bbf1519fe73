import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { DirectoryCreationError } from "../errors.js";
import { layoutFor, listFrames, materialize, sceneExists, videoStem } from "../scene/layout.js";
import { removeTempDirs, tempDir } from "./helpers.js";

afterEach(removeTempDirs);

describe("videoStem", () => {
  it("drops the directory and the last extension", () => {
    expect(videoStem("clips/day 1/take.2.mp4")).toBe("take.2");
    expect(videoStem("/abs/orbit.MOV")).toBe("orbit");
    expect(videoStem("noext")).toBe("noext");
  });
});

describe("layoutFor", () => {
  it("keeps images and sparse under the scene root", () => {
    const layout = layoutFor("/data/scenes", "orbit");
    expect(layout).toEqual({
      root: "/data/scenes/orbit",
      images: "/data/scenes/orbit/images",
      sparse: "/data/scenes/orbit/sparse",
      database: "/data/scenes/orbit/database.db",
      model: "/data/scenes/orbit/sparse/0"
    });
  });
});

describe("materialize", () => {
  it("creates images and sparse and marks the scene as existing", () => {
    const layout = layoutFor(tempDir(), "orbit");
    expect(sceneExists(layout)).toBe(false);

    materialize(layout);

    expect(existsSync(layout.images)).toBe(true);
    expect(existsSync(layout.sparse)).toBe(true);
    expect(sceneExists(layout)).toBe(true);
  });

  it("merges into an existing tree unless asked to clear it", () => {
    const layout = layoutFor(tempDir(), "orbit");
    mkdirSync(layout.images, { recursive: true });
    writeFileSync(join(layout.images, "frame_000001.jpg"), "old");

    materialize(layout);
    expect(existsSync(join(layout.images, "frame_000001.jpg"))).toBe(true);

    materialize(layout, { clear: true });
    expect(existsSync(join(layout.images, "frame_000001.jpg"))).toBe(false);
    expect(existsSync(layout.sparse)).toBe(true);
  });

  it("reports directories it cannot create", () => {
    const scenes = tempDir();
    const layout = layoutFor(scenes, "orbit");
    writeFileSync(layout.root, "a file where the scene should be");

    expect(() => materialize(layout)).toThrow(DirectoryCreationError);
  });
});

describe("listFrames", () => {
  it("lists image files in name order", () => {
    const layout = layoutFor(tempDir(), "orbit");
    materialize(layout);
    for (const name of ["frame_000002.jpg", "frame_000001.JPG", "notes.txt", "frame_000003.png"]) {
      writeFileSync(join(layout.images, name), "");
    }
    mkdirSync(join(layout.images, "thumbs.jpg"));

    expect(listFrames(layout)).toEqual([
      join(layout.images, "frame_000001.JPG"),
      join(layout.images, "frame_000002.jpg"),
      join(layout.images, "frame_000003.png")
    ]);
  });

  it("returns nothing before the images directory exists", () => {
    expect(listFrames(layoutFor(tempDir(), "orbit"))).toEqual([]);
  });
});
