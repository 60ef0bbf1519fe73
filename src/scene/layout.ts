import { existsSync, mkdirSync, readdirSync, rmSync } from "node:fs";
import { basename, extname, join, resolve } from "node:path";
import { DirectoryCreationError } from "../errors.js";

export type SceneDirectories = {
  root: string;
  images: string;
  sparse: string;
  database: string;
  model: string;
};

const FRAME_EXTENSIONS = new Set([".jpg", ".jpeg", ".png"]);

export function videoStem(videoPath: string) {
  const name = basename(videoPath);
  return basename(name, extname(name));
}

// Keyed by stem alone: clip.mp4 and clip.mov share a scene.
export function layoutFor(scenesDir: string, stem: string): SceneDirectories {
  const root = resolve(scenesDir, stem);
  const sparse = join(root, "sparse");
  return {
    root,
    images: join(root, "images"),
    sparse,
    database: join(root, "database.db"),
    model: join(sparse, "0")
  };
}

export function sceneExists(layout: SceneDirectories) {
  return existsSync(layout.root);
}

function makeDir(dir: string) {
  try {
    mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new DirectoryCreationError(dir, err);
  }
}

export function materialize(layout: SceneDirectories, opts: { clear?: boolean } = {}) {
  if (opts.clear) {
    try {
      rmSync(layout.root, { recursive: true, force: true });
    } catch (err) {
      throw new DirectoryCreationError(layout.root, err);
    }
  }
  makeDir(layout.images);
  makeDir(layout.sparse);
}

export function listFrames(layout: SceneDirectories) {
  if (!existsSync(layout.images)) return [];
  return readdirSync(layout.images, { withFileTypes: true })
    .filter(entry => entry.isFile() && FRAME_EXTENSIONS.has(extname(entry.name).toLowerCase()))
    .map(entry => join(layout.images, entry.name))
    .sort();
}
