import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

export type Env = Record<string, string | undefined>;

export const TOOL_SELECTIONS = ["glomap", "colmap"] as const;
export type ToolSelection = (typeof TOOL_SELECTIONS)[number];

export type ReconstructionSettings = {
  singleCamera: boolean;
  useGpu: boolean;
  maxImageSize: number;
  matchOverlap: number;
  frameQuality: number;
};

// Fixed for every video; not derived from frame count or resolution.
export const RECONSTRUCTION: ReconstructionSettings = {
  singleCamera: true,
  useGpu: true,
  maxImageSize: 4096,
  matchOverlap: 15,
  frameQuality: 2
};

export const APP_DIR_NAME = "vid2scene";
export const DEFAULT_SCENES_DIR = "scenes";

function optional(env: Env, key: string) {
  const value = env[key];
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

export type EnvConfig = {
  ffmpegPath?: string;
  colmapPath?: string;
  glomapPath?: string;
  scenesDir: string;
  installRoot: string;
};

export function localDataDir(env: Env = process.env, platform: NodeJS.Platform = process.platform) {
  if (platform === "win32") {
    return optional(env, "LOCALAPPDATA") ?? join(homedir(), "AppData", "Local");
  }
  if (platform === "darwin") {
    return join(homedir(), "Library", "Application Support");
  }
  return optional(env, "XDG_DATA_HOME") ?? join(homedir(), ".local", "share");
}

export function readEnv(env: Env = process.env, platform: NodeJS.Platform = process.platform): EnvConfig {
  return {
    ffmpegPath: optional(env, "FFMPEG_PATH"),
    colmapPath: optional(env, "COLMAP_PATH"),
    glomapPath: optional(env, "GLOMAP_PATH"),
    scenesDir: optional(env, "VID2SCENE_SCENES_DIR") ?? DEFAULT_SCENES_DIR,
    installRoot: optional(env, "VID2SCENE_HOME") ?? join(localDataDir(env, platform), APP_DIR_NAME)
  };
}

export const cliOptionsSchema = z.object({
  videos: z.array(z.string().min(1)).min(1, "at least one video is required"),
  tool: z.enum(TOOL_SELECTIONS).default("glomap"),
  force: z.boolean().default(false),
  scenesDir: z.string().min(1).optional(),
  ffmpegPath: z.string().min(1).optional(),
  toolPath: z.string().min(1).optional(),
  colmapPath: z.string().min(1).optional(),
  fps: z.coerce.number().positive().finite().optional()
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;
