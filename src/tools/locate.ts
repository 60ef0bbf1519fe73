import { accessSync, constants, existsSync, statSync } from "node:fs";
import { delimiter, dirname, join, resolve } from "node:path";
import type { Env, ToolSelection } from "../config.js";
import { ToolNotFoundError } from "../errors.js";

export type ToolName = "ffmpeg" | "colmap" | "glomap";

export type LocateOptions = {
  explicit?: string;
  installRoot: string;
  env: Env;
  platform?: NodeJS.Platform;
};

export type ResolvedTools = {
  extractor: string;
  features: string;
  mapper: string;
  env: Env;
};

export type ResolveOptions = {
  installRoot: string;
  env: Env;
  platform?: NodeJS.Platform;
  ffmpegPath?: string;
  colmapPath?: string;
  mapperPath?: string;
};

export function executableName(name: string, platform: NodeJS.Platform = process.platform) {
  return platform === "win32" ? `${name}.exe` : name;
}

function isExecutable(path: string, platform: NodeJS.Platform) {
  try {
    if (!statSync(path).isFile()) return false;
    if (platform !== "win32") accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

// Windows spells it "Path"; keep whatever casing the environment already uses.
export function pathKey(env: Env, platform: NodeJS.Platform = process.platform) {
  if (platform !== "win32") return "PATH";
  return Object.keys(env).find(key => key.toUpperCase() === "PATH") ?? "Path";
}

export function pathEntries(env: Env, platform: NodeJS.Platform = process.platform) {
  const raw = env[pathKey(env, platform)] ?? "";
  const sep = platform === "win32" ? ";" : delimiter;
  return raw.split(sep).filter(entry => entry.length > 0);
}

export function candidateDirs(name: ToolName, installRoot: string) {
  const primary = join(installRoot, name);
  return [primary, join(primary, "bin")];
}

export function locateTool(name: ToolName, opts: LocateOptions): string {
  const platform = opts.platform ?? process.platform;

  if (opts.explicit) {
    const explicit = resolve(opts.explicit);
    if (!existsSync(explicit)) {
      throw new ToolNotFoundError(name, [explicit], `Provided path for ${name} does not exist: ${explicit}`);
    }
    return explicit;
  }

  const exe = executableName(name, platform);
  const searched = [...candidateDirs(name, opts.installRoot), ...pathEntries(opts.env, platform)];
  for (const dir of searched) {
    const candidate = join(dir, exe);
    if (isExecutable(candidate, platform)) return resolve(candidate);
  }
  throw new ToolNotFoundError(name, searched);
}

export function withToolDirs(env: Env, tools: string[], platform: NodeJS.Platform = process.platform): Env {
  const key = pathKey(env, platform);
  const sep = platform === "win32" ? ";" : delimiter;
  const existing = pathEntries(env, platform);
  const prepend: string[] = [];
  for (const tool of tools) {
    const dir = dirname(tool);
    for (const entry of [dir, join(dir, "bin")]) {
      if (!prepend.includes(entry)) prepend.push(entry);
    }
  }
  const merged = [...prepend, ...existing.filter(entry => !prepend.includes(entry))];
  return { ...env, [key]: merged.join(sep) };
}

function withQtPlugins(env: Env, colmap: string, platform: NodeJS.Platform): Env {
  const dir = dirname(colmap);
  const plugins = [join(dir, "plugins"), join(dir, "..", "plugins")].find(p => existsSync(p));
  if (!plugins) return env;
  const sep = platform === "win32" ? ";" : delimiter;
  const current = env.QT_PLUGIN_PATH;
  return { ...env, QT_PLUGIN_PATH: current ? `${resolve(plugins)}${sep}${current}` : resolve(plugins) };
}

/**
 * Resolves ffmpeg, colmap and the selected mapper once per run. The returned
 * environment is what every stage subprocess gets; process.env is left alone.
 */
export function resolveTools(selection: ToolSelection, opts: ResolveOptions): ResolvedTools {
  const platform = opts.platform ?? process.platform;
  const base = { installRoot: opts.installRoot, env: opts.env, platform };

  const extractor = locateTool("ffmpeg", { ...base, explicit: opts.ffmpegPath });
  const features = locateTool("colmap", {
    ...base,
    explicit: opts.colmapPath ?? (selection === "colmap" ? opts.mapperPath : undefined)
  });
  let mapper = features;
  if (selection === "glomap") {
    mapper = locateTool("glomap", { ...base, explicit: opts.mapperPath });
  } else if (opts.mapperPath) {
    mapper = locateTool("colmap", { ...base, explicit: opts.mapperPath });
  }

  const unique = [...new Set([extractor, features, mapper])];
  const env = withQtPlugins(withToolDirs(opts.env, unique, platform), features, platform);
  return { extractor, features, mapper, env };
}
