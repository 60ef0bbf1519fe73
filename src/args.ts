import { cliOptionsSchema, type CliOptions } from "./config.js";
import { UsageError } from "./errors.js";

export type ParsedArgs = { kind: "help" } | { kind: "version" } | { kind: "run"; options: CliOptions };

export const USAGE = `Usage: vid2scene [options] <video...>

Turns videos into sparse photogrammetry scenes (for camera tracking in Blender).

Options:
  -t, --tool <glomap|colmap>  mapping engine (default: glomap)
  -f, --force                 re-process scenes that already exist
      --scenes-dir <dir>      output directory (default: scenes)
      --ffmpeg-path <file>    ffmpeg executable
      --tool-path <file>      glomap or colmap executable used for mapping
      --colmap-path <file>    colmap executable
      --fps <n>               extract n frames per second instead of every frame
  -h, --help                  show this help
  -v, --version               print version

Example:
    vid2scene video.mp4 video.mov`;

const VALUE_FLAGS: Record<string, "tool" | "scenesDir" | "ffmpegPath" | "toolPath" | "colmapPath" | "fps"> = {
  "-t": "tool",
  "--tool": "tool",
  "--scenes-dir": "scenesDir",
  "--ffmpeg-path": "ffmpegPath",
  "--tool-path": "toolPath",
  "--colmap-path": "colmapPath",
  "--fps": "fps"
};

export function parseArgs(argv: string[]): ParsedArgs {
  const raw: Record<string, unknown> = {};
  const videos: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "-h" || arg === "--help") return { kind: "help" };
    if (arg === "-v" || arg === "--version") return { kind: "version" };
    if (arg === "-f" || arg === "--force") {
      raw.force = true;
      continue;
    }
    if (arg === "--") {
      videos.push(...argv.slice(i + 1));
      break;
    }

    const eq = arg.indexOf("=");
    const name = arg.startsWith("--") && eq !== -1 ? arg.slice(0, eq) : arg;
    const key = VALUE_FLAGS[name];
    if (key) {
      const value = name !== arg ? arg.slice(eq + 1) : argv[i + 1];
      if (name === arg) i += 1;
      if (value === undefined) throw new UsageError(`Missing value for ${name}`);
      raw[key] = value;
      continue;
    }
    if (arg.startsWith("-") && arg !== "-") {
      throw new UsageError(`Unknown option: ${arg}`);
    }
    videos.push(arg);
  }

  raw.videos = videos;
  const parsed = cliOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new UsageError(`${where}${issue.message}`);
  }
  return { kind: "run", options: parsed.data };
}
