import sharp from "sharp";
import { join } from "node:path";
import { NoOutputProducedError, describeError } from "../errors.js";
import { listFrames, type SceneDirectories } from "../scene/layout.js";
import type { StageInvocation } from "../stage/run_stage.js";

export const FRAME_PATTERN = "frame_%06d.jpg";

export type DecodeOptions = {
  ffmpegPath: string;
  input: string;
  layout: SceneDirectories;
  quality: number;
  fps?: number;
};

export type ExtractedFrames = {
  count: number;
  first: string;
  width: number;
  height: number;
};

export function extractFramesInvocation(opts: DecodeOptions): StageInvocation {
  const args = ["-hide_banner", "-loglevel", "error", "-i", opts.input];
  if (opts.fps !== undefined) {
    args.push("-vf", `fps=${opts.fps}`);
  }
  args.push("-qscale:v", String(opts.quality), join(opts.layout.images, FRAME_PATTERN));
  return { stage: "extract", command: opts.ffmpegPath, args };
}

/**
 * ffmpeg can exit 0 on a stream it could not decode, so the frames are checked
 * on disk: at least one must exist and the first one must read as an image.
 */
export async function verifyFrames(layout: SceneDirectories): Promise<ExtractedFrames> {
  const frames = listFrames(layout);
  if (frames.length === 0) {
    throw new NoOutputProducedError(layout.images);
  }
  const first = frames[0];
  try {
    const meta = await sharp(first).metadata();
    if (!meta.width || !meta.height) {
      throw new Error("missing dimensions");
    }
    return { count: frames.length, first, width: meta.width, height: meta.height };
  } catch (err) {
    throw new NoOutputProducedError(layout.images, `first frame ${first} is not a readable image: ${describeError(err)}`);
  }
}
