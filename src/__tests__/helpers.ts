import sharp from "sharp";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { RECONSTRUCTION } from "../config.js";
import { silentLogger } from "../log.js";
import type { PipelineContext } from "../pipeline.js";
import type { StageInvocation, StageName, StageResult, StageRunner } from "../stage/run_stage.js";

export type FakeBehaviour = "ok" | "fail" | "no-output" | "no-model";

export type FakeRunner = StageRunner & { calls: StageInvocation[] };

const tempDirs: string[] = [];

export function tempDir(prefix = "vid2scene-") {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export function removeTempDirs() {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
}

export function touchVideo(dir: string, name: string) {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, name);
  writeFileSync(path, "not really a video");
  return path;
}

export async function writeJpeg(path: string) {
  await sharp({ create: { width: 8, height: 6, channels: 3, background: { r: 10, g: 20, b: 30 } } })
    .jpeg()
    .toFile(path);
}

function argAfter(invocation: StageInvocation, flag: string) {
  const idx = invocation.args.indexOf(flag);
  return idx === -1 ? undefined : invocation.args[idx + 1];
}

/**
 * Stands in for ffmpeg/colmap/glomap: records each call and leaves behind the
 * files the real tool would (one frame, the sparse/0 model).
 */
export function fakeRunner(
  behave: (invocation: StageInvocation) => FakeBehaviour = () => "ok"
): FakeRunner {
  const calls: StageInvocation[] = [];
  return {
    calls,
    async run(invocation): Promise<StageResult> {
      calls.push(invocation);
      const mode = behave(invocation);
      if (mode === "fail") {
        return { stage: invocation.stage, success: false, exitCode: 1, error: "exited with code 1" };
      }
      if (invocation.stage === "extract" && mode === "ok") {
        const pattern = invocation.args[invocation.args.length - 1];
        await writeJpeg(join(dirname(pattern), "frame_000001.jpg"));
      }
      if (invocation.stage === "mapper" && mode === "ok") {
        const output = argAfter(invocation, "--output_path");
        if (output) mkdirSync(join(output, "0"), { recursive: true });
      }
      return { stage: invocation.stage, success: true, exitCode: 0 };
    }
  };
}

export function stages(runner: FakeRunner): StageName[] {
  return runner.calls.map(c => c.stage);
}

export function testContext(scenesDir: string, runner: StageRunner, overrides: Partial<PipelineContext> = {}): PipelineContext {
  return {
    scenesDir,
    tool: "glomap",
    tools: { extractor: "/opt/tools/ffmpeg", features: "/opt/tools/colmap", mapper: "/opt/tools/glomap", env: {} },
    runner,
    logger: silentLogger,
    settings: RECONSTRUCTION,
    threads: 4,
    ...overrides
  };
}
