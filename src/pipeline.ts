import { existsSync, statSync } from "node:fs";
import { availableParallelism } from "node:os";
import type { ReconstructionSettings, ToolSelection } from "./config.js";
import { extractFramesInvocation, verifyFrames } from "./decode/ffmpeg_decode.js";
import { StageFailureError, describeError } from "./errors.js";
import type { Logger } from "./log.js";
import {
  exportInvocations,
  featureExtractorInvocation,
  mapperInvocation,
  sequentialMatcherInvocation
} from "./reconstruct/colmap.js";
import { layoutFor, materialize, sceneExists, type SceneDirectories } from "./scene/layout.js";
import type { StageInvocation, StageName, StageRunner } from "./stage/run_stage.js";
import type { ResolvedTools } from "./tools/locate.js";

export type Job = {
  videoPath: string;
  name: string;
  index: number;
  total: number;
};

export type SkipReason = "exists" | "duplicate";

export type JobStatus = { kind: "fresh" } | { kind: "rerun" } | { kind: "skip"; reason: SkipReason };

export type PipelineStatus =
  | { kind: "completed"; frames: number; exported: boolean }
  | { kind: "skipped"; reason: SkipReason }
  | { kind: "failed"; stage: StageName; reason: string };

export type PipelineOutcome = {
  video: string;
  name: string;
  status: PipelineStatus;
};

export type PipelineContext = {
  scenesDir: string;
  tool: ToolSelection;
  tools: ResolvedTools;
  runner: StageRunner;
  logger: Logger;
  settings: ReconstructionSettings;
  fps?: number;
  threads?: number;
};

const STAGE_COUNT = 4;

export function decideJobStatus(exists: boolean, force: boolean, claimed: boolean): JobStatus {
  if (!exists) return { kind: "fresh" };
  if (claimed) return { kind: "skip", reason: "duplicate" };
  return force ? { kind: "rerun" } : { kind: "skip", reason: "exists" };
}

export function jobStatusFor(job: Job, scenesDir: string, force: boolean, claimed: boolean): JobStatus {
  return decideJobStatus(sceneExists(layoutFor(scenesDir, job.name)), force, claimed);
}

async function runStage(ctx: PipelineContext, invocation: StageInvocation) {
  const result = await ctx.runner.run(invocation);
  if (!result.success) {
    throw new StageFailureError(
      invocation.stage,
      result.error ?? `${invocation.command} exited with code ${result.exitCode}`,
      result.exitCode
    );
  }
  return result;
}

async function exportModel(ctx: PipelineContext, layout: SceneDirectories) {
  if (!existsSync(layout.model)) return false;
  ctx.logger.info("Exporting model to TXT...");
  let exported = true;
  for (const invocation of exportInvocations(ctx.tools.features, layout)) {
    const result = await ctx.runner.run(invocation);
    if (!result.success) {
      exported = false;
      ctx.logger.warn(`model_converter -> ${invocation.args[4]}: ${result.error ?? "failed"}`);
    }
  }
  return exported;
}

function isFile(path: string) {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

type Progress = { stage: StageName };

async function reconstruct(
  job: Job,
  layout: SceneDirectories,
  status: JobStatus,
  ctx: PipelineContext,
  progress: Progress
) {
  if (!isFile(job.videoPath)) {
    throw new StageFailureError("extract", `input video not found: ${job.videoPath}`);
  }

  if (status.kind === "rerun") {
    ctx.logger.info("Scene directory exists. Forcing overwrite.");
  }
  materialize(layout, { clear: status.kind === "rerun" });

  ctx.logger.step(1, STAGE_COUNT, "Extracting frames...");
  await runStage(
    ctx,
    extractFramesInvocation({
      ffmpegPath: ctx.tools.extractor,
      input: job.videoPath,
      layout,
      quality: ctx.settings.frameQuality,
      fps: ctx.fps
    })
  );
  const frames = await verifyFrames(layout);
  ctx.logger.info(`Extracted ${frames.count} frame(s) at ${frames.width}x${frames.height}`);

  progress.stage = "features";
  ctx.logger.step(2, STAGE_COUNT, "Feature extraction...");
  await runStage(ctx, featureExtractorInvocation(ctx.tools.features, layout, ctx.settings));

  progress.stage = "match";
  ctx.logger.step(3, STAGE_COUNT, "Feature matching...");
  await runStage(ctx, sequentialMatcherInvocation(ctx.tools.features, layout, ctx.settings));

  progress.stage = "mapper";
  ctx.logger.step(4, STAGE_COUNT, "Sparse reconstruction...");
  await runStage(ctx, mapperInvocation(ctx.tools.mapper, ctx.tool, layout, ctx.threads ?? availableParallelism()));

  progress.stage = "export";
  const exported = await exportModel(ctx, layout);
  return { frames: frames.count, exported };
}

/**
 * Takes one video through extract -> features -> match -> mapper -> export.
 * A stage failure ends this video only; it comes back as a "failed" outcome
 * rather than an exception so the batch can carry on.
 */
export async function runVideoPipeline(job: Job, status: JobStatus, ctx: PipelineContext): Promise<PipelineOutcome> {
  const outcome = (s: PipelineStatus): PipelineOutcome => ({ video: job.videoPath, name: job.name, status: s });
  ctx.logger.line();
  ctx.logger.line(`=== [${job.index}/${job.total}] Processing ${job.name} ===`);

  if (status.kind === "skip") {
    ctx.logger.info(
      status.reason === "duplicate"
        ? `Skipping ${job.name} - another video in this batch already uses that scene name.`
        : `Skipping ${job.name} - already processed (use --force to redo).`
    );
    return outcome({ kind: "skipped", reason: status.reason });
  }

  const layout = layoutFor(ctx.scenesDir, job.name);
  const progress: Progress = { stage: "extract" };
  try {
    const done = await reconstruct(job, layout, status, ctx, progress);
    ctx.logger.line(`✔ Finished ${job.name}`);
    return outcome({ kind: "completed", ...done });
  } catch (err) {
    const stage = err instanceof StageFailureError ? err.stage : progress.stage;
    const reason = describeError(err);
    ctx.logger.error(`${stage} failed for ${job.name}: ${reason}`);
    return outcome({ kind: "failed", stage, reason });
  }
}
