import { mkdirSync } from "node:fs";
import { resolve } from "node:path";
import { DirectoryCreationError } from "./errors.js";
import {
  jobStatusFor,
  runVideoPipeline,
  type Job,
  type PipelineContext,
  type PipelineOutcome
} from "./pipeline.js";
import { layoutFor, sceneExists, videoStem } from "./scene/layout.js";

export type BatchOptions = {
  videos: string[];
  force: boolean;
};

export type BatchSummary = {
  outcomes: PipelineOutcome[];
  completed: number;
  skipped: number;
  failed: number;
  exitCode: number;
};

const RULE = "=".repeat(62);
const THIN_RULE = "-".repeat(62);

export function createJobs(videos: string[]): Job[] {
  return videos.map((videoPath, i) => ({
    videoPath,
    name: videoStem(videoPath),
    index: i + 1,
    total: videos.length
  }));
}

export function summarize(outcomes: PipelineOutcome[]): BatchSummary {
  const counts = outcomes.reduce(
    (acc, o) => {
      acc[o.status.kind] += 1;
      return acc;
    },
    { completed: 0, skipped: 0, failed: 0 }
  );
  const allFailed = outcomes.length > 0 && counts.failed === outcomes.length;
  return { outcomes, ...counts, exitCode: allFailed ? 1 : 0 };
}

function ensureScenesDir(dir: string) {
  try {
    mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new DirectoryCreationError(dir, err);
  }
}

/**
 * Runs every video in argument order, one at a time. A scene name is claimed
 * once a job leaves its scene on disk, so a later video with the same stem
 * never touches that scene, force or not.
 */
export async function runBatch(opts: BatchOptions, ctx: PipelineContext): Promise<BatchSummary> {
  const scenesDir = resolve(ctx.scenesDir);
  ensureScenesDir(scenesDir);

  const jobs = createJobs(opts.videos);
  const { logger } = ctx;
  logger.line(RULE);
  logger.line(` Starting on ${jobs.length} video(s)...`);
  logger.line(RULE);

  const claimed = new Set<string>();
  const outcomes: PipelineOutcome[] = [];
  for (const job of jobs) {
    const status = jobStatusFor(job, scenesDir, opts.force, claimed.has(job.name));
    outcomes.push(await runVideoPipeline(job, status, { ...ctx, scenesDir }));
    if (sceneExists(layoutFor(scenesDir, job.name))) claimed.add(job.name);
  }

  const summary = summarize(outcomes);
  logger.line();
  logger.line(THIN_RULE);
  logger.line(` All jobs finished - results are in ${scenesDir}`);
  logger.line(` Completed: ${summary.completed}  Skipped: ${summary.skipped}  Failed: ${summary.failed}`);
  for (const o of outcomes) {
    if (o.status.kind === "failed") {
      logger.line(`   ✘ ${o.name} (${o.status.stage}): ${o.status.reason}`);
    }
  }
  logger.line(THIN_RULE);
  return summary;
}
