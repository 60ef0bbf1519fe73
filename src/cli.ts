#!/usr/bin/env node
import { readFileSync } from "node:fs";
import { parseArgs, USAGE } from "./args.js";
import { runBatch } from "./batch.js";
import { RECONSTRUCTION, readEnv } from "./config.js";
import { UsageError } from "./errors.js";
import { consoleLogger } from "./log.js";
import { createStageRunner } from "./stage/run_stage.js";
import { resolveTools } from "./tools/locate.js";

function readVersion() {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  const pkg: unknown = JSON.parse(raw);
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

async function main() {
  const parsed = parseArgs(process.argv.slice(2));
  if (parsed.kind === "help") {
    console.log(USAGE);
    return;
  }
  if (parsed.kind === "version") {
    console.log(`vid2scene ${readVersion()}`);
    return;
  }

  const opts = parsed.options;
  const env = readEnv();
  const tools = resolveTools(opts.tool, {
    installRoot: env.installRoot,
    env: process.env,
    ffmpegPath: opts.ffmpegPath ?? env.ffmpegPath,
    colmapPath: opts.colmapPath ?? (opts.tool === "colmap" ? opts.toolPath : undefined) ?? env.colmapPath,
    mapperPath: opts.toolPath ?? (opts.tool === "glomap" ? env.glomapPath : undefined)
  });
  consoleLogger.info(`ffmpeg: ${tools.extractor}`);
  consoleLogger.info(`colmap: ${tools.features}`);
  if (opts.tool === "glomap") consoleLogger.info(`glomap: ${tools.mapper}`);

  const summary = await runBatch(
    { videos: opts.videos, force: opts.force },
    {
      scenesDir: opts.scenesDir ?? env.scenesDir,
      tool: opts.tool,
      tools,
      runner: createStageRunner({ env: tools.env }),
      logger: consoleLogger,
      settings: RECONSTRUCTION,
      fps: opts.fps
    }
  );
  process.exitCode = summary.exitCode;
}

main().catch(err => {
  if (err instanceof UsageError) {
    console.error(err.message);
    console.error(USAGE);
  } else {
    console.error(err instanceof Error ? `[ERROR] ${err.message}` : err);
  }
  process.exit(1);
});
