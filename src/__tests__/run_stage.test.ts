import { describe, expect, it } from "vitest";
import { createStageRunner } from "../stage/run_stage.js";

const runner = createStageRunner({ env: { ...process.env } });

describe("createStageRunner", () => {
  it("reports success for a zero exit", async () => {
    const result = await runner.run({
      stage: "features",
      command: process.execPath,
      args: ["-e", "process.exit(0)"],
      quiet: true
    });
    expect(result).toEqual({ stage: "features", success: true, exitCode: 0 });
  });

  it("maps a non-zero exit to a failed stage", async () => {
    const result = await runner.run({
      stage: "match",
      command: process.execPath,
      args: ["-e", "process.exit(3)"],
      quiet: true
    });
    expect(result).toEqual({ stage: "match", success: false, exitCode: 3, error: "exited with code 3" });
  });

  it("passes the configured environment to the child", async () => {
    const scoped = createStageRunner({ env: { ...process.env, VID2SCENE_TEST_MARKER: "7" } });
    const result = await scoped.run({
      stage: "mapper",
      command: process.execPath,
      args: ["-e", "process.exit(Number(process.env.VID2SCENE_TEST_MARKER))"],
      quiet: true
    });
    expect(result.exitCode).toBe(7);
  });

  it("fails without throwing when the program cannot be launched", async () => {
    const result = await runner.run({
      stage: "extract",
      command: "/nonexistent/vid2scene-test/ffmpeg",
      args: [],
      quiet: true
    });
    expect(result.stage).toBe("extract");
    expect(result.success).toBe(false);
    expect(result.exitCode).not.toBe(0);
  });
});
