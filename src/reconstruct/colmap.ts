import type { ReconstructionSettings, ToolSelection } from "../config.js";
import type { SceneDirectories } from "../scene/layout.js";
import type { StageInvocation } from "../stage/run_stage.js";

const flag = (value: boolean) => (value ? "1" : "0");

export function featureExtractorInvocation(
  colmap: string,
  layout: SceneDirectories,
  settings: ReconstructionSettings
): StageInvocation {
  return {
    stage: "features",
    command: colmap,
    args: [
      "feature_extractor",
      "--database_path",
      layout.database,
      "--image_path",
      layout.images,
      "--ImageReader.single_camera",
      flag(settings.singleCamera),
      "--SiftExtraction.use_gpu",
      flag(settings.useGpu),
      "--SiftExtraction.max_image_size",
      String(settings.maxImageSize)
    ]
  };
}

export function sequentialMatcherInvocation(
  colmap: string,
  layout: SceneDirectories,
  settings: ReconstructionSettings
): StageInvocation {
  return {
    stage: "match",
    command: colmap,
    args: [
      "sequential_matcher",
      "--database_path",
      layout.database,
      "--SequentialMatching.overlap",
      String(settings.matchOverlap)
    ]
  };
}

export function mapperInvocation(
  mapper: string,
  tool: ToolSelection,
  layout: SceneDirectories,
  threads: number
): StageInvocation {
  const args = [
    "mapper",
    "--database_path",
    layout.database,
    "--image_path",
    layout.images,
    "--output_path",
    layout.sparse
  ];
  if (tool === "colmap") {
    args.push("--Mapper.num_threads", String(threads));
  }
  return { stage: "mapper", command: mapper, args };
}

// Text copies: one beside the binary model, one at sparse/ where importers look.
export function exportInvocations(colmap: string, layout: SceneDirectories): StageInvocation[] {
  return [layout.model, layout.sparse].map((output): StageInvocation => ({
    stage: "export",
    command: colmap,
    quiet: true,
    args: ["model_converter", "--input_path", layout.model, "--output_path", output, "--output_type", "TXT"]
  }));
}
