import { AppError } from "../../middleware/errors";
import type { CallOptions, PipelineCapabilities } from "../providers/providers.types";
import type { QualityGate } from "./quality.gate";
import type { SourceResolver } from "./source.resolver";
import type {
  DocumentSubmission,
  EnhancementResult,
  OcrResult,
  QualityAssessment,
  ResolvedSource,
  StageName,
} from "./pipeline.types";

export type PipelineState = {
  readonly submission: DocumentSubmission;
  source: ResolvedSource | null;
  quality: QualityAssessment | null;
  initialQuality: QualityAssessment | null;
  preprocessingApplied: boolean;
  ocr: OcrResult | null;
  enhancement: EnhancementResult | null;
  warnings: string[];
};

export type StageDecision = { run: true } | { run: false; reason: string };

export type StageDependencies = {
  resolver: SourceResolver;
  qualityGate: QualityGate;
  capabilities: PipelineCapabilities;
};

export type PipelineStage = {
  name: StageName;
  /** Job progress reported once the stage has finished or been skipped. */
  progress: number;
  /** A failing non-fatal stage is recorded as a warning and the pipeline continues. */
  fatal: boolean;
  decide: (state: PipelineState) => StageDecision;
  run: (state: PipelineState, deps: StageDependencies, options: CallOptions) => Promise<void>;
};

const RUN: StageDecision = { run: true };

function skip(reason: string): StageDecision {
  return { run: false, reason };
}

function requireSource(state: PipelineState): ResolvedSource {
  if (!state.source) {
    throw new AppError("INTERNAL", "Source was not resolved before use.", 500);
  }
  return state.source;
}

function requireQuality(state: PipelineState): QualityAssessment {
  if (!state.quality) {
    throw new AppError("INTERNAL", "Quality was not assessed before use.", 500);
  }
  return state.quality;
}

export function createInitialState(submission: DocumentSubmission): PipelineState {
  return {
    submission,
    source: null,
    quality: null,
    initialQuality: null,
    preprocessingApplied: false,
    ocr: null,
    enhancement: null,
    warnings: [],
  };
}

const resolveSourceStage: PipelineStage = {
  name: "resolve_source",
  progress: 10,
  fatal: true,
  decide: () => RUN,
  run: async (state, deps, options) => {
    state.source = await deps.resolver.resolve(state.submission.source, options);
  },
};

const qualityGateStage: PipelineStage = {
  name: "quality_gate",
  progress: 30,
  fatal: true,
  decide: () => RUN,
  run: async (state, deps, options) => {
    const source = requireSource(state);
    state.quality = await deps.qualityGate.evaluate(
      { bytes: source.bytes, format: source.format },
      state.submission.thresholds.qualityThreshold,
      options
    );
  },
};

// Preprocessing runs once; the re-assessed quality becomes authoritative
// whatever its score.
const preprocessingStage: PipelineStage = {
  name: "preprocessing",
  progress: 40,
  fatal: true,
  decide: (state) => {
    if (requireQuality(state).passed) {
      return skip("quality_passed");
    }
    if (!state.submission.options.enablePreprocessing) {
      return skip("preprocessing_disabled");
    }
    return RUN;
  },
  run: async (state, deps, options) => {
    const source = requireSource(state);
    const bytes = await deps.capabilities.preprocessor.preprocess(
      { bytes: source.bytes, format: source.format },
      options
    );
    state.source = { ...source, bytes };
    state.initialQuality = requireQuality(state);
    state.preprocessingApplied = true;
    state.quality = await deps.qualityGate.evaluate(
      { bytes, format: source.format },
      state.submission.thresholds.qualityThreshold,
      options
    );
  },
};

const ocrStage: PipelineStage = {
  name: "ocr",
  progress: 70,
  fatal: true,
  decide: (state) => {
    if (!state.submission.options.enableOcr) {
      return skip("ocr_disabled");
    }
    if (!requireQuality(state).passed && !state.preprocessingApplied) {
      return skip("quality_gate_failed");
    }
    return RUN;
  },
  run: async (state, deps, options) => {
    const source = requireSource(state);
    state.ocr = await deps.capabilities.ocrEngine.extractText(
      { bytes: source.bytes, format: source.format },
      options
    );
  },
};

const enhancementStage: PipelineStage = {
  name: "enhancement",
  progress: 90,
  fatal: false,
  decide: (state) => {
    if (!state.submission.options.enableEnhancement) {
      return skip("enhancement_disabled");
    }
    if (!state.ocr) {
      return skip("no_ocr_result");
    }
    return RUN;
  },
  run: async (state, deps, options) => {
    if (!state.ocr) {
      return;
    }
    state.enhancement = await deps.capabilities.textEnhancer.enhance(state.ocr.text, options);
  },
};

export const PIPELINE_STAGES: readonly PipelineStage[] = [
  resolveSourceStage,
  qualityGateStage,
  preprocessingStage,
  ocrStage,
  enhancementStage,
];
