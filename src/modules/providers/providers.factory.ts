import {
  getRemoteRetryPolicy,
  getRemoteServiceApiKey,
  getRemoteServiceUrls,
  getRemoteTimeoutMs,
  getStorageConfig,
} from "../../config";
import { describeError, logWarn } from "../../observability/logger";
import { withRetry } from "../../utils/retry";
import { isRetryableRemoteError } from "../pipeline/pipeline.errors";
import { createHttpTextEnhancer } from "./enhancement.provider";
import { createHttpOcrEngine } from "./ocr.provider";
import type { CallOptions, PipelineCapabilities } from "./providers.types";
import { createObjectStorage, createS3BodyReader } from "./storage.provider";
import { createHttpPreprocessor, createHttpQualityAssessor } from "./vision.provider";

export type RetryPolicy = {
  maxRetries: number;
  baseDelayMs: number;
};

function retrying<T>(
  capability: string,
  policy: RetryPolicy,
  options: CallOptions | undefined,
  fn: () => Promise<T>
): Promise<T> {
  return withRetry(fn, {
    retries: policy.maxRetries,
    baseDelayMs: policy.baseDelayMs,
    shouldRetry: isRetryableRemoteError,
    signal: options?.signal,
    onRetry: (error, attempt, delayMs) => {
      logWarn("remote_call_retry", {
        capability,
        attempt,
        delayMs,
        error: describeError(error),
      });
    },
  });
}

/**
 * Wraps every capability call in the retry policy. Only errors flagged
 * retryable are attempted again.
 */
export function withRetryPolicy(
  capabilities: PipelineCapabilities,
  policy: RetryPolicy
): PipelineCapabilities {
  return {
    storage: {
      getObject: (ref, options) =>
        retrying("storage", policy, options, () => capabilities.storage.getObject(ref, options)),
    },
    qualityAssessor: {
      assess: (input, options) =>
        retrying("quality", policy, options, () =>
          capabilities.qualityAssessor.assess(input, options)
        ),
    },
    preprocessor: {
      preprocess: (input, options) =>
        retrying("preprocess", policy, options, () =>
          capabilities.preprocessor.preprocess(input, options)
        ),
    },
    ocrEngine: {
      extractText: (input, options) =>
        retrying("ocr", policy, options, () => capabilities.ocrEngine.extractText(input, options)),
    },
    textEnhancer: {
      enhance: (text, options) =>
        retrying("enhancement", policy, options, () =>
          capabilities.textEnhancer.enhance(text, options)
        ),
    },
  };
}

export function createRemoteCapabilities(): PipelineCapabilities {
  const urls = getRemoteServiceUrls();
  const apiKey = getRemoteServiceApiKey();
  const timeoutMs = getRemoteTimeoutMs();

  return withRetryPolicy(
    {
      storage: createObjectStorage(createS3BodyReader(getStorageConfig())),
      qualityAssessor: createHttpQualityAssessor({
        service: "vision",
        baseUrl: urls.vision,
        apiKey,
        timeoutMs,
      }),
      preprocessor: createHttpPreprocessor({
        service: "vision",
        baseUrl: urls.vision,
        apiKey,
        timeoutMs,
      }),
      ocrEngine: createHttpOcrEngine({ service: "ocr", baseUrl: urls.ocr, apiKey, timeoutMs }),
      textEnhancer: createHttpTextEnhancer({
        service: "enhancement",
        baseUrl: urls.enhancement,
        apiKey,
        timeoutMs,
      }),
    },
    getRemoteRetryPolicy()
  );
}
