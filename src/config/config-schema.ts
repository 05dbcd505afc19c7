import { z } from "zod";

const percentage = z.number().min(0).max(100);
const nonNegativeMs = z.number().int().min(0);
const positiveCount = z.number().int().min(1);

const fn = (message: string) =>
  z
    .unknown()
    .refine((v) => v === undefined || typeof v === "function", message)
    .optional();

const constructorList = z
  .array(z.unknown().refine((v) => typeof v === "function", "must be an error class"))
  .optional();

export const slidingWindowTypeSchema = z.enum(["count-based", "time-based"]);

export const circuitBreakerConfigSchema = z.object({
  // Thresholds
  failureRateThreshold: percentage.optional(),
  slowCallRateThreshold: percentage.optional(),
  slowCallDurationThresholdMs: nonNegativeMs.optional(),

  // Sliding window
  slidingWindowType: slidingWindowTypeSchema.optional(),
  slidingWindowSize: positiveCount.optional(),
  minimumNumberOfCalls: positiveCount.optional(),

  // Open / half-open
  permittedCallsInHalfOpen: positiveCount.optional(),
  waitDurationInOpenMs: nonNegativeMs.optional(),
  autoTransitionFromOpenToHalfOpen: z.boolean().optional(),
  maxWaitDurationInHalfOpenMs: nonNegativeMs.optional(),

  // Error classification
  errorClassifier: z
    .unknown()
    .refine(
      (v) =>
        v === undefined ||
        (typeof v === "object" && v !== null && "classify" in v && typeof v.classify === "function"),
      "must implement classify(error)",
    )
    .optional(),
  recordError: fn("must be a function"),
  ignoreError: fn("must be a function"),
  recordErrors: constructorList,
  ignoreErrors: constructorList,
});

export const circuitBreakerNameSchema = z.string().trim().min(1, "must be a non-empty string");
