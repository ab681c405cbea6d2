/**
 * Validation Helpers
 *
 * Input validation for the HTTP edge. Key builders accept whatever they are
 * given; handlers check identifier segments here before building keys.
 */

import { z } from "zod";
import { MAX_KEY_LENGTH, MAX_SEGMENT_LENGTH } from "./constants.js";
import { ENDPOINT_STATUSES } from "./paths.js";

/**
 * Whether value can be used as a single path segment
 */
export function isValidSegment(value: string): boolean {
  return value.length > 0 && value.length <= MAX_SEGMENT_LENGTH && !value.includes("/");
}

/**
 * One non-empty, slash-free path segment
 */
export const segmentSchema = z.string().refine(isValidSegment, {
  message: `Identifier must be 1-${MAX_SEGMENT_LENGTH} characters without '/'`,
});

/**
 * Raw key as received from a store event
 */
export const rawKeySchema = z.string().min(1).max(MAX_KEY_LENGTH);

export const endpointQuerySchema = z.object({
  host: segmentSchema,
  orchestrator: segmentSchema,
  workload: segmentSchema,
  endpoint: segmentSchema,
});

/**
 * Endpoint status document written by the agent
 */
export const endpointStatusSchema = z.object({
  status: z.enum(ENDPOINT_STATUSES),
});
