/**
 * Traffic types
 */

/**
 * A single incoming request, produced per step by the traffic generator
 */
export interface TrafficRequest {
  /** Normalized prompt length in [0, 1] (observation only) */
  length: number;

  /** Complexity in [0, 1], right-skewed */
  complexity: number;

  /** Minimum acceptable quality for this request, in [0, 1] */
  qualityRequired: number;
}

/**
 * Shape parameters for the traffic generator's Beta draws
 */
export interface TrafficParams {
  complexityAlpha: number;
  complexityBeta: number;
  lengthAlpha: number;
  lengthBeta: number;
}
