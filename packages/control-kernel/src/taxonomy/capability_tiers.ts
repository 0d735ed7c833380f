// Control Kernel - Capability tier lattice (v1)
//
// Engineering rule:
// - Tiers are an allowlist with a fixed total order (CAPABILITY_TIERS_V1).
// - Every rank comparison in the kernel goes through tierRankV1; never compare
//   tier strings directly.

import { CAPABILITY_TIERS_V1, type CapabilityTierV1 } from "@vitalgate/contracts";

/**
 * Position of a tier in the ascending lattice (MODEL_ONLY = 0).
 */
export function tierRankV1(tier: CapabilityTierV1): number {
  return CAPABILITY_TIERS_V1.indexOf(tier);
}

/**
 * Number of lattice steps between two tiers (0 for the same tier).
 */
export function tierDistanceV1(from: CapabilityTierV1, to: CapabilityTierV1): number {
  return Math.abs(tierRankV1(to) - tierRankV1(from));
}

export function isDowngradeV1(from: CapabilityTierV1, to: CapabilityTierV1): boolean {
  return tierRankV1(to) < tierRankV1(from);
}

export function isValidCapabilityTierV1(tier: string): tier is CapabilityTierV1 {
  return CAPABILITY_TIER_SET_V1.has(tier);
}

/**
 * Throws a typed error if a string is not a tier in the v1 lattice.
 *
 * @param context - Human-friendly location string to aid debugging.
 */
export function assertValidCapabilityTierV1(tier: string, context: string): asserts tier is CapabilityTierV1 {
  if (!isValidCapabilityTierV1(tier)) {
    throw new Error(`CAPABILITY_TIER_NOT_ALLOWED: ${tier} @ ${context}`);
  }
}

const CAPABILITY_TIER_SET_V1: ReadonlySet<string> = new Set<string>(CAPABILITY_TIERS_V1);
