// =============================================================================
// Result — explicit success/failure values passed between layers
// =============================================================================

import type { PageBriefError } from "./errors.js";

export type Result<T, E extends PageBriefError = PageBriefError> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends PageBriefError>(error: E): { success: false; error: E } {
  return { success: false, error };
}
