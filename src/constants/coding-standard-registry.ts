// Coding standard registry keyed by version tag

import type { CodingStandardInfo } from '../types/coding-standard.js';
import { ICD10_TERMINOLOGY_INFO, ICD10CM_TERMINOLOGY_INFO } from './icd10-constants.js';

/**
 * Registry of every coding standard a diagnosis can be imported under
 */
export const CODING_STANDARD_REGISTRY: Readonly<Record<string, CodingStandardInfo>> = {
  [ICD10_TERMINOLOGY_INFO.identity.versionTag]: ICD10_TERMINOLOGY_INFO,
  [ICD10CM_TERMINOLOGY_INFO.identity.versionTag]: ICD10CM_TERMINOLOGY_INFO
};

/**
 * Get coding standard information by version tag
 */
export function getCodingStandard(versionTag: string): CodingStandardInfo | null {
  return CODING_STANDARD_REGISTRY[versionTag] ?? null;
}

export function getSupportedVersionTags(): string[] {
  return Object.keys(CODING_STANDARD_REGISTRY);
}
