// ICD-10 Constants and Identifiers

import type { CodingStandardInfo } from '../types/coding-standard.js';

/**
 * Element names used by the ICD-10 tabular XML distribution
 */
export const ICD10_XML_ELEMENTS = {
  CHAPTER: 'chapter',
  SECTION: 'section',
  DIAGNOSIS: 'diag',
  CODE: 'name',
  DESCRIPTION: 'desc'
} as const;

/**
 * Root element names of the official ICD-10-CM XML files
 */
export const ICD10_ROOT_TAGS: readonly string[] = ['ICD10CM.tabular', 'ICD10CM.index'];

/**
 * Concept property codes written for every imported diagnosis
 */
export const ICD10_PROPERTY_CODES = {
  CATEGORY: 'category',
  ACTIVE: 'active'
} as const;

export const DEFAULT_VERSION_TAG = 'icd10';

export const DEFAULT_BATCH_SIZE = 100;

export const ICD10_TERMINOLOGY_INFO: CodingStandardInfo = {
  identity: {
    versionTag: 'icd10',
    name: 'ICD10',
    displayName: 'ICD-10',
    description: 'International Statistical Classification of Diseases and Related Health Problems, 10th Revision'
  },
  publisher: {
    name: 'World Health Organization',
    website: 'https://icd.who.int'
  },
  fhirUrls: {
    system: 'http://hl7.org/fhir/sid/icd-10',
    codeSystemId: 'icd10'
  }
} as const;

export const ICD10CM_TERMINOLOGY_INFO: CodingStandardInfo = {
  identity: {
    versionTag: 'icd10cm',
    name: 'ICD10CM',
    displayName: 'ICD-10-CM',
    description: 'International Classification of Diseases, 10th Revision, Clinical Modification'
  },
  publisher: {
    name: 'National Center for Health Statistics',
    website: 'https://www.cdc.gov/nchs/icd/icd-10-cm'
  },
  fhirUrls: {
    system: 'http://hl7.org/fhir/sid/icd-10-cm',
    codeSystemId: 'icd10cm'
  }
} as const;
