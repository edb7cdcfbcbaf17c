import type { CodeSystem, CodeSystemConcept, Parameters, ParametersParameter } from 'fhir/r4';
import type { DiagnosisRecord } from '../types/diagnosis-types.js';
import type { CodingStandardInfo } from '../types/coding-standard.js';
import { DiagnosisRepository, recordKey } from './diagnosis-repository.js';
import { FhirClient } from '../base/fhir-client.js';
import { getCodingStandard } from '../constants/coding-standard-registry.js';
import { ICD10_PROPERTY_CODES } from '../constants/icd10-constants.js';
import { RepositoryError, toRepositoryError } from '../types/import-errors.js';
import { LogPrefixes } from '../constants/log-prefixes.js';

/**
 * Diagnosis records stored as concepts of a FHIR CodeSystem, one CodeSystem per
 * version tag. Staged creates are held locally and sent in one
 * $apply-codesystem-delta-add request on commit. In dry run the server is never
 * written, so committed records are kept here for later lookups in the same process.
 */
export class FhirDiagnosisRepository implements DiagnosisRepository {
  private fhirClient: FhirClient;
  private fhirUrl: string;
  private staged: Map<string, DiagnosisRecord> = new Map();
  private dryRunCommitted: Map<string, DiagnosisRecord> = new Map();

  constructor(fhirClient: FhirClient, fhirUrl: string) {
    this.fhirClient = fhirClient;
    this.fhirUrl = fhirUrl.replace(/\/+$/, '');
  }

  async find(code: string, versionTag: string): Promise<DiagnosisRecord | undefined> {
    const key = recordKey(code, versionTag);
    const local = this.staged.get(key) ?? this.dryRunCommitted.get(key);
    if (local) {
      return local;
    }

    const standard = this.requireStandard(versionTag, 'find');
    let result: Parameters | undefined;
    try {
      result = await this.fhirClient.lookupCode(this.fhirUrl, standard.fhirUrls.system, code);
    } catch (error) {
      throw toRepositoryError(error, 'find');
    }
    return result ? recordFromLookup(result, code, versionTag) : undefined;
  }

  async stageCreate(record: DiagnosisRecord): Promise<void> {
    this.requireStandard(record.versionTag, 'stage');
    const key = recordKey(record.code, record.versionTag);
    if (this.staged.has(key)) {
      throw new RepositoryError('stage', `Diagnosis ${record.code} is already staged for ${record.versionTag}`);
    }
    this.staged.set(key, record);
  }

  async commit(): Promise<void> {
    if (this.staged.size === 0) {
      return;
    }

    const byVersionTag = new Map<string, DiagnosisRecord[]>();
    for (const record of this.staged.values()) {
      const records = byVersionTag.get(record.versionTag) ?? [];
      records.push(record);
      byVersionTag.set(record.versionTag, records);
    }

    for (const [versionTag, records] of byVersionTag) {
      const standard = this.requireStandard(versionTag, 'commit');
      try {
        await this.fhirClient.uploadResource(createCodeSystemShell(standard), this.fhirUrl, 'CodeSystem');
        await this.fhirClient.applyCodeSystemDeltaAdd(
          this.fhirUrl,
          standard.fhirUrls.system,
          standard.fhirUrls.codeSystemId,
          records.map(toConcept)
        );
      } catch (error) {
        throw toRepositoryError(error, 'commit');
      }
    }

    if (this.fhirClient.dryRun) {
      for (const [key, record] of this.staged) {
        this.dryRunCommitted.set(key, record);
      }
    }
    this.staged.clear();
  }

  async rollback(): Promise<void> {
    if (this.staged.size > 0) {
      console.info(`${LogPrefixes.ROLLBACK} Discarding ${this.staged.size} staged concepts`);
    }
    this.staged.clear();
  }

  private requireStandard(versionTag: string, operation: 'find' | 'stage' | 'commit'): CodingStandardInfo {
    const standard = getCodingStandard(versionTag);
    if (!standard) {
      throw new RepositoryError(operation, `No CodeSystem is registered for version tag "${versionTag}"`);
    }
    return standard;
  }
}

export function toConcept(record: DiagnosisRecord): CodeSystemConcept {
  return {
    code: record.code,
    display: record.name,
    definition: record.description,
    property: [
      { code: ICD10_PROPERTY_CODES.CATEGORY, valueString: record.category },
      { code: ICD10_PROPERTY_CODES.ACTIVE, valueBoolean: record.active }
    ]
  };
}

/**
 * Empty CodeSystem that concepts are added to; uploaded only when the server has none
 */
export function createCodeSystemShell(standard: CodingStandardInfo): CodeSystem {
  return {
    resourceType: 'CodeSystem',
    id: standard.fhirUrls.codeSystemId,
    url: standard.fhirUrls.system,
    name: standard.identity.name,
    title: standard.identity.displayName,
    status: 'active',
    publisher: standard.publisher.name,
    description: standard.identity.description,
    caseSensitive: true,
    content: 'complete',
    property: [
      {
        code: ICD10_PROPERTY_CODES.CATEGORY,
        uri: `${standard.fhirUrls.system}#${ICD10_PROPERTY_CODES.CATEGORY}`,
        description: 'Chapter the diagnosis belongs to',
        type: 'string'
      },
      {
        code: ICD10_PROPERTY_CODES.ACTIVE,
        uri: `${standard.fhirUrls.system}#${ICD10_PROPERTY_CODES.ACTIVE}`,
        description: 'Whether the diagnosis can be used',
        type: 'boolean'
      }
    ]
  };
}

function propertyValue(parameters: ParametersParameter[], propertyCode: string): ParametersParameter | undefined {
  const property = parameters.find(parameter =>
    parameter.name === 'property' &&
    parameter.part?.some(part => part.name === 'code' && part.valueCode === propertyCode)
  );
  return property?.part?.find(part => part.name === 'value');
}

export function recordFromLookup(result: Parameters, code: string, versionTag: string): DiagnosisRecord {
  const parameters = result.parameter ?? [];
  const display = parameters.find(parameter => parameter.name === 'display')?.valueString ?? '';
  const definition = parameters.find(parameter => parameter.name === 'definition')?.valueString;

  return {
    code,
    name: display,
    description: definition ?? display,
    category: propertyValue(parameters, ICD10_PROPERTY_CODES.CATEGORY)?.valueString ?? '',
    versionTag,
    active: propertyValue(parameters, ICD10_PROPERTY_CODES.ACTIVE)?.valueBoolean ?? true
  };
}
