import axios from 'axios';
import type { CodeSystemConcept, Parameters, Resource } from 'fhir/r4';
import { LogPrefixes } from '../constants/log-prefixes.js';

export interface FhirClientConfig {
  dryRun: boolean;
  verbose: boolean;
  timeout?: number;
}

const FHIR_HEADERS = {
  'Content-Type': 'application/fhir+json',
  'Accept': 'application/fhir+json',
};

/**
 * HTTP status of a failed axios request, if the server answered at all
 */
export function responseStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'response' in error) {
    const response = error.response;
    if (typeof response === 'object' && response !== null && 'status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  return undefined;
}

export class FhirClient {
  protected config: FhirClientConfig;

  constructor(config: FhirClientConfig) {
    this.config = config;
  }

  get dryRun(): boolean {
    return this.config.dryRun;
  }

  /**
   * Check if a FHIR resource already exists on the server. Only a 404 means it does not;
   * any other failure is rethrown.
   */
  async checkResourceExists(fhirUrl: string, resourceType: string, resourceId: string): Promise<boolean> {
    try {
      const response = await axios.get(
        `${fhirUrl}/${resourceType}/${resourceId}`,
        {
          headers: {
            'Accept': 'application/fhir+json',
          },
        }
      );
      return response.status === 200;
    } catch (error) {
      if (responseStatus(error) === 404) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Upload a single FHIR resource unless one with the same id already exists
   */
  async uploadResource(resource: Resource, fhirUrl: string, resourceType: string): Promise<void> {
    if (!resource.id) {
      throw new Error(`Invalid ${resourceType}: missing id`);
    }

    if (this.config.dryRun) {
      console.log(`${LogPrefixes.DRY_RUN} Would upload ${resourceType} to ${fhirUrl}/${resourceType}/${resource.id}`);
      if (this.config.verbose) {
        console.log(JSON.stringify(resource, null, 2));
      }
      return;
    }

    const exists = await this.checkResourceExists(fhirUrl, resourceType, resource.id);
    if (exists) {
      if (this.config.verbose) {
        console.debug(`${LogPrefixes.SKIP} ${resourceType} ${resource.id} already exists on server, skipping upload`);
      }
      return;
    }

    try {
      const response = await axios.put(
        `${fhirUrl}/${resourceType}/${resource.id}`,
        resource,
        {
          headers: FHIR_HEADERS,
          timeout: this.config.timeout || 300000,
        }
      );
      console.info(`[SUCCESS] Uploaded ${resourceType} ${resource.id}: ${response.status} ${response.statusText}`);
    } catch (error) {
      console.error(`[FAILURE] Uploading ${resourceType} ${resource.id}: ${responseStatus(error) ?? 'no response'}`);
      throw error;
    }
  }

  /**
   * Look up a code with CodeSystem/$lookup. Resolves undefined when the server does not know it.
   */
  async lookupCode(fhirUrl: string, system: string, code: string): Promise<Parameters | undefined> {
    try {
      const response = await axios.get<Parameters>(
        `${fhirUrl}/CodeSystem/$lookup`,
        {
          params: { system, code },
          headers: {
            'Accept': 'application/fhir+json',
          },
          timeout: this.config.timeout || 60000,
        }
      );
      return response.data;
    } catch (error) {
      const status = responseStatus(error);
      // HAPI answers 400 for codes it cannot find, other servers 404
      if (status === 404 || status === 400) {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Add concepts to an existing CodeSystem in a single request
   */
  async applyCodeSystemDeltaAdd(fhirUrl: string, system: string, codeSystemId: string, concepts: CodeSystemConcept[]): Promise<void> {
    if (this.config.dryRun) {
      console.log(`${LogPrefixes.DRY_RUN} Would apply delta add of ${concepts.length} concepts to CodeSystem ${codeSystemId}`);
      return;
    }

    const parameters: Parameters = {
      resourceType: 'Parameters',
      parameter: [
        {
          name: 'system',
          valueUri: system
        },
        {
          name: 'codeSystem',
          resource: {
            resourceType: 'CodeSystem',
            id: codeSystemId,
            url: system,
            status: 'active',
            content: 'complete',
            concept: concepts
          }
        }
      ]
    };

    try {
      const response = await axios.post(
        `${fhirUrl}/CodeSystem/$apply-codesystem-delta-add`,
        parameters,
        {
          headers: FHIR_HEADERS,
          timeout: this.config.timeout || 300000,
        }
      );
      console.info(`[SUCCESS] Applied delta add of ${concepts.length} concepts to CodeSystem ${codeSystemId}: ${response.status} ${response.statusText}`);
    } catch (error) {
      console.error(`[FAILURE] Applying delta add to CodeSystem ${codeSystemId}: ${responseStatus(error) ?? 'no response'}`);
      throw error;
    }
  }
}
