// Shapes shared by the coding standard constants

/**
 * FHIR system URL and CodeSystem resource id for a coding standard
 */
export interface CodingStandardFhirUrls {
  readonly system: string;
  readonly codeSystemId: string;
}

/**
 * Basic coding standard identification and display
 */
export interface CodingStandardIdentity {
  readonly versionTag: string;
  readonly name: string;
  readonly displayName: string;
  readonly description: string;
}

/**
 * Organization and publisher information
 */
export interface CodingStandardPublisher {
  readonly name: string;
  readonly website: string;
}

/**
 * Comprehensive coding standard information interface
 */
export interface CodingStandardInfo {
  readonly identity: CodingStandardIdentity;
  readonly publisher: CodingStandardPublisher;
  readonly fhirUrls: CodingStandardFhirUrls;
}
