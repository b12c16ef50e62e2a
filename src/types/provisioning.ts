/**
 * Provisioning result types exchanged with the data product platform.
 *
 * Every result carries a `kind` tag so callers can branch on the outcome;
 * the tag is dropped when the result is serialized onto the wire.
 */

export type ProvisioningStatusValue = 'RUNNING' | 'COMPLETED' | 'FAILED';

export interface Info {
  publicInfo: Record<string, unknown>;
  privateInfo: Record<string, unknown>;
}

// Recognized outcome of provision, unprovision and update-ACL
export interface ProvisioningStatus {
  kind: 'ProvisioningStatus';
  status: ProvisioningStatusValue;
  result: string;
  info?: Info;
}

export interface ReverseProvisioningStatus {
  kind: 'ReverseProvisioningStatus';
  status: ProvisioningStatusValue;
  result: string;
  updates: Record<string, unknown>;
}

// Descriptor or structural problem; never retried
export interface ValidationError {
  kind: 'ValidationError';
  errors: string[];
}

export interface ValidationResult {
  kind: 'ValidationResult';
  valid: boolean;
  error?: ValidationError;
}

export interface ErrorMoreInfo {
  problems: string[];
  solutions: string[];
}

// Invalid caller-supplied parameters, with hints for the caller
export interface RequestValidationError {
  kind: 'RequestValidationError';
  errors: string[];
  userMessage?: string;
  input?: string;
  inputErrorField?: string;
  moreInfo?: ErrorMoreInfo;
}

// Unexpected failure, reported generically
export interface SystemErr {
  kind: 'SystemErr';
  error: string;
  userMessage?: string;
  input?: string;
  inputErrorField?: string;
  moreInfo?: ErrorMoreInfo;
}

export type ProvisioningResult = ProvisioningStatus | ValidationError | SystemErr;

export type ValidationOutcome = ValidationResult | SystemErr;

export type ReverseProvisioningResult =
  | ReverseProvisioningStatus
  | RequestValidationError
  | SystemErr;

export type ProvisionerResponse =
  | ProvisioningResult
  | ValidationOutcome
  | ReverseProvisioningResult;
