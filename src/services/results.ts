import {
  ErrorMoreInfo,
  Info,
  ProvisioningStatus,
  ProvisioningStatusValue,
  RequestValidationError,
  ReverseProvisioningStatus,
  SystemErr,
  ValidationError,
  ValidationResult
} from '../types/provisioning';

const CONTACT_PLATFORM_TEAM = 'Contact the Platform Team for further assistance';

export function provisioningStatus(
  status: ProvisioningStatusValue,
  result: string,
  info?: Info
): ProvisioningStatus {
  return {
    kind: 'ProvisioningStatus',
    status,
    result,
    ...(info && { info })
  };
}

export function reverseProvisioningStatus(
  result: string,
  updates: Record<string, unknown>
): ReverseProvisioningStatus {
  return {
    kind: 'ReverseProvisioningStatus',
    status: 'COMPLETED',
    result,
    updates
  };
}

export function validationError(errors: string[]): ValidationError {
  return { kind: 'ValidationError', errors };
}

export function validationResult(error?: ValidationError): ValidationResult {
  return error
    ? { kind: 'ValidationResult', valid: false, error }
    : { kind: 'ValidationResult', valid: true };
}

/**
 * Builds a request validation error carrying one problem and one solution.
 * The platform team contact is always offered as the last solution.
 */
export function requestValidationError(
  error: string,
  problem: string,
  solution: string
): RequestValidationError {
  const moreInfo: ErrorMoreInfo = {
    problems: [problem],
    solutions: [solution, CONTACT_PLATFORM_TEAM]
  };
  return {
    kind: 'RequestValidationError',
    errors: [error],
    userMessage: problem,
    moreInfo
  };
}

export function systemErr(error: string): SystemErr {
  return {
    kind: 'SystemErr',
    error,
    userMessage: 'An unexpected error occurred while processing the request',
    moreInfo: {
      problems: [error],
      solutions: [CONTACT_PLATFORM_TEAM]
    }
  };
}

export function isValidationError(value: unknown): value is ValidationError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    value.kind === 'ValidationError'
  );
}
