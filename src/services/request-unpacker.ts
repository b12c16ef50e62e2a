/**
 * Request Unpacker
 *
 * Turns provisioning, unprovisioning and update-ACL request bodies into a
 * data product plus the id of the component to act on. The descriptor
 * travels as a YAML document with `dataProduct` and
 * `componentIdToProvision` at the top level.
 */

import { parse } from 'yaml';
import { ValidationError } from '../types/provisioning';
import { DataProduct } from './data-product';
import { isValidationError, validationError } from './results';
import { schemaValidator } from './schema-validator';

export interface UnpackedProvisioningRequest {
  dataProduct: DataProduct;
  componentId: string;
}

export interface UnpackedUnprovisioningRequest extends UnpackedProvisioningRequest {
  removeData: boolean;
}

export interface UnpackedUpdateAclRequest extends UnpackedProvisioningRequest {
  refs: string[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses a YAML descriptor into the data product and the target component id
 */
export function parseDescriptor(descriptor: string): UnpackedProvisioningRequest | ValidationError {
  let document: unknown;
  try {
    document = parse(descriptor);
  } catch (error) {
    return validationError([
      'Unable to parse the descriptor.',
      error instanceof Error ? error.message : String(error)
    ]);
  }

  if (!isRecord(document)) {
    return validationError(['Unable to parse the descriptor.', 'Descriptor is not a YAML mapping']);
  }

  const dataProduct = schemaValidator.validateDataProduct(document.dataProduct);
  if (!dataProduct.parsedOutput) {
    return validationError(['Unable to parse the descriptor.', ...dataProduct.errors]);
  }

  const componentId = document.componentIdToProvision;
  if (typeof componentId !== 'string' || componentId === '') {
    return validationError(['Unable to parse the descriptor.', 'Missing componentIdToProvision']);
  }

  return {
    dataProduct: new DataProduct(dataProduct.parsedOutput),
    componentId
  };
}

export const RequestUnpacker = {
  unpackProvisioningRequest(body: unknown): UnpackedProvisioningRequest | ValidationError {
    const request = schemaValidator.validateProvisioningRequest(body);
    if (!request.parsedOutput) {
      return validationError(['Invalid provisioning request.', ...request.errors]);
    }

    const { descriptorKind, descriptor } = request.parsedOutput;
    if (descriptorKind !== 'COMPONENT_DESCRIPTOR') {
      return validationError([
        `Expecting a COMPONENT_DESCRIPTOR but got a ${descriptorKind} instead; please check with the platform team.`
      ]);
    }

    return parseDescriptor(descriptor);
  },

  /**
   * Same as a provisioning request; `removeData` defaults to false
   */
  unpackUnprovisioningRequest(body: unknown): UnpackedUnprovisioningRequest | ValidationError {
    const unpacked = RequestUnpacker.unpackProvisioningRequest(body);
    if (isValidationError(unpacked)) {
      return unpacked;
    }

    const request = schemaValidator.validateProvisioningRequest(body);
    return {
      ...unpacked,
      removeData: request.parsedOutput?.removeData ?? false
    };
  },

  /**
   * The descriptor of an update-ACL request is the one sent with the
   * provisioning request that created the component.
   */
  unpackUpdateAclRequest(body: unknown): UnpackedUpdateAclRequest | ValidationError {
    const request = schemaValidator.validateUpdateAclRequest(body);
    if (!request.parsedOutput) {
      return validationError(['Invalid update ACL request.', ...request.errors]);
    }

    const unpacked = parseDescriptor(request.parsedOutput.provisionInfo.request);
    if (isValidationError(unpacked)) {
      return unpacked;
    }

    return {
      ...unpacked,
      refs: request.parsedOutput.refs
    };
  }
};
