/**
 * JSON Schemas for the request bodies accepted by the provisioner API.
 */

export type DescriptorKind =
  | 'DATAPRODUCT_DESCRIPTOR'
  | 'COMPONENT_DESCRIPTOR'
  | 'DATAPRODUCT_DESCRIPTOR_WITH_RESULTS';

export interface ProvisioningRequest {
  descriptorKind: DescriptorKind;
  descriptor: string;
  removeData?: boolean | null;
}

export interface UpdateAclRequest {
  refs: string[];
  provisionInfo: {
    request: string;
    result: string;
  };
}

export interface ReverseProvisioningRequest {
  useCaseTemplateId: string;
  environment: string;
  params?: Record<string, unknown> | null;
  catalogInfo?: Record<string, unknown> | null;
}

export const ProvisioningRequestSchema = {
  type: 'object',
  required: ['descriptorKind', 'descriptor'],
  properties: {
    descriptorKind: {
      type: 'string',
      enum: ['DATAPRODUCT_DESCRIPTOR', 'COMPONENT_DESCRIPTOR', 'DATAPRODUCT_DESCRIPTOR_WITH_RESULTS']
    },
    descriptor: { type: 'string' },
    removeData: { type: ['boolean', 'null'] }
  }
} as const;

export const UpdateAclRequestSchema = {
  type: 'object',
  required: ['refs', 'provisionInfo'],
  properties: {
    refs: {
      type: 'array',
      items: { type: 'string' }
    },
    provisionInfo: {
      type: 'object',
      required: ['request', 'result'],
      properties: {
        request: { type: 'string' },
        result: { type: 'string' }
      }
    }
  }
} as const;

export const ReverseProvisioningRequestSchema = {
  type: 'object',
  required: ['useCaseTemplateId', 'environment'],
  properties: {
    useCaseTemplateId: { type: 'string' },
    environment: { type: 'string' },
    params: { type: ['object', 'null'] },
    catalogInfo: { type: ['object', 'null'] }
  }
} as const;
