/**
 * JSON Schema for the data product section of a provisioning descriptor.
 * `dependsOn` and `specific` default to empty values when omitted.
 */

import { OpenMetadataColumnSchema } from './snowflake';

export const ComponentSchema = {
  type: 'object',
  required: ['id', 'name', 'kind'],
  properties: {
    id: { type: 'string', minLength: 1 },
    name: { type: 'string' },
    fullyQualifiedName: { type: ['string', 'null'] },
    description: { type: 'string' },
    kind: { type: 'string' },
    version: { type: 'string' },
    useCaseTemplateId: { type: 'string' },
    infrastructureTemplateId: { type: 'string' },
    dependsOn: {
      type: 'array',
      items: { type: 'string' },
      default: []
    },
    specific: { type: 'object', default: {} },
    dataContract: {
      type: 'object',
      required: ['schema'],
      properties: {
        schema: { type: 'array', items: OpenMetadataColumnSchema }
      }
    }
  }
} as const;

export const DataProductSchema = {
  type: 'object',
  required: ['id', 'dataProductOwner', 'devGroup', 'components'],
  properties: {
    id: { type: 'string', minLength: 1 },
    name: { type: 'string' },
    fullyQualifiedName: { type: ['string', 'null'] },
    domain: { type: 'string' },
    environment: { type: 'string' },
    version: { type: 'string' },
    dataProductOwner: { type: 'string', minLength: 1 },
    devGroup: { type: 'string', minLength: 1 },
    components: {
      type: 'array',
      items: ComponentSchema
    }
  }
} as const;
