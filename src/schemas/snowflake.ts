/**
 * JSON Schemas for the specific sections of upstream Snowflake components.
 */

export const OpenMetadataColumnSchema = {
  type: 'object',
  required: ['name', 'dataType'],
  properties: {
    name: { type: 'string', minLength: 1 },
    dataType: { type: 'string' },
    description: { type: ['string', 'null'] },
    dataLength: { type: 'integer' },
    precision: { type: 'integer' },
    scale: { type: 'integer' },
    constraint: { type: 'string' },
    tags: { type: 'array' }
  }
} as const;

export const SnowflakeStorageSpecificSchema = {
  type: 'object',
  required: ['database', 'schema', 'tables'],
  properties: {
    database: { type: 'string', minLength: 1 },
    schema: { type: 'string', minLength: 1 },
    tables: {
      type: 'array',
      items: {
        type: 'object',
        required: ['tableName', 'schema'],
        properties: {
          tableName: { type: 'string', minLength: 1 },
          schema: { type: 'array', items: OpenMetadataColumnSchema }
        }
      }
    }
  }
} as const;

export const SnowflakeOutputPortSpecificSchema = {
  type: 'object',
  required: ['viewName', 'tableName', 'database', 'schema'],
  properties: {
    viewName: { type: 'string', minLength: 1 },
    tableName: { type: 'string', minLength: 1 },
    database: { type: 'string', minLength: 1 },
    schema: { type: 'string', minLength: 1 }
  }
} as const;
