/**
 * Reads the specific sections of typed components into their payloads.
 * Parse problems come back as a ValidationError listing every schema error.
 */

import { GoodDataOutputPort, SnowflakeComponent } from '../types/descriptor';
import { ValidationError } from '../types/provisioning';
import { SnowflakeMetadata, SnowflakeObject, WorkspaceSpec } from '../types/workspace';
import { validationError } from './results';
import { schemaValidator } from './schema-validator';

export function getWorkspaceSpec(component: GoodDataOutputPort): WorkspaceSpec | ValidationError {
  const result = schemaValidator.validateWorkspaceSpec(component.specific);
  if (!result.parsedOutput) {
    return validationError(result.errors);
  }
  return result.parsedOutput;
}

/**
 * A storage area exposes each of its tables; a Snowflake output port exposes
 * its view, described by the port's data contract.
 */
export function getSnowflakeMetadata(component: SnowflakeComponent): SnowflakeMetadata | ValidationError {
  if (component.type === 'SNOWFLAKE_STORAGE_AREA') {
    const result = schemaValidator.validateSnowflakeStorage(component.specific);
    if (!result.parsedOutput) {
      return validationError(result.errors);
    }
    const specific = result.parsedOutput;
    return {
      database: specific.database,
      schema: specific.schema,
      objects: specific.tables.map((table): SnowflakeObject => ({
        name: table.tableName,
        schema: table.schema,
        type: 'TABLE'
      }))
    };
  }

  const result = schemaValidator.validateSnowflakeOutputPort(component.specific);
  if (!result.parsedOutput) {
    return validationError(result.errors);
  }
  const specific = result.parsedOutput;
  return {
    database: specific.database,
    schema: specific.schema,
    objects: [
      {
        name: specific.viewName,
        schema: component.dataContract.schema,
        type: 'VIEW'
      }
    ]
  };
}
