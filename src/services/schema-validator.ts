/**
 * Schema Validator Service
 * Validates descriptor sections and request bodies against their JSON schemas.
 */

import Ajv, { ErrorObject, ValidateFunction } from 'ajv';
import { isDeepStrictEqual } from 'util';
import { DataProductDescriptor, OpenMetadataColumn } from '../types/descriptor';
import { DeclarativeWorkspaceModel, WorkspaceSpec } from '../types/workspace';
import { WorkspaceSpecSchema } from '../schemas/workspace-spec';
import { DeclarativeWorkspaceModelSchema } from '../schemas/declarative-workspace';
import {
  SnowflakeOutputPortSpecificSchema,
  SnowflakeStorageSpecificSchema
} from '../schemas/snowflake';
import { DataProductSchema } from '../schemas/descriptor';
import {
  ProvisioningRequest,
  ProvisioningRequestSchema,
  ReverseProvisioningRequest,
  ReverseProvisioningRequestSchema,
  UpdateAclRequest,
  UpdateAclRequestSchema
} from '../schemas/requests';

export interface SnowflakeStorageSpecific {
  database: string;
  schema: string;
  tables: Array<{ tableName: string; schema: OpenMetadataColumn[] }>;
}

export interface SnowflakeOutputPortSpecific {
  viewName: string;
  tableName: string;
  database: string;
  schema: string;
}

export interface SchemaValidationResult<T> {
  valid: boolean;
  errors: string[];
  parsedOutput?: T;
}

/**
 * Outcome of converting a workspace layout to the platform model and back.
 * `consistent` is false when the conversion dropped or altered content.
 */
export interface LayoutRoundTripResult {
  parsed: boolean;
  consistent: boolean;
  errors: string[];
  model?: DeclarativeWorkspaceModel;
}

export class SchemaValidator {
  private ajv: Ajv;
  private layoutAjv: Ajv;
  private validateWorkspaceSpecSchema: ValidateFunction<WorkspaceSpec>;
  private validateStorageSchema: ValidateFunction<SnowflakeStorageSpecific>;
  private validateOutputPortSchema: ValidateFunction<SnowflakeOutputPortSpecific>;
  private validateDataProductSchema: ValidateFunction<DataProductDescriptor>;
  private validateProvisioningRequestSchema: ValidateFunction<ProvisioningRequest>;
  private validateUpdateAclRequestSchema: ValidateFunction<UpdateAclRequest>;
  private validateReverseRequestSchema: ValidateFunction<ReverseProvisioningRequest>;
  private validateLayoutSchema: ValidateFunction<DeclarativeWorkspaceModel>;

  constructor() {
    this.ajv = new Ajv({ allErrors: true, useDefaults: true, allowUnionTypes: true });
    this.layoutAjv = new Ajv({ allErrors: true, removeAdditional: true });

    this.validateWorkspaceSpecSchema = this.ajv.compile<WorkspaceSpec>(WorkspaceSpecSchema);
    this.validateStorageSchema = this.ajv.compile<SnowflakeStorageSpecific>(SnowflakeStorageSpecificSchema);
    this.validateOutputPortSchema = this.ajv.compile<SnowflakeOutputPortSpecific>(
      SnowflakeOutputPortSpecificSchema
    );
    this.validateDataProductSchema = this.ajv.compile<DataProductDescriptor>(DataProductSchema);
    this.validateProvisioningRequestSchema = this.ajv.compile<ProvisioningRequest>(ProvisioningRequestSchema);
    this.validateUpdateAclRequestSchema = this.ajv.compile<UpdateAclRequest>(UpdateAclRequestSchema);
    this.validateReverseRequestSchema = this.ajv.compile<ReverseProvisioningRequest>(
      ReverseProvisioningRequestSchema
    );
    this.validateLayoutSchema = this.layoutAjv.compile<DeclarativeWorkspaceModel>(
      DeclarativeWorkspaceModelSchema
    );
  }

  /**
   * Converts AJV errors to readable "<path> <message>" strings
   */
  private convertErrors(errors: ErrorObject[] | null | undefined): string[] {
    if (!errors) return [];

    return errors.map((error) => {
      const message = error.message || 'is invalid';
      return error.instancePath ? `${error.instancePath} ${message}` : message;
    });
  }

  private run<T>(validate: ValidateFunction<T>, data: unknown): SchemaValidationResult<T> {
    if (validate(data)) {
      return { valid: true, errors: [], parsedOutput: data };
    }

    return {
      valid: false,
      errors: this.convertErrors(validate.errors)
    };
  }

  validateWorkspaceSpec(data: unknown): SchemaValidationResult<WorkspaceSpec> {
    return this.run(this.validateWorkspaceSpecSchema, data);
  }

  validateSnowflakeStorage(data: unknown): SchemaValidationResult<SnowflakeStorageSpecific> {
    return this.run(this.validateStorageSchema, data);
  }

  validateSnowflakeOutputPort(data: unknown): SchemaValidationResult<SnowflakeOutputPortSpecific> {
    return this.run(this.validateOutputPortSchema, data);
  }

  validateDataProduct(data: unknown): SchemaValidationResult<DataProductDescriptor> {
    return this.run(this.validateDataProductSchema, data);
  }

  validateProvisioningRequest(data: unknown): SchemaValidationResult<ProvisioningRequest> {
    return this.run(this.validateProvisioningRequestSchema, data);
  }

  validateUpdateAclRequest(data: unknown): SchemaValidationResult<UpdateAclRequest> {
    return this.run(this.validateUpdateAclRequestSchema, data);
  }

  validateReverseProvisioningRequest(data: unknown): SchemaValidationResult<ReverseProvisioningRequest> {
    return this.run(this.validateReverseRequestSchema, data);
  }

  /**
   * Reads a workspace layout into the platform's declarative model and
   * compares the result with the input. Properties the model does not know
   * are dropped by the conversion, which makes the two differ.
   */
  roundTripWorkspaceLayout(layout: unknown): LayoutRoundTripResult {
    const copy = structuredClone(layout);

    if (!this.validateLayoutSchema(copy)) {
      return {
        parsed: false,
        consistent: false,
        errors: this.convertErrors(this.validateLayoutSchema.errors)
      };
    }

    return {
      parsed: true,
      consistent: isDeepStrictEqual(copy, layout),
      errors: [],
      model: copy
    };
  }
}

// Singleton instance for convenience
export const schemaValidator = new SchemaValidator();
