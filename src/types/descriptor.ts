/**
 * Data Product Descriptor Type Definitions
 */

// Component kinds known to the descriptor format
export type ComponentKind = 'outputport' | 'storage' | 'workload' | 'observability';

export const ComponentKinds = {
  OUTPUT_PORT: 'outputport',
  STORAGE: 'storage',
  WORKLOAD: 'workload',
  OBSERVABILITY: 'observability'
} as const satisfies Record<string, ComponentKind>;

// Column definition as declared in data contracts and storage areas
export interface OpenMetadataColumn {
  name: string;
  dataType: string;
  description?: string | null;
  dataLength?: number;
  precision?: number;
  scale?: number;
  constraint?: string;
  tags?: unknown[];
}

export interface DataContract {
  schema: OpenMetadataColumn[];
}

// Raw component as it appears inside the data product descriptor
export interface ComponentDescriptor {
  id: string;
  name: string;
  fullyQualifiedName?: string | null;
  description?: string;
  kind: string;
  version?: string;
  useCaseTemplateId?: string;
  infrastructureTemplateId?: string;
  dependsOn: string[];
  specific: Record<string, unknown>;
  dataContract?: DataContract;
}

export interface DataProductDescriptor {
  id: string;
  name?: string;
  fullyQualifiedName?: string | null;
  domain?: string;
  environment?: string;
  version?: string;
  dataProductOwner: string;
  devGroup: string;
  components: ComponentDescriptor[];
}

// Component flavours this provisioner knows how to read
export type TypedComponentType =
  | 'GOODDATA_OUTPUT_PORT'
  | 'SNOWFLAKE_STORAGE_AREA'
  | 'SNOWFLAKE_OUTPUT_PORT';

export interface GoodDataOutputPort extends ComponentDescriptor {
  type: 'GOODDATA_OUTPUT_PORT';
  dataContract: DataContract;
}

export interface SnowflakeStorageArea extends ComponentDescriptor {
  type: 'SNOWFLAKE_STORAGE_AREA';
}

export interface SnowflakeOutputPort extends ComponentDescriptor {
  type: 'SNOWFLAKE_OUTPUT_PORT';
  dataContract: DataContract;
}

export type SnowflakeComponent = SnowflakeStorageArea | SnowflakeOutputPort;

export type TypedComponent = GoodDataOutputPort | SnowflakeComponent;

// Use case templates of the upstream components a workspace can read from
export const SnowflakeTemplates = {
  STORAGE: 'urn:dmb:utm:snowflake-storage-template:0.0.0',
  OUTPUT_PORT: 'urn:dmb:utm:snowflake-outputport-template:0.0.0'
} as const;
