import {
  ComponentDescriptor,
  ComponentKinds,
  DataProductDescriptor,
  GoodDataOutputPort,
  SnowflakeOutputPort,
  SnowflakeStorageArea,
  TypedComponent,
  TypedComponentType
} from '../types/descriptor';

/**
 * Error thrown when a component id is not part of the data product
 */
export class ComponentNotFoundError extends Error {
  constructor(componentId: string) {
    super(`Component not found: ${componentId}`);
    this.name = 'ComponentNotFoundError';
  }
}

/**
 * Error thrown when a component cannot be read as the requested type
 */
export class ComponentTypeMismatchError extends Error {
  constructor(componentId: string, expectedType: TypedComponentType, reason: string) {
    super(`Component ${componentId} is not a ${expectedType}: ${reason}`);
    this.name = 'ComponentTypeMismatchError';
  }
}

function toGoodDataOutputPort(component: ComponentDescriptor): GoodDataOutputPort {
  if (component.kind !== ComponentKinds.OUTPUT_PORT) {
    throw new ComponentTypeMismatchError(component.id, 'GOODDATA_OUTPUT_PORT', `kind is ${component.kind}`);
  }
  if (!component.dataContract) {
    throw new ComponentTypeMismatchError(component.id, 'GOODDATA_OUTPUT_PORT', 'missing data contract');
  }
  return { ...component, type: 'GOODDATA_OUTPUT_PORT', dataContract: component.dataContract };
}

function toSnowflakeStorageArea(component: ComponentDescriptor): SnowflakeStorageArea {
  if (component.kind !== ComponentKinds.STORAGE) {
    throw new ComponentTypeMismatchError(component.id, 'SNOWFLAKE_STORAGE_AREA', `kind is ${component.kind}`);
  }
  return { ...component, type: 'SNOWFLAKE_STORAGE_AREA' };
}

function toSnowflakeOutputPort(component: ComponentDescriptor): SnowflakeOutputPort {
  if (component.kind !== ComponentKinds.OUTPUT_PORT) {
    throw new ComponentTypeMismatchError(component.id, 'SNOWFLAKE_OUTPUT_PORT', `kind is ${component.kind}`);
  }
  if (!component.dataContract) {
    throw new ComponentTypeMismatchError(component.id, 'SNOWFLAKE_OUTPUT_PORT', 'missing data contract');
  }
  return { ...component, type: 'SNOWFLAKE_OUTPUT_PORT', dataContract: component.dataContract };
}

/**
 * Read-only view over a data product descriptor.
 *
 * Lookups return the raw component, or a typed component once its kind
 * has been checked against the requested type.
 */
export class DataProduct {
  readonly id: string;
  readonly dataProductOwner: string;
  readonly devGroup: string;
  readonly components: readonly ComponentDescriptor[];

  constructor(descriptor: DataProductDescriptor) {
    this.id = descriptor.id;
    this.dataProductOwner = descriptor.dataProductOwner;
    this.devGroup = descriptor.devGroup;
    this.components = descriptor.components;
  }

  getComponentById(componentId: string): ComponentDescriptor | null {
    return this.components.find((component) => component.id === componentId) ?? null;
  }

  /**
   * @throws ComponentNotFoundError if the id is unknown
   * @throws ComponentTypeMismatchError if the component is of another kind
   */
  getTypedComponentById(componentId: string, type: 'GOODDATA_OUTPUT_PORT'): GoodDataOutputPort;
  getTypedComponentById(componentId: string, type: 'SNOWFLAKE_STORAGE_AREA'): SnowflakeStorageArea;
  getTypedComponentById(componentId: string, type: 'SNOWFLAKE_OUTPUT_PORT'): SnowflakeOutputPort;
  getTypedComponentById(componentId: string, type: TypedComponentType): TypedComponent {
    const component = this.getComponentById(componentId);
    if (!component) {
      throw new ComponentNotFoundError(componentId);
    }

    switch (type) {
      case 'GOODDATA_OUTPUT_PORT':
        return toGoodDataOutputPort(component);
      case 'SNOWFLAKE_STORAGE_AREA':
        return toSnowflakeStorageArea(component);
      case 'SNOWFLAKE_OUTPUT_PORT':
        return toSnowflakeOutputPort(component);
    }
  }
}
