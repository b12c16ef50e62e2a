import { DataProduct } from '../services/data-product';
import { ComponentDescriptor, DataProductDescriptor, GoodDataOutputPort } from '../types/descriptor';
import { JsonObject } from '../types/workspace';

export const OWNER_REF = 'user:owner_example.com';
export const DEV_GROUP_REF = 'group:developers';
export const OUTPUT_PORT_ID = 'urn:dmb:cmp:acme:sales:1:sink';
export const STORAGE_ID = 'urn:dmb:cmp:acme:sales:1:storage:raw';
export const SNOWFLAKE_PORT_ID = 'urn:dmb:cmp:acme:sales:1:snowflake-port';

export const WORKSPACE_LAYOUT: JsonObject = {
  ldm: { datasets: [], dateInstances: [] },
  analytics: { metrics: [{ id: 'revenue', title: 'Revenue' }] }
};

export function goodDataComponent(overrides: Partial<ComponentDescriptor> = {}): ComponentDescriptor {
  return {
    id: OUTPUT_PORT_ID,
    name: 'Sales Dashboard',
    kind: 'outputport',
    useCaseTemplateId: 'urn:dmb:utm:gooddata-outputport-template:0.0.0',
    dependsOn: [STORAGE_ID],
    specific: {
      workspaceId: 'sales-ws',
      workspaceName: 'Sales',
      workspaceLayout: WORKSPACE_LAYOUT
    },
    dataContract: { schema: [] },
    ...overrides
  };
}

export function storageComponent(overrides: Partial<ComponentDescriptor> = {}): ComponentDescriptor {
  return {
    id: STORAGE_ID,
    name: 'Raw Storage',
    kind: 'storage',
    useCaseTemplateId: 'urn:dmb:utm:snowflake-storage-template:0.0.0',
    dependsOn: [],
    specific: {
      database: 'SALES_DB',
      schema: 'RAW',
      tables: [
        { tableName: 'orders', schema: [{ name: 'ID', dataType: 'NUMBER' }] },
        { tableName: 'customers', schema: [{ name: 'ID', dataType: 'NUMBER' }] }
      ]
    },
    ...overrides
  };
}

export function snowflakeOutputPortComponent(overrides: Partial<ComponentDescriptor> = {}): ComponentDescriptor {
  return {
    id: SNOWFLAKE_PORT_ID,
    name: 'Orders View',
    kind: 'outputport',
    useCaseTemplateId: 'urn:dmb:utm:snowflake-outputport-template:0.0.0',
    dependsOn: [STORAGE_ID],
    specific: {
      viewName: 'orders_view',
      tableName: 'orders',
      database: 'SALES_DB',
      schema: 'PUBLIC'
    },
    dataContract: { schema: [{ name: 'ID', dataType: 'NUMBER' }] },
    ...overrides
  };
}

export function dataProductDescriptor(components: ComponentDescriptor[]): DataProductDescriptor {
  return {
    id: 'urn:dmb:dp:acme:sales:1',
    name: 'Sales',
    dataProductOwner: OWNER_REF,
    devGroup: DEV_GROUP_REF,
    components
  };
}

export function dataProduct(components: ComponentDescriptor[]): DataProduct {
  return new DataProduct(dataProductDescriptor(components));
}

/**
 * The GoodData output port of a data product, read as its typed component
 */
export function outputPortOf(product: DataProduct, componentId = OUTPUT_PORT_ID): GoodDataOutputPort {
  return product.getTypedComponentById(componentId, 'GOODDATA_OUTPUT_PORT');
}
