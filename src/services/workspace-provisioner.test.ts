import { WorkspaceProvisioner, buildUserDataFilterMaql, hasLogicalModel } from './workspace-provisioner';
import { FakeAnalyticsClient } from '../test/fake-analytics-client';
import {
  OUTPUT_PORT_ID,
  SNOWFLAKE_PORT_ID,
  STORAGE_ID,
  WORKSPACE_LAYOUT,
  dataProduct,
  goodDataComponent,
  outputPortOf,
  snowflakeOutputPortComponent,
  storageComponent
} from '../test/fixtures';
import { ComponentDescriptor } from '../types/descriptor';
import { Logger } from '../types/logger';
import { PdmTable } from '../types/workspace';

const DATA_SOURCE_ID = 'acme_sales_1_datasource_storage_raw';

const pdmTable = (id: string): PdmTable => ({ id, path: ['SALES_DB', 'RAW', id], type: 'TABLE', columns: [] });

function setup() {
  const client = new FakeAnalyticsClient();
  client.users = [
    { id: 'owner-id', email: 'owner@example.com' },
    { id: 'analyst-id', email: 'analyst@example.com' }
  ];
  client.groups = [
    { id: 'dev-id', name: 'developers' },
    { id: 'viewers-id', name: 'viewers' }
  ];
  client.scanTables = [pdmTable('ORDERS'), pdmTable('CUSTOMERS'), pdmTable('INVENTORY')];

  const logger: jest.Mocked<Logger> = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  };

  return { client, logger, provisioner: new WorkspaceProvisioner(client, logger) };
}

function withSpecific(specific: Record<string, unknown>, overrides: Partial<ComponentDescriptor> = {}) {
  return goodDataComponent({
    specific: { workspaceId: 'sales-ws', workspaceName: 'Sales', workspaceLayout: WORKSPACE_LAYOUT, ...specific },
    ...overrides
  });
}

function snapshot(client: FakeAnalyticsClient) {
  return structuredClone({
    workspaces: [...client.workspaces.entries()],
    dataSources: [...client.dataSources.entries()],
    userPermissions: [...client.userPermissions.entries()],
    groupPermissions: [...client.groupPermissions.entries()]
  });
}

describe('WorkspaceProvisioner', () => {
  describe('provision', () => {
    it('should create the workspace, data source and LDM and grant the owners', async () => {
      const { client, provisioner } = setup();
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      const result = await provisioner.provision(outputPortOf(product), product);

      expect(result).toEqual({
        kind: 'ProvisioningStatus',
        status: 'COMPLETED',
        result: 'Provisioning completed',
        info: {
          publicInfo: {
            link: {
              type: 'string',
              label: 'Link',
              value: 'Go to "Sales" workspace on GoodData',
              href: 'https://analytics.example.com/dashboards/#/workspace/sales-ws/'
            }
          },
          privateInfo: {}
        }
      });

      const workspace = client.workspaces.get('sales-ws');
      expect(workspace?.name).toBe('Sales');
      expect(workspace?.parentId).toBeNull();
      expect(workspace?.content.analytics).toEqual(WORKSPACE_LAYOUT.analytics);
      expect(workspace?.content.ldm).toEqual(client.generatedLdm);
      expect(workspace?.permissions).toEqual({
        permissions: [
          { name: 'MANAGE', assignee: { id: 'owner-id', type: 'user' } },
          { name: 'MANAGE', assignee: { id: 'dev-id', type: 'userGroup' } }
        ],
        hierarchyPermissions: []
      });

      expect(client.dataSources.get(DATA_SOURCE_ID)).toEqual({
        id: DATA_SOURCE_ID,
        name: 'Acme - Sales - V1 - Sales Dashboard - Data Source - Raw Storage',
        database: 'SALES_DB',
        schema: 'RAW'
      });
      expect(client.userPermissions.get('owner-id')?.dataSources).toEqual([{ id: DATA_SOURCE_ID, permissions: ['USE'] }]);
      expect(client.groupPermissions.get('dev-id')?.dataSources).toEqual([{ id: DATA_SOURCE_ID, permissions: ['USE'] }]);

      const generate = client.calls.find((call) => call.method === 'generateLogicalModel');
      expect(generate?.args).toEqual([DATA_SOURCE_ID, [pdmTable('ORDERS'), pdmTable('CUSTOMERS')], 'sales-ws']);
    });

    it('should reach the same end state when run twice', async () => {
      const { client, provisioner } = setup();
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      await provisioner.provision(outputPortOf(product), product);
      const afterFirst = snapshot(client);
      const second = await provisioner.provision(outputPortOf(product), product);

      expect(second).toMatchObject({ status: 'COMPLETED' });
      expect(snapshot(client)).toEqual(afterFirst);
      expect(client.calls.filter((call) => call.method === 'createOrUpdateWorkspace')).toHaveLength(1);
    });

    it('should keep an LDM declared in the layout', async () => {
      const { client, provisioner } = setup();
      const layout = { ldm: { datasets: [{ id: 'orders' }], dateInstances: [] } };
      const product = dataProduct([withSpecific({ workspaceLayout: layout }), storageComponent()]);

      await provisioner.provision(outputPortOf(product), product);

      expect(client.calls.some((call) => call.method === 'scanDataSource')).toBe(false);
      expect(client.workspaces.get('sales-ws')?.content).toEqual(layout);
      expect(client.dataSources.has(DATA_SOURCE_ID)).toBe(true);
    });

    it('should read a Snowflake output port dependency as a single view', async () => {
      const { client, provisioner } = setup();
      client.scanTables = [pdmTable('ORDERS_VIEW'), pdmTable('ORDERS')];
      const component = goodDataComponent({ dependsOn: [SNOWFLAKE_PORT_ID] });
      const product = dataProduct([component, snowflakeOutputPortComponent()]);

      await provisioner.provision(outputPortOf(product), product);

      expect(client.dataSources.get('acme_sales_1_datasource_snowflake-port')).toMatchObject({ schema: 'PUBLIC' });
      const generate = client.calls.find((call) => call.method === 'generateLogicalModel');
      expect(generate?.args[1]).toEqual([pdmTable('ORDERS_VIEW')]);
    });

    it('should only create and grant a child workspace', async () => {
      const { client, provisioner } = setup();
      const product = dataProduct([withSpecific({ parentWorkspaceId: 'parent-ws' }, { dependsOn: [] })]);

      const result = await provisioner.provision(outputPortOf(product), product);

      expect(result).toMatchObject({ status: 'COMPLETED' });
      expect(client.workspaces.get('sales-ws')?.parentId).toBe('parent-ws');
      expect(client.mutations().map((call) => call.method)).toEqual([
        'createOrUpdateWorkspace',
        'putWorkspacePermissions'
      ]);
    });

    it('should skip the data source when no dependency is a Snowflake component', async () => {
      const { client, provisioner } = setup();
      const product = dataProduct([goodDataComponent({ dependsOn: ['urn:dmb:cmp:acme:sales:1:ghost'] })]);

      const result = await provisioner.provision(outputPortOf(product), product);

      expect(result).toMatchObject({ status: 'COMPLETED' });
      expect(client.dataSources.size).toBe(0);
    });

    it('should fail without any remote call when two Snowflake components qualify', async () => {
      const { client, provisioner } = setup();
      const component = goodDataComponent({ dependsOn: [STORAGE_ID, SNOWFLAKE_PORT_ID] });
      const product = dataProduct([component, storageComponent(), snowflakeOutputPortComponent()]);

      const result = await provisioner.provision(outputPortOf(product), product);

      expect(result).toEqual({
        kind: 'ValidationError',
        errors: [
          'Unable to extract Snowflake dependencies.',
          `Component ${OUTPUT_PORT_ID} must have exactly one dependency on a Snowflake component ` +
            `(Storage Area or Output Port) but has 2: ${STORAGE_ID}, ${SNOWFLAKE_PORT_ID}`
        ]
      });
      expect(client.calls).toEqual([]);
    });

    it('should fail when the root workspace declares no dependency', async () => {
      const { client, provisioner } = setup();
      const product = dataProduct([goodDataComponent({ dependsOn: [] })]);

      const result = await provisioner.provision(outputPortOf(product), product);

      expect(result).toMatchObject({ kind: 'ValidationError' });
      expect(client.mutations()).toEqual([]);
    });

    it('should fail before any mutation when the owner cannot be mapped', async () => {
      const { client, provisioner } = setup();
      client.users = [{ id: 'analyst-id', email: 'analyst@example.com' }];
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      const result = await provisioner.provision(outputPortOf(product), product);

      expect(result).toEqual({
        kind: 'ValidationError',
        errors: [
          'Unable to map DP owner and/or developer group to GoodData ids. ' +
            'Ensure they are present in GoodData and try again.',
          'Unable to map DP owner "user:owner_example.com" to a GoodData user.'
        ]
      });
      expect(client.mutations()).toEqual([]);
    });

    it('should report a malformed specific section', async () => {
      const { client, provisioner } = setup();
      const product = dataProduct([goodDataComponent({ specific: { workspaceName: 'Sales', workspaceLayout: {} } })]);

      const result = await provisioner.provision(outputPortOf(product), product);

      expect(result).toEqual({
        kind: 'ValidationError',
        errors: ['Unable to access specific section of component.', "must have required property 'workspaceId'"]
      });
      expect(client.calls).toEqual([]);
    });

    it('should replace existing user data filters with the declared ones', async () => {
      const { client, provisioner } = setup();
      const workspace = client.addWorkspace('sales-ws', 'Sales');
      workspace.userDataFilters = [{ id: 'old', title: 'Old', maql: '{label/region} = "APAC"', userId: 'owner-id' }];
      const userDataFilters = [
        { id: 'emea', title: 'EMEA only', user: 'user:analyst_example.com', label: 'region', value: 'EMEA' }
      ];
      const product = dataProduct([withSpecific({ userDataFilters }), storageComponent()]);

      await provisioner.provision(outputPortOf(product), product);

      expect(client.workspaces.get('sales-ws')?.userDataFilters).toEqual([
        { id: 'emea', title: 'EMEA only', maql: '{label/region} = "EMEA"', userId: 'analyst-id' }
      ]);
      expect(client.calls.some((call) => call.method === 'createOrUpdateWorkspace')).toBe(false);
    });

    it('should fail before any mutation when a filter user cannot be mapped', async () => {
      const { client, provisioner } = setup();
      const userDataFilters = [
        { id: 'emea', title: 'EMEA only', user: 'user:ghost_example.com', label: 'region', value: 'EMEA' }
      ];
      const product = dataProduct([withSpecific({ userDataFilters }), storageComponent()]);

      const result = await provisioner.provision(outputPortOf(product), product);

      expect(result).toEqual({
        kind: 'ValidationError',
        errors: ['Unable to map User Data Filter users [user:ghost_example.com] to GoodData users.']
      });
      expect(client.mutations()).toEqual([]);
    });

    it('should report remote failures as a system error', async () => {
      const { client, logger, provisioner } = setup();
      const failure = new Error('connection reset');
      client.failOn('createOrUpdateWorkspace', failure);
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      const result = await provisioner.provision(outputPortOf(product), product);

      expect(result).toMatchObject({ kind: 'SystemErr', error: 'connection reset' });
      expect(logger.error).toHaveBeenCalledWith('Error during provision:', failure);
    });
  });

  describe('unprovision', () => {
    it('should do nothing for a workspace that does not exist', async () => {
      const { client, provisioner } = setup();
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      const result = await provisioner.unprovision(outputPortOf(product), product, true);

      expect(result).toEqual({
        kind: 'ProvisioningStatus',
        status: 'COMPLETED',
        result: 'Unprovisioning completed (nothing to be done)'
      });
      expect(client.mutations()).toEqual([]);
    });

    it('should empty the workspace and strip permissions when removing data', async () => {
      const { client, provisioner } = setup();
      const workspace = client.addWorkspace('sales-ws', 'Sales');
      workspace.content = structuredClone(WORKSPACE_LAYOUT);
      workspace.permissions = {
        permissions: [{ name: 'VIEW', assignee: { id: 'analyst-id', type: 'user' } }],
        hierarchyPermissions: [{ name: 'MANAGE', assignee: { id: 'admins', type: 'userGroup' } }]
      };
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      const result = await provisioner.unprovision(outputPortOf(product), product, true);

      expect(result).toEqual({ kind: 'ProvisioningStatus', status: 'COMPLETED', result: 'Unprovisioning completed' });
      expect(client.workspaces.get('sales-ws')?.permissions).toEqual({
        permissions: [],
        hierarchyPermissions: [{ name: 'MANAGE', assignee: { id: 'admins', type: 'userGroup' } }]
      });
      expect(client.mutations().map((call) => call.method)).toEqual(['emptyWorkspace', 'putWorkspacePermissions']);
    });

    it('should keep the content when not removing data', async () => {
      const { client, provisioner } = setup();
      client.addWorkspace('sales-ws', 'Sales');
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      await provisioner.unprovision(outputPortOf(product), product, false);

      expect(client.mutations().map((call) => call.method)).toEqual(['putWorkspacePermissions']);
    });
  });

  describe('updateAcl', () => {
    it('should fail without mutations when the workspace does not exist', async () => {
      const { client, provisioner } = setup();
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      const result = await provisioner.updateAcl(outputPortOf(product), product, ['user:analyst_example.com']);

      expect(result).toEqual({
        kind: 'ProvisioningStatus',
        status: 'FAILED',
        result: 'Update ACL failed, workspace sales-ws does not exist.'
      });
      expect(client.mutations()).toEqual([]);
    });

    it('should grant resolved consumers and report the unresolved ones', async () => {
      const { client, logger, provisioner } = setup();
      const workspace = client.addWorkspace('sales-ws', 'Sales');
      workspace.permissions = {
        permissions: [{ name: 'VIEW', assignee: { id: 'former-id', type: 'user' } }],
        hierarchyPermissions: []
      };
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      const result = await provisioner.updateAcl(outputPortOf(product), product, [
        'user:analyst_example.com',
        'group:viewers',
        'user:ghost_example.com',
        'group:ghosts',
        'service:bot'
      ]);

      expect(result).toEqual({
        kind: 'ProvisioningStatus',
        status: 'FAILED',
        result:
          'Update ACL failed, unable to map all users/groups. ' +
          'Problematic users: [user:ghost_example.com], groups: [group:ghosts]'
      });
      expect(client.workspaces.get('sales-ws')?.permissions.permissions).toEqual([
        { name: 'VIEW', assignee: { id: 'analyst-id', type: 'user' } },
        { name: 'VIEW', assignee: { id: 'viewers-id', type: 'userGroup' } },
        { name: 'MANAGE', assignee: { id: 'owner-id', type: 'user' } },
        { name: 'MANAGE', assignee: { id: 'dev-id', type: 'userGroup' } }
      ]);
      expect(logger.warn).toHaveBeenCalledWith('Ignoring references that are neither users nor groups: [service:bot]');
    });

    it('should complete when every reference resolves', async () => {
      const { client, provisioner } = setup();
      client.addWorkspace('sales-ws', 'Sales');
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      const result = await provisioner.updateAcl(outputPortOf(product), product, ['group:viewers']);

      expect(result).toEqual({ kind: 'ProvisioningStatus', status: 'COMPLETED', result: 'Update ACL completed' });
    });

    it('should leave permissions alone when the dev group cannot be mapped', async () => {
      const { client, provisioner } = setup();
      client.groups = [];
      client.addWorkspace('sales-ws', 'Sales');
      const product = dataProduct([goodDataComponent(), storageComponent()]);

      const result = await provisioner.updateAcl(outputPortOf(product), product, []);

      expect(result).toEqual({
        kind: 'ValidationError',
        errors: [
          'Unable to map DP owner and/or developer group to GoodData ids.',
          'Unable to map DP dev group "group:developers" to a GoodData group.'
        ]
      });
      expect(client.mutations()).toEqual([]);
    });
  });

  describe('reverseProvision', () => {
    const template = 'urn:dmb:utm:gooddata-outputport-template:0.0.0';

    it('should require a parameters object', async () => {
      const { client, provisioner } = setup();

      const result = await provisioner.reverseProvision(template, 'development', undefined, undefined);

      expect(result).toMatchObject({
        kind: 'RequestValidationError',
        errors: ['Missing parameters object in reverse provisioning request']
      });
      expect(client.calls).toEqual([]);
    });

    it('should require a workspace id', async () => {
      const { client, provisioner } = setup();

      const result = await provisioner.reverseProvision(template, 'development', {}, null);

      expect(result).toEqual({
        kind: 'RequestValidationError',
        errors: ['Missing workspaceId in reverse provisioning request'],
        userMessage: 'Missing required parameter workspaceId for reverse provisioning request',
        moreInfo: {
          problems: ['Missing required parameter workspaceId for reverse provisioning request'],
          solutions: [
            'Specify workspaceId for reverse provisioning request',
            'Contact the Platform Team for further assistance'
          ]
        }
      });
      expect(client.calls).toEqual([]);
    });

    it('should reject a workspace that does not exist', async () => {
      const { provisioner } = setup();

      const result = await provisioner.reverseProvision(template, 'development', { workspaceId: 'nope' }, null);

      expect(result).toMatchObject({ kind: 'RequestValidationError', errors: ['Workspace nope does not exist'] });
    });

    it('should propose the exported content as the new layout', async () => {
      const { client, provisioner } = setup();
      client.addWorkspace('sales-ws', 'Sales').content = structuredClone(WORKSPACE_LAYOUT);

      const result = await provisioner.reverseProvision(template, 'development', { workspaceId: 'sales-ws' }, null);

      expect(result).toEqual({
        kind: 'ReverseProvisioningStatus',
        status: 'COMPLETED',
        result: 'Reverse provisioning completed',
        updates: { 'spec.mesh.specific.workspaceLayout': WORKSPACE_LAYOUT }
      });
    });
  });

  describe('validate', () => {
    it('should accept a layout the platform model covers, without remote calls', async () => {
      const { client, provisioner } = setup();
      const product = dataProduct([goodDataComponent()]);

      const result = await provisioner.validate(outputPortOf(product), product);

      expect(result).toEqual({ kind: 'ValidationResult', valid: true });
      expect(client.calls).toEqual([]);
    });

    it('should reject a layout with unknown content', async () => {
      const { provisioner } = setup();
      const product = dataProduct([withSpecific({ workspaceLayout: { ldm: {}, dashboards: [] } })]);

      const result = await provisioner.validate(outputPortOf(product), product);

      expect(result).toEqual({
        kind: 'ValidationResult',
        valid: false,
        error: { kind: 'ValidationError', errors: ['Workspace content is not valid.'] }
      });
    });

    it('should reject a layout of the wrong shape', async () => {
      const { provisioner } = setup();
      const product = dataProduct([withSpecific({ workspaceLayout: { ldm: { datasets: {} } } })]);

      const result = await provisioner.validate(outputPortOf(product), product);

      expect(result).toEqual({
        kind: 'ValidationResult',
        valid: false,
        error: {
          kind: 'ValidationError',
          errors: ['Unable to parse the workspace content.', '/ldm/datasets must be array']
        }
      });
    });
  });

  describe('helpers', () => {
    it('should build the filter predicate with the default operator', () => {
      expect(
        buildUserDataFilterMaql({ id: 'f', title: 'F', user: 'user:a_b.com', label: 'region', value: 'EMEA' })
      ).toBe('{label/region} = "EMEA"');
      expect(
        buildUserDataFilterMaql({
          id: 'f',
          title: 'F',
          user: 'user:a_b.com',
          label: 'region',
          value: 'EMEA',
          operator: '!='
        })
      ).toBe('{label/region} != "EMEA"');
    });

    it('should only count datasets and date instances as an LDM', () => {
      expect(hasLogicalModel({})).toBe(false);
      expect(hasLogicalModel({ ldm: { datasets: [], dateInstances: [] } })).toBe(false);
      expect(hasLogicalModel({ ldm: { dateInstances: [{ id: 'date' }] } })).toBe(true);
    });
  });
});
