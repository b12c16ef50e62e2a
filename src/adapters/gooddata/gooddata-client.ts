/**
 * GoodData Client
 *
 * Implements the analytics platform interface over the GoodData REST API:
 * JSON:API entity endpoints for workspaces, data sources, principals and
 * user data filters, and layout endpoints for declarative content and
 * permissions.
 */

import { SnowflakeConfig } from '../../config/provisioner-config';
import { AnalyticsPlatformClient } from '../../types/analytics-platform';
import {
  DeclarativeLdm,
  DeclarativeWorkspaceModel,
  LogicalModel,
  PdmTable,
  PlatformDataSource,
  PlatformUser,
  PlatformUserDataFilter,
  PlatformUserGroup,
  PlatformWorkspace,
  PrincipalPermissions,
  ScanResult,
  SnowflakeDataSourceRequest,
  WorkspacePermissions
} from '../../types/workspace';
import { JSON_API_CONTENT_TYPE, RestClient, RestClientConfig } from './rest-client';

const PAGE_SIZE = 500;
const SCAN_SEPARATOR = '__';

/**
 * Declarative content with every analytics object and the LDM removed
 */
export const EMPTY_WORKSPACE_CONTENT: DeclarativeWorkspaceModel = {
  ldm: {
    datasets: [],
    dateInstances: []
  },
  analytics: {
    analyticalDashboards: [],
    analyticalDashboardExtensions: [],
    attributeHierarchies: [],
    dashboardPlugins: [],
    exportDefinitions: [],
    filterContexts: [],
    metrics: [],
    visualizationObjects: []
  }
};

interface JsonApiRelationship {
  data: { id: string; type: string } | null;
}

interface JsonApiResource<A> {
  id: string;
  type: string;
  attributes?: A;
  relationships?: Record<string, JsonApiRelationship | undefined>;
}

interface JsonApiDocument<A> {
  data: JsonApiResource<A>;
}

interface JsonApiCollection<A> {
  data: JsonApiResource<A>[];
  links?: { next?: string };
}

interface WorkspaceAttributes {
  name?: string;
}

interface DataSourceAttributes {
  name: string;
  type: string;
  schema: string;
  url?: string;
  username?: string;
  password?: string;
}

interface UserAttributes {
  email?: string | null;
  firstname?: string | null;
  lastname?: string | null;
}

interface UserGroupAttributes {
  name?: string | null;
}

interface UserDataFilterAttributes {
  title?: string;
  maql: string;
}

/**
 * JDBC URL GoodData uses to connect to Snowflake
 */
export function buildSnowflakeJdbcUrl(snowflake: SnowflakeConfig, database: string): string {
  const params = new URLSearchParams({
    warehouse: snowflake.warehouse,
    db: database,
    role: snowflake.role
  });
  return `jdbc:snowflake://${snowflake.account}.snowflakecomputing.com:${snowflake.port}?${params.toString()}`;
}

function relationshipId(resource: JsonApiResource<unknown>, name: string): string | undefined {
  return resource.relationships?.[name]?.data?.id;
}

export class GoodDataClient extends RestClient implements AnalyticsPlatformClient {
  constructor(
    config: RestClientConfig,
    private readonly snowflake: SnowflakeConfig
  ) {
    super(config);
  }

  // ============================================
  // Workspaces
  // ============================================

  async workspaceExists(workspaceId: string): Promise<boolean> {
    const workspace = await this.getWorkspace(workspaceId);
    return workspace !== null;
  }

  async createOrUpdateWorkspace(
    workspaceId: string,
    name: string,
    parentId?: string | null
  ): Promise<PlatformWorkspace> {
    const resource: JsonApiResource<WorkspaceAttributes> = {
      id: workspaceId,
      type: 'workspace',
      attributes: { name },
      ...(parentId && {
        relationships: { parent: { data: { id: parentId, type: 'workspace' } } }
      })
    };

    const existing = await this.getWorkspace(workspaceId);
    const document = existing
      ? await this.requestJson<JsonApiDocument<WorkspaceAttributes>>(
          'PUT',
          `/api/v1/entities/workspaces/${encodeURIComponent(workspaceId)}`,
          { body: { data: resource }, contentType: JSON_API_CONTENT_TYPE }
        )
      : await this.requestJson<JsonApiDocument<WorkspaceAttributes>>('POST', '/api/v1/entities/workspaces', {
          body: { data: resource },
          contentType: JSON_API_CONTENT_TYPE
        });

    return this.toWorkspace(document.data);
  }

  async importDeclarativeContent(workspaceId: string, content: DeclarativeWorkspaceModel): Promise<void> {
    await this.requestVoid('PUT', `/api/v1/layout/workspaces/${encodeURIComponent(workspaceId)}`, {
      body: content
    });
  }

  async exportDeclarativeContent(workspaceId: string): Promise<DeclarativeWorkspaceModel> {
    return this.requestJson<DeclarativeWorkspaceModel>(
      'GET',
      `/api/v1/layout/workspaces/${encodeURIComponent(workspaceId)}`
    );
  }

  async emptyWorkspace(workspaceId: string): Promise<void> {
    await this.importDeclarativeContent(workspaceId, EMPTY_WORKSPACE_CONTENT);
  }

  async deleteWorkspace(workspaceId: string): Promise<void> {
    await this.requestVoid('DELETE', `/api/v1/entities/workspaces/${encodeURIComponent(workspaceId)}`);
  }

  // ============================================
  // Permissions
  // ============================================

  async getWorkspacePermissions(workspaceId: string): Promise<WorkspacePermissions> {
    const permissions = await this.requestJson<Partial<WorkspacePermissions>>(
      'GET',
      `/api/v1/layout/workspaces/${encodeURIComponent(workspaceId)}/permissions`
    );
    return {
      permissions: permissions.permissions ?? [],
      hierarchyPermissions: permissions.hierarchyPermissions ?? []
    };
  }

  async putWorkspacePermissions(workspaceId: string, permissions: WorkspacePermissions): Promise<void> {
    await this.requestVoid('PUT', `/api/v1/layout/workspaces/${encodeURIComponent(workspaceId)}/permissions`, {
      body: permissions
    });
  }

  async getUserPermissions(userId: string): Promise<PrincipalPermissions> {
    return this.getPrincipalPermissions(`/api/v1/layout/users/${encodeURIComponent(userId)}/permissions`);
  }

  async putUserPermissions(userId: string, permissions: PrincipalPermissions): Promise<void> {
    await this.requestVoid('PUT', `/api/v1/layout/users/${encodeURIComponent(userId)}/permissions`, {
      body: permissions
    });
  }

  async getGroupPermissions(groupId: string): Promise<PrincipalPermissions> {
    return this.getPrincipalPermissions(`/api/v1/layout/userGroups/${encodeURIComponent(groupId)}/permissions`);
  }

  async putGroupPermissions(groupId: string, permissions: PrincipalPermissions): Promise<void> {
    await this.requestVoid('PUT', `/api/v1/layout/userGroups/${encodeURIComponent(groupId)}/permissions`, {
      body: permissions
    });
  }

  // ============================================
  // Data sources and logical model
  // ============================================

  async createOrUpdateDataSource(request: SnowflakeDataSourceRequest): Promise<PlatformDataSource> {
    const resource: JsonApiResource<DataSourceAttributes> = {
      id: request.id,
      type: 'dataSource',
      attributes: {
        name: request.name,
        type: 'SNOWFLAKE',
        schema: request.schema,
        url: buildSnowflakeJdbcUrl(this.snowflake, request.database),
        username: this.snowflake.user,
        password: this.snowflake.password
      }
    };
    const path = `/api/v1/entities/dataSources/${encodeURIComponent(request.id)}`;

    const existing = await this.requestOptional<JsonApiDocument<DataSourceAttributes>>('GET', path, {
      contentType: JSON_API_CONTENT_TYPE
    });
    const document = existing
      ? await this.requestJson<JsonApiDocument<DataSourceAttributes>>('PUT', path, {
          body: { data: resource },
          contentType: JSON_API_CONTENT_TYPE
        })
      : await this.requestJson<JsonApiDocument<DataSourceAttributes>>('POST', '/api/v1/entities/dataSources', {
          body: { data: resource },
          contentType: JSON_API_CONTENT_TYPE
        });

    return {
      id: document.data.id,
      name: document.data.attributes?.name ?? request.name,
      type: document.data.attributes?.type ?? 'SNOWFLAKE',
      schema: document.data.attributes?.schema ?? request.schema
    };
  }

  async scanDataSource(dataSourceId: string): Promise<ScanResult> {
    const result = await this.requestJson<Partial<ScanResult>>(
      'POST',
      `/api/v1/actions/dataSources/${encodeURIComponent(dataSourceId)}/scan`,
      { body: { separator: SCAN_SEPARATOR, scanTables: true, scanViews: true } }
    );
    return {
      pdm: { tables: result.pdm?.tables ?? [] },
      warnings: result.warnings ?? []
    };
  }

  async generateLogicalModel(dataSourceId: string, tables: PdmTable[], workspaceId: string): Promise<LogicalModel> {
    const model = await this.requestJson<Partial<LogicalModel>>(
      'POST',
      `/api/v1/actions/dataSources/${encodeURIComponent(dataSourceId)}/generateLogicalModel`,
      { body: { separator: SCAN_SEPARATOR, pdm: { tables }, workspaceId } }
    );
    return { ldm: model.ldm ?? { datasets: [], dateInstances: [] } };
  }

  async putLogicalModel(workspaceId: string, ldm: DeclarativeLdm): Promise<void> {
    await this.requestVoid('PUT', `/api/v1/layout/workspaces/${encodeURIComponent(workspaceId)}/logicalModel`, {
      body: { ldm }
    });
  }

  // ============================================
  // Principals
  // ============================================

  async listUsers(): Promise<PlatformUser[]> {
    const resources = await this.listAll<UserAttributes>('/api/v1/entities/users');
    return resources.map((resource) => ({
      id: resource.id,
      email: resource.attributes?.email ?? null,
      firstname: resource.attributes?.firstname ?? null,
      lastname: resource.attributes?.lastname ?? null
    }));
  }

  async listGroups(): Promise<PlatformUserGroup[]> {
    const resources = await this.listAll<UserGroupAttributes>('/api/v1/entities/userGroups');
    return resources.map((resource) => ({
      id: resource.id,
      name: resource.attributes?.name ?? null
    }));
  }

  // ============================================
  // User data filters
  // ============================================

  async listUserDataFilters(workspaceId: string): Promise<PlatformUserDataFilter[]> {
    const resources = await this.listAll<UserDataFilterAttributes>(
      `/api/v1/entities/workspaces/${encodeURIComponent(workspaceId)}/userDataFilters`
    );
    return resources.map((resource) => ({
      id: resource.id,
      title: resource.attributes?.title ?? '',
      maql: resource.attributes?.maql ?? '',
      userId: relationshipId(resource, 'user'),
      userGroupId: relationshipId(resource, 'userGroup')
    }));
  }

  async createOrUpdateUserDataFilter(workspaceId: string, filter: PlatformUserDataFilter): Promise<void> {
    const relationships: Record<string, JsonApiRelationship> = {};
    if (filter.userId) {
      relationships.user = { data: { id: filter.userId, type: 'user' } };
    }
    if (filter.userGroupId) {
      relationships.userGroup = { data: { id: filter.userGroupId, type: 'userGroup' } };
    }

    const collectionPath = `/api/v1/entities/workspaces/${encodeURIComponent(workspaceId)}/userDataFilters`;
    const body = {
      data: {
        ...(filter.id && { id: filter.id }),
        type: 'userDataFilter',
        attributes: { title: filter.title, maql: filter.maql },
        relationships
      }
    };

    if (filter.id) {
      const itemPath = `${collectionPath}/${encodeURIComponent(filter.id)}`;
      const existing = await this.requestOptional<JsonApiDocument<UserDataFilterAttributes>>('GET', itemPath, {
        contentType: JSON_API_CONTENT_TYPE
      });
      if (existing) {
        await this.requestVoid('PUT', itemPath, { body, contentType: JSON_API_CONTENT_TYPE });
        return;
      }
    }

    await this.requestVoid('POST', collectionPath, { body, contentType: JSON_API_CONTENT_TYPE });
  }

  async deleteUserDataFilter(workspaceId: string, filterId: string): Promise<void> {
    await this.requestVoid(
      'DELETE',
      `/api/v1/entities/workspaces/${encodeURIComponent(workspaceId)}/userDataFilters/${encodeURIComponent(filterId)}`
    );
  }

  // ============================================
  // Helper Methods
  // ============================================

  private async getWorkspace(workspaceId: string): Promise<PlatformWorkspace | null> {
    const document = await this.requestOptional<JsonApiDocument<WorkspaceAttributes>>(
      'GET',
      `/api/v1/entities/workspaces/${encodeURIComponent(workspaceId)}`,
      { contentType: JSON_API_CONTENT_TYPE, query: { include: 'parent' } }
    );
    return document ? this.toWorkspace(document.data) : null;
  }

  private toWorkspace(resource: JsonApiResource<WorkspaceAttributes>): PlatformWorkspace {
    const parentId = relationshipId(resource, 'parent');
    return {
      id: resource.id,
      name: resource.attributes?.name ?? resource.id,
      ...(parentId && { parentId })
    };
  }

  private async getPrincipalPermissions(path: string): Promise<PrincipalPermissions> {
    const permissions = await this.requestJson<Partial<PrincipalPermissions>>('GET', path);
    return {
      workspaces: permissions.workspaces ?? [],
      dataSources: permissions.dataSources ?? []
    };
  }

  /**
   * Follows page numbers until a page comes back without a next link
   */
  private async listAll<A>(path: string): Promise<JsonApiResource<A>[]> {
    const resources: JsonApiResource<A>[] = [];
    for (let page = 0; ; page++) {
      const collection = await this.requestJson<JsonApiCollection<A>>('GET', path, {
        contentType: JSON_API_CONTENT_TYPE,
        query: { page, size: PAGE_SIZE }
      });
      resources.push(...collection.data);
      if (!collection.links?.next || collection.data.length === 0) {
        return resources;
      }
    }
  }
}
