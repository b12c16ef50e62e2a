/**
 * Analytics platform client interface.
 * The provisioner drives the remote platform only through these calls;
 * the REST client and the in-memory test double both implement it.
 */

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
  WorkspacePermissions,
} from './workspace';

export interface AnalyticsPlatformClient {
  // Workspaces
  workspaceExists(workspaceId: string): Promise<boolean>;
  createOrUpdateWorkspace(
    workspaceId: string,
    name: string,
    parentId?: string | null
  ): Promise<PlatformWorkspace>;
  importDeclarativeContent(workspaceId: string, content: DeclarativeWorkspaceModel): Promise<void>;
  exportDeclarativeContent(workspaceId: string): Promise<DeclarativeWorkspaceModel>;
  emptyWorkspace(workspaceId: string): Promise<void>;
  deleteWorkspace(workspaceId: string): Promise<void>;

  // Workspace-level permissions
  getWorkspacePermissions(workspaceId: string): Promise<WorkspacePermissions>;
  putWorkspacePermissions(workspaceId: string, permissions: WorkspacePermissions): Promise<void>;

  // Principal-level permissions (carry data-source grants)
  getUserPermissions(userId: string): Promise<PrincipalPermissions>;
  putUserPermissions(userId: string, permissions: PrincipalPermissions): Promise<void>;
  getGroupPermissions(groupId: string): Promise<PrincipalPermissions>;
  putGroupPermissions(groupId: string, permissions: PrincipalPermissions): Promise<void>;

  // Data sources and logical model
  createOrUpdateDataSource(request: SnowflakeDataSourceRequest): Promise<PlatformDataSource>;
  scanDataSource(dataSourceId: string): Promise<ScanResult>;
  generateLogicalModel(
    dataSourceId: string,
    tables: PdmTable[],
    workspaceId: string
  ): Promise<LogicalModel>;
  putLogicalModel(workspaceId: string, ldm: DeclarativeLdm): Promise<void>;

  // Principals
  listUsers(): Promise<PlatformUser[]>;
  listGroups(): Promise<PlatformUserGroup[]>;

  // Row filters
  listUserDataFilters(workspaceId: string): Promise<PlatformUserDataFilter[]>;
  createOrUpdateUserDataFilter(workspaceId: string, filter: PlatformUserDataFilter): Promise<void>;
  deleteUserDataFilter(workspaceId: string, filterId: string): Promise<void>;

  // Base URL used to build links back to the platform UI
  getHost(): string;
}
