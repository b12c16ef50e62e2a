/**
 * Workspace Type Definitions
 *
 * Desired-state payload read from a GoodData output port, plus the shapes
 * the analytics platform uses for declarative content, permissions, data
 * sources and logical models.
 */

import { OpenMetadataColumn } from './descriptor';

export type JsonObject = Record<string, unknown>;

// Row-level filter declared on the output port
export interface UserDataFilter {
  id: string;
  title: string;
  user: string;
  label: string;
  value: string;
  operator?: string;
}

// Specific section of a GoodData output port
export interface WorkspaceSpec {
  workspaceId: string;
  workspaceName: string;
  workspaceLayout: JsonObject;
  parentWorkspaceId?: string | null;
  userDataFilters?: UserDataFilter[] | null;
}

export interface DeclarativeLdm {
  datasets?: JsonObject[];
  dateInstances?: JsonObject[];
  datasetExtensions?: JsonObject[];
}

export interface DeclarativeAnalytics {
  analyticalDashboards?: JsonObject[];
  analyticalDashboardExtensions?: JsonObject[];
  attributeHierarchies?: JsonObject[];
  dashboardPlugins?: JsonObject[];
  exportDefinitions?: JsonObject[];
  filterContexts?: JsonObject[];
  metrics?: JsonObject[];
  visualizationObjects?: JsonObject[];
}

// Full structural description of a workspace's analytics and LDM objects
export interface DeclarativeWorkspaceModel {
  ldm?: DeclarativeLdm;
  analytics?: DeclarativeAnalytics;
}

export interface PlatformWorkspace {
  id: string;
  name: string;
  parentId?: string;
}

export type AssigneeType = 'user' | 'userGroup';

export interface AssigneeIdentifier {
  id: string;
  type: AssigneeType;
}

export interface WorkspacePermission {
  name: string;
  assignee: AssigneeIdentifier;
}

// Declarative permission set of a single workspace
export interface WorkspacePermissions {
  permissions: WorkspacePermission[];
  hierarchyPermissions: WorkspacePermission[];
}

export interface WorkspacePermissionEntry {
  id: string;
  permissions: string[];
  hierarchyPermissions: string[];
}

export interface DataSourcePermissionEntry {
  id: string;
  permissions: string[];
}

// Permission set of a single user or user group across targets
export interface PrincipalPermissions {
  workspaces: WorkspacePermissionEntry[];
  dataSources: DataSourcePermissionEntry[];
}

/**
 * One grant of one permission level to one principal on one target
 * (a workspace or a data source).
 */
export interface PermissionAssignment {
  assigneeId: string;
  assigneeType: AssigneeType;
  targetId: string;
  level: string;
}

export interface PlatformUser {
  id: string;
  email?: string | null;
  firstname?: string | null;
  lastname?: string | null;
}

export interface PlatformUserGroup {
  id: string;
  name?: string | null;
}

// Row filter as stored on the platform
export interface PlatformUserDataFilter {
  id?: string;
  title: string;
  maql: string;
  userId?: string;
  userGroupId?: string;
}

export interface SnowflakeDataSourceRequest {
  id: string;
  name: string;
  database: string;
  schema: string;
}

export interface PlatformDataSource {
  id: string;
  name: string;
  type: string;
  schema: string;
}

export interface PdmTable {
  id: string;
  path: string[];
  type: string;
  columns: JsonObject[];
}

// Physical model returned by a data source scan
export interface ScanResult {
  pdm: {
    tables: PdmTable[];
  };
  warnings: JsonObject[];
}

export interface LogicalModel {
  ldm: DeclarativeLdm;
}

// Object exposed by an upstream Snowflake component
export type SnowflakeObjectType = 'TABLE' | 'VIEW';

export interface SnowflakeObject {
  name: string;
  schema: OpenMetadataColumn[];
  type: SnowflakeObjectType;
}

export interface SnowflakeMetadata {
  database: string;
  schema: string;
  objects: SnowflakeObject[];
}
