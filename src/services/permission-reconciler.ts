import {
  AssigneeIdentifier,
  PermissionAssignment,
  PrincipalPermissions,
  WorkspacePermission,
  WorkspacePermissions
} from '../types/workspace';

/**
 * Permission Reconciler
 *
 * Pure merge of an existing permission set with a batch of grants. Any
 * grant the given principals already hold on the target is dropped before
 * the new grants are prepended, so a principal ends up with exactly one
 * grant on the target however often the merge runs. Reading the current
 * set and writing the result back is left to the caller.
 */
export const PermissionReconciler = {
  reconcile(
    existing: PermissionAssignment[],
    principals: AssigneeIdentifier[],
    targetId: string,
    level: string
  ): PermissionAssignment[] {
    const unique = new Map<string, AssigneeIdentifier>();
    for (const principal of principals) {
      if (!unique.has(principal.id)) {
        unique.set(principal.id, principal);
      }
    }

    const kept = existing.filter(
      (assignment) => !(assignment.targetId === targetId && unique.has(assignment.assigneeId))
    );

    const granted = Array.from(unique.values(), (principal) => ({
      assigneeId: principal.id,
      assigneeType: principal.type,
      targetId,
      level
    }));

    return [...granted, ...kept];
  },

  /**
   * Flattens a workspace permission set; hierarchy permissions are not
   * part of the result and must be carried over by the caller.
   */
  fromWorkspacePermissions(workspaceId: string, permissions: WorkspacePermissions): PermissionAssignment[] {
    return permissions.permissions.map((permission) => ({
      assigneeId: permission.assignee.id,
      assigneeType: permission.assignee.type,
      targetId: workspaceId,
      level: permission.name
    }));
  },

  toWorkspacePermissions(
    assignments: PermissionAssignment[],
    hierarchyPermissions: WorkspacePermission[]
  ): WorkspacePermissions {
    return {
      permissions: assignments.map((assignment) => ({
        name: assignment.level,
        assignee: { id: assignment.assigneeId, type: assignment.assigneeType }
      })),
      hierarchyPermissions
    };
  },

  /**
   * Flattens the data source part of one principal's permission set into
   * one assignment per (data source, level).
   */
  fromDataSourcePermissions(
    principal: AssigneeIdentifier,
    permissions: PrincipalPermissions
  ): PermissionAssignment[] {
    return permissions.dataSources.flatMap((dataSource) =>
      dataSource.permissions.map((level) => ({
        assigneeId: principal.id,
        assigneeType: principal.type,
        targetId: dataSource.id,
        level
      }))
    );
  },

  /**
   * Groups assignments back per data source, keeping first-seen order.
   * Workspace grants of the principal and data sources without any
   * assignment are passed through unchanged.
   */
  toPrincipalPermissions(
    assignments: PermissionAssignment[],
    current: PrincipalPermissions
  ): PrincipalPermissions {
    const byDataSource = new Map<string, string[]>();
    for (const assignment of assignments) {
      const levels = byDataSource.get(assignment.targetId) ?? [];
      levels.push(assignment.level);
      byDataSource.set(assignment.targetId, levels);
    }

    const untouched = current.dataSources.filter((dataSource) => !byDataSource.has(dataSource.id));

    return {
      workspaces: current.workspaces,
      dataSources: [...Array.from(byDataSource, ([id, permissions]) => ({ id, permissions })), ...untouched]
    };
  }
};
