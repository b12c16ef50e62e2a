/**
 * Workspace Provisioner
 *
 * Drives a GoodData workspace toward the state declared by a GoodData
 * output port. Every operation re-reads the remote state it depends on and
 * can be re-run safely: workspace creation, permission grants and the data
 * source are upserts, and an existing logical model is never regenerated.
 *
 * Remote calls are issued one after another and never retried. A failing
 * call aborts the operation and leaves the steps already taken in place;
 * running the operation again is the way to recover.
 */

import { AnalyticsPlatformClient } from '../types/analytics-platform';
import { ComponentDescriptor, GoodDataOutputPort, SnowflakeComponent } from '../types/descriptor';
import { Logger } from '../types/logger';
import {
  Info,
  ProvisioningResult,
  ReverseProvisioningResult,
  SystemErr,
  ValidationError,
  ValidationOutcome
} from '../types/provisioning';
import { SpecificProvisioner } from '../types/provisioner';
import {
  AssigneeIdentifier,
  DeclarativeWorkspaceModel,
  PlatformUserDataFilter,
  SnowflakeMetadata,
  UserDataFilter,
  WorkspaceSpec
} from '../types/workspace';
import { summarize } from '../utils/text';
import { DataProduct } from './data-product';
import { DependencyResolver } from './dependency-resolver';
import { IdentifierDeriver } from './identifier-deriver';
import { GROUP_REF_PREFIX, IdentityMapper, USER_REF_PREFIX, partitionMapping } from './identity-mapper';
import { PermissionReconciler } from './permission-reconciler';
import {
  isValidationError,
  provisioningStatus,
  requestValidationError,
  reverseProvisioningStatus,
  systemErr,
  validationError,
  validationResult
} from './results';
import { schemaValidator } from './schema-validator';
import { getSnowflakeMetadata, getWorkspaceSpec } from './specific-section';

const SPECIFIC_SECTION_ERROR = 'Unable to access specific section of component.';

export const WORKSPACE_LAYOUT_FIELD = 'spec.mesh.specific.workspaceLayout';

/**
 * Permission levels granted by the provisioner
 */
export const PermissionLevels = {
  WORKSPACE_OWNER: 'MANAGE',
  WORKSPACE_CONSUMER: 'VIEW',
  DATA_SOURCE_OWNER: 'USE'
} as const;

/**
 * Platform ids of the data product owner and its developer group
 */
interface OwnerPrincipals {
  ownerId: string;
  developersId: string;
}

/**
 * Data source and logical model to set up for a root workspace
 */
interface DataSourcePlan {
  dependency: SnowflakeComponent;
  metadata: SnowflakeMetadata;
  dataSourceId: string;
  dataSourceName: string;
}

function ownerAssignees(principals: OwnerPrincipals): AssigneeIdentifier[] {
  return [
    { id: principals.ownerId, type: 'user' },
    { id: principals.developersId, type: 'userGroup' }
  ];
}

/**
 * A logical model counts as present once it has a dataset or a date instance
 */
export function hasLogicalModel(content: DeclarativeWorkspaceModel): boolean {
  const ldm = content.ldm;
  if (!ldm) {
    return false;
  }
  return (ldm.datasets?.length ?? 0) > 0 || (ldm.dateInstances?.length ?? 0) > 0;
}

/**
 * Row filter predicate, e.g. `{label/region} = "EMEA"`
 */
export function buildUserDataFilterMaql(filter: UserDataFilter): string {
  const operator = filter.operator ?? '=';
  return `{label/${filter.label}} ${operator} "${filter.value}"`;
}

function formatList(items: string[]): string {
  return `[${items.join(', ')}]`;
}

export class WorkspaceProvisioner implements SpecificProvisioner {
  private readonly identityMapper: IdentityMapper;

  constructor(
    private readonly client: AnalyticsPlatformClient,
    private readonly logger: Logger = console
  ) {
    this.identityMapper = new IdentityMapper(client, logger);
  }

  /**
   * Checks the specific section and that the workspace layout survives a
   * conversion to the platform model unchanged. Makes no remote call.
   */
  async validate(component: GoodDataOutputPort, _dataProduct: DataProduct): Promise<ValidationOutcome> {
    return this.guard('validate', async () => {
      this.logger.info(`Validating component: ${summarize(component)}`);

      const spec = getWorkspaceSpec(component);
      if (isValidationError(spec)) {
        return validationResult(validationError([SPECIFIC_SECTION_ERROR, ...spec.errors]));
      }

      const roundTrip = schemaValidator.roundTripWorkspaceLayout(spec.workspaceLayout);
      if (!roundTrip.parsed) {
        return validationResult(validationError(['Unable to parse the workspace content.', ...roundTrip.errors]));
      }
      if (!roundTrip.consistent) {
        return validationResult(validationError(['Workspace content is not valid.']));
      }

      this.logger.info(`Workspace contents: ${summarize(roundTrip.model)}`);
      return validationResult();
    });
  }

  async provision(component: GoodDataOutputPort, dataProduct: DataProduct): Promise<ProvisioningResult> {
    return this.guard('provision', async () => {
      this.logger.info(`Provisioning component: ${summarize(component)}`);

      const spec = getWorkspaceSpec(component);
      if (isValidationError(spec)) {
        return validationError([SPECIFIC_SECTION_ERROR, ...spec.errors]);
      }
      const workspaceId = spec.workspaceId;
      const parentId = spec.parentWorkspaceId ?? null;

      // Everything that can be checked locally is checked before the first write
      let content: DeclarativeWorkspaceModel | null = null;
      let dataSourcePlan: DataSourcePlan | null = null;
      if (parentId === null) {
        const roundTrip = schemaValidator.roundTripWorkspaceLayout(spec.workspaceLayout);
        if (!roundTrip.model) {
          return validationError(['Unable to parse the workspace content.', ...roundTrip.errors]);
        }
        content = roundTrip.model;

        const plan = this.planDataSource(component, dataProduct);
        if (isValidationError(plan)) {
          return plan;
        }
        dataSourcePlan = plan;
      }

      const principals = await this.mapOwnerAndDevGroup(dataProduct);
      if (isValidationError(principals)) {
        return validationError([
          'Unable to map DP owner and/or developer group to GoodData ids. ' +
            'Ensure they are present in GoodData and try again.',
          ...principals.errors
        ]);
      }

      const filters = spec.userDataFilters ?? [];
      const filterUsers = await this.mapUserDataFilterUsers(filters);
      if (isValidationError(filterUsers)) {
        return filterUsers;
      }

      if (await this.client.workspaceExists(workspaceId)) {
        this.logger.info(`Skipping workspace creation as workspace ${workspaceId} already exists`);
      } else {
        this.logger.info(`Creating workspace ${workspaceId}`);
        await this.client.createOrUpdateWorkspace(workspaceId, spec.workspaceName, parentId);
      }

      // Content, data source and LDM belong to root workspaces only
      if (content !== null) {
        this.logger.info(`Importing content to workspace ${workspaceId}`);
        await this.client.importDeclarativeContent(workspaceId, content);

        if (dataSourcePlan !== null) {
          this.logger.info('Snowflake component found; provisioning Data Source and LDM...');
          await this.provisionDataSourceAndLdm(dataSourcePlan, workspaceId, content, principals);
        } else {
          this.logger.info('No Snowflake component found; skipping provisioning of Data Source and LDM');
        }
      }

      this.logger.info(`Applying MANAGE permissions to workspace ${workspaceId} for DP owner and dev group`);
      await this.grantWorkspacePermissions(
        workspaceId,
        ownerAssignees(principals),
        PermissionLevels.WORKSPACE_OWNER
      );

      await this.replaceUserDataFilters(workspaceId, filters, filterUsers);

      return provisioningStatus('COMPLETED', 'Provisioning completed', this.buildLinkInfo(spec));
    });
  }

  async unprovision(
    component: GoodDataOutputPort,
    _dataProduct: DataProduct,
    removeData: boolean
  ): Promise<ProvisioningResult> {
    return this.guard('unprovision', async () => {
      this.logger.info(`Unprovisioning component: ${summarize(component)}`);

      const spec = getWorkspaceSpec(component);
      if (isValidationError(spec)) {
        return validationError([SPECIFIC_SECTION_ERROR, ...spec.errors]);
      }
      const workspaceId = spec.workspaceId;

      if (!(await this.client.workspaceExists(workspaceId))) {
        this.logger.info(`Skipping unprovisioning as workspace ${workspaceId} does not exist`);
        return provisioningStatus('COMPLETED', 'Unprovisioning completed (nothing to be done)');
      }

      if (removeData) {
        this.logger.info(`Emptying workspace ${workspaceId} as removeData is true`);
        await this.client.emptyWorkspace(workspaceId);
      } else {
        this.logger.info(`Not emptying workspace ${workspaceId} as removeData is false`);
      }

      this.logger.info(`Removing all permissions on workspace ${workspaceId}`);
      await this.removeWorkspacePermissions(workspaceId);

      return provisioningStatus('COMPLETED', 'Unprovisioning completed');
    });
  }

  /**
   * Replaces the workspace grants with MANAGE for the owner and dev group
   * plus VIEW for every reference that resolves. References that do not
   * resolve turn the result into FAILED, but the grants for the resolved
   * ones have been written by then.
   */
  async updateAcl(
    component: GoodDataOutputPort,
    dataProduct: DataProduct,
    refs: string[]
  ): Promise<ProvisioningResult> {
    return this.guard('updateAcl', async () => {
      this.logger.info(`Update ACL for component: ${summarize(component)}`);

      const spec = getWorkspaceSpec(component);
      if (isValidationError(spec)) {
        return validationError([SPECIFIC_SECTION_ERROR, ...spec.errors]);
      }
      const workspaceId = spec.workspaceId;

      if (!(await this.client.workspaceExists(workspaceId))) {
        return provisioningStatus('FAILED', `Update ACL failed, workspace ${workspaceId} does not exist.`);
      }

      const principals = await this.mapOwnerAndDevGroup(dataProduct);
      if (isValidationError(principals)) {
        return validationError([
          'Unable to map DP owner and/or developer group to GoodData ids.',
          ...principals.errors
        ]);
      }

      this.logger.info(`Removing all permissions on workspace ${workspaceId}`);
      await this.removeWorkspacePermissions(workspaceId);

      this.logger.info(`Applying MANAGE permissions to workspace ${workspaceId} for DP owner and dev group`);
      await this.grantWorkspacePermissions(
        workspaceId,
        ownerAssignees(principals),
        PermissionLevels.WORKSPACE_OWNER
      );

      const userRefs = refs.filter((ref) => ref.startsWith(USER_REF_PREFIX));
      const groupRefs = refs.filter((ref) => ref.startsWith(GROUP_REF_PREFIX));
      const ignored = refs.filter((ref) => !ref.startsWith(USER_REF_PREFIX) && !ref.startsWith(GROUP_REF_PREFIX));
      if (ignored.length > 0) {
        this.logger.warn(`Ignoring references that are neither users nor groups: ${formatList(ignored)}`);
      }

      const users = partitionMapping(await this.identityMapper.mapUsers(userRefs));
      const groups = partitionMapping(await this.identityMapper.mapGroups(groupRefs));

      const consumers: AssigneeIdentifier[] = [
        ...users.resolved.map((id): AssigneeIdentifier => ({ id, type: 'user' })),
        ...groups.resolved.map((id): AssigneeIdentifier => ({ id, type: 'userGroup' }))
      ];
      if (consumers.length > 0) {
        this.logger.info(`Applying VIEW permissions to workspace ${workspaceId} for consumers`);
        await this.grantWorkspacePermissions(workspaceId, consumers, PermissionLevels.WORKSPACE_CONSUMER);
      }

      if (users.unresolved.length === 0 && groups.unresolved.length === 0) {
        return provisioningStatus('COMPLETED', 'Update ACL completed');
      }

      return provisioningStatus(
        'FAILED',
        'Update ACL failed, unable to map all users/groups. ' +
          `Problematic users: ${formatList(users.unresolved)}, groups: ${formatList(groups.unresolved)}`
      );
    });
  }

  /**
   * Exports the current content of an existing workspace as a proposed
   * update of the descriptor's workspace layout.
   */
  async reverseProvision(
    useCaseTemplateId: string,
    environment: string,
    parameters: Record<string, unknown> | null | undefined,
    _catalogInfo: Record<string, unknown> | null | undefined
  ): Promise<ReverseProvisioningResult> {
    return this.guard('reverseProvision', async () => {
      this.logger.info(
        `Reverse provisioning for template ${useCaseTemplateId} in ${environment} with parameters: ${summarize(parameters ?? null)}`
      );

      if (parameters === null || parameters === undefined) {
        return requestValidationError(
          'Missing parameters object in reverse provisioning request',
          'Missing required parameters for reverse provisioning request',
          'Specify required parameters for reverse provisioning request'
        );
      }

      const workspaceId = parameters.workspaceId;
      if (typeof workspaceId !== 'string' || workspaceId === '') {
        return requestValidationError(
          'Missing workspaceId in reverse provisioning request',
          'Missing required parameter workspaceId for reverse provisioning request',
          'Specify workspaceId for reverse provisioning request'
        );
      }

      if (!(await this.client.workspaceExists(workspaceId))) {
        const message = `Workspace ${workspaceId} does not exist`;
        this.logger.error(message);
        return requestValidationError(message, message, 'Ensure the workspace id provided is correct');
      }

      this.logger.info(`Exporting content from workspace ${workspaceId}`);
      const content = await this.client.exportDeclarativeContent(workspaceId);

      return reverseProvisioningStatus('Reverse provisioning completed', {
        [WORKSPACE_LAYOUT_FIELD]: content
      });
    });
  }

  /**
   * Runs an operation and reports any exception as a SystemErr
   */
  private async guard<T>(operation: string, run: () => Promise<T>): Promise<T | SystemErr> {
    try {
      return await run();
    } catch (error) {
      this.logger.error(`Error during ${operation}:`, error);
      return systemErr(error instanceof Error ? error.message : String(error));
    }
  }

  private buildLinkInfo(spec: WorkspaceSpec): Info {
    const host = this.client.getHost().replace(/\/+$/, '');
    return {
      publicInfo: {
        link: {
          type: 'string',
          label: 'Link',
          value: `Go to "${spec.workspaceName}" workspace on GoodData`,
          href: `${host}/dashboards/#/workspace/${spec.workspaceId}/`
        }
      },
      privateInfo: {}
    };
  }

  /**
   * Resolves the single Snowflake dependency a root workspace is fed from.
   * Returns null when the component depends on no Snowflake component.
   */
  private planDataSource(
    component: ComponentDescriptor,
    dataProduct: DataProduct
  ): DataSourcePlan | null | ValidationError {
    this.logger.info('Looking for Snowflake dependency...');

    const dependencies = DependencyResolver.findSnowflakeDependencies(component, dataProduct);
    if (isValidationError(dependencies)) {
      return validationError(['Unable to extract Snowflake dependencies.', ...dependencies.errors]);
    }
    if (dependencies.length === 0) {
      return null;
    }

    const dependency = DependencyResolver.extractSnowflakeDependency(component, dataProduct);
    if (isValidationError(dependency)) {
      return validationError(['Unable to extract Snowflake dependencies.', ...dependency.errors]);
    }

    const metadata = getSnowflakeMetadata(dependency);
    if (isValidationError(metadata)) {
      return validationError(['Unable to extract Snowflake metadata.', ...metadata.errors]);
    }

    return {
      dependency,
      metadata,
      dataSourceId: IdentifierDeriver.dataSourceId(component, dependency),
      dataSourceName: IdentifierDeriver.dataSourceName(component, dependency)
    };
  }

  private async provisionDataSourceAndLdm(
    plan: DataSourcePlan,
    workspaceId: string,
    content: DeclarativeWorkspaceModel,
    principals: OwnerPrincipals
  ): Promise<void> {
    const { dataSourceId, metadata } = plan;

    this.logger.info(`Creating data source ${dataSourceId}`);
    await this.client.createOrUpdateDataSource({
      id: dataSourceId,
      name: plan.dataSourceName,
      database: metadata.database,
      schema: metadata.schema
    });

    this.logger.info(`Applying USE permissions to data source ${dataSourceId} for DP owner and dev group`);
    await this.grantDataSourcePermissions(dataSourceId, principals, PermissionLevels.DATA_SOURCE_OWNER);

    if (hasLogicalModel(content)) {
      this.logger.info(
        `Skipping generating LDM for data source ${dataSourceId} as workspace ${workspaceId} already has an LDM`
      );
      return;
    }

    this.logger.info(`Generating LDM for data source ${dataSourceId} and applying it to workspace ${workspaceId}`);
    const scan = await this.client.scanDataSource(dataSourceId);
    if (scan.warnings.length > 0) {
      this.logger.warn(`PDM scan for data source ${dataSourceId} returned warnings: ${summarize(scan.warnings)}`);
    }

    // Only the objects the dependency exposes end up in the model
    const objectNames = new Set(metadata.objects.map((object) => object.name.toUpperCase()));
    const tables = scan.pdm.tables.filter((table) => objectNames.has(table.id.toUpperCase()));
    this.logger.info(`Filtered tables: ${tables.map((table) => table.id).join(', ')}`);

    const generated = await this.client.generateLogicalModel(dataSourceId, tables, workspaceId);
    await this.client.putLogicalModel(workspaceId, generated.ldm);
  }

  private async mapOwnerAndDevGroup(dataProduct: DataProduct): Promise<OwnerPrincipals | ValidationError> {
    const owner = dataProduct.dataProductOwner;
    const ownerId = (await this.identityMapper.mapUsers([owner])).get(owner) ?? null;
    if (ownerId === null) {
      return validationError([`Unable to map DP owner "${owner}" to a GoodData user.`]);
    }

    const devGroup = dataProduct.devGroup;
    const developersId = (await this.identityMapper.mapGroups([devGroup])).get(devGroup) ?? null;
    if (developersId === null) {
      return validationError([`Unable to map DP dev group "${devGroup}" to a GoodData group.`]);
    }

    return { ownerId, developersId };
  }

  private async mapUserDataFilterUsers(
    filters: UserDataFilter[]
  ): Promise<Map<string, string> | ValidationError> {
    const resolved = new Map<string, string>();
    if (filters.length === 0) {
      return resolved;
    }

    const mapped = await this.identityMapper.mapUsers(new Set(filters.map((filter) => filter.user)));
    const unresolved: string[] = [];
    for (const [ref, id] of mapped) {
      if (id === null) {
        unresolved.push(ref);
      } else {
        resolved.set(ref, id);
      }
    }

    if (unresolved.length > 0) {
      return validationError([
        `Unable to map User Data Filter users ${formatList(unresolved)} to GoodData users.`
      ]);
    }
    return resolved;
  }

  private async grantWorkspacePermissions(
    workspaceId: string,
    principals: AssigneeIdentifier[],
    level: string
  ): Promise<void> {
    const current = await this.client.getWorkspacePermissions(workspaceId);
    const existing = PermissionReconciler.fromWorkspacePermissions(workspaceId, current);
    const updated = PermissionReconciler.reconcile(existing, principals, workspaceId, level);
    await this.client.putWorkspacePermissions(
      workspaceId,
      PermissionReconciler.toWorkspacePermissions(updated, current.hierarchyPermissions)
    );
  }

  private async removeWorkspacePermissions(workspaceId: string): Promise<void> {
    const current = await this.client.getWorkspacePermissions(workspaceId);
    await this.client.putWorkspacePermissions(
      workspaceId,
      PermissionReconciler.toWorkspacePermissions([], current.hierarchyPermissions)
    );
  }

  private async grantDataSourcePermissions(
    dataSourceId: string,
    principals: OwnerPrincipals,
    level: string
  ): Promise<void> {
    const user: AssigneeIdentifier = { id: principals.ownerId, type: 'user' };
    const userPermissions = await this.client.getUserPermissions(user.id);
    const userAssignments = PermissionReconciler.reconcile(
      PermissionReconciler.fromDataSourcePermissions(user, userPermissions),
      [user],
      dataSourceId,
      level
    );
    await this.client.putUserPermissions(
      user.id,
      PermissionReconciler.toPrincipalPermissions(userAssignments, userPermissions)
    );

    const group: AssigneeIdentifier = { id: principals.developersId, type: 'userGroup' };
    const groupPermissions = await this.client.getGroupPermissions(group.id);
    const groupAssignments = PermissionReconciler.reconcile(
      PermissionReconciler.fromDataSourcePermissions(group, groupPermissions),
      [group],
      dataSourceId,
      level
    );
    await this.client.putGroupPermissions(
      group.id,
      PermissionReconciler.toPrincipalPermissions(groupAssignments, groupPermissions)
    );
  }

  /**
   * Deletes every row filter of the workspace, then creates the declared
   * ones. Filters are never diffed.
   */
  private async replaceUserDataFilters(
    workspaceId: string,
    filters: UserDataFilter[],
    filterUsers: Map<string, string>
  ): Promise<void> {
    this.logger.info(`Removing existing User Data Filters from workspace ${workspaceId}`);
    const existing = await this.client.listUserDataFilters(workspaceId);
    for (const filter of existing) {
      if (filter.id) {
        await this.client.deleteUserDataFilter(workspaceId, filter.id);
      } else {
        this.logger.warn(`User Data Filter without id found in workspace ${workspaceId}: ${summarize(filter)}`);
      }
    }

    if (filters.length === 0) {
      this.logger.info(`No User Data Filters defined for workspace ${workspaceId}, skipping applying UDF`);
      return;
    }

    this.logger.info(`Applying new User Data Filters to workspace ${workspaceId}`);
    for (const filter of filters) {
      const userId = filterUsers.get(filter.user);
      if (userId === undefined) {
        throw new Error(`User Data Filter ${filter.id} refers to unmapped user ${filter.user}`);
      }
      const platformFilter: PlatformUserDataFilter = {
        id: filter.id,
        title: filter.title,
        maql: buildUserDataFilterMaql(filter),
        userId
      };
      this.logger.info(`Applying User Data Filter ${filter.id} to workspace ${workspaceId}`);
      await this.client.createOrUpdateUserDataFilter(workspaceId, platformFilter);
    }
  }
}
