import {
  ComponentDescriptor,
  ComponentKinds,
  SnowflakeComponent,
  SnowflakeTemplates
} from '../types/descriptor';
import { ValidationError } from '../types/provisioning';
import { ComponentTypeMismatchError, DataProduct } from './data-product';
import { validationError } from './results';

/**
 * Upstream components a workspace can be fed from, as (kind, template) pairs
 */
const SNOWFLAKE_DEPENDENCY_KINDS: ReadonlyArray<{ kind: string; template: string }> = [
  { kind: ComponentKinds.STORAGE, template: SnowflakeTemplates.STORAGE },
  { kind: ComponentKinds.OUTPUT_PORT, template: SnowflakeTemplates.OUTPUT_PORT }
];

function isSnowflakeComponent(component: ComponentDescriptor): boolean {
  return SNOWFLAKE_DEPENDENCY_KINDS.some(
    ({ kind, template }) => component.kind === kind && component.useCaseTemplateId === template
  );
}

/**
 * Dependency Resolver
 *
 * Finds the Snowflake storage areas and output ports a component depends
 * on. Dependency ids that are not part of the data product are ignored.
 */
export const DependencyResolver = {
  /**
   * @returns the recognized dependencies, possibly none, or a
   * ValidationError when the component declares no dependency at all
   */
  findSnowflakeDependencies(
    component: ComponentDescriptor,
    dataProduct: DataProduct
  ): ComponentDescriptor[] | ValidationError {
    if (component.dependsOn.length === 0) {
      return validationError([
        `Component ${component.id} must have at least one dependency on a Snowflake component ` +
          '(Storage Area or Output Port) but has none.'
      ]);
    }

    return component.dependsOn
      .map((dependencyId) => dataProduct.getComponentById(dependencyId))
      .filter((dependency): dependency is ComponentDescriptor => dependency !== null)
      .filter(isSnowflakeComponent);
  },

  /**
   * Requires exactly one recognized dependency and reads it as the typed
   * Snowflake component matching its kind.
   */
  extractSnowflakeDependency(
    component: ComponentDescriptor,
    dataProduct: DataProduct
  ): SnowflakeComponent | ValidationError {
    const dependencies = DependencyResolver.findSnowflakeDependencies(component, dataProduct);
    if (!Array.isArray(dependencies)) {
      return dependencies;
    }

    if (dependencies.length === 0) {
      return validationError([
        `Component ${component.id} must have exactly one dependency on a Snowflake component ` +
          '(Storage Area or Output Port) but has none.'
      ]);
    }

    if (dependencies.length > 1) {
      const ids = dependencies.map((dependency) => dependency.id).join(', ');
      return validationError([
        `Component ${component.id} must have exactly one dependency on a Snowflake component ` +
          `(Storage Area or Output Port) but has ${dependencies.length}: ${ids}`
      ]);
    }

    const dependencyId = dependencies[0].id;
    const dependency = dataProduct.getComponentById(dependencyId);
    try {
      if (dependency?.kind === ComponentKinds.STORAGE) {
        return dataProduct.getTypedComponentById(dependencyId, 'SNOWFLAKE_STORAGE_AREA');
      }
      if (dependency?.kind === ComponentKinds.OUTPUT_PORT) {
        return dataProduct.getTypedComponentById(dependencyId, 'SNOWFLAKE_OUTPUT_PORT');
      }
    } catch (error) {
      if (error instanceof ComponentTypeMismatchError) {
        return validationError([error.message]);
      }
      throw error;
    }

    return validationError([
      `Dependency ${dependencyId} must be a Snowflake component but is neither a Storage Area nor an Output Port`
    ]);
  }
};
