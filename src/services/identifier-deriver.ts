import { ComponentDescriptor } from '../types/descriptor';

/**
 * Field positions inside a colon-delimited component id, e.g.
 * `urn:dmb:cmp:<domain>:<product>:<major version>:<component path...>`
 */
const DOMAIN_FIELD = 3;
const PRODUCT_NAME_FIELD = 4;
const MAJOR_VERSION_FIELD = 5;
const COMPONENT_PATH_START = 6;

const ID_SEPARATOR = ':';
const DATA_SOURCE_ID_SEPARATOR = '_';

/**
 * Turns a normalized id field back into a display name:
 * `sales-and-marketing` becomes `Sales And Marketing`.
 */
export function titleCase(normalized: string): string {
  return normalized
    .replace(/-/g, ' ')
    .toLowerCase()
    .replace(/(^|\P{L})(\p{L})/gu, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

function fieldAt(fields: string[], position: number, componentId: string): string {
  const field = fields[position];
  if (field === undefined) {
    throw new Error(`Component id ${componentId} has no field at position ${position}`);
  }
  return field;
}

/**
 * Identifier Deriver
 *
 * Derives data source ids and display names from component ids. The
 * output must stay stable across runs: re-provisioning looks the data
 * source up by the id computed here.
 */
export const IdentifierDeriver = {
  /**
   * `<domain>_<product>_<major>_datasource_<dependency component path>`
   *
   * @example
   * dataSourceId(
   *   { id: 'urn:dmb:cmp:acme:sales:1:sink' },
   *   { id: 'urn:dmb:cmp:acme:sales:1:storage:raw' }
   * ) === 'acme_sales_1_datasource_storage_raw'
   */
  dataSourceId(
    component: Pick<ComponentDescriptor, 'id'>,
    dependency: Pick<ComponentDescriptor, 'id'>
  ): string {
    const prefix = component.id.split(ID_SEPARATOR).slice(DOMAIN_FIELD, COMPONENT_PATH_START);
    const suffix = dependency.id.split(ID_SEPARATOR).slice(COMPONENT_PATH_START);
    return [...prefix, 'datasource', ...suffix].join(DATA_SOURCE_ID_SEPARATOR);
  },

  /**
   * `<Domain> - <Product> - V<major> - <component name>`
   */
  fullyQualifiedName(component: Pick<ComponentDescriptor, 'id' | 'name'>): string {
    const fields = component.id.split(ID_SEPARATOR);
    const domain = titleCase(fieldAt(fields, DOMAIN_FIELD, component.id));
    const dataProductName = titleCase(fieldAt(fields, PRODUCT_NAME_FIELD, component.id));
    const majorVersion = fieldAt(fields, MAJOR_VERSION_FIELD, component.id);
    return `${domain} - ${dataProductName} - V${majorVersion} - ${component.name}`;
  },

  dataSourceName(
    component: Pick<ComponentDescriptor, 'id' | 'name' | 'fullyQualifiedName'>,
    dependency: Pick<ComponentDescriptor, 'name'>
  ): string {
    const componentName = component.fullyQualifiedName ?? IdentifierDeriver.fullyQualifiedName(component);
    return `${componentName} - Data Source - ${dependency.name}`;
  }
};
