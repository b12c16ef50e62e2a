/**
 * JSON Schema of the declarative workspace model accepted by the platform.
 *
 * Only the two top levels are pinned down; objects inside the collections
 * are passed through untouched.
 */

const objectList = {
  type: 'array',
  items: { type: 'object' }
} as const;

export const DeclarativeLdmSchema = {
  type: 'object',
  properties: {
    datasets: objectList,
    dateInstances: objectList,
    datasetExtensions: objectList
  },
  additionalProperties: false
} as const;

export const DeclarativeAnalyticsSchema = {
  type: 'object',
  properties: {
    analyticalDashboards: objectList,
    analyticalDashboardExtensions: objectList,
    attributeHierarchies: objectList,
    dashboardPlugins: objectList,
    exportDefinitions: objectList,
    filterContexts: objectList,
    metrics: objectList,
    visualizationObjects: objectList
  },
  additionalProperties: false
} as const;

export const DeclarativeWorkspaceModelSchema = {
  type: 'object',
  properties: {
    ldm: DeclarativeLdmSchema,
    analytics: DeclarativeAnalyticsSchema
  },
  additionalProperties: false
} as const;
