/**
 * JSON Schema for the specific section of a GoodData output port.
 * Unknown properties are tolerated so descriptors can carry extra fields.
 */

export const UserDataFilterSchema = {
  type: 'object',
  required: ['id', 'title', 'user', 'label', 'value'],
  properties: {
    id: { type: 'string', minLength: 1 },
    title: { type: 'string' },
    user: { type: 'string', minLength: 1 },
    label: { type: 'string' },
    value: { type: 'string' },
    operator: { type: ['string', 'null'] }
  }
} as const;

export const WorkspaceSpecSchema = {
  type: 'object',
  required: ['workspaceId', 'workspaceName', 'workspaceLayout'],
  properties: {
    workspaceId: { type: 'string', minLength: 1 },
    workspaceName: { type: 'string' },
    workspaceLayout: { type: 'object' },
    parentWorkspaceId: { type: ['string', 'null'] },
    userDataFilters: {
      type: ['array', 'null'],
      items: UserDataFilterSchema
    }
  }
} as const;
