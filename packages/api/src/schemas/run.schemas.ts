/** JSON schema for `POST /api/pipelines/:name/runs`. */
export const startRunSchema = {
  type: 'object',
  additionalProperties: false,
  properties: {
    commit: { type: 'string', minLength: 1 },
    version: { type: 'string', minLength: 1 },
    parameters: {
      type: 'object',
      additionalProperties: { type: 'string' }
    },
    artifact: {
      type: 'object',
      required: ['id', 'version'],
      additionalProperties: false,
      properties: {
        id: { type: 'string', minLength: 1 },
        version: { type: 'string', minLength: 1 },
        location: { type: 'string' }
      }
    }
  }
} as const;
