export const paramKinds = [
  'positional-only',
  'ambiguous',
  'named-only',
  'variadic-positional',
  'variadic-named',
] as const

export const argSpecFileSchema = {
  type: 'object',
  required: ['params'],
  properties: {
    name: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    params: {
      type: 'array',
      items: {
        type: 'object',
        required: ['name', 'kind'],
        properties: {
          name: { type: 'string', minLength: 1 },
          kind: { enum: [...paramKinds] },
          default: { type: ['string', 'number', 'boolean', 'null'] },
          help: { type: 'string' },
        },
        additionalProperties: false,
      },
    },
  },
  additionalProperties: false,
} as const

export const configSchema = {
  type: 'object',
  properties: {
    abbreviations: { type: 'boolean' },
    debug: { type: 'boolean' },
  },
  additionalProperties: false,
} as const
