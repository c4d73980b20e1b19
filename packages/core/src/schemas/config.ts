import { z } from 'zod';

export const ConnectorConfigSchema = z.object({
  api_key: z.string().min(1, 'api_key must not be empty')
});

export type ConnectorConfig = z.infer<typeof ConnectorConfigSchema>;

export const DOCUMENTATION_URL = 'https://developers.greenhouse.io/harvest.html';

// JSON schema handed to callers of `spec`; mirrors ConnectorConfigSchema
export const CONNECTION_SPECIFICATION = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  title: 'Greenhouse Source Spec',
  type: 'object',
  required: ['api_key'],
  additionalProperties: false,
  properties: {
    api_key: {
      type: 'string',
      title: 'API Key',
      description: 'Greenhouse Harvest API key. Read permissions are needed for every stream you want to sync.',
      secret: true
    }
  }
} as const;
