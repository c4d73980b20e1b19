import type { StreamDescriptor } from './schemas';

// Records are passed through unvalidated, so the declared schema stays open
export function describeStream(name: string): StreamDescriptor {
  return {
    name,
    json_schema: {
      $schema: 'http://json-schema.org/draft-07/schema#',
      type: 'object',
      additionalProperties: true,
      properties: {
        id: { type: ['integer', 'string'] }
      }
    },
    supported_sync_modes: ['full_refresh'],
    source_defined_primary_key: [['id']]
  };
}
