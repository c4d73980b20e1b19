import { z } from 'zod';
import { CONNECTION_SPECIFICATION, DOCUMENTATION_URL } from './config';

export const LogLevel = z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR']);
export type LogLevel = z.infer<typeof LogLevel>;

export const SyncMode = z.enum(['full_refresh']);
export type SyncMode = z.infer<typeof SyncMode>;

export const StreamDescriptorSchema = z.object({
  name: z.string(),
  json_schema: z.record(z.unknown()),
  supported_sync_modes: z.array(SyncMode),
  source_defined_primary_key: z.array(z.array(z.string())).optional()
});

export type StreamDescriptor = z.infer<typeof StreamDescriptorSchema>;

export const CatalogSchema = z.object({
  streams: z.array(StreamDescriptorSchema)
});

export type Catalog = z.infer<typeof CatalogSchema>;

export const ConfiguredStreamSchema = z.object({
  stream: z.object({ name: z.string() }).passthrough(),
  sync_mode: SyncMode.default('full_refresh')
});

export const ConfiguredCatalogSchema = z.object({
  streams: z.array(ConfiguredStreamSchema)
});

export type ConfiguredCatalog = z.infer<typeof ConfiguredCatalogSchema>;

export const ConnectionStatusSchema = z.object({
  status: z.enum(['SUCCEEDED', 'FAILED']),
  message: z.string().optional()
});

export type ConnectionStatus = z.infer<typeof ConnectionStatusSchema>;

export interface ConnectorSpecification {
  documentationUrl: string;
  connectionSpecification: typeof CONNECTION_SPECIFICATION;
}

export const CONNECTOR_SPECIFICATION: ConnectorSpecification = {
  documentationUrl: DOCUMENTATION_URL,
  connectionSpecification: CONNECTION_SPECIFICATION
};

export interface RecordMessage {
  type: 'RECORD';
  record: {
    stream: string;
    data: Record<string, unknown>;
    emitted_at: number;
  };
}

export interface LogMessage {
  type: 'LOG';
  log: {
    level: LogLevel;
    message: string;
  };
}

export interface SpecMessage {
  type: 'SPEC';
  spec: ConnectorSpecification;
}

export interface ConnectionStatusMessage {
  type: 'CONNECTION_STATUS';
  connectionStatus: ConnectionStatus;
}

export interface CatalogMessage {
  type: 'CATALOG';
  catalog: Catalog;
}

export type ConnectorMessage =
  | RecordMessage
  | LogMessage
  | SpecMessage
  | ConnectionStatusMessage
  | CatalogMessage;
