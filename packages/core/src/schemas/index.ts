// Connector config
export {
  ConnectorConfigSchema,
  CONNECTION_SPECIFICATION,
  DOCUMENTATION_URL,
  type ConnectorConfig
} from './config';

// Records
export {
  ParentRecordSchema,
  type HarvestRecord,
  type RecordId,
  type QueryParams,
  type QueryValue
} from './record';

// Protocol messages
export {
  LogLevel,
  SyncMode,
  StreamDescriptorSchema,
  CatalogSchema,
  ConfiguredStreamSchema,
  ConfiguredCatalogSchema,
  ConnectionStatusSchema,
  CONNECTOR_SPECIFICATION,
  type StreamDescriptor,
  type Catalog,
  type ConfiguredCatalog,
  type ConnectionStatus,
  type ConnectorSpecification,
  type ConnectorMessage,
  type RecordMessage,
  type LogMessage,
  type SpecMessage,
  type ConnectionStatusMessage,
  type CatalogMessage
} from './protocol';
