export * from './ports/logger';
export * from './ports/eventorClient';
export * from './errors/eventorClientError';
export * from './errors/eventorDecodeError';
export * from './xml/fields';
export * from './xml/decoder';
export * from './connectors/eventor/client';
export * from './connectors/eventor/courseDistances';
export * from './connectors/eventor/distance';
export * from './connectors/eventor/schemas';
