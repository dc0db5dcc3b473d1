// Modelos del dominio
export * from './Json.js';
export * from './Link.js';
export * from './Broadcast.js';
export * from './Mixtape.js';

// Esquemas de los payloads de la API
export * from './NtsSchemas.js';
