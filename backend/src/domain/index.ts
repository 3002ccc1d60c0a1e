// Entities
export * from './entities';

// Value objects
export * from './value-objects';

// Errors
export * from './errors';

// Repositories
export * from './repositories';

// Ports
export * from './ports';
