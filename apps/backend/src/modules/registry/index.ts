export { ModuleRegistry } from './ModuleRegistry.js';
export type { IModuleRegistryEntry, IResolvedContentPath } from './ModuleRegistry.js';
export { ModuleRegistryBuilder } from './ModuleRegistryBuilder.js';
