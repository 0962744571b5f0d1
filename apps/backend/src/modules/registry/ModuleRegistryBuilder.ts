import type { IDashboardModule, ILogger } from '@clusterview/types';
import { joinContentPath } from '../../lib/content-path.js';
import {
    DuplicateContentPathError,
    ModuleRegistrationError,
    RegistryFrozenError
} from '../../lib/errors.js';
import { ModuleRegistry, type IModuleRegistryEntry } from './ModuleRegistry.js';

/**
 * Collects dashboard module registrations during startup.
 *
 * Registration happens strictly before the HTTP handler is built. Calling
 * {@link build} hands out an immutable {@link ModuleRegistry} and closes the
 * builder for good; only the snapshot reaches the request-serving layer.
 *
 * @example
 * ```typescript
 * const builder = new ModuleRegistryBuilder(logger);
 * builder.register(new OverviewModule(clusterClient));
 * const registry = builder.build();
 * ```
 */
export class ModuleRegistryBuilder {
    private readonly entries: IModuleRegistryEntry[] = [];
    private readonly paths = new Map<string, IModuleRegistryEntry>();
    private frozen = false;

    constructor(private readonly logger: ILogger) {}

    /**
     * Register a module under `/content/{module.contentPath()}`.
     *
     * A rejected registration leaves the builder unchanged.
     *
     * @throws {RegistryFrozenError} If {@link build} has already been called
     * @throws {ModuleRegistrationError} If the content path is empty, escapes
     * `/content`, or the module instance is already registered
     * @throws {DuplicateContentPathError} If another module owns the same prefix
     */
    register(module: IDashboardModule): this {
        if (this.frozen) {
            throw new RegistryFrozenError(module.name);
        }

        const contentPath = joinContentPath(module.contentPath());
        if (contentPath === undefined) {
            throw new ModuleRegistrationError(
                `module "${module.name}" has an invalid content path "${module.contentPath()}"`,
                { module: module.name }
            );
        }

        const existing = this.paths.get(contentPath);
        if (existing) {
            throw new DuplicateContentPathError(contentPath, existing.module.name, module.name);
        }

        const sameInstance = this.entries.find(entry => entry.module === module);
        if (sameInstance) {
            throw new ModuleRegistrationError(
                `module "${module.name}" is already registered at ${sameInstance.contentPath}`,
                { module: module.name, contentPath: sameInstance.contentPath }
            );
        }

        this.logger.debug({ contentPath, module: module.name }, 'registering content path');

        const entry: IModuleRegistryEntry = { index: this.entries.length, contentPath, module };
        this.entries.push(entry);
        this.paths.set(contentPath, entry);

        return this;
    }

    /**
     * Freeze the registrations into an immutable snapshot.
     *
     * @throws {ModuleRegistrationError} If called a second time
     */
    build(): ModuleRegistry {
        if (this.frozen) {
            throw new ModuleRegistrationError('module registry has already been built');
        }

        this.frozen = true;
        this.logger.info({ modules: this.entries.map(entry => entry.contentPath) }, 'module registry frozen');

        return new ModuleRegistry(this.entries);
    }
}
