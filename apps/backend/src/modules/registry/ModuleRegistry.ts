import type { IDashboardModule } from '@clusterview/types';
import { normalizeUrlPath } from '../../lib/content-path.js';

/**
 * One registered dashboard module.
 */
export interface IModuleRegistryEntry {
    /**
     * Zero-based position in registration order.
     */
    readonly index: number;

    /**
     * Content prefix the module is served under, e.g. `/content/overview`.
     */
    readonly contentPath: string;

    readonly module: IDashboardModule;
}

/**
 * Result of resolving a request path against the registered prefixes.
 */
export interface IResolvedContentPath {
    entry: IModuleRegistryEntry;

    /**
     * Part of the path beneath the prefix, without a leading slash.
     */
    remainder: string;
}

/**
 * Immutable snapshot of the registered dashboard modules.
 *
 * Produced by {@link ModuleRegistryBuilder.build} once startup registration is
 * complete. The snapshot has no mutating operations and its entries are
 * frozen, so request handlers can read it concurrently without coordination.
 */
export class ModuleRegistry {
    /**
     * Registered modules in registration order. This is the order of the
     * top-level navigation sections.
     */
    readonly entries: readonly IModuleRegistryEntry[];

    private readonly byContentPath: ReadonlyMap<string, IModuleRegistryEntry>;

    /**
     * Prefixes sorted longest first so {@link resolve} finds the most specific
     * owner of a nested path.
     */
    private readonly prefixes: readonly string[];

    constructor(entries: readonly IModuleRegistryEntry[]) {
        this.entries = Object.freeze(entries.map(entry => Object.freeze({ ...entry })));
        this.byContentPath = new Map(this.entries.map(entry => [entry.contentPath, entry]));
        this.prefixes = Object.freeze([...this.byContentPath.keys()].sort((a, b) => b.length - a.length));
    }

    get size(): number {
        return this.entries.length;
    }

    /**
     * Look up the entry registered under an exact content prefix.
     */
    get(contentPath: string): IModuleRegistryEntry | undefined {
        return this.byContentPath.get(contentPath);
    }

    /**
     * Content prefix a module instance was registered under.
     */
    contentPathFor(module: IDashboardModule): string | undefined {
        return this.entries.find(entry => entry.module === module)?.contentPath;
    }

    /**
     * Find the module owning a request path.
     *
     * Matching is by prefix on path-segment boundaries, so `/content/overview/x/y`
     * resolves to the module registered at `/content/overview`, but
     * `/content/overviews` does not. When prefixes nest, the longest wins.
     *
     * @param requestPath - Path relative to the API mount prefix, e.g. `/content/overview/x/y`
     */
    resolve(requestPath: string): IResolvedContentPath | undefined {
        const normalized = normalizeUrlPath(requestPath);

        for (const prefix of this.prefixes) {
            if (normalized !== prefix && !normalized.startsWith(prefix + '/')) {
                continue;
            }

            const entry = this.byContentPath.get(prefix);
            if (entry) {
                return { entry, remainder: normalized.slice(prefix.length + 1) };
            }
        }

        return undefined;
    }
}
