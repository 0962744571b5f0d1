import type {
    ILogger,
    IModuleContext,
    INavigationFailure,
    INavigationResult,
    INavigationSection,
    NavigationFailurePolicy
} from '@clusterview/types';
import type { IModuleRegistryEntry, ModuleRegistry } from '../registry/index.js';

/**
 * Message carried by every degrade-policy failure annotation. The cause is
 * only written to the log.
 */
export const NAVIGATION_FAILURE_MESSAGE = 'unable to generate navigation';

/**
 * Outcome of asking one module for its navigation section.
 */
export type ModuleNavigationOutcome =
    | { status: 'fulfilled'; entry: IModuleRegistryEntry; section: INavigationSection }
    | { status: 'rejected'; entry: IModuleRegistryEntry; reason: unknown };

export interface INavigationAggregatorOptions {
    /**
     * Reaction to a failing module. Defaults to `fail-fast`.
     */
    policy?: NavigationFailurePolicy;

    /**
     * Number of modules queried at once. Defaults to 1, which queries them one
     * after another in registration order.
     */
    concurrency?: number;
}

/**
 * Composes the dashboard navigation tree from every registered module.
 *
 * Each module contributes one top-level section and the sections always come
 * back in registration order, whatever the fan-out.
 *
 * **Failure policies:**
 *
 * - `fail-fast`: the first failing module (by registration order) aborts the
 *   request. The caller receives that module's original error and none of the
 *   sections gathered so far. Once a failure is seen no further modules are
 *   called.
 * - `degrade`: failing modules are left out of `sections` and listed in
 *   `failures` instead, with {@link NAVIGATION_FAILURE_MESSAGE} in place of
 *   the cause.
 *
 * **Fan-out:**
 *
 * With `concurrency` above 1 a bounded set of workers takes modules in
 * registration order and records each outcome at the module's index, and the
 * result is reassembled in that order. No timeout is applied; the request
 * context's signal is passed to every module.
 */
export class NavigationAggregator {
    readonly policy: NavigationFailurePolicy;
    readonly concurrency: number;

    constructor(
        private readonly registry: ModuleRegistry,
        private readonly logger: ILogger,
        options: INavigationAggregatorOptions = {}
    ) {
        this.policy = options.policy ?? 'fail-fast';
        this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 1));
    }

    /**
     * Navigation sections for `namespace`, in registration order.
     *
     * @throws The original error of the first failing module under `fail-fast`
     */
    async sections(context: IModuleContext, namespace: string): Promise<INavigationSection[]> {
        const result = await this.compose(context, namespace);
        return result.sections;
    }

    /**
     * Navigation sections plus the failure annotations left by `degrade`.
     *
     * @throws The original error of the first failing module under `fail-fast`
     */
    async compose(context: IModuleContext, namespace: string): Promise<INavigationResult> {
        const outcomes = await this.collect(context, namespace);
        const sections: INavigationSection[] = [];
        const failures: INavigationFailure[] = [];

        for (const outcome of outcomes) {
            if (outcome === undefined) {
                continue;
            }

            if (outcome.status === 'fulfilled') {
                sections.push(outcome.section);
                continue;
            }

            if (this.policy === 'fail-fast') {
                throw outcome.reason;
            }

            failures.push({
                module: outcome.entry.module.name,
                contentPath: outcome.entry.contentPath,
                message: NAVIGATION_FAILURE_MESSAGE
            });
        }

        return { sections, failures };
    }

    /**
     * Query modules with bounded concurrency.
     *
     * Workers claim indices in ascending order, so every module before a
     * failure has been claimed and settles before the outcomes are read. Slots
     * left `undefined` belong to modules never called after a fail-fast stop.
     */
    private async collect(
        context: IModuleContext,
        namespace: string
    ): Promise<Array<ModuleNavigationOutcome | undefined>> {
        const entries = this.registry.entries;
        const outcomes: Array<ModuleNavigationOutcome | undefined> = new Array(entries.length).fill(undefined);
        let next = 0;
        let stopped = false;

        const worker = async (): Promise<void> => {
            while (!stopped && next < entries.length) {
                const entry = entries[next];
                next += 1;

                const outcome = await this.query(entry, context, namespace);
                outcomes[entry.index] = outcome;

                if (outcome.status === 'rejected' && this.policy === 'fail-fast') {
                    stopped = true;
                }
            }
        };

        const workers = Math.min(this.concurrency, entries.length);
        await Promise.all(Array.from({ length: workers }, () => worker()));

        return outcomes;
    }

    private async query(
        entry: IModuleRegistryEntry,
        context: IModuleContext,
        namespace: string
    ): Promise<ModuleNavigationOutcome> {
        const moduleContext: IModuleContext = {
            ...context,
            logger: context.logger.child({ module: entry.module.name })
        };

        try {
            const section = await entry.module.navigation(moduleContext, namespace, entry.contentPath);
            return { status: 'fulfilled', entry, section };
        } catch (reason) {
            this.logger.error(
                { error: reason, module: entry.module.name, contentPath: entry.contentPath, namespace },
                'module navigation failed'
            );
            return { status: 'rejected', entry, reason };
        }
    }
}
