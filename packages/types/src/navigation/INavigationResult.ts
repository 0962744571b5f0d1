import type { INavigationFailure } from './INavigationFailure.js';
import type { INavigationSection } from './INavigationSection.js';

/**
 * How the aggregator reacts when a module's navigation call fails.
 *
 * - `fail-fast`: the first failure aborts the whole request and no sections are returned
 * - `degrade`: failing modules are skipped and reported in `failures`
 */
export type NavigationFailurePolicy = 'fail-fast' | 'degrade';

/**
 * Composed navigation returned by the aggregator.
 *
 * `sections` is always in module registration order. `failures` is empty
 * unless the degrade policy skipped at least one module.
 */
export interface INavigationResult {
    sections: INavigationSection[];
    failures: INavigationFailure[];
}
