/**
 * Navigation aggregation: composes module sections into the dashboard tree.
 */
export { NavigationAggregator, NAVIGATION_FAILURE_MESSAGE } from './navigation-aggregator.js';
export type { INavigationAggregatorOptions, ModuleNavigationOutcome } from './navigation-aggregator.js';
export { NavigationController } from './navigation.controller.js';
export { navigationRouter } from './navigation.router.js';
export { createNavigationSection, navigationSectionId } from './navigation-section.js';
