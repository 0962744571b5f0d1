/**
 * Navigation tree types shared between the aggregator and dashboard modules.
 */
export type { INavigationSection } from './INavigationSection.js';
export type { INavigationFailure } from './INavigationFailure.js';
export type { INavigationResult, NavigationFailurePolicy } from './INavigationResult.js';
