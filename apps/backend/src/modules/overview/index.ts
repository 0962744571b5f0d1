export { OverviewModule } from './OverviewModule.js';
export type { IOverviewSummary, IResourceGroupContent } from './OverviewModule.js';
