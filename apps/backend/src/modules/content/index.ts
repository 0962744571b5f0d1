export { ContentRouter } from './content-router.js';
export type { IContentInstallFailure } from './content-router.js';
