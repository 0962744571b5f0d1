/**
 * Dashboard module capability and the request types passed to it.
 */
export type { IDashboardModule } from './IDashboardModule.js';
export type { IContentHandler, IContentRequest } from './IContentHandler.js';
export type { IModuleContext } from './IModuleContext.js';
