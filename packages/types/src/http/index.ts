/**
 * Wire shapes of the dashboard API.
 */
export type { IErrorResponse } from './IErrorResponse.js';
