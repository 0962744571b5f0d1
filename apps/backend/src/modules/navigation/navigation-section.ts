import { createHash } from 'node:crypto';
import type { INavigationSection } from '@clusterview/types';

/**
 * Stable identity for a navigation entry at `path`.
 *
 * The id depends on the path only, so an entry keeps its id across requests
 * and across namespaces' re-renders of the same location.
 */
export function navigationSectionId(path: string): string {
    return createHash('sha1').update(path).digest('hex').slice(0, 16);
}

/**
 * Build a navigation section with its stable id.
 *
 * @example
 * createNavigationSection('Overview', '/content/overview/namespace/default', [
 *     createNavigationSection('Workloads', '/content/overview/namespace/default/workloads')
 * ]);
 */
export function createNavigationSection(
    title: string,
    path: string,
    children: INavigationSection[] = []
): INavigationSection {
    return {
        id: navigationSectionId(path),
        title,
        path,
        children
    };
}
