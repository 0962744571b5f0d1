import path from 'node:path';
import { ValidationError } from './errors.js';

/**
 * Base segment all module content prefixes live under.
 */
export const CONTENT_ROOT = '/content';

/**
 * Normalize a URL path: collapse duplicate slashes, resolve dot segments and
 * drop any trailing slash except on the root itself.
 */
export function normalizeUrlPath(value: string): string {
    const normalized = path.posix.normalize('/' + value);
    return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
}

/**
 * Compute the content prefix for a module's content path.
 *
 * @example
 * joinContentPath('overview');        // '/content/overview'
 * joinContentPath('/workloads/apps/'); // '/content/workloads/apps'
 *
 * @returns The prefix, or `undefined` when `contentPath` does not name a
 * location strictly beneath {@link CONTENT_ROOT}
 */
export function joinContentPath(contentPath: string): string | undefined {
    const prefix = normalizeUrlPath(path.posix.join(CONTENT_ROOT, contentPath));
    return prefix.startsWith(CONTENT_ROOT + '/') ? prefix : undefined;
}

/**
 * Namespace scope and module-relative path parsed from the remainder of a
 * content request beneath its module prefix.
 */
export interface IContentScope {
    /**
     * Namespace named by a leading `namespace/{name}` pair, if present.
     */
    namespace?: string;

    /**
     * Remaining segments joined with `/`, without a leading slash.
     */
    path: string;
}

/**
 * Percent-decode one path segment.
 *
 * @throws {ValidationError} When the segment holds a malformed escape
 */
function decodeSegment(segment: string): string {
    try {
        return decodeURIComponent(segment);
    } catch (error) {
        if (error instanceof URIError) {
            throw new ValidationError('invalid request', { segment });
        }
        throw error;
    }
}

/**
 * Split a content remainder into its optional namespace scope and the path
 * the module serves. Segments are percent-decoded, matching the decoding
 * Express applies to route parameters.
 *
 * @example
 * parseContentScope('namespace/default/workloads'); // { namespace: 'default', path: 'workloads' }
 * parseContentScope('workloads/pods');              // { path: 'workloads/pods' }
 * parseContentScope('namespace/kube%2Dsystem');     // { namespace: 'kube-system', path: '' }
 *
 * @throws {ValidationError} When a segment holds a malformed escape
 */
export function parseContentScope(remainder: string): IContentScope {
    const segments = remainder
        .split('/')
        .filter(segment => segment.length > 0)
        .map(decodeSegment);

    if (segments.length >= 2 && segments[0] === 'namespace') {
        return { namespace: segments[1], path: segments.slice(2).join('/') };
    }

    return { path: segments.join('/') };
}
