/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { joinContentPath, normalizeUrlPath, parseContentScope } from '../content-path.js';
import { ValidationError } from '../errors.js';

describe('content paths', () => {
    describe('normalizeUrlPath', () => {
        it('should collapse duplicate and trailing slashes', () => {
            expect(normalizeUrlPath('//content//overview/')).toBe('/content/overview');
        });

        it('should keep the root as a single slash', () => {
            expect(normalizeUrlPath('')).toBe('/');
            expect(normalizeUrlPath('///')).toBe('/');
        });

        it('should resolve dot segments', () => {
            expect(normalizeUrlPath('/content/overview/../workloads')).toBe('/content/workloads');
        });
    });

    describe('joinContentPath', () => {
        it('should place the content path beneath /content', () => {
            expect(joinContentPath('overview')).toBe('/content/overview');
        });

        it('should accept nested and slash-wrapped content paths', () => {
            expect(joinContentPath('/workloads/apps/')).toBe('/content/workloads/apps');
        });

        /**
         * Test: Paths that resolve to /content itself or escape it have no prefix.
         */
        it('should reject paths that do not name a location beneath /content', () => {
            expect(joinContentPath('')).toBeUndefined();
            expect(joinContentPath('/')).toBeUndefined();
            expect(joinContentPath('..')).toBeUndefined();
            expect(joinContentPath('../contentious')).toBeUndefined();
        });
    });

    describe('parseContentScope', () => {
        it('should take the namespace from a leading namespace pair', () => {
            expect(parseContentScope('namespace/default/workloads/pods')).toEqual({
                namespace: 'default',
                path: 'workloads/pods'
            });
        });

        it('should return an empty path for a namespace-scoped module root', () => {
            expect(parseContentScope('namespace/kube-system')).toEqual({ namespace: 'kube-system', path: '' });
        });

        it('should leave unscoped remainders unchanged', () => {
            expect(parseContentScope('x/y')).toEqual({ path: 'x/y' });
            expect(parseContentScope('')).toEqual({ path: '' });
        });

        it('should treat a lone namespace segment as a path', () => {
            expect(parseContentScope('namespace')).toEqual({ path: 'namespace' });
        });

        /**
         * Test: Escaped and plain spellings of a namespace reach modules alike.
         */
        it('should percent-decode the namespace and path segments', () => {
            expect(parseContentScope('namespace/kube%2Dsystem/x')).toEqual({ namespace: 'kube-system', path: 'x' });
            expect(parseContentScope('config%20maps/app')).toEqual({ path: 'config maps/app' });
        });

        it('should reject a malformed escape', () => {
            expect(() => parseContentScope('namespace/%E0%A4%A/x')).toThrow(ValidationError);
        });
    });
});
