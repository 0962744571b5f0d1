/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { IClusterInfoProvider, INamespaceProvider, NavigationFailurePolicy } from '@clusterview/types';
import { createExpressApp } from '../express.js';
import { ModuleRegistryBuilder } from '../../modules/registry/index.js';
import { NavigationAggregator } from '../../modules/navigation/index.js';
import { NamespaceManager, StaticClusterClient } from '../../services/cluster/index.js';
import { FakeModule, MockLogger } from '../../../tests/support/dashboard-fakes.js';
import { startTestServer, type ITestServer } from '../../../tests/support/http-client.js';

const CLUSTER_INFO = {
    context: 'test-context',
    cluster: 'test-cluster',
    server: 'https://127.0.0.1:6443',
    user: 'test-user'
};

interface IAppFixture {
    modules?: FakeModule[];
    namespaceProvider?: INamespaceProvider;
    clusterInfoProvider?: IClusterInfoProvider;
    policy?: NavigationFailurePolicy;
}

describe('createExpressApp', () => {
    let logger: MockLogger;
    let namespaceManager: NamespaceManager;
    let server: ITestServer | undefined;

    beforeEach(() => {
        logger = new MockLogger();
        namespaceManager = new NamespaceManager('default', logger);
        server = undefined;
    });

    afterEach(async () => {
        await server?.close();
    });

    async function start(fixture: IAppFixture = {}): Promise<ITestServer> {
        const builder = new ModuleRegistryBuilder(logger);
        (fixture.modules ?? [new FakeModule('overview')]).forEach(module => builder.register(module));
        const registry = builder.build();
        const clusterClient = new StaticClusterClient({ namespaces: ['default', 'kube-system'], info: CLUSTER_INFO });

        const app = createExpressApp({
            prefix: '/api/v1',
            acceptedHosts: ['localhost', '127.0.0.1'],
            registry,
            aggregator: new NavigationAggregator(registry, logger, { policy: fixture.policy }),
            namespaceProvider: fixture.namespaceProvider ?? clusterClient,
            clusterInfoProvider: fixture.clusterInfoProvider ?? clusterClient,
            namespaceManager,
            logger
        });

        server = await startTestServer(app);
        return server;
    }

    describe('host-rebinding guard', () => {
        /**
         * Test: Every route rejects an unaccepted Host before any handler runs.
         */
        it.each(['/api/v1/navigation', '/api/v1/content/overview/x', '/api/v1/namespaces', '/healthz'])(
            'should reject a spoofed host on %s',
            async path => {
                const overview = new FakeModule('overview');
                const { request } = await start({ modules: [overview] });

                const response = await request({ path, headers: { host: 'rebind.attacker.example:7777' } });

                expect(response.status).toBe(403);
                expect(response.text).toBe('{"error":{"code":403,"message":"forbidden"}}');
                expect(overview.navigationCalls).toHaveLength(0);
                expect(overview.contentRequests).toHaveLength(0);
            }
        );

        it('should serve requests whose host is accepted', async () => {
            const { request } = await start();

            const response = await request({ path: '/healthz', headers: { host: 'localhost:7777' } });

            expect(response.status).toBe(200);
            expect(response.body).toEqual({ status: 'ok' });
        });
    });

    describe('not found', () => {
        it('should answer unmatched paths with the 404 envelope', async () => {
            const { request } = await start();

            const response = await request({ path: '/does-not-exist' });

            expect(response.status).toBe(404);
            expect(response.text).toBe('{"error":{"code":404,"message":"not found"}}');
        });

        it('should answer unmatched paths under the prefix with the 404 envelope', async () => {
            const { request } = await start();

            const response = await request({ path: '/api/v1/does-not-exist' });

            expect(response.status).toBe(404);
            expect(response.body).toEqual({ error: { code: 404, message: 'not found' } });
        });

        it('should not serve navigation for other methods', async () => {
            const { request } = await start();

            const response = await request({ method: 'DELETE', path: '/api/v1/navigation' });

            expect(response.status).toBe(404);
        });
    });

    describe('navigation', () => {
        it('should compose sections in registration order', async () => {
            const { request } = await start({
                modules: [new FakeModule('workloads'), new FakeModule('overview')]
            });

            const response = await request({ path: '/api/v1/navigation' });

            expect(response.status).toBe(200);
            expect(response.body).toMatchObject({
                sections: [
                    { title: 'workloads', path: '/content/workloads/namespace/default', children: [] },
                    { title: 'overview', path: '/content/overview/namespace/default', children: [] }
                ]
            });
        });

        it('should scope navigation to a namespace in the path', async () => {
            const overview = new FakeModule('overview');
            const { request } = await start({ modules: [overview] });

            await request({ path: '/api/v1/navigation/namespace/kube-system' });

            expect(overview.navigationCalls[0].namespace).toBe('kube-system');
        });

        it('should fail the whole request when one module fails', async () => {
            const { request } = await start({
                modules: [new FakeModule('overview'), new FakeModule('broken', 'broken', { navigationError: new Error('x') })]
            });

            const response = await request({ path: '/api/v1/navigation' });

            expect(response.status).toBe(500);
            expect(response.body).toEqual({ error: { code: 500, message: 'unable to generate navigation' } });
        });

        /**
         * Test: Under the degrade policy the failure annotation carries a
         * generic message; the module's error stays in the log.
         */
        it('should not expose module error messages under the degrade policy', async () => {
            const cause = new Error('dial tcp 10.0.0.5:6443: token test-secret rejected');
            const { request } = await start({
                modules: [new FakeModule('overview'), new FakeModule('broken', 'broken', { navigationError: cause })],
                policy: 'degrade'
            });

            const response = await request({ path: '/api/v1/navigation' });

            expect(response.status).toBe(200);
            expect(response.body).toMatchObject({
                failures: [{ module: 'broken', contentPath: '/content/broken', message: 'unable to generate navigation' }]
            });
            expect(response.text).not.toContain('10.0.0.5');
            expect(response.text).not.toContain('test-secret');
            expect(logger.error).toHaveBeenCalledWith(
                { error: cause, module: 'broken', contentPath: '/content/broken', namespace: 'default' },
                'module navigation failed'
            );
        });
    });

    describe('content', () => {
        it('should delegate the suffix beneath the module prefix', async () => {
            const { request } = await start();

            const response = await request({ path: '/api/v1/content/overview/x/y' });

            expect(response.status).toBe(200);
            expect(response.body).toEqual({
                module: 'overview',
                prefix: '/content/overview',
                path: 'x/y',
                namespace: 'default'
            });
        });

        it('should decode an escaped namespace in the content path', async () => {
            const overview = new FakeModule('overview');
            const { request } = await start({ modules: [overview] });

            const response = await request({ path: '/api/v1/content/overview/namespace/kube%2Dsystem/x' });

            expect(response.body).toEqual({
                module: 'overview',
                prefix: '/content/overview',
                path: 'x',
                namespace: 'kube-system'
            });
        });

        it('should answer 400 for a malformed escape in the content path', async () => {
            const overview = new FakeModule('overview');
            const { request } = await start({ modules: [overview] });

            const response = await request({ path: '/api/v1/content/overview/namespace/%E0%A4%A/x' });

            expect(response.status).toBe(400);
            expect(response.text).toBe('{"error":{"code":400,"message":"invalid request"}}');
            expect(overview.contentRequests).toHaveLength(0);
        });

        it('should use the current namespace set through the API', async () => {
            const { request } = await start();

            await request({ method: 'POST', path: '/api/v1/namespace', body: { namespace: 'kube-system' } });
            const response = await request({ path: '/api/v1/content/overview' });

            expect(response.body).toMatchObject({ namespace: 'kube-system', path: '' });
        });
    });

    describe('namespaces and namespace', () => {
        it('should list namespaces', async () => {
            const { request } = await start();

            const response = await request({ path: '/api/v1/namespaces' });

            expect(response.body).toEqual({ namespaces: ['default', 'kube-system'] });
        });

        it('should answer 500 when listing namespaces fails', async () => {
            const { request } = await start({
                namespaceProvider: { list: async () => Promise.reject(new Error('unauthorized')) }
            });

            const response = await request({ path: '/api/v1/namespaces' });

            expect(response.status).toBe(500);
            expect(response.body).toEqual({ error: { code: 500, message: 'unable to list namespaces' } });
        });

        it('should read and update the current namespace', async () => {
            const { request } = await start();

            const before = await request({ path: '/api/v1/namespace' });
            const update = await request({ method: 'POST', path: '/api/v1/namespace', body: { namespace: ' team-a ' } });
            const after = await request({ path: '/api/v1/namespace' });

            expect(before.body).toEqual({ namespace: 'default' });
            expect(update.body).toEqual({ namespace: 'team-a' });
            expect(after.body).toEqual({ namespace: 'team-a' });
        });

        it('should reject an invalid namespace update', async () => {
            const { request } = await start();

            const response = await request({ method: 'POST', path: '/api/v1/namespace', body: { namespace: '' } });

            expect(response.status).toBe(400);
            expect(response.body).toEqual({ error: { code: 400, message: 'invalid request' } });
            expect(namespaceManager.getNamespace()).toBe('default');
        });

        it('should reject malformed JSON', async () => {
            const { request } = await start();

            const response = await request({
                method: 'POST',
                path: '/api/v1/namespace',
                headers: { 'content-type': 'application/json' },
                body: 'not json'
            });

            expect(response.status).toBe(400);
            expect(response.body).toEqual({ error: { code: 400, message: 'invalid request' } });
        });
    });

    describe('cluster-info', () => {
        it.each(['GET', 'POST'])('should serve cluster info for %s', async method => {
            const { request } = await start();

            const response = await request({ method, path: '/api/v1/cluster-info' });

            expect(response.status).toBe(200);
            expect(response.body).toEqual(CLUSTER_INFO);
        });

        it('should answer 500 when cluster info is unavailable', async () => {
            const { request } = await start({
                clusterInfoProvider: { get: async () => Promise.reject(new Error('no kubeconfig')) }
            });

            const response = await request({ path: '/api/v1/cluster-info' });

            expect(response.body).toEqual({ error: { code: 500, message: 'unable to get cluster info' } });
        });
    });
});
