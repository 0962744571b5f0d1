import type { ILogger, INamespaceManager } from '@clusterview/types';

/**
 * In-memory holder of the dashboard's current namespace.
 */
export class NamespaceManager implements INamespaceManager {
    private namespace: string;

    constructor(initialNamespace: string, private readonly logger: ILogger) {
        this.namespace = initialNamespace;
    }

    getNamespace(): string {
        return this.namespace;
    }

    setNamespace(namespace: string): void {
        if (namespace === this.namespace) {
            return;
        }

        const previous = this.namespace;
        this.namespace = namespace;
        this.logger.info({ namespace, previous }, 'current namespace changed');
    }
}
