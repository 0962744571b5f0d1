/**
 * Holds the namespace the dashboard is currently looking at.
 *
 * The current namespace scopes navigation and content requests that do not
 * name a namespace themselves. Clients read and change it through
 * `GET` and `POST /namespace`.
 */
export interface INamespaceManager {
    getNamespace(): string;

    setNamespace(namespace: string): void;
}
