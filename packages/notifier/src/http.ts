// Shared HTTP plumbing

/**
 * The fetch signature every collaborator accepts, so tests can pass a fake.
 */
export type FetchFn = typeof fetch;
