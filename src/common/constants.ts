export const GITHUB_ACTIVITY_OPTIONS = 'GITHUB_ACTIVITY_OPTIONS';

export const CREDENTIAL_STORE = 'ICredentialStore';

export const OAUTH_STATE_STORE = 'IOAuthStateStore';

/** Outbound HTTP. Defaults to the global `fetch`; tests swap in a scripted one. */
export const HTTP_FETCH = 'HTTP_FETCH';

/** Waits between device-flow polls. */
export const SLEEP = 'SLEEP';

export type FetchFn = typeof fetch;

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));
