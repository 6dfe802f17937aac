import {
  DEFAULT_PREFERENCES,
  UserAccountInput,
} from '../src/accounts/interfaces/user-account.interface';
import type { FetchFn } from '../src/common/constants';
import type { GitHubActivityModuleOptions } from '../src/interfaces/module-options.interface';

export function buildAccountInput(
  overrides: Partial<UserAccountInput> = {},
): UserAccountInput {
  return {
    githubId: 1001,
    username: 'octo-test',
    email: 'octo@example.com',
    name: 'Octo Test',
    avatarUrl: null,
    publicRepos: 3,
    privateRepos: 1,
    followers: 0,
    following: 2,
    preferences: { ...DEFAULT_PREFERENCES },
    encryptedAccessToken: 'aa:bb:cc',
    tokenExpiresAt: null,
    encryptedRefreshToken: null,
    ...overrides,
  };
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {},
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export interface RecordedRequest {
  url: URL;
  method: string;
  headers: Headers;
  body?: string;
}

type Route = (request: RecordedRequest) => Response | Promise<Response>;

/**
 * In-process stand-in for `fetch`. Routes match on `METHOD pathname`, first
 * registered wins; unmatched requests fail the test with a 599.
 */
export class ScriptedFetch {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Array<{ key: string; route: Route }> = [];

  on(method: string, pathname: string, route: Route): this {
    this.routes.push({ key: `${method.toUpperCase()} ${pathname}`, route });
    return this;
  }

  /** Responds to successive calls with successive entries, repeating the last. */
  sequence(method: string, pathname: string, responses: Route[]): this {
    let index = 0;
    return this.on(method, pathname, (request) => {
      const route = responses[Math.min(index, responses.length - 1)];
      index++;
      return route(request);
    });
  }

  calls(method: string, pathname: string): RecordedRequest[] {
    return this.requests.filter(
      (request) =>
        request.method === method.toUpperCase() &&
        request.url.pathname === pathname,
    );
  }

  readonly fetch: FetchFn = async (input, init) => {
    const url = new URL(
      typeof input === 'string' ? input : input instanceof URL ? input.href : input.url,
    );
    const method = (init?.method ?? 'GET').toUpperCase();
    const request: RecordedRequest = {
      url,
      method,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    };
    this.requests.push(request);

    const match = this.routes.find(
      ({ key }) => key === `${method} ${url.pathname}`,
    );
    if (!match) {
      return jsonResponse({ message: `No scripted route for ${method} ${url.pathname}` }, 599);
    }
    return match.route(request);
  };
}

export class RecordingSleep {
  readonly calls: number[] = [];

  readonly sleep = async (ms: number): Promise<void> => {
    this.calls.push(ms);
  };
}

export const TEST_MODULE_OPTIONS: GitHubActivityModuleOptions = {
  github: {
    clientId: 'test-client',
    clientSecret: 'test-client-secret',
    redirectUri: 'http://localhost:5001/auth/github/callback',
    deviceClientId: 'test-device-client',
    authorizeUrl: 'https://github.test/login/oauth/authorize',
    tokenUrl: 'https://github.test/login/oauth/access_token',
    deviceCodeUrl: 'https://github.test/login/device/code',
    apiBaseUrl: 'https://api.github.test',
  },
  session: { secret: 'test-secret' },
  encryption: { secret: 'test-encryption-secret' },
  logging: false,
};

export const TEST_GITHUB_USER = {
  id: 42,
  login: 'octo-test',
  email: 'octo@example.com',
  name: 'Octo Test',
  avatar_url: null,
  public_repos: 3,
  total_private_repos: 1,
  followers: 5,
  following: 2,
};

/** Scripts a successful code exchange for `gho-test-token` and its /user lookup. */
export function scriptSignIn(scripted: ScriptedFetch): ScriptedFetch {
  return scripted
    .on('POST', '/login/oauth/access_token', () =>
      jsonResponse({
        access_token: 'gho-test-token',
        token_type: 'bearer',
        scope: 'repo,read:org,read:user',
      }),
    )
    .on('GET', '/user', () => jsonResponse(TEST_GITHUB_USER));
}
