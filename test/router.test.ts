// This test suite verifies URI routing: specificity, host parameters, query constraints and pattern validation.

import { describe, expect, it } from 'vitest';
import {
  RouteConflictError,
  RouteNotFoundError,
  RoutePatternError,
  UriParseError,
  UriRouter
} from '../src/router/router.js';

describe('uri router matching', () => {
  it('prefers fixed segments over parameters regardless of registration order', async () => {
    const router = new UriRouter<string>()
      .handle('mcp://users/{id}', (request) => `user:${request.params.id}`)
      .handle('mcp://users/profile', () => 'profile');

    await expect(router.execute('mcp://users/profile')).resolves.toBe('profile');
    await expect(router.execute('mcp://users/42')).resolves.toBe('user:42');
  });

  it('selects the fixed users route over the parameterized one on plain http URIs', async () => {
    const router = new UriRouter<string>()
      .handle('http://example.com/users/{id}', (request) => `user:${request.params.id}`)
      .handle('http://example.com/users/profile', () => 'profile')
      .handle('http://{sub}.example.com/x', (request) => `sub:${request.params.sub}`);

    await expect(router.execute('http://example.com/users/profile')).resolves.toBe('profile');
    await expect(router.execute('http://test.example.com/x')).resolves.toBe('sub:test');
    expect(() => router.handle('http://example.com/users/profile', () => 'again')).toThrow(RouteConflictError);
  });

  it('binds a host parameter between its literal prefix and suffix', async () => {
    const router = new UriRouter<Record<string, string>>().handle(
      'https://{sub}.example.com/',
      (request) => request.params
    );

    await expect(router.execute('https://test.example.com')).resolves.toEqual({ sub: 'test' });
    await expect(router.execute('https://example.com')).rejects.toThrow('No route matches https://example.com.');
  });

  it('gives ties to the route registered first', async () => {
    const router = new UriRouter<string>()
      .handle('mcp://{tenant}/items', () => 'tenant-items')
      .handle('mcp://shop/{kind}', () => 'shop-kind');

    await expect(router.execute('mcp://shop/items')).resolves.toBe('tenant-items');
  });

  it('requires the route query pairs and exposes every incoming pair', async () => {
    const router = new UriRouter<Record<string, string>>().handle(
      'mcp://search/items?kind=book',
      (request) => request.query
    );

    await expect(router.execute('mcp://search/items?kind=book&q=hello+world%21')).resolves.toEqual({
      kind: 'book',
      q: 'hello world!'
    });
    await expect(router.execute('mcp://search/items?kind=film')).rejects.toBeInstanceOf(RouteNotFoundError);
  });

  it('decodes path segments before binding them', async () => {
    const router = new UriRouter<string>().handle('mcp://files/{name}', (request) => request.params.name);

    await expect(router.execute('mcp://files/annual%20report.pdf')).resolves.toBe('annual report.pdf');
  });

  it('folds scheme and host case, collapses slashes and drops fragments', async () => {
    const router = new UriRouter<string>().handle('mcp://users/profile', () => 'profile');

    await expect(router.execute('MCP://Users/profile')).resolves.toBe('profile');
    await expect(router.execute('mcp://users//profile/')).resolves.toBe('profile');
    await expect(router.execute('mcp://users/profile#top')).resolves.toBe('profile');
    await expect(router.execute('mcp://users/Profile')).rejects.toBeInstanceOf(RouteNotFoundError);
  });

  it('hands unmatched URIs to the fallback handler with their query', async () => {
    const router = new UriRouter<unknown>()
      .handle('mcp://users/profile', () => 'profile')
      .setNotFoundHandler((request) => request);

    await expect(router.execute('mcp://none/x?a=1')).resolves.toEqual({
      uri: 'mcp://none/x?a=1',
      params: {},
      query: { a: '1' }
    });
  });

  it('passes the caller context to the handler', async () => {
    const controller = new AbortController();
    const router = new UriRouter<boolean>().handle('mcp://jobs/{id}', (_request, context) => context.signal === controller.signal);

    await expect(router.execute('mcp://jobs/1', { signal: controller.signal })).resolves.toBe(true);
  });

  it('reports malformed incoming URIs as parse errors', async () => {
    const router = new UriRouter<string>().handle('mcp://files/{name}', () => 'file');

    await expect(router.execute('mcp://files/%E0%A4%A')).rejects.toBeInstanceOf(UriParseError);
    await expect(router.execute('mcp://files/%E0%A4%A')).rejects.toThrow(
      'Invalid URI mcp://files/%E0%A4%A: malformed escape in segment "%E0%A4%A".'
    );
    await expect(router.execute('files/report')).rejects.toThrow('Invalid URI files/report: scheme is required.');
    await expect(router.execute('mcp://files/a?x=1&x=2')).rejects.toThrow('duplicate query key x');
    await expect(router.execute('mcp:///a')).rejects.toThrow('host is required');
  });
});

describe('uri router registration', () => {
  it('rejects routes that cover the same URIs as an earlier route', () => {
    const router = new UriRouter<string>().handle('mcp://users/{id}', () => 'a');

    expect(() => router.handle('mcp://users/{user}', () => 'b')).toThrow(RouteConflictError);
    expect(() => router.handle('mcp://users/{user}', () => 'b')).toThrow(
      'Route mcp://users/{user} conflicts with registered route mcp://users/{id}.'
    );
    expect(router.size).toBe(1);
  });

  it('detects conflicts between fixed routes after normalization and keeps query values distinct', async () => {
    const router = new UriRouter<string>().handle('http://example.com/a/b?x=1', () => 'one');

    expect(() => router.handle('HTTP://EXAMPLE.com/a//b/?x=1', () => 'again')).toThrow(
      'Route http://example.com/a/b?x=1 conflicts with registered route http://example.com/a/b?x=1.'
    );

    router.handle('http://example.com/a/b?x=2', () => 'two');
    await expect(router.execute('http://example.com/a/b?x=2')).resolves.toBe('two');
    await expect(router.execute('http://example.com/a/b?x=1')).resolves.toBe('one');
    expect(router.routes()).toEqual(['http://example.com/a/b?x=1', 'http://example.com/a/b?x=2']);
  });

  it('treats host parameters with different literals as distinct routes', () => {
    const router = new UriRouter<string>()
      .handle('https://{sub}.example.com/', () => 'a')
      .handle('https://{sub}.example.org/', () => 'b');

    expect(router.routes()).toEqual(['https://{sub}.example.com/', 'https://{sub}.example.org/']);
  });

  it('rejects malformed patterns', () => {
    const router = new UriRouter<string>();
    const handler = (): string => 'x';

    expect(() => router.handle('users/{id}', handler)).toThrow('Invalid route pattern users/{id}: scheme is required.');
    expect(() => router.handle('mcp://files/a{id}', handler)).toThrow(RoutePatternError);
    expect(() => router.handle('mcp://{id}.host/{id}', handler)).toThrow('parameter name "id" is used twice');
    expect(() => router.handle('mcp://files/{bad name}', handler)).toThrow('invalid path parameter name "bad name"');
    expect(() => router.handle('mcp://files/list?{k}=v', handler)).toThrow('query key {k} cannot be a parameter');
    expect(() => router.handle('mcp://{a}{b}/x', handler)).toThrow('host takes at most one {name} parameter');
  });

  it('lists routes in registration order with sorted query keys', () => {
    const router = new UriRouter<string>()
      .handle('mcp://server', () => 'root')
      .handle('mcp://search/items?z=1&a=2', () => 'items');

    expect(router.routes()).toEqual(['mcp://server/', 'mcp://search/items?a=2&z=1']);
  });
});
