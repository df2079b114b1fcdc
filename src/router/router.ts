// This module routes URIs such as resource addresses to handlers using fixed and `{name}` parameter segments.

const PARAM_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export interface RouteRequest {
  uri: string;
  // Host and path parameters bound by the matched route.
  params: Record<string, string>;
  // Every query pair of the incoming URI, including keys the route does not mention.
  query: Record<string, string>;
}

export interface RouteContext {
  signal?: AbortSignal;
}

export type RouteHandler<T> = (request: RouteRequest, context: RouteContext) => T | Promise<T>;

export class RouteNotFoundError extends Error {
  public readonly uri: string;

  public constructor(uri: string) {
    super(`No route matches ${uri}.`);
    this.name = 'RouteNotFoundError';
    this.uri = uri;
  }
}

export class RoutePatternError extends Error {
  public readonly pattern: string;

  public constructor(pattern: string, reason: string) {
    super(`Invalid route pattern ${pattern}: ${reason}.`);
    this.name = 'RoutePatternError';
    this.pattern = pattern;
  }
}

export class RouteConflictError extends Error {
  public readonly pattern: string;
  public readonly existing: string;

  public constructor(pattern: string, existing: string) {
    super(`Route ${pattern} conflicts with registered route ${existing}.`);
    this.name = 'RouteConflictError';
    this.pattern = pattern;
    this.existing = existing;
  }
}

export class UriParseError extends Error {
  public readonly uri: string;

  public constructor(uri: string, reason: string) {
    super(`Invalid URI ${uri}: ${reason}.`);
    this.name = 'UriParseError';
    this.uri = uri;
  }
}

type HostPattern =
  | { kind: 'fixed'; host: string }
  | { kind: 'param'; name: string; prefix: string; suffix: string };

type PathSegment = { kind: 'fixed'; literal: string } | { kind: 'param'; name: string };

interface Route<T> {
  scheme: string;
  host: HostPattern;
  segments: PathSegment[];
  query: Map<string, string>;
  handler: RouteHandler<T>;
}

interface UriParts {
  scheme: string;
  host: string;
  path: string;
  rawQuery: string;
}

interface ParsedUri {
  scheme: string;
  host: string;
  segments: string[];
  query: Map<string, string>;
}

// This helper splits a URI into scheme, authority, path and query without resolving it against anything.
function splitUri(raw: string): UriParts | string {
  const schemeEnd = raw.indexOf('://');
  if (schemeEnd <= 0) {
    return 'scheme is required';
  }

  const scheme = raw.slice(0, schemeEnd).toLowerCase();
  const hashIndex = raw.indexOf('#', schemeEnd + 3);
  const remainder = raw.slice(schemeEnd + 3, hashIndex === -1 ? undefined : hashIndex);

  const queryIndex = remainder.indexOf('?');
  const beforeQuery = queryIndex === -1 ? remainder : remainder.slice(0, queryIndex);
  const rawQuery = queryIndex === -1 ? '' : remainder.slice(queryIndex + 1);

  const slashIndex = beforeQuery.indexOf('/');
  const host = slashIndex === -1 ? beforeQuery : beforeQuery.slice(0, slashIndex);
  const path = slashIndex === -1 ? '' : beforeQuery.slice(slashIndex);

  if (host === '') {
    return 'host is required';
  }

  return { scheme, host: host.toLowerCase(), path, rawQuery };
}

function decodeComponent(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

// Consecutive and trailing slashes collapse, so `/a//b/` has the segments `a` and `b`.
function splitPath(path: string): string[] {
  return path.split('/').filter((segment) => segment !== '');
}

// This function parses `a=1&b=2` into ordered pairs; empty or duplicate keys and bad escapes fail.
function parseQuery(rawQuery: string): Map<string, string> | string {
  const query = new Map<string, string>();
  if (rawQuery === '') {
    return query;
  }

  for (const pair of rawQuery.split('&')) {
    if (pair === '') {
      continue;
    }

    const equalsIndex = pair.indexOf('=');
    const rawKey = equalsIndex === -1 ? pair : pair.slice(0, equalsIndex);
    const rawValue = equalsIndex === -1 ? '' : pair.slice(equalsIndex + 1);
    const key = decodeComponent(rawKey.replace(/\+/g, ' '));
    const value = decodeComponent(rawValue.replace(/\+/g, ' '));

    if (key === null || value === null) {
      return `malformed escape in query pair ${pair}`;
    }

    if (key === '') {
      return 'query key cannot be empty';
    }

    if (query.has(key)) {
      return `duplicate query key ${key}`;
    }

    query.set(key, value);
  }

  return query;
}

function parseHostPattern(pattern: string, host: string): HostPattern {
  const open = host.indexOf('{');
  const close = host.indexOf('}');
  if (open === -1 && close === -1) {
    return { kind: 'fixed', host };
  }

  if (open === -1 || close < open || host.indexOf('{', open + 1) !== -1 || host.indexOf('}', close + 1) !== -1) {
    throw new RoutePatternError(pattern, 'host takes at most one {name} parameter');
  }

  const name = host.slice(open + 1, close);
  if (!PARAM_NAME_PATTERN.test(name)) {
    throw new RoutePatternError(pattern, `invalid host parameter name "${name}"`);
  }

  return { kind: 'param', name, prefix: host.slice(0, open), suffix: host.slice(close + 1) };
}

function parsePathPattern(pattern: string, path: string): PathSegment[] {
  return splitPath(path).map((segment) => {
    if (segment.startsWith('{') && segment.endsWith('}')) {
      const name = segment.slice(1, -1);
      if (!PARAM_NAME_PATTERN.test(name)) {
        throw new RoutePatternError(pattern, `invalid path parameter name "${name}"`);
      }

      return { kind: 'param', name };
    }

    if (segment.includes('{') || segment.includes('}')) {
      throw new RoutePatternError(pattern, `parameter must span the whole segment "${segment}"`);
    }

    const literal = decodeComponent(segment);
    if (literal === null) {
      throw new RoutePatternError(pattern, `malformed escape in segment "${segment}"`);
    }

    return { kind: 'fixed', literal };
  });
}

function assertUniqueParamNames(pattern: string, host: HostPattern, segments: PathSegment[]): void {
  const used = new Set<string>();
  if (host.kind === 'param') {
    used.add(host.name);
  }

  for (const segment of segments) {
    if (segment.kind !== 'param') {
      continue;
    }

    if (used.has(segment.name)) {
      throw new RoutePatternError(pattern, `parameter name "${segment.name}" is used twice`);
    }

    used.add(segment.name);
  }
}

function sameHostCoverage(left: HostPattern, right: HostPattern): boolean {
  if (left.kind === 'fixed') {
    return right.kind === 'fixed' && right.host === left.host;
  }

  return right.kind === 'param' && right.prefix === left.prefix && right.suffix === left.suffix;
}

function sameSegmentCoverage(left: PathSegment, right: PathSegment): boolean {
  if (left.kind === 'param') {
    return right.kind === 'param';
  }

  return right.kind === 'fixed' && right.literal === left.literal;
}

// Two routes cover the same URIs when they differ at most in parameter names.
function sameCoverage<T>(left: Route<T>, right: Route<T>): boolean {
  if (left.scheme !== right.scheme || !sameHostCoverage(left.host, right.host)) {
    return false;
  }

  if (left.segments.length !== right.segments.length) {
    return false;
  }

  for (let index = 0; index < left.segments.length; index += 1) {
    if (!sameSegmentCoverage(left.segments[index], right.segments[index])) {
      return false;
    }
  }

  if (left.query.size !== right.query.size) {
    return false;
  }

  for (const [key, value] of left.query) {
    if (right.query.get(key) !== value) {
      return false;
    }
  }

  return true;
}

// A fixed host counts once, and so does every fixed path segment.
function specificity<T>(route: Route<T>): number {
  let score = route.host.kind === 'fixed' ? 1 : 0;
  for (const segment of route.segments) {
    if (segment.kind === 'fixed') {
      score += 1;
    }
  }

  return score;
}

function formatRoute<T>(route: Route<T>): string {
  const host =
    route.host.kind === 'fixed' ? route.host.host : `${route.host.prefix}{${route.host.name}}${route.host.suffix}`;
  const path = route.segments
    .map((segment) => (segment.kind === 'fixed' ? segment.literal : `{${segment.name}}`))
    .join('/');
  const query = [...route.query.entries()]
    .sort(([left], [right]) => left.localeCompare(right))
    .map(([key, value]) => `${key}=${value}`)
    .join('&');

  return `${route.scheme}://${host}/${path}${query === '' ? '' : `?${query}`}`;
}

function matchHost(pattern: HostPattern, host: string, params: Record<string, string>): boolean {
  if (pattern.kind === 'fixed') {
    return pattern.host === host;
  }

  if (!host.startsWith(pattern.prefix) || !host.endsWith(pattern.suffix)) {
    return false;
  }

  // Overlapping prefix and suffix leave an empty remainder.
  const value = host.slice(pattern.prefix.length, host.length - pattern.suffix.length);
  if (value === '') {
    return false;
  }

  params[pattern.name] = value;
  return true;
}

function matchRoute<T>(route: Route<T>, uri: ParsedUri): Record<string, string> | null {
  if (route.scheme !== uri.scheme) {
    return null;
  }

  const params: Record<string, string> = {};
  if (!matchHost(route.host, uri.host, params)) {
    return null;
  }

  if (route.segments.length !== uri.segments.length) {
    return null;
  }

  for (let index = 0; index < route.segments.length; index += 1) {
    const segment = route.segments[index];
    const value = uri.segments[index];
    if (segment.kind === 'param') {
      params[segment.name] = value;
    } else if (segment.literal !== value) {
      return null;
    }
  }

  for (const [key, value] of route.query) {
    if (uri.query.get(key) !== value) {
      return null;
    }
  }

  return params;
}

function parseIncomingUri(raw: string): ParsedUri {
  const parts = splitUri(raw);
  if (typeof parts === 'string') {
    throw new UriParseError(raw, parts);
  }

  const segments: string[] = [];
  for (const segment of splitPath(parts.path)) {
    const decoded = decodeComponent(segment);
    if (decoded === null) {
      throw new UriParseError(raw, `malformed escape in segment "${segment}"`);
    }

    segments.push(decoded);
  }

  const query = parseQuery(parts.rawQuery);
  if (typeof query === 'string') {
    throw new UriParseError(raw, query);
  }

  return { scheme: parts.scheme, host: parts.host, segments, query };
}

export class UriRouter<T> {
  private readonly table: Array<Route<T>> = [];
  private notFoundHandler: RouteHandler<T> | null = null;

  // This method registers a handler; invalid patterns and routes covering an existing route are rejected.
  public handle(pattern: string, handler: RouteHandler<T>): this {
    const parts = splitUri(pattern);
    if (typeof parts === 'string') {
      throw new RoutePatternError(pattern, parts);
    }

    const host = parseHostPattern(pattern, parts.host);
    const segments = parsePathPattern(pattern, parts.path);
    assertUniqueParamNames(pattern, host, segments);

    const query = parseQuery(parts.rawQuery);
    if (typeof query === 'string') {
      throw new RoutePatternError(pattern, query);
    }

    for (const key of query.keys()) {
      if (key.startsWith('{') && key.endsWith('}')) {
        throw new RoutePatternError(pattern, `query key ${key} cannot be a parameter`);
      }
    }

    const route: Route<T> = { scheme: parts.scheme, host, segments, query, handler };
    const existing = this.table.find((candidate) => sameCoverage(candidate, route));
    if (existing) {
      throw new RouteConflictError(formatRoute(route), formatRoute(existing));
    }

    this.table.push(route);
    return this;
  }

  public setNotFoundHandler(handler: RouteHandler<T> | null): this {
    this.notFoundHandler = handler;
    return this;
  }

  public routes(): string[] {
    return this.table.map((route) => formatRoute(route));
  }

  public get size(): number {
    return this.table.length;
  }

  // This method runs the most specific matching route; equal scores go to the earliest registration.
  public async execute(rawUri: string, context: RouteContext = {}): Promise<T> {
    const uri = parseIncomingUri(rawUri);
    const query = Object.fromEntries(uri.query);

    let best: { route: Route<T>; params: Record<string, string>; score: number } | null = null;
    for (const route of this.table) {
      const params = matchRoute(route, uri);
      if (!params) {
        continue;
      }

      const score = specificity(route);
      if (!best || score > best.score) {
        best = { route, params, score };
      }
    }

    if (!best) {
      if (this.notFoundHandler) {
        return this.notFoundHandler({ uri: rawUri, params: {}, query }, context);
      }

      throw new RouteNotFoundError(rawUri);
    }

    return best.route.handler({ uri: rawUri, params: best.params, query }, context);
  }
}
