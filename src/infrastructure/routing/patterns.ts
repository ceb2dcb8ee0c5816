/**
 * @muxkit/core - Route Patterns
 *
 * Pattern grammar: `"[METHOD ]/path/with/{param}/segments"`.
 *
 * | Pattern              | Matches                                        |
 * | -------------------- | ---------------------------------------------- |
 * | `GET /users/{id}`    | GET (and HEAD) `/users/42`, binds `id`          |
 * | `/files/{path...}`   | any method, `/files/a/b.txt`, binds `path`      |
 * | `/static/`           | `/static/` and everything beneath it            |
 * | `/`                  | every path (catch-all)                          |
 * | `/posts/{$}`         | exactly `/posts/`                              |
 *
 * Patterns are translated into find-my-way route syntax
 * (`:param`, `*`, `::` for a literal colon).
 */

import { METHODS } from 'http';
import type { HTTPMethod } from 'find-my-way';
import { ConfigurationError } from '../../domain/exceptions';

/**
 * A pattern split into the pieces the substrate needs
 */
export interface ParsedPattern {
  /** Pattern as written by the caller */
  source: string;

  /** Method token, undefined when the pattern matches any method */
  method: HTTPMethod | undefined;

  /** Path part of the pattern */
  path: string;

  /** Same path in find-my-way syntax */
  routePath: string;

  /** Method + path with parameter names erased; equal keys collide */
  key: string;

  /** Trailing-slash pattern that matches a whole subtree */
  subtree: boolean;

  /** Name bound to the remainder for `{name...}` patterns */
  wildcardName: string | undefined;
}

const WILDCARD_SEGMENT = /^\{([A-Za-z_][A-Za-z0-9_]*)(\.\.\.)?\}$/;

export function isHttpMethod(value: string): value is HTTPMethod {
  return METHODS.includes(value);
}

/**
 * Parse and validate a pattern.
 *
 * @throws ConfigurationError with code `INVALID_PATTERN`
 */
export function parsePattern(source: string): ParsedPattern {
  let method: HTTPMethod | undefined;
  let path = source;

  const separator = source.search(/[ \t]/);
  if (separator !== -1) {
    const token = source.slice(0, separator);
    if (!isHttpMethod(token)) {
      throw invalid(source, `unknown method "${token}"`);
    }
    method = token;
    path = source.slice(separator + 1).replace(/^[ \t]+/, '');
  }

  if (!path.startsWith('/')) {
    throw invalid(source, "path must begin with '/'");
  }

  const segments = path.slice(1).split('/');
  const route: string[] = [];
  const key: string[] = [];
  const names = new Set<string>();
  let subtree = false;
  let wildcardName: string | undefined;

  for (let index = 0; index < segments.length; index++) {
    const segment = segments[index];
    const last = index === segments.length - 1;

    if (segment === '' && last) {
      subtree = true;
      route.push('*');
      key.push('{...}');
      continue;
    }

    if (segment === '{$}') {
      if (!last) {
        throw invalid(source, '{$} must be the last segment');
      }
      route.push('');
      key.push('{$}');
      continue;
    }

    if (segment.includes('{') || segment.includes('}')) {
      const match = WILDCARD_SEGMENT.exec(segment);
      if (!match) {
        throw invalid(source, `bad wildcard segment "${segment}"`);
      }

      const [, name, remainder] = match;
      if (names.has(name)) {
        throw invalid(source, `duplicate wildcard name "${name}"`);
      }
      names.add(name);

      if (remainder) {
        if (!last) {
          throw invalid(source, `{${name}...} must be the last segment`);
        }
        wildcardName = name;
        route.push('*');
        key.push('{...}');
      } else {
        route.push(`:${name}`);
        key.push('{}');
      }
      continue;
    }

    if (segment.includes('*')) {
      throw invalid(source, `literal "*" is not supported in segment "${segment}"`);
    }

    route.push(segment.replace(/:/g, '::'));
    key.push(segment);
  }

  return {
    source,
    method,
    path,
    routePath: `/${route.join('/')}`,
    key: `${method ?? 'ANY'} /${key.join('/')}`,
    subtree,
    wildcardName,
  };
}

function invalid(pattern: string, reason: string): ConfigurationError {
  return new ConfigurationError(
    'INVALID_PATTERN',
    `Invalid pattern "${pattern}": ${reason}`,
    pattern,
  );
}
