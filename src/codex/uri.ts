/**
 * Codex URIs
 * `/codex/{kind}/{slug}/`, with an optional scheme and host in front.
 */

import { CODEX_KINDS, type CodexKind } from '../types.js';

export interface CodexUriParts {
  kind: CodexKind;
  slug: string;
}

function isCodexKind(value: string): value is CodexKind {
  return (CODEX_KINDS as readonly string[]).includes(value);
}

/**
 * Split a codex URI into kind and slug. Returns null for anything that
 * isn't a codex entity path.
 */
export function parseCodexUri(uri: string): CodexUriParts | null {
  let path = uri.trim();
  const schemeEnd = path.indexOf('://');
  if (schemeEnd !== -1) {
    const pathStart = path.indexOf('/', schemeEnd + 3);
    path = pathStart === -1 ? '' : path.slice(pathStart);
  }
  const query = path.search(/[?#]/);
  if (query !== -1) path = path.slice(0, query);

  const segments = path.split('/').filter(s => s.length > 0);
  if (segments.length !== 3 || segments[0] !== 'codex') return null;
  const [, kind, slug] = segments;
  if (!isCodexKind(kind)) return null;
  return { kind, slug };
}

export function codexUri(kind: CodexKind, slug: string): string {
  return `/codex/${kind}/${slug}/`;
}

/** Index key shared by both sides of a lookup: `kind/slug`. */
export function codexKey(kind: CodexKind, slug: string): string {
  return `${kind}/${slug}`;
}

export function codexKeyOfUri(uri: string): string | null {
  const parts = parseCodexUri(uri);
  return parts ? codexKey(parts.kind, parts.slug) : null;
}
