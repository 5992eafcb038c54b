/**
 * Codex client
 * Read-only access to the public codex. List pages are paginated with `?p=N`
 * starting at 2; entity pages live at `/codex/{kind}/{slug}/`.
 */

import { codexCircuitBreaker } from '../circuitBreaker.js';
import { codexUri } from '../codex/uri.js';
import { config } from '../config.js';
import { CODEX_PARSERS, parseCodexList } from './codexPages.js';
import { HtmlClient } from './http.js';
import type { CodexEntityMap, CodexKind, CodexListEntry } from '../types.js';

export interface Codex {
  list(kind: CodexKind): Promise<CodexListEntry[]>;
  fetch<K extends CodexKind>(kind: K, slug: string): Promise<CodexEntityMap[K]>;
}

export interface HttpCodexOptions {
  host: string;
  sleepSeconds: number;
  timeout: number;
}

export class HttpCodex implements Codex {
  private readonly http: HtmlClient;

  constructor(options: HttpCodexOptions) {
    this.http = new HtmlClient({
      host: options.host,
      timeout: options.timeout,
      sleepSeconds: options.sleepSeconds,
      breaker: codexCircuitBreaker,
    });
  }

  async list(kind: CodexKind): Promise<CodexListEntry[]> {
    const base = `/codex/${kind}/`;
    let page = parseCodexList(await this.http.get(base));
    const entries = [...page.entries];
    for (let p = 2; page.hasNextPage; p++) {
      page = parseCodexList(await this.http.get(`${base}?p=${p}`));
      entries.push(...page.entries);
    }
    return entries;
  }

  async fetch<K extends CodexKind>(kind: K, slug: string): Promise<CodexEntityMap[K]> {
    const html = await this.http.get(codexUri(kind, slug));
    return CODEX_PARSERS[kind](html, slug);
  }
}

export function createCodex(options: HttpCodexOptions = config.codex): HttpCodex {
  return new HttpCodex(options);
}
