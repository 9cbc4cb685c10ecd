/**
 * Outbound proxy routing for the fetch-based methods
 *
 * Requests leave through one HTTP proxy unless the target host is on the
 * bypass list. Bypass entries match a host exactly; entries starting with
 * '.' match any subdomain (".internal" covers "cms.internal").
 */

import { ProxyAgent, type Dispatcher } from 'undici';
import { logger } from '../../utils/logger.js';

const log = logger.methods;

export interface ProxyRouterOptions {
  proxyUrl?: string;
  bypassHosts?: readonly string[];
  /** Builds the dispatcher for the proxy URL; tests substitute their own */
  createAgent?: (proxyUrl: string) => Dispatcher;
}

/**
 * Accept "host:port" as well as full URLs
 */
export function normalizeProxyUrl(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed) return '';
  return trimmed.includes('://') ? trimmed : `http://${trimmed}`;
}

/**
 * Lower-cased, de-duplicated bypass entries from a list or a
 * comma-separated string
 */
export function parseBypassHosts(raw: string | readonly string[] | undefined): string[] {
  if (raw === undefined) return [];
  const entries = typeof raw === 'string' ? raw.split(',') : raw;
  const hosts = new Set<string>();
  for (const entry of entries) {
    const host = entry.trim().toLowerCase();
    if (host) hosts.add(host);
  }
  return [...hosts];
}

function hostOf(url: string): string | null {
  try {
    const host = new URL(url).hostname.toLowerCase();
    return host || null;
  } catch {
    return null;
  }
}

export class ProxyRouter {
  private readonly proxyUrl: string;
  private readonly bypassHosts: string[];
  private readonly createAgent: (proxyUrl: string) => Dispatcher;
  private agent: Dispatcher | null = null;

  constructor(options: ProxyRouterOptions = {}) {
    this.proxyUrl = normalizeProxyUrl(options.proxyUrl ?? '');
    this.bypassHosts = parseBypassHosts(options.bypassHosts);
    this.createAgent = options.createAgent ?? ((proxyUrl) => new ProxyAgent(proxyUrl));
  }

  get enabled(): boolean {
    return this.proxyUrl.length > 0;
  }

  shouldBypass(url: string): boolean {
    const host = hostOf(url);
    if (!host) return false;

    return this.bypassHosts.some(
      (candidate) => candidate === host || (candidate.startsWith('.') && host.endsWith(candidate))
    );
  }

  usesProxy(url: string): boolean {
    return this.enabled && !this.shouldBypass(url);
  }

  /**
   * Dispatcher for a request to `url`, or undefined to connect directly
   */
  dispatcherFor(url: string): Dispatcher | undefined {
    if (!this.usesProxy(url)) return undefined;

    if (!this.agent) {
      this.agent = this.createAgent(this.proxyUrl);
      log.debug('Proxy agent created', { bypassHosts: this.bypassHosts.length });
    }
    return this.agent;
  }

  async close(): Promise<void> {
    const agent = this.agent;
    this.agent = null;
    if (agent) {
      await agent.close();
    }
  }
}
