export type {
  BrowserLoadOptions,
  BrowserSession,
  BrowserSessionOptions,
  BrowserSessionProvider,
  ExtractionMethod,
  FetchImpl,
  HttpRequestInit,
  HttpResponse,
} from './types.js';
export { StructuredMethod, type StructuredMethodOptions } from './structured-method.js';
export { HeuristicDomMethod, type HeuristicDomMethodOptions } from './heuristic-dom-method.js';
export {
  BrowserEmulationMethod,
  BrowserAbortedError,
  type BrowserEmulationMethodOptions,
} from './browser-emulation-method.js';
export {
  PlaywrightSessionProvider,
  toPlaywrightProxy,
  type PlaywrightSessionProviderOptions,
} from './playwright-session-provider.js';
export {
  BROWSER_PROFILES,
  PROFILE_NAMES,
  ProfileRotator,
  headersForProfile,
  type BrowserProfile,
} from './header-profiles.js';
export { fetchPage, type HttpFetchOptions } from './http-fetch.js';
export {
  ProxyRouter,
  normalizeProxyUrl,
  parseBypassHosts,
  type ProxyRouterOptions,
} from './proxy-router.js';
