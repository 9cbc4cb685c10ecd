/**
 * Browser header profiles
 *
 * Request headers copied from real desktop and mobile browsers. The
 * heuristic method rotates through them; the structured method uses the
 * desktop Chrome profile.
 */

export const BROWSER_PROFILES = {
  // Chrome 120 on Windows
  chrome_120: {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    headers: {
      'sec-ch-ua': '"Not_A Brand";v="8", "Chromium";v="120", "Google Chrome";v="120"',
      'sec-ch-ua-mobile': '?0',
      'sec-ch-ua-platform': '"Windows"',
      'sec-fetch-dest': 'document',
      'sec-fetch-mode': 'navigate',
      'sec-fetch-site': 'none',
      'sec-fetch-user': '?1',
      'upgrade-insecure-requests': '1',
    },
  },

  // Firefox 121 on Windows
  firefox_121: {
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
    headers: {
      'upgrade-insecure-requests': '1',
    },
  },

  // Safari 17 on macOS
  safari_17: {
    userAgent:
      'Mozilla/5.0 (Macintosh; Intel Mac OS X 14_2) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15',
    headers: {},
  },

  // Chrome on Android
  chrome_android: {
    userAgent:
      'Mozilla/5.0 (Linux; Android 14; Pixel 8) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.6099.144 Mobile Safari/537.36',
    headers: {
      'sec-ch-ua': '"Not_A Brand";v="8", "Chromium";v="120", "Google Chrome";v="120"',
      'sec-ch-ua-mobile': '?1',
      'sec-ch-ua-platform': '"Android"',
    },
  },
} as const;

export type BrowserProfile = keyof typeof BROWSER_PROFILES;

export const PROFILE_NAMES: readonly BrowserProfile[] = [
  'chrome_120',
  'firefox_121',
  'safari_17',
  'chrome_android',
];

const BASE_HEADERS: Record<string, string> = {
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'accept-language': 'en-US,en;q=0.9',
  'cache-control': 'no-cache',
};

/**
 * Full request headers for a profile
 */
export function headersForProfile(profile: BrowserProfile): Record<string, string> {
  const { userAgent, headers } = BROWSER_PROFILES[profile];
  return {
    ...BASE_HEADERS,
    ...headers,
    'user-agent': userAgent,
  };
}

/**
 * Round-robin profile rotation
 */
export class ProfileRotator {
  private index: number;

  constructor(
    private readonly profiles: readonly BrowserProfile[] = PROFILE_NAMES,
    random: () => number = Math.random
  ) {
    this.index = Math.floor(random() * profiles.length);
  }

  next(): BrowserProfile {
    const profile = this.profiles[this.index % this.profiles.length];
    this.index = (this.index + 1) % this.profiles.length;
    return profile;
  }
}
