import { describe, it, expect } from 'vitest';
import {
  BotProtectionDetector,
  classifyProtection,
  describeProtection,
  eventTypeForProtection,
  getHeader,
  parseRetryAfterMs,
  DEFAULT_DETECTOR_OPTIONS,
} from '../../src/core/bot-protection-detector.js';

const LONG_BODY = '<html><body>' + '<p>Ordinary server error page.</p>'.repeat(40) + '</body></html>';

describe('classifyProtection', () => {
  describe('rate limiting', () => {
    it('should classify 429 as rate_limited regardless of body', () => {
      expect(classifyProtection(429, {}, '')).toBe('rate_limited');
      expect(classifyProtection(429, {}, 'captcha')).toBe('rate_limited');
    });
  });

  describe('not found', () => {
    it('should never classify 404 or 410 as protection', () => {
      expect(classifyProtection(404, {}, 'access denied')).toBeNull();
      expect(classifyProtection(410, {}, '')).toBeNull();
    });
  });

  describe('blocking statuses', () => {
    it('should detect a Cloudflare challenge on 503', () => {
      const body = '<title>Just a moment...</title><div>Checking your browser</div>';
      expect(classifyProtection(503, {}, body)).toBe('cloudflare_challenge');
    });

    it('should detect a Cloudflare challenge from the cf-mitigated header', () => {
      expect(classifyProtection(403, { 'CF-Mitigated': 'challenge' }, LONG_BODY)).toBe('cloudflare_challenge');
    });

    it('should detect a CAPTCHA page on 403', () => {
      expect(classifyProtection(403, {}, '<h1>Are you a robot?</h1>')).toBe('captcha');
    });

    it('should detect a generic block page', () => {
      expect(classifyProtection(401, {}, '<h1>Access Denied</h1>')).toBe('generic_block');
    });

    it('should check cloudflare signatures before captcha signatures', () => {
      const body = 'cloudflare ray id: abc - please complete the captcha';
      expect(classifyProtection(403, {}, body)).toBe('cloudflare_challenge');
    });

    it('should flag a short 403 without signatures as suspicious', () => {
      expect(classifyProtection(403, {}, 'nope')).toBe('suspicious_short_response');
    });

    it('should flag a short 503 without signatures as suspicious', () => {
      expect(classifyProtection(503, {}, '')).toBe('suspicious_short_response');
    });

    it('should treat a long 403 without signatures as server_block', () => {
      expect(classifyProtection(403, {}, LONG_BODY)).toBe('server_block');
    });

    it('should treat a short 502 as server_block (not in the short-response set)', () => {
      expect(classifyProtection(502, {}, 'bad gateway')).toBe('server_block');
    });

    it('should honor a custom minResponseBytes threshold', () => {
      const options = { ...DEFAULT_DETECTOR_OPTIONS, minResponseBytes: 3 };
      expect(classifyProtection(403, {}, 'nope', options)).toBe('server_block');
    });
  });

  describe('2xx interstitials', () => {
    it('should detect a challenge page served with 200', () => {
      expect(classifyProtection(200, {}, '<p>Verify you are human</p>')).toBe('captcha');
    });

    it('should return null for an ordinary article', () => {
      expect(classifyProtection(200, {}, LONG_BODY)).toBeNull();
    });

    it('should not flag an article page that loads Cloudflare or reCAPTCHA scripts', () => {
      const article = (script: string) =>
        '<html><head><title>Mill reopens</title>' +
        '<script type="application/ld+json">{"@type": "NewsArticle", "headline": "Mill reopens"}</script>' +
        `<script src="${script}"></script></head>` +
        '<body><article><p>The mill reopened on Monday.</p></article></body></html>';

      expect(classifyProtection(200, {}, article('/cdn-cgi/challenge-platform/scripts/jsd/main.js'))).toBeNull();
      expect(classifyProtection(200, {}, article('https://www.google.com/recaptcha/api.js'))).toBeNull();
    });

    it('should not treat a passing mention of captcha as a challenge', () => {
      expect(classifyProtection(200, {}, '<p>Sign up below. Protected by reCAPTCHA.</p>')).toBeNull();
    });

    it('should detect a Cloudflare interstitial served with 200', () => {
      const body =
        '<html><head><title>Just a moment...</title></head>' +
        '<body><script>window._cf_chl_opt={cvId: "3"};</script></body></html>';
      expect(classifyProtection(200, {}, body)).toBe('cloudflare_challenge');
    });

    it('should honor custom article markers', () => {
      const options = { ...DEFAULT_DETECTOR_OPTIONS, articleMarkers: ['data-story-body'] };
      expect(classifyProtection(200, {}, '<div data-story-body>Verify you are human</div>', options)).toBeNull();
      expect(classifyProtection(200, {}, '<article>Verify you are human</article>', options)).toBe('captcha');
    });

    it('should ignore signatures in bodies larger than maxChallengePageBytes', () => {
      const options = { ...DEFAULT_DETECTOR_OPTIONS, maxChallengePageBytes: 20 };
      expect(classifyProtection(200, {}, 'an article that mentions captcha in passing', options)).toBeNull();
    });
  });

  describe('other statuses', () => {
    it('should return null for a 500 not in the blocking set', () => {
      expect(classifyProtection(500, {}, 'access denied')).toBeNull();
    });

    it('should return null for redirects', () => {
      expect(classifyProtection(301, {}, '')).toBeNull();
    });
  });

  describe('degenerate input', () => {
    it('should not throw on null or undefined input', () => {
      expect(classifyProtection(null, null, null)).toBeNull();
      expect(classifyProtection(undefined, undefined, undefined)).toBeNull();
      expect(classifyProtection(403, null, null)).toBe('suspicious_short_response');
      expect(classifyProtection(Number.NaN, {}, 'captcha')).toBeNull();
    });
  });
});

describe('eventTypeForProtection', () => {
  it('should map each kind to its event type', () => {
    expect(eventTypeForProtection('rate_limited', 429)).toBe('rate_limit_429');
    expect(eventTypeForProtection('cloudflare_challenge', 503)).toBe('captcha_detected');
    expect(eventTypeForProtection('captcha', 200)).toBe('captcha_detected');
    expect(eventTypeForProtection('generic_block', 403)).toBe('forbidden_403');
    expect(eventTypeForProtection('suspicious_short_response', 403)).toBe('forbidden_403');
  });

  it('should map server_block by status class', () => {
    expect(eventTypeForProtection('server_block', 403)).toBe('forbidden_403');
    expect(eventTypeForProtection('server_block', 401)).toBe('forbidden_403');
    expect(eventTypeForProtection('server_block', 503)).toBe('multiple_failures');
  });
});

describe('describeProtection', () => {
  it('should describe every kind', () => {
    expect(describeProtection('rate_limited')).toBe('Rate limited (HTTP 429)');
    expect(describeProtection('cloudflare_challenge')).toBe('Cloudflare browser challenge');
  });
});

describe('getHeader', () => {
  it('should look up headers case-insensitively', () => {
    expect(getHeader({ 'Retry-After': '30' }, 'retry-after')).toBe('30');
  });

  it('should join repeated headers', () => {
    expect(getHeader({ 'set-cookie': ['a=1', 'b=2'] }, 'Set-Cookie')).toBe('a=1, b=2');
  });

  it('should return undefined for missing headers', () => {
    expect(getHeader(undefined, 'x')).toBeUndefined();
    expect(getHeader({ x: undefined }, 'x')).toBeUndefined();
  });
});

describe('parseRetryAfterMs', () => {
  it('should parse delta seconds', () => {
    expect(parseRetryAfterMs({ 'retry-after': '120' })).toBe(120_000);
  });

  it('should parse an HTTP date relative to now', () => {
    const now = Date.parse('2024-01-01T00:00:00Z');
    expect(parseRetryAfterMs({ 'retry-after': 'Mon, 01 Jan 2024 00:01:00 GMT' }, now)).toBe(60_000);
  });

  it('should return null when absent or invalid', () => {
    expect(parseRetryAfterMs({})).toBeNull();
    expect(parseRetryAfterMs({ 'retry-after': 'soon' })).toBeNull();
  });
});

describe('BotProtectionDetector', () => {
  it('should apply its bound options', () => {
    const detector = new BotProtectionDetector({ blockingStatuses: [403] });
    expect(detector.classify(503, {}, '')).toBeNull();
    expect(detector.classify(403, {}, '')).toBe('suspicious_short_response');
  });

  it('should classify a fetched page', () => {
    const detector = new BotProtectionDetector();
    const kind = detector.classifyPage({
      status: 429,
      headers: {},
      body: '',
      finalUrl: 'https://news.example.com/a',
    });
    expect(kind).toBe('rate_limited');
  });

  it('should report not-found statuses', () => {
    const detector = new BotProtectionDetector();
    expect(detector.isNotFound(404)).toBe(true);
    expect(detector.isNotFound(410)).toBe(true);
    expect(detector.isNotFound(403)).toBe(false);
  });
});
