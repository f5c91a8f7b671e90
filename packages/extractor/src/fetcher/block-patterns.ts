// Pattern constants for block detection

export const CAPTCHA_PATTERNS = [
  /g-recaptcha|grecaptcha/i,
  /h-captcha|hcaptcha/i,
  /captcha-delivery|geo\.captcha/i,
  /enter the characters you see below/i,
  /type the characters you see in this image/i,
  /verify.*human/i,
  /are you a robot/i,
  /prove.*not.*robot/i,
  /complete.*verification/i,
];

export const CLOUDFLARE_PATTERNS = [
  /checking your browser/i,
  /cf-browser-verification/i,
  /cf-challenge|challenge-platform/i,
  /cloudflare ray id/i,
  /security by cloudflare/i,
  /just a moment\.\.\./i,
  /enable javascript and cookies to continue/i,
  /attention required!? \| cloudflare/i,
];

export const BOT_DETECTION_PATTERNS = [
  /access denied/i,
  /suspicious activity/i,
  /automated access/i,
  /bot detected/i,
  /your access has been blocked/i,
  /unusual (activity|traffic)/i,
  /automated traffic/i,
  /pardon our interruption/i,
];

export const GEO_BLOCK_PATTERNS = [
  /not available in your (country|region|location)/i,
  /service.*not available.*country/i,
  /geographic(al)? restriction/i,
];

export const RATE_LIMIT_PATTERNS = [
  /too many requests/i,
  /rate limit(ed)? exceeded/i,
  /request limit exceeded/i,
  /you have been throttled/i,
];

// Bodies below this size with a bot-detection phrase are treated as block pages (bytes)
export const MIN_NORMAL_HTML_SIZE = 5000;

// Content heuristics only apply to bodies up to this size (bytes)
export const MAX_CHALLENGE_PAGE_SIZE = 50000;

// Cloudflare headers
export const CLOUDFLARE_HEADERS = ['cf-ray', 'cf-cache-status', 'cf-request-id', 'cf-mitigated'];

