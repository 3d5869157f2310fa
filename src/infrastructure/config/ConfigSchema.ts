import { z } from 'zod';
import { CONSENT, NAVIGATION, OUTPUT, BROWSER } from '../../application/config/ScraperDefaults';

/** `scheme:` at the start of a value; a colon followed by a digit is a port, not a scheme */
const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:(?!\d)/i;

/** Hosts left behind when a scheme is mistyped, as in `https//example.com` */
const SCHEME_NAMES = new Set(['http', 'https']);

/**
 * Prepends https:// when the value carries no scheme.
 * Values with any other scheme are kept so validation can reject them.
 */
export function normalizeSiteUrl(value: string): string {
  const trimmed = value.trim();
  return SCHEME_PREFIX.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function validateSiteUrl(value: string, ctx: z.RefinementCtx): void {
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'SITE_URL is not a valid URL' });
    return;
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'SITE_URL must use http or https protocol' });
  } else if (SCHEME_NAMES.has(url.hostname)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'SITE_URL is not a valid URL' });
  }
}

export const SiteSchema = z.object({
  url: z
    .string({ required_error: 'SITE_URL is not set' })
    .trim()
    .min(1, { message: 'SITE_URL is empty' })
    .transform(normalizeSiteUrl)
    .pipe(z.string().superRefine(validateSiteUrl)),
});

export const BrowserSchema = z.object({
  headless: z.boolean().default(true),
  width: z.number().int().positive().default(BROWSER.DEFAULT_VIEWPORT_WIDTH),
  height: z.number().int().positive().default(BROWSER.DEFAULT_VIEWPORT_HEIGHT),
  userAgent: z.string().min(1).default(BROWSER.DEFAULT_USER_AGENT),
});

export const NavigationSchema = z.object({
  timeout: z.number().int().positive().default(NAVIGATION.DEFAULT_TIMEOUT),
  networkIdleTimeout: z.number().int().nonnegative().default(NAVIGATION.DEFAULT_NETWORK_IDLE_TIMEOUT),
  initialWait: z.number().int().nonnegative().default(NAVIGATION.DEFAULT_INITIAL_WAIT),
  settleDelay: z.number().int().nonnegative().default(NAVIGATION.DEFAULT_SETTLE_DELAY),
  scrollPage: z.boolean().default(true),
});

export const ConsentSchema = z.object({
  acceptPhrases: z.array(z.string().min(1)).min(1).default([...CONSENT.DEFAULT_ACCEPT_PHRASES]),
  attributeMarkers: z.array(z.string().min(1)).default([...CONSENT.DEFAULT_ATTRIBUTE_MARKERS]),
  bannerMarkers: z.array(z.string().min(1)).min(1).default([...CONSENT.DEFAULT_BANNER_MARKERS]),
  maxTextLength: z.number().int().positive().default(CONSENT.DEFAULT_MAX_TEXT_LENGTH),
  clickTimeout: z.number().int().positive().default(CONSENT.DEFAULT_CLICK_TIMEOUT),
  postClickWait: z.number().int().nonnegative().default(CONSENT.DEFAULT_POST_CLICK_WAIT),
});

export const OutputSchema = z.object({
  directory: z.string().min(1).default(OUTPUT.DEFAULT_DIRECTORY),
});

export const LoggingSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  json: z.boolean().default(false),
});

export const AppConfigSchema = z.object({
  site: SiteSchema,
  browser: BrowserSchema.default({}),
  navigation: NavigationSchema.default({}),
  consent: ConsentSchema.default({}),
  output: OutputSchema.default({}),
  logging: LoggingSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type BrowserConfig = z.infer<typeof BrowserSchema>;
export type NavigationConfig = z.infer<typeof NavigationSchema>;
export type ConsentConfig = z.infer<typeof ConsentSchema>;
