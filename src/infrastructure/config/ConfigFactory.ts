import * as dotenv from 'dotenv';
import { AppConfig, AppConfigSchema } from './ConfigSchema';
import { ConfigurationError } from '../../domain/errors/AppErrors';

export interface ConfigLoadOptions {
  /** Path of the .env file (default: .env in the working directory) */
  envFile?: string;
  /** Environment to read; defaults to process.env after loading the .env file */
  env?: NodeJS.ProcessEnv;
}

function parseIntVar(value: string | undefined): number | undefined {
  return value !== undefined && value.trim() !== '' ? Number(value) : undefined;
}

function parseBoolVar(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return !['false', '0', 'no', 'off'].includes(value.trim().toLowerCase());
}

function parseListVar(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export class ConfigFactory {
  static load(options: ConfigLoadOptions = {}): AppConfig {
    let env = options.env;
    if (!env) {
      dotenv.config(options.envFile ? { path: options.envFile } : {});
      env = process.env;
    }

    const rawConfig = {
      site: {
        url: env.SITE_URL,
      },
      browser: {
        headless: parseBoolVar(env.HEADLESS),
        width: parseIntVar(env.VIEWPORT_WIDTH),
        height: parseIntVar(env.VIEWPORT_HEIGHT),
        userAgent: env.USER_AGENT || undefined,
      },
      navigation: {
        timeout: parseIntVar(env.NAVIGATION_TIMEOUT),
        networkIdleTimeout: parseIntVar(env.NETWORK_IDLE_TIMEOUT),
        initialWait: parseIntVar(env.INITIAL_WAIT_MS),
        settleDelay: parseIntVar(env.SETTLE_DELAY_MS),
        scrollPage: parseBoolVar(env.SCROLL_PAGE),
      },
      consent: {
        acceptPhrases: parseListVar(env.CONSENT_ACCEPT_PHRASES),
        attributeMarkers: parseListVar(env.CONSENT_ATTRIBUTE_MARKERS),
        bannerMarkers: parseListVar(env.CONSENT_MARKERS),
        maxTextLength: parseIntVar(env.CONSENT_MAX_TEXT_LENGTH),
        clickTimeout: parseIntVar(env.CONSENT_CLICK_TIMEOUT),
        postClickWait: parseIntVar(env.CONSENT_POST_CLICK_WAIT_MS),
      },
      output: {
        directory: env.OUTPUT_DIR || undefined,
      },
      logging: {
        level: env.LOG_LEVEL || undefined,
        json: parseBoolVar(env.LOG_JSON),
      },
    };

    const result = AppConfigSchema.safeParse(rawConfig);

    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(issues);
    }

    return result.data;
  }
}
