/**
 * Runtime configuration, read from the environment.
 */

import { DEFAULT_LANGUAGE } from './parser/program.js';

export interface ParserConfig {
  /** IPPcode version, e.g. `IPPcode24`. Sets the header and the XML language attribute. */
  language: string;
}

export const LANGUAGE_ENV = 'IPPCODE_LANGUAGE';

const LANGUAGE_PATTERN = /^IPPcode\d{2}$/;

export class ConfigError extends Error {
  constructor(message: string, public variable: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): ParserConfig {
  const language = env[LANGUAGE_ENV] ?? DEFAULT_LANGUAGE;

  if (!LANGUAGE_PATTERN.test(language)) {
    throw new ConfigError(`${LANGUAGE_ENV} must look like 'IPPcode24', got '${language}'`, LANGUAGE_ENV);
  }

  return { language };
}
