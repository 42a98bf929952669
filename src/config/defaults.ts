import type { Config } from './validator';

export const defaults: Config = {
  gemini: {
    base_url: 'https://generativelanguage.googleapis.com/v1beta',
    model: 'gemini-2.0-flash',
    research_model: 'gemini-2.5-flash',
    timeout_ms: 60000,
    max_retries: 2,
    retry_base_delay_ms: 1000,
  },
  storage: {
    driver: 'file',
    dir: '.research-graph/threads',
  },
  logging: {
    level: 'info',
  },
  engine: {
    max_steps: 50,
  },
};
