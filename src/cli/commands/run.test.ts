import { describe, it, expect } from 'vitest';
import { ConfigService } from '@/lib/services/config';
import { validatorEnv } from './run';

describe('validatorEnv', () => {
  const env = { COLLECTION_NAME: 'recipes' };

  it('turns on debug logging for --debug', () => {
    const config = new ConfigService().fromEnv(validatorEnv({ debug: true }, env));

    expect(config.logging.debug).toBe(true);
  });

  it('leaves the environment alone otherwise', () => {
    expect(validatorEnv({}, env)).toBe(env);
    expect(new ConfigService().fromEnv(validatorEnv({}, env)).logging.debug).toBe(false);
  });
});
