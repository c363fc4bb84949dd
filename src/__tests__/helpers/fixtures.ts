/**
 * Test Fixtures
 * Reusable test data
 */

import { loadSettings, Settings } from '../../config/env';

/**
 * Settings as loaded from a minimal test environment, with overrides
 */
export function createTestSettings(overrides: Partial<Settings> = {}): Settings {
  const loaded = loadSettings({ ENVIRONMENT: 'test', TRUST_PROXY: 'true' });
  if (!loaded.ok) {
    throw new Error(`Test settings are invalid: ${loaded.errors.join('; ')}`);
  }
  return { ...loaded.value, ...overrides };
}
