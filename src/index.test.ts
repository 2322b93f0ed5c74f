import { describe, it, expect } from 'vitest';
import {
  VERSION,
  TRIGGER_KINDS,
  ConfigurationWorkflow,
  NotificationSynchronizer,
  createFleetNotify,
  getDefaultConfig,
  listTriggerKinds,
} from './index.js';

describe('fleet-notify', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public API', () => {
    it('should expose the trigger registry', () => {
      expect(TRIGGER_KINDS).toHaveLength(17);
      expect(listTriggerKinds().map((k) => k.kind)).toHaveLength(17);
    });

    it('should assemble the service from configuration', () => {
      const config = getDefaultConfig();
      config.workflow.token_secret = 'test-secret-0123456789';
      config.delivery.callback_base_url = 'https://alerts.example.com';

      const app = createFleetNotify(config, { credentials: { getToken: async () => null } });

      expect(app.synchronizer).toBeInstanceOf(NotificationSynchronizer);
      expect(app.workflow).toBeInstanceOf(ConfigurationWorkflow);
      expect(app.config).toBe(config);
    });
  });
});
