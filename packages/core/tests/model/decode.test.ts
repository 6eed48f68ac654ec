import { describe, it, expect } from 'vitest';
import {
  createModel,
  decodeModel,
  defaultModel,
  encodeModel,
  formatPath,
  mergeModel,
} from '../../src/model/decode.js';
import { ValidationError } from '../../src/errors.js';

function violationsOf(fn: () => unknown): Array<{ path: string; message: string }> {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err.violations;
    throw err;
  }
  return [];
}

describe('decodeModel', () => {
  it('should fill every default', () => {
    expect(defaultModel()).toEqual({
      networking: { hostname: 'meshnode', wifi_enabled: false, country_code: 'US', wifi: [] },
      services: {},
      hardware: {},
    });
  });

  it('should default running to enabled', () => {
    const model = createModel({
      services: {
        meshtasticd: { enabled: true },
        ssh: { enabled: true, running: false },
        avahi: {},
      },
    });
    expect(model.services).toEqual({
      meshtasticd: { enabled: true, running: true },
      ssh: { enabled: true, running: false },
      avahi: { enabled: false, running: false },
    });
  });

  it('should tag peripherals with their family', () => {
    const model = createModel({
      hardware: { act_led: { mode: 'heartbeat' }, i2c3: { enabled: true, speed: 100000 }, uart4: {} },
    });
    expect(model.hardware).toEqual({
      act_led: { family: 'led', mode: 'heartbeat' },
      i2c3: { family: 'bus', enabled: true, speed: 100000 },
      uart4: { family: 'bus', enabled: false },
    });
  });

  it('should deep-freeze the model', () => {
    const model = createModel({ networking: { wifi: [{ ssid: 'mesh', psk: 'password1' }] } });
    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(model.networking.wifi)).toBe(true);
    expect(Object.isFrozen(model.networking.wifi[0])).toBe(true);
  });

  it('should list every value with the wrong type', () => {
    const violations = violationsOf(() =>
      decodeModel({ networking: { hostname: 5, wifi_enabled: 'yes' } }),
    );
    expect(violations.map((v) => v.path)).toEqual(['networking.hostname', 'networking.wifi_enabled']);
  });

  it('should reject settings that belong to the other peripheral family', () => {
    const violations = violationsOf(() => decodeModel({ hardware: { act_led: { enabled: true } } }));
    expect(violations).toEqual([
      { path: 'hardware.act_led.enabled', message: '"enabled" is not a setting of led peripherals' },
    ]);
  });

  it('should reject unknown LED modes', () => {
    const violations = violationsOf(() => decodeModel({ hardware: { act_led: { mode: 'blink' } } }));
    expect(violations.map((v) => v.path)).toEqual(['hardware.act_led.mode']);
  });

  it('should drop unknown keys', () => {
    const model = decodeModel({ networking: { hostname: 'alpha', colour: 'blue' }, experimental: { x: 1 } });
    expect(model.networking).toEqual({
      hostname: 'alpha',
      wifi_enabled: false,
      country_code: 'US',
      wifi: [],
    });
  });
});

describe('formatPath', () => {
  it('should render indices in brackets', () => {
    expect(formatPath(['networking', 'wifi', 1, 'ssid'])).toBe('networking.wifi[1].ssid');
    expect(formatPath([])).toBe('(root)');
  });
});

describe('encodeModel', () => {
  it('should omit an empty wifi list and unset speeds', () => {
    const model = createModel({
      networking: { hostname: 'alpha', wifi_interface: 'wlan1' },
      hardware: { spi0: { enabled: true }, act_led: { mode: 'disable' } },
    });
    expect(encodeModel(model)).toEqual({
      networking: {
        hostname: 'alpha',
        wifi_enabled: false,
        country_code: 'US',
        wifi_interface: 'wlan1',
      },
      services: {},
      hardware: { spi0: { enabled: true }, act_led: { mode: 'disable' } },
    });
  });
});

describe('mergeModel', () => {
  const base = createModel({
    networking: { hostname: 'alpha' },
    services: { meshtasticd: { enabled: false }, ssh: { enabled: true } },
  });

  it('should not mutate the base model', () => {
    const next = mergeModel(base, { networking: { hostname: 'beta' } });
    expect(next.networking.hostname).toBe('beta');
    expect(base.networking.hostname).toBe('alpha');
    expect(Object.isFrozen(next)).toBe(true);
  });

  it('should make running follow a patched enabled flag', () => {
    const next = mergeModel(base, { services: { meshtasticd: { enabled: true } } });
    expect(next.services['meshtasticd']).toEqual({ enabled: true, running: true });
  });

  it('should keep enabled when only running is patched', () => {
    const next = mergeModel(base, { services: { ssh: { running: false } } });
    expect(next.services['ssh']).toEqual({ enabled: true, running: false });
  });

  it('should remove entries patched to null', () => {
    const next = mergeModel(base, { services: { ssh: null } });
    expect(Object.keys(next.services)).toEqual(['meshtasticd']);
  });

  it('should drop an explicitly undefined speed', () => {
    const next = mergeModel(base, { hardware: { spi0: { family: 'bus', enabled: true, speed: undefined } } });
    expect(next.hardware['spi0']).toStrictEqual({ family: 'bus', enabled: true });
  });
});
