import { describe, it, expect } from 'vitest';
import { parseWpaSupplicant, renderWpaSupplicant } from '../../src/adapters/wpa-supplicant.js';

const HEX_KEY = 'a'.repeat(64);

describe('renderWpaSupplicant', () => {
  it('should write default globals for a new file', () => {
    expect(
      renderWpaSupplicant({ country: 'NZ', networks: [{ ssid: 'mesh', psk: 'password1' }] }),
    ).toBe(
      [
        'ctrl_interface=DIR=/var/run/wpa_supplicant GROUP=netdev',
        'update_config=1',
        'country=NZ',
        '',
        'network={',
        '\tssid="mesh"',
        '\tpsk="password1"',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('should render open networks, raw keys and hex SSIDs', () => {
    const text = renderWpaSupplicant({
      country: 'US',
      networks: [
        { ssid: 'cafe', psk: '' },
        { ssid: 'lab', psk: HEX_KEY },
        { ssid: 'say "hi"', psk: 'password1' },
      ],
    });

    expect(text).toContain('network={\n\tssid="cafe"\n\tkey_mgmt=NONE\n}');
    expect(text).toContain(`network={\n\tssid="lab"\n\tpsk=${HEX_KEY}\n}`);
    expect(text).toContain('network={\n\tssid=7361792022686922\n\tpsk="password1"\n}');
  });

  it('should keep existing globals and replace country and networks', () => {
    const existing = [
      'ctrl_interface=/run/wpa_supplicant',
      'country=US',
      'ap_scan=1',
      '',
      'network={',
      '    ssid="old"',
      '    psk="password0"',
      '}',
      '',
    ].join('\n');

    expect(renderWpaSupplicant({ country: 'DE', networks: [] }, existing)).toBe(
      'ctrl_interface=/run/wpa_supplicant\nap_scan=1\ncountry=DE\n',
    );
  });
});

describe('parseWpaSupplicant', () => {
  it('should read back what it renders', () => {
    const networks = [
      { ssid: 'cafe', psk: '' },
      { ssid: 'lab', psk: HEX_KEY },
      { ssid: 'say "hi"', psk: 'password1' },
    ];
    expect(parseWpaSupplicant(renderWpaSupplicant({ country: 'JP', networks }))).toEqual({
      country: 'JP',
      networks,
    });
  });

  it('should ignore comments and unknown network keys', () => {
    const text = '# managed\nnetwork={\n  ssid="mesh"\n  priority=5\n  psk="password1"\n}\n';
    expect(parseWpaSupplicant(text)).toEqual({
      country: undefined,
      networks: [{ ssid: 'mesh', psk: 'password1' }],
    });
  });
});
