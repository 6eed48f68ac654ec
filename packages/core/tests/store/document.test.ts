import { describe, it, expect } from 'vitest';
import { DocumentError, TomlDocument } from '../../src/store/document.js';

const SAMPLE = [
  '# header comment',
  '',
  '[networking]',
  'hostname = "alpha" # inline',
  'wifi_enabled = true',
  '',
  '# services below',
  '[services.meshtasticd]',
  'enabled = true',
  '',
  '[[networking.wifi]]',
  'ssid = "mesh"',
  '',
  '[experimental]',
  'list = [',
  '  1, # one',
  '  2,',
  ']',
  'text = """',
  'line [not a header]',
  '"""',
  '',
].join('\n');

describe('TomlDocument.parse', () => {
  it('should render an untouched document byte-for-byte', () => {
    expect(TomlDocument.parse(SAMPLE).toString()).toBe(SAMPLE);
    expect(TomlDocument.parse('a = 1\r\nb = 2\r\n').toString()).toBe('a = 1\r\nb = 2\r\n');
    expect(TomlDocument.parse('').toString()).toBe('');
  });

  it('should split the document into blocks with leading comments attached', () => {
    const blocks = TomlDocument.parse(SAMPLE).blocks.map((b) => [
      b.kind,
      b.path.join('.'),
      b.start,
      b.header,
      b.end,
    ]);
    expect(blocks).toEqual([
      ['root', '', 0, -1, 1],
      ['table', 'networking', 2, 2, 5],
      ['table', 'services.meshtasticd', 6, 7, 9],
      ['array', 'networking.wifi', 10, 10, 12],
      ['table', 'experimental', 13, 13, 20],
    ]);
  });

  it('should track multi-line values and ignore brackets inside them', () => {
    const experimental = TomlDocument.parse(SAMPLE).blocks[4];
    expect(experimental.entries.map((e) => [e.key.join('.'), e.start, e.end])).toEqual([
      ['list', 14, 17],
      ['text', 18, 20],
    ]);
  });

  it('should decode quoted and dotted keys', () => {
    const doc = TomlDocument.parse('[services."getty@tty1.service"]\nsite . "a b" = 1\n');
    expect(doc.blocks[1].path).toEqual(['services', 'getty@tty1.service']);
    expect(doc.blocks[1].entries[0].key).toEqual(['site', 'a b']);
  });
});

describe('TomlDocument.setValue', () => {
  it('should replace a value in place, keeping the trailing comment', () => {
    const doc = TomlDocument.parse(SAMPLE);
    doc.setValue(['networking', 'hostname'], '"beta"');
    expect(doc.toString()).toBe(SAMPLE.replace('hostname = "alpha" # inline', 'hostname = "beta" # inline'));
  });

  it('should add a missing key after the last entry of its table', () => {
    const doc = TomlDocument.parse(SAMPLE);
    doc.setValue(['networking', 'country_code'], '"DE"');
    expect(doc.toString()).toBe(
      SAMPLE.replace('wifi_enabled = true\n', 'wifi_enabled = true\ncountry_code = "DE"\n'),
    );
  });

  it('should create a missing table at the end of the document', () => {
    const doc = TomlDocument.parse('[networking]\nhostname = "alpha"\n\n[experimental]\nflag = true\n');
    doc.setValue(['services', 'ssh', 'enabled'], 'true');
    doc.setValue(['services', 'ssh', 'running'], 'false');
    expect(doc.toString()).toBe(
      '[networking]\nhostname = "alpha"\n\n[experimental]\nflag = true\n\n[services.ssh]\nenabled = true\nrunning = false\n',
    );
  });

  it('should place a new table before its existing sub-tables', () => {
    const doc = TomlDocument.parse('[[networking.wifi]]\nssid = "mesh"\n');
    doc.setValue(['networking', 'hostname'], '"alpha"');
    expect(doc.toString()).toBe('[networking]\nhostname = "alpha"\n\n[[networking.wifi]]\nssid = "mesh"\n');
  });

  it('should add a dotted sibling when the table is defined by dotted keys', () => {
    const doc = TomlDocument.parse('networking.hostname = "alpha"\n');
    doc.setValue(['networking', 'country_code'], '"DE"');
    expect(doc.toString()).toBe('networking.hostname = "alpha"\nnetworking.country_code = "DE"\n');
  });

  it('should refuse to edit inside an inline table', () => {
    const doc = TomlDocument.parse('networking = { hostname = "alpha" }\n');
    expect(() => doc.setValue(['networking', 'hostname'], '"beta"')).toThrow(DocumentError);
  });

  it('should keep CRLF line endings', () => {
    const doc = TomlDocument.parse('a = 1\r\nb = 2\r\n');
    doc.setValue(['b'], '3');
    expect(doc.toString()).toBe('a = 1\r\nb = 3\r\n');
  });
});

describe('TomlDocument.removePath', () => {
  it('should remove a table together with its leading comment', () => {
    const doc = TomlDocument.parse(SAMPLE);
    expect(doc.removePath(['services', 'meshtasticd'])).toBe(true);
    expect(doc.toString()).toBe(SAMPLE.replace('# services below\n[services.meshtasticd]\nenabled = true\n\n', ''));
  });

  it('should report when nothing matched', () => {
    const doc = TomlDocument.parse(SAMPLE);
    expect(doc.removePath(['services', 'ssh'])).toBe(false);
    expect(doc.toString()).toBe(SAMPLE);
  });

  it('should not leave blank lines behind at the end of the document', () => {
    const doc = TomlDocument.parse('[networking]\nhostname = "a"\n\n[services.ssh]\nenabled = true\n');
    doc.removePath(['services', 'ssh']);
    expect(doc.toString()).toBe('[networking]\nhostname = "a"\n');
  });

  it('should remove a single key', () => {
    const doc = TomlDocument.parse('[hardware.spi0]\nenabled = true\nspeed = 8000000 # 8 MHz\n');
    doc.removePath(['hardware', 'spi0', 'speed']);
    expect(doc.toString()).toBe('[hardware.spi0]\nenabled = true\n');
  });
});

describe('TomlDocument.insertArrayTables', () => {
  it('should append array tables after the last table of their section', () => {
    const doc = TomlDocument.parse('[networking]\nhostname = "a"\n\n[experimental]\nx = 1\n');
    doc.insertArrayTables(
      ['networking', 'wifi'],
      [
        ['ssid = "a"', 'psk = ""'],
        ['ssid = "b"', 'psk = ""'],
      ],
    );
    expect(doc.toString()).toBe(
      [
        '[networking]',
        'hostname = "a"',
        '',
        '[[networking.wifi]]',
        'ssid = "a"',
        'psk = ""',
        '',
        '[[networking.wifi]]',
        'ssid = "b"',
        'psk = ""',
        '',
        '[experimental]',
        'x = 1',
        '',
      ].join('\n'),
    );
  });
});
