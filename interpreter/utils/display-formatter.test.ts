import { describe, it, expect } from 'vitest';
import { dumpValue, escapeHtml, formatForDisplay } from './display-formatter';
import {
  NULL,
  boolValue,
  numberValue,
  objectValue,
  sequenceValue,
  stringValue,
  type Value
} from '@core/types/value';
import { toValue } from './value-conversion';
import { createCookie } from '@tests/utils/fixtures';

describe('escapeHtml', () => {
  it('escapes markup and both quote styles', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#039;s&lt;/a&gt;'
    );
  });
});

describe('formatForDisplay', () => {
  it('sanitizes by default and not when asked', () => {
    expect(formatForDisplay(stringValue('<b>'))).toBe('&lt;b&gt;');
    expect(formatForDisplay(stringValue('<b>'), { sanitize: false })).toBe('<b>');
  });

  it('renders scalars in their natural form', () => {
    expect(formatForDisplay(NULL)).toBe('');
    expect(formatForDisplay(boolValue(true))).toBe('1');
    expect(formatForDisplay(boolValue(false))).toBe('');
    expect(formatForDisplay(numberValue(1.25))).toBe('1.25');
    expect(formatForDisplay(numberValue(5))).toBe('5');
    expect(formatForDisplay(stringValue('plain'))).toBe('plain');
  });

  it('dumps sequences', () => {
    const value = sequenceValue([stringValue('Flour'), stringValue('Sugar')]);
    expect(formatForDisplay(value, { sanitize: false })).toBe('Array\n(\n    [0] => Flour\n    [1] => Sugar\n)\n');
  });

  it('escapes the dump when sanitizing', () => {
    const value = sequenceValue([stringValue('x')]);
    expect(formatForDisplay(value)).toBe('Array\n(\n    [0] =&gt; x\n)\n');
  });
});

describe('dumpValue', () => {
  it('indents nested structures by eight spaces per level', () => {
    const value = toValue({ a: [1], b: true });
    expect(dumpValue(value)).toBe(
      'Array\n' +
      '(\n' +
      '    [a] => Array\n' +
      '        (\n' +
      '            [0] => 1\n' +
      '        )\n' +
      '\n' +
      '    [b] => 1\n' +
      ')\n'
    );
  });

  it('titles objects by type and lists set properties', () => {
    const dump = dumpValue(objectValue(createCookie()));
    expect(dump.startsWith('Cookie Object\n(\n    [tasty] => 100\n    [type] => Chocolate Chip\n    [price] => 1.25\n')).toBe(true);
    expect(dump).not.toContain('[topping]');
  });

  it('renders scalars directly', () => {
    expect(dumpValue(numberValue(3))).toBe('3');
  });

  it('marks a sequence that contains itself', () => {
    const items: Value[] = [numberValue(1)];
    const looped = sequenceValue(items);
    items.push(looped);

    expect(dumpValue(looped)).toBe('Array\n(\n    [0] => 1\n    [1] => Array\n *RECURSION*\n)\n');
  });

  it('dumps a value shared by siblings in full each time', () => {
    const shared = sequenceValue([numberValue(1)]);
    const value = sequenceValue([shared, shared]);

    expect(dumpValue(value)).toBe(
      'Array\n(\n' +
      '    [0] => Array\n        (\n            [0] => 1\n        )\n\n' +
      '    [1] => Array\n        (\n            [0] => 1\n        )\n\n' +
      ')\n'
    );
  });
});
