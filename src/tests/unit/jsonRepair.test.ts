import { describe, it, expect } from 'vitest';
import { extractJsonObject, repairJson } from '../../core/extraction/jsonRepair.js';

describe('repairJson', () => {
  it('drops a trailing comma directly before the closing brace', () => {
    const repaired = repairJson('{"Title":"X","Author":"Y",}');
    expect(repaired).toBe('{"Title":"X","Author":"Y"}');
    expect(JSON.parse(repaired)).toEqual({ Title: 'X', Author: 'Y' });
  });

  it('drops a trailing comma on the line before a lone closing brace', () => {
    const raw = ['{', '  "Title": "Dune",', '  "Description": null,', '}'].join('\n');
    expect(repairJson(raw)).toBe(['{', '  "Title": "Dune",', '  "Description": null', '}'].join('\n'));
  });

  it('accepts indentation around the closing brace line', () => {
    const raw = '{\n  "Title": "Dune",  \n  }  ';
    expect(JSON.parse(repairJson(raw))).toEqual({ Title: 'Dune' });
  });

  it('leaves commas that separate members untouched', () => {
    const raw = '{\n  "Title": "A, B",\n  "Author": "C"\n}';
    expect(repairJson(raw)).toBe(raw);
  });

  it('does not repair trailing commas inside arrays', () => {
    const raw = '{"Author": ["A", "B",]}';
    expect(repairJson(raw)).toBe(raw);
  });
});

describe('extractJsonObject', () => {
  it('strips markdown fences and chatter around the object', () => {
    const raw = 'Here you go:\n```json\n{"Title": "Dune"}\n```';
    expect(extractJsonObject(raw)).toBe('{"Title": "Dune"}');
  });

  it('returns the text unchanged when it holds no braces', () => {
    expect(extractJsonObject('I cannot read this page.')).toBe('I cannot read this page.');
  });
});
