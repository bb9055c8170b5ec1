/**
 * Response Parsing Tests
 */

import { describe, it, expect } from 'vitest';
import { extractJson, stripCodeFences, truncateMiddle } from './responseParsing.js';
import { fenceLanguage } from './PromptBuilder.js';

describe('extractJson', () => {
  it('should parse a bare object', () => {
    expect(extractJson('{"tests_passed": true}')).toEqual({ tests_passed: true });
  });

  it('should parse a fenced object surrounded by prose', () => {
    const text = 'Here is my evaluation:\n```json\n{"tests_passed": false, "errors": ["x"]}\n```\nThanks.';

    expect(extractJson(text)).toEqual({ tests_passed: false, errors: ['x'] });
  });

  it('should find an unfenced object inside prose', () => {
    expect(extractJson('Verdict: {"tests_passed": true} (done)')).toEqual({ tests_passed: true });
  });

  it('should return undefined when nothing parses', () => {
    expect(extractJson('no json here')).toBeUndefined();
    expect(extractJson('{ broken')).toBeUndefined();
    expect(extractJson('   ')).toBeUndefined();
  });
});

describe('stripCodeFences', () => {
  it('should remove a language fence and the closing fence', () => {
    expect(stripCodeFences('```python\nx = 1\n```\n')).toBe('x = 1');
  });

  it('should leave unfenced code alone apart from surrounding whitespace', () => {
    expect(stripCodeFences('\n  x = 1\ny = 2  \n')).toBe('x = 1\ny = 2');
  });
});

describe('truncateMiddle', () => {
  it('should keep short text unchanged', () => {
    expect(truncateMiddle('a\nb', 4)).toBe('a\nb');
  });

  it('should keep the head and tail of long text', () => {
    expect(truncateMiddle('1\n2\n3\n4\n5\n6', 4)).toBe('1\n2\n... [2 lines truncated] ...\n5\n6');
  });
});

describe('fenceLanguage', () => {
  it('should name the fence language by extension', () => {
    expect(fenceLanguage('pkg/calc.py')).toBe('python');
    expect(fenceLanguage('view.tsx')).toBe('tsx');
    expect(fenceLanguage('README')).toBe('');
  });
});
