/**
 * Analyzer Output Parsing Tests
 */

import { describe, it, expect } from 'vitest';
import { averageScore, categorizeIssues, parseIssues, parseScore, toSeverity } from './parsing.js';

describe('parseScore', () => {
  it('should read the rating from the report line', () => {
    expect(parseScore('Your code has been rated at 7.50/10 (previous run: 6.00/10, +1.50)')).toBe(7.5);
  });

  it('should return undefined when no rating is printed', () => {
    expect(parseScore('************* Module calc\n')).toBeUndefined();
  });

  it('should clamp negative ratings to 0', () => {
    expect(parseScore('Your code has been rated at -3.20/10')).toBe(0);
  });

  it('should read integer ratings', () => {
    expect(parseScore('rated at 10/10')).toBe(10);
  });
});

describe('toSeverity', () => {
  it('should keep the four known severities', () => {
    expect(['error', 'warning', 'convention', 'refactor'].map(toSeverity))
      .toEqual(['error', 'warning', 'convention', 'refactor']);
  });

  it('should fold fatal into error and anything else into convention', () => {
    expect(toSeverity('fatal')).toBe('error');
    expect(toSeverity('info')).toBe('convention');
  });
});

describe('parseIssues', () => {
  it('should map analyzer messages to issues', () => {
    const stdout = JSON.stringify([
      { type: 'error', line: 3, column: 4, symbol: 'undefined-variable', 'message-id': 'E0602', message: "Undefined variable 'x'" },
      { type: 'convention', line: 1, column: 0, 'message-id': 'C0114', message: 'Missing module docstring' },
      { type: 'fatal', line: null, column: null, message: 'Parse error' }
    ]);

    expect(parseIssues(stdout)).toEqual([
      { line: 3, column: 4, severity: 'error', symbol: 'undefined-variable', message: "Undefined variable 'x'" },
      { line: 1, column: 0, severity: 'convention', symbol: 'C0114', message: 'Missing module docstring' },
      { line: 0, column: 0, severity: 'error', symbol: 'unknown', message: 'Parse error' }
    ]);
  });

  it('should skip malformed entries', () => {
    const stdout = JSON.stringify([{ type: 'warning' }, { type: 'warning', line: 2, message: 'unused' }]);

    expect(parseIssues(stdout)).toHaveLength(1);
  });

  it('should yield no issues for output that is not JSON', () => {
    expect(parseIssues('No config file found')).toEqual([]);
    expect(parseIssues('')).toEqual([]);
  });
});

describe('categorizeIssues', () => {
  it('should group issues by severity', () => {
    const issues = parseIssues(JSON.stringify([
      { type: 'refactor', line: 1, message: 'too-many-branches' },
      { type: 'warning', line: 2, message: 'unused-import' },
      { type: 'warning', line: 3, message: 'unused-variable' }
    ]));

    const categorized = categorizeIssues(issues);

    expect(categorized.error).toHaveLength(0);
    expect(categorized.warning.map(i => i.line)).toEqual([2, 3]);
    expect(categorized.convention).toHaveLength(0);
    expect(categorized.refactor.map(i => i.line)).toEqual([1]);
  });
});

describe('averageScore', () => {
  it('should average only the defined scores', () => {
    expect(averageScore([6, 8, undefined])).toBe(7);
  });

  it('should be 0 when no file produced a score', () => {
    expect(averageScore([undefined])).toBe(0);
    expect(averageScore([])).toBe(0);
  });
});
