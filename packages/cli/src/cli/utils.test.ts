import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InvalidArgumentError } from 'commander';

// Mock ora
vi.mock('ora', () => {
  const mockOra = {
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  };
  return {
    default: vi.fn(() => mockOra),
    __mockOra: mockOra,
  };
});

import ora from 'ora';
import { CrapScoreError, CrapScoreErrorCode } from '@crapscore/core';
import {
  TaskSpinner,
  collect,
  formatDuration,
  formatFileCount,
  handleCommandError,
  parseNonNegativeInteger,
  parseNonNegativeNumber,
  parsePositiveInteger,
} from './utils.js';

describe('formatDuration', () => {
  it('should format milliseconds below 1000', () => {
    expect(formatDuration(123)).toBe('123ms');
    expect(formatDuration(0)).toBe('0ms');
  });

  it('should format seconds for 1000ms and above', () => {
    expect(formatDuration(1000)).toBe('1.0s');
    expect(formatDuration(1500)).toBe('1.5s');
  });
});

describe('formatFileCount', () => {
  it('should pluralize', () => {
    expect(formatFileCount(1)).toBe('1 file');
    expect(formatFileCount(0)).toBe('0 files');
    expect(formatFileCount(12)).toBe('12 files');
  });
});

describe('option parsers', () => {
  it('parseNonNegativeNumber accepts decimals and zero', () => {
    expect(parseNonNegativeNumber('12.5')).toBe(12.5);
    expect(parseNonNegativeNumber('0')).toBe(0);
  });

  it('parseNonNegativeNumber rejects negatives, blanks and junk', () => {
    for (const bad of ['-1', '', ' ', 'abc', 'Infinity']) {
      expect(() => parseNonNegativeNumber(bad)).toThrow(InvalidArgumentError);
    }
  });

  it('parseNonNegativeInteger rejects fractions', () => {
    expect(parseNonNegativeInteger('0')).toBe(0);
    expect(() => parseNonNegativeInteger('2.5')).toThrow('Expected a non-negative integer.');
  });

  it('parsePositiveInteger rejects zero', () => {
    expect(parsePositiveInteger('8')).toBe(8);
    expect(() => parsePositiveInteger('0')).toThrow('Expected a positive integer.');
  });

  it('collect accumulates repeated values', () => {
    expect(collect('b', collect('a', undefined))).toEqual(['a', 'b']);
  });
});

describe('TaskSpinner', () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  it('should start an ora spinner on stderr', () => {
    new TaskSpinner('Working');

    expect(ora).toHaveBeenCalledWith({ text: 'Working', stream: process.stderr });
  });
});

describe('handleCommandError', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function printed(): string {
    return vi.mocked(console.error).mock.calls.map(call => call.map(String).join(' ')).join('\n');
  }

  it('should print known errors without the "Unexpected" prefix', () => {
    handleCommandError(new CrapScoreError('Bad threshold', CrapScoreErrorCode.CONFIG_INVALID));

    expect(printed()).toContain('❌ Bad threshold');
    expect(printed()).not.toContain('Unexpected error');
    expect(printed()).toContain('Run with --verbose for more details');
  });

  it('should show context for known errors in verbose mode', () => {
    handleCommandError(
      new CrapScoreError('Bad threshold', CrapScoreErrorCode.CONFIG_INVALID, { source: '.crapscore.yml' }),
      true,
    );

    expect(printed()).toContain('"source": ".crapscore.yml"');
    expect(printed()).not.toContain('Run with --verbose');
  });

  it('should label other errors as unexpected', () => {
    handleCommandError(new Error('boom'));

    expect(printed()).toContain('❌ Unexpected error: boom');
  });
});
