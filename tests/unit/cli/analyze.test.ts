/**
 * Unit Tests: Analyze Command
 */

import { describe, it, expect } from 'vitest';
import { buildOverrides, createAnalyzeCommand } from '../../../src/cli/commands/analyze.js';

describe('buildOverrides', () => {
  it('is empty when nothing was given', () => {
    expect(buildOverrides({})).toEqual({});
  });

  it('keeps only options that change the configuration', () => {
    expect(
      buildOverrides({
        baseRef: 'v1',
        ignoreUnused: false,
        failOnBreaking: true,
        includePatterns: [],
        logLevel: 'WARNING',
        concurrency: 4,
      })
    ).toEqual({ baseRef: 'v1', logLevel: 'warn', concurrency: 4 });
  });

  it('records a disabled failure exit', () => {
    expect(buildOverrides({ failOnBreaking: false, ignoreUnused: true })).toEqual({
      failOnBreaking: false,
      ignoreUnused: true,
    });
  });
});

describe('createAnalyzeCommand', () => {
  it('declares the analysis options', () => {
    const longs = createAnalyzeCommand().options.map(o => o.long);

    expect(longs).toEqual([
      '--base-ref',
      '--head-ref',
      '--repository-path',
      '--ignore-unused',
      '--include-patterns',
      '--exclude-patterns',
      '--json-output',
      '--markdown-output',
      '--log-level',
      '--log-file',
      '--no-fail-on-breaking',
      '--concurrency',
      '--env-file',
    ]);
  });
});
