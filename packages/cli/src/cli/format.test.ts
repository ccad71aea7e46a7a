import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { CategorizationError, Err, Ok, type ClassificationResult } from '@quecat/core';
import {
  formatCategories,
  formatCheckRow,
  formatCheckSummary,
  formatPercent,
  formatResult,
  summarizeCheck,
  type CheckRow,
} from './format.js';

function result(overrides: Partial<ClassificationResult>): ClassificationResult {
  return {
    categoryId: 'stok',
    displayName: 'Stok',
    confidence: 0.9,
    method: 'embedding',
    similarities: new Map([['stok', 0.9]]),
    isHighSimilarity: true,
    ...overrides,
  };
}

describe('format', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should format a fraction as a percentage', () => {
    expect(formatPercent(0.8123)).toBe('81.2%');
    expect(formatPercent(1)).toBe('100.0%');
  });

  describe('formatResult', () => {
    it('should list the winner and similarities from best to worst', () => {
      const lines = formatResult(
        'Ürün bozuk',
        result({
          categoryId: 'teknik',
          displayName: 'Teknik Destek',
          confidence: 0.8123,
          similarities: new Map([
            ['stok', 0.4],
            ['teknik', 0.8123],
            ['kargo', 0.4],
          ]),
        })
      );

      expect(lines).toEqual([
        'Question:   Ürün bozuk',
        'Category:   Teknik Destek (teknik)',
        'Confidence: 81.2% · high similarity',
        '',
        'Similarities:',
        '  › teknik  0.812',
        '    stok    0.400',
        '    kargo   0.400',
      ]);
    });

    it('should omit the high similarity note below the threshold', () => {
      const lines = formatResult('Merhaba', result({ confidence: 0.35, isHighSimilarity: false }));

      expect(lines[2]).toBe('Confidence: 35.0%');
    });
  });

  it('should list categories with example counts', () => {
    expect(
      formatCategories([
        { id: 'stok', displayName: 'Stok', examples: ['a'] },
        { id: 'teknik', displayName: 'Teknik', examples: ['a', 'b'] },
      ])
    ).toEqual(['  stok    Stok (1 example)', '  teknik  Teknik (2 examples)']);
  });

  describe('check summary', () => {
    const rows: CheckRow[] = [
      { question: 'Stokta var mı?', expected: 'stok', outcome: Ok(result({ confidence: 0.9 })) },
      {
        question: 'Ürün bozuk',
        expected: 'teknik',
        outcome: Ok(result({ confidence: 0.5, isHighSimilarity: false })),
      },
      {
        question: 'Kargom nerede?',
        expected: 'kargo',
        outcome: Err(new CategorizationError('EmbeddingFailure', 'Failed to embed question: timeout')),
      },
    ];

    it('should count matches, high similarity and failures', () => {
      const summary = summarizeCheck(rows);

      expect(summary).toMatchObject({ total: 3, failed: 1, matched: 1, highSimilarity: 1 });
      expect(summary.averageConfidence).toBeCloseTo(0.7, 10);
    });

    it('should report zero average confidence when nothing succeeded', () => {
      expect(summarizeCheck([rows[2]]).averageConfidence).toBe(0);
      expect(summarizeCheck([])).toEqual({
        total: 0,
        failed: 0,
        matched: 0,
        highSimilarity: 0,
        averageConfidence: 0,
      });
    });

    it('should mark each row by outcome', () => {
      expect(rows.map(formatCheckRow)).toEqual([
        '✓ Stokta var mı? → stok 90.0%',
        '≠ Ürün bozuk → stok 50.0%',
        '✗ Kargom nerede? Failed to embed question: timeout',
      ]);
    });

    it('should format the summary lines', () => {
      expect(
        formatCheckSummary({ total: 3, failed: 1, matched: 1, highSimilarity: 1, averageConfidence: 0.7 })
      ).toEqual([
        'Questions:          3',
        'Matched expected:   1/3',
        'High similarity:    1/3 (33.3%)',
        'Average confidence: 70.0%',
        'Failed:             1',
      ]);
    });
  });
});
