import { getOrderingPolicy, type SearchNode } from '@gsearch/core';
import { describe, it, expect } from 'vitest';

import { createColorFns } from '../reporter/colors.js';
import {
  formatCompactList,
  formatDetailedList,
  formatNodeInfo,
  formatState,
} from '../reporter/formatters.js';

function node(id: number, g: number, h?: number): SearchNode<string> {
  return { id, state: `s${id}`, parentId: 1, depth: 2, g, h };
}

describe('formatters', () => {
  describe('formatNodeInfo', () => {
    const sample = { ...node(3, 1.5, 2.25), state: 'X' };

    it.each([
      ['best-first', '#3: d 2, g 1.50, state X'],
      ['depth-first', '#3: d 2, g 1.50, state X'],
      ['uniform-cost', '#3: g 1.50, d 2, state X'],
      ['greedy-best-first', '#3: h 2.25, d 2, g 1.50, state X'],
      ['a-star', '#3: f 3.75, g 1.50, h 2.25, d 2, state X'],
    ] as const)('%s', (strategy, expected) => {
      expect(formatNodeInfo(sample, strategy, formatState)).toBe(expected);
    });
  });

  describe('formatState', () => {
    it('should print strings as they are and other values as JSON', () => {
      expect(formatState('A')).toBe('A');
      expect(formatState({ r: 1, c: 2 })).toBe('{"r":1,"c":2}');
      expect(formatState(7)).toBe('7');
      expect(formatState(undefined)).toBe('undefined');
    });
  });

  describe('formatCompactList', () => {
    it('should leave a trailing space when the list is empty', () => {
      expect(formatCompactList('add', [], getOrderingPolicy('uniform-cost'))).toBe(
        '        add   0: ',
      );
    });
  });

  describe('formatDetailedList', () => {
    it('should show ten entries and count the rest', () => {
      const nodes = Array.from({ length: 12 }, (_, i) => node(i + 2, i));

      const lines = formatDetailedList('frontier', nodes, getOrderingPolicy('uc'), formatState);

      expect(lines).toHaveLength(12);
      expect(lines[0]).toBe('      frontier 12 nodes:');
      expect(lines[1]).toBe('           #2: g 0.00, d 2, state s2');
      expect(lines[10]).toBe('           #11: g 9.00, d 2, state s11');
      expect(lines[11]).toBe('            and 2 more ...');
    });
  });

  describe('createColorFns', () => {
    it('should return text unchanged when color is off', () => {
      const c = createColorFns(false);

      expect([c.bold('a'), c.green('b'), c.red('c'), c.cyan('d')]).toEqual(['a', 'b', 'c', 'd']);
    });
  });
});
