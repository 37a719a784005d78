import { describe, it, expect } from 'vitest';
import type { Document } from 'paperscout-sdk';
import { formatResults, formatSelections } from '../src/format';

const paper: Document = {
  id: 'p-1',
  title: 'Quantum Computing Basics',
  abstract: 'intro to qubits',
  categories: ['quant-ph', 'cs.ET'],
  submitter: 'alice',
  updateDate: '2020-03-14',
  link: 'https://example.org/papers/1',
};

const bare: Document = {
  id: 'p-2',
  title: 'Untitled Note',
  abstract: '',
  categories: [],
};

describe('Result formatting', () => {
  it('should number results and show their details', () => {
    const output = formatResults('quantum', [{ document: paper, score: 100, index: 0 }]);
    expect(output.split('\n')).toEqual([
      "Top recommendations for 'quantum':",
      '',
      '1. Quantum Computing Basics (score 100.0)',
      '   Submitter: alice',
      '   Update Year: 2020',
      '   Categories: quant-ph, cs.ET',
      '   Abstract: intro to qubits',
    ]);
  });

  it('should show Unknown for a missing submitter and year', () => {
    const lines = formatResults('note', [{ document: bare, score: 57.14, index: 3 }]).split('\n');
    expect(lines[2]).toBe('1. Untitled Note (score 57.1)');
    expect(lines[3]).toBe('   Submitter: Unknown');
    expect(lines[4]).toBe('   Update Year: Unknown');
    expect(lines[5]).toBe('   Categories: ');
  });

  it('should say so when nothing matches', () => {
    expect(formatResults('nothing', [])).toBe("No papers match 'nothing'.");
  });
});

describe('Selection formatting', () => {
  it('should list saved papers with their links', () => {
    const lines = formatSelections([paper, bare]).split('\n');
    expect(lines[0]).toBe('Saved Papers');
    expect(lines[2]).toBe('## Quantum Computing Basics');
    expect(lines[7]).toBe('   Link: https://example.org/papers/1');
    expect(lines[9]).toBe('## Untitled Note');
    expect(lines).toHaveLength(14);
  });

  it('should report an empty shortlist', () => {
    expect(formatSelections([])).toBe('No papers selected yet.');
  });
});
