import type { Document } from '../src/document';

export const quantumPaper: Document = {
  id: 'p-quantum',
  title: 'Quantum Computing Basics',
  abstract: 'intro to qubits',
  categories: ['quant-ph'],
  submitter: 'alice',
  updateDate: '2020-03-14',
};

export const mechanicsPaper: Document = {
  id: 'p-mechanics',
  title: 'Classical Mechanics',
  abstract: 'Newtonian dynamics',
  categories: ['physics'],
  submitter: 'bob',
  updateDate: '2019-07-01',
};

export const graphPaper: Document = {
  id: 'p-graph',
  title: 'Graph Neural Networks',
  abstract: 'message passing on graphs',
  categories: ['cs.LG', 'stat.ML'],
  submitter: 'carol',
  updateDate: '2021-11-30',
  link: 'https://example.org/papers/graph',
};

export const sparsePaper: Document = {
  id: 'p-sparse',
  title: 'Untitled Note',
  abstract: '',
  categories: [],
};

export const papers: Document[] = [quantumPaper, mechanicsPaper, graphPaper, sparsePaper];
