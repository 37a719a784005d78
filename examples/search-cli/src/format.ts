import {
  displayCategories,
  displaySubmitter,
  displayYear,
  type Document,
  type SearchResult,
} from 'paperscout-sdk';

function details(doc: Document): string[] {
  return [
    `   Submitter: ${displaySubmitter(doc)}`,
    `   Update Year: ${displayYear(doc)}`,
    `   Categories: ${displayCategories(doc)}`,
    `   Abstract: ${doc.abstract}`,
  ];
}

export function formatResults(query: string, results: SearchResult[]): string {
  if (results.length === 0) {
    return `No papers match '${query}'.`;
  }

  const lines = [`Top recommendations for '${query}':`];
  results.forEach(({ document, score }, i) => {
    lines.push('', `${i + 1}. ${document.title} (score ${score.toFixed(1)})`, ...details(document));
  });
  return lines.join('\n');
}

export function formatSelections(selections: Document[]): string {
  if (selections.length === 0) {
    return 'No papers selected yet.';
  }

  const lines = ['Saved Papers'];
  for (const doc of selections) {
    lines.push('', `## ${doc.title}`, ...details(doc));
    if (doc.link) lines.push(`   Link: ${doc.link}`);
  }
  return lines.join('\n');
}
