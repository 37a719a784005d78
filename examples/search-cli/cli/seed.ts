#!/usr/bin/env node
import 'dotenv/config';
import { PaperScout } from 'paperscout-sdk';
import { loadRecords } from '../src/records';

async function main() {
  const file = process.argv[2];

  if (!file) {
    console.error('Usage: npm run seed -- <papers.json>');
    process.exit(1);
  }

  const papers = loadRecords(file);
  const scout = await PaperScout.open();

  try {
    if (!scout.documents) {
      throw new Error('No database to seed');
    }
    if (!process.env.PAPERSCOUT_ID && !process.env.PAPERSCOUT_DB_PATH) {
      console.warn('PAPERSCOUT_ID is not set; papers go to an in-memory database and vanish on exit.');
    }

    const written = await scout.documents.insertMany(papers);
    const corpus = await scout.refresh();
    console.log(`✓ Seeded ${written} papers (${corpus.documents.length} in collection)`);
    console.log(`  Years: ${corpus.distinctYears.join(', ') || 'none'}`);
    console.log(`  Categories: ${corpus.distinctCategories.length}, submitters: ${corpus.distinctSubmitters.length}`);
  } finally {
    await scout.close();
  }
}

main().catch((error) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
