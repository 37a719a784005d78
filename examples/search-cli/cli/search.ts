#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'util';
import { PaperScout } from 'paperscout-sdk';
import { formatResults } from '../src/format';

const USAGE =
  'Usage: npm run search -- [--year Y] [--submitter S] [--category C] [--limit N] [--session ID --save K] "<query>"';

async function main() {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    options: {
      year: { type: 'string' },
      submitter: { type: 'string' },
      category: { type: 'string' },
      limit: { type: 'string' },
      session: { type: 'string' },
      save: { type: 'string' },
    },
  });
  const query = positionals.join(' ').trim();

  if (!query) {
    console.error(USAGE);
    process.exit(1);
  }

  const limit = values.limit ? Number(values.limit) : undefined;
  const scout = await PaperScout.open({ limit });

  try {
    const results = scout.search(query, {
      year: values.year,
      submitter: values.submitter,
      category: values.category,
    });
    console.log(formatResults(query, results));

    if (values.save) {
      if (!values.session || !scout.sessions) {
        throw new Error('--save needs --session and a persistent collection (PAPERSCOUT_ID)');
      }
      const position = Number(values.save);
      const picked = results[position - 1];
      if (!picked) {
        throw new Error(`--save must name a result between 1 and ${results.length}`);
      }

      const session = await scout.sessions.load(values.session);
      session.appendSelection(picked.document);
      await scout.sessions.save(values.session, session);
      console.log(`\n✓ Saved "${picked.document.title}" (${session.listSelections().length} selected)`);
    }
  } finally {
    await scout.close();
  }
}

main().catch((error) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
