#!/usr/bin/env node
import 'dotenv/config';
import { parseArgs } from 'util';
import { PaperScout } from 'paperscout-sdk';
import { formatSelections } from '../src/format';

async function main() {
  const { values } = parseArgs({
    args: process.argv.slice(2),
    options: {
      session: { type: 'string' },
      home: { type: 'boolean', default: false },
    },
  });

  if (!values.session) {
    console.error('Usage: npm run saved -- --session <id> [--home]');
    process.exit(1);
  }

  const scout = await PaperScout.open();

  try {
    if (!scout.sessions) {
      throw new Error('No database holding sessions');
    }

    const session = await scout.sessions.load(values.session);
    session.goto(values.home ? 'home' : 'selected');
    await scout.sessions.save(values.session, session);

    if (session.page === 'selected') {
      console.log(formatSelections(session.listSelections()));
    } else {
      console.log(`Session '${values.session}' is back on the search page.`);
    }
  } finally {
    await scout.close();
  }
}

main().catch((error) => {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
