/**
 * Check Quote Tables
 *
 * Verifies that the quote tables, every expected column and the
 * mark_quotes_shown function exist in Supabase, and prints what to apply.
 *
 * Run: npm run check-schema
 */

import 'dotenv/config';
import { createClient } from '@supabase/supabase-js';
import { ConfigError, loadConfig } from '../src/config.ts';
import {
  checkSchema,
  isSchemaComplete,
  missingColumnStatements,
  missingFunctionMigrations,
} from '../src/quotes/index.ts';

async function checkTables() {
  const config = loadConfig();
  const supabase = createClient(config.supabase.url, config.supabase.key);

  console.log('Checking quote tables in Supabase...\n');

  const status = await checkSchema(supabase);
  for (const report of status.tables) {
    if (!report.exists) {
      console.log(`✗ ${report.table}: NOT FOUND`);
    } else if (report.missingColumns.length > 0) {
      console.log(`✗ ${report.table}: missing ${report.missingColumns.join(', ')}`);
    } else {
      console.log(`✓ ${report.table}: complete`);
    }
  }
  for (const fn of status.functions) {
    console.log(fn.exists ? `✓ ${fn.name}(): found` : `✗ ${fn.name}(): NOT FOUND`);
  }

  if (isSchemaComplete(status)) {
    console.log('\n✓ All quote tables are ready!');
    return;
  }

  console.log('\n===========================================');
  console.log('ACTION REQUIRED: Apply migrations');
  console.log('===========================================');

  if (status.tables.some((r) => !r.exists)) {
    console.log('\nMissing tables: run the files in supabase/migrations in order,');
    console.log('or use the Supabase CLI:');
    console.log('   npx supabase db push');
  }

  const migrations = missingFunctionMigrations(status);
  if (migrations.length > 0) {
    console.log('\nMissing functions: run these migration files in the SQL Editor:\n');
    for (const migration of migrations) {
      console.log(`   ${migration}`);
    }
  }

  const statements = missingColumnStatements(status);
  if (statements.length > 0) {
    console.log('\nMissing columns: run in the SQL Editor:\n');
    for (const statement of statements) {
      console.log(`   ${statement}`);
    }
  }

  process.exitCode = 1;
}

checkTables().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(error.message);
  } else {
    console.error('Schema check failed:', error);
  }
  process.exit(1);
});
