#!/usr/bin/env node

import * as fs from 'fs';
import * as path from 'path';
import { assertTableName } from '../utils/assert-table-name';
import { AUDIT_TABLE_SUFFIX } from '../workflow.constants';

/**
 * dbmate-compatible SQL creating the audit table of one workflow type.
 */
export function generateMigration(workflowName: string): string {
  const tableName = `${workflowName}${AUDIT_TABLE_SUFFIX}`;
  assertTableName(tableName);

  return `-- migrate:up
CREATE TABLE ${tableName} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    subject_id TEXT NOT NULL,
    transition TEXT NOT NULL,
    from_state TEXT NOT NULL,
    to_state TEXT NOT NULL,
    params JSONB NOT NULL DEFAULT '[]'::jsonb,
    transitioned_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
);

CREATE INDEX idx_${tableName}_subject_id
    ON ${tableName} (subject_id, transitioned_at);

CREATE INDEX idx_${tableName}_transition
    ON ${tableName} (transition);

-- migrate:down
DROP TABLE IF EXISTS ${tableName};
`;
}

function main(): void {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    console.log(
      'Usage: nest-transition-workflows generate-migration <workflowName>\n\n' +
        'Generates a dbmate-compatible SQL migration creating the transition audit table.\n\n' +
        'Arguments:\n' +
        '  workflowName    Registered workflow type name (alphanumeric and underscores only)\n\n' +
        'Example:\n' +
        '  npx nest-transition-workflows generate-migration order',
    );
    process.exit(args.length === 0 ? 1 : 0);
  }

  const command = args[0];
  if (command !== 'generate-migration') {
    console.error(`Unknown command: ${command}`);
    console.error('Available commands: generate-migration');
    process.exit(1);
  }

  const workflowName = args[1];
  if (!workflowName) {
    console.error('Error: workflowName argument is required.');
    console.error(
      'Usage: nest-transition-workflows generate-migration <workflowName>',
    );
    process.exit(1);
  }

  const sql = generateMigration(workflowName);

  const migrationsDir = path.resolve('db', 'migrations');
  if (!fs.existsSync(migrationsDir)) {
    fs.mkdirSync(migrationsDir, { recursive: true });
  }

  const timestamp = new Date().toISOString().replace(/[-:T]/g, '').slice(0, 14);
  const fileName = `${timestamp}_create_${workflowName}${AUDIT_TABLE_SUFFIX}.sql`;
  const filePath = path.join(migrationsDir, fileName);

  fs.writeFileSync(filePath, sql, 'utf-8');
  console.log(`Migration created: ${filePath}`);
}

if (require.main === module) {
  main();
}
