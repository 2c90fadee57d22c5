#!/usr/bin/env ts-node
/**
 * Database CLI for migrations and account bootstrap
 *
 * Usage:
 *   npx ts-node src/db/cli.ts migrate          - Run pending migrations
 *   npx ts-node src/db/cli.ts rollback         - Rollback last migration
 *   npx ts-node src/db/cli.ts rollback 001     - Rollback to specific migration
 *   npx ts-node src/db/cli.ts status           - Show migration status
 *   npx ts-node src/db/cli.ts create-account --email=a@example.com --username=a [--role=admin]
 *   npx ts-node src/db/cli.ts issue-token --username=a
 *   npx ts-node src/db/cli.ts revoke-tokens --username=a
 */

import 'dotenv/config';
import { openDatabase } from './index';
import { runMigrations, rollbackMigration, getMigrationStatus } from './migrate';
import { bootstrapAccount, issueSessionToken, revokeSessionTokens } from './bootstrap';
import { getConfig } from '../config';
import { StoreRegistry } from '../stores';

const command = process.argv[2];
const args = process.argv.slice(3);

// Parse --key=value arguments
function parseArgs(args: string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith('--')) {
      const [key, value] = arg.slice(2).split('=');
      parsed[key] = value || 'true';
    }
  }
  return parsed;
}

function requireArg(parsed: Record<string, string>, key: string): string {
  const value = parsed[key];
  if (!value || value === 'true') {
    console.error(`Missing --${key}=<value>`);
    process.exit(1);
  }
  return value;
}

function printUsage(): void {
  console.log(`
Database CLI

Commands:
  migrate                                  Run pending migrations
  rollback [id]                            Rollback migrations (optionally to specific id)
  status                                   Show migration status
  create-account --email=E --username=U    Create an account (--role=R, --name=N optional)
                                           The first account is always an admin
  issue-token --username=U                 Open a session and print its bearer token
  revoke-tokens --username=U               Revoke every open session of an account
  `);
}

function main(): void {
  const config = getConfig();
  const db = openDatabase(config.databasePath);

  const parsedArgs = parseArgs(args);
  const stores = StoreRegistry.create(db);

  switch (command) {
    case 'migrate':
      runMigrations(db);
      break;

    case 'rollback':
      rollbackMigration(db, args[0]);
      break;

    case 'status': {
      const status = getMigrationStatus(db);
      console.log('\nMigration Status:');
      console.log('─'.repeat(50));
      for (const m of status) {
        const icon = m.applied ? '✓' : '○';
        console.log(`  ${icon} ${m.id}: ${m.name}`);
      }
      console.log('');
      break;
    }

    case 'create-account': {
      runMigrations(db);
      const account = bootstrapAccount(stores, {
        email: requireArg(parsedArgs, 'email'),
        username: requireArg(parsedArgs, 'username'),
        role: parsedArgs.role,
        name: parsedArgs.name,
      });
      console.log(`Created ${account.role} account ${account.username} (${account.id})`);
      break;
    }

    case 'issue-token': {
      runMigrations(db);
      const session = issueSessionToken(
        stores,
        requireArg(parsedArgs, 'username'),
        config.sessionTtlMs
      );
      console.log(`Token: ${session.session_token}`);
      console.log(`Expires: ${session.expires_at}`);
      break;
    }

    case 'revoke-tokens': {
      const revoked = revokeSessionTokens(stores, requireArg(parsedArgs, 'username'));
      console.log(`Revoked ${revoked} session(s)`);
      break;
    }

    default:
      printUsage();
      process.exit(1);
  }

  db.close();
}

try {
  main();
} catch (err) {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
}
