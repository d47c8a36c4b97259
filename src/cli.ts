#!/usr/bin/env node

import { Command } from 'commander';
import { clear } from './commands/clear.js';
import { forget, memories, remember, show } from './commands/memories.js';
import type { MemoriesOptions, RememberOptions } from './commands/memories.js';
import { action } from './commands/shared.js';
import { stats, topics } from './commands/stats.js';
import { stmGet, stmSet } from './commands/stm.js';

const VERSION = '0.1.0';

const CATEGORY_HELP = 'Category: memories, sessions or knowledge';

const program = new Command();

program
  .name('mnemos')
  .description('Hybrid semantic memory store for conversational agents')
  .version(VERSION);

program
  .command('remember <content>')
  .description('Save a memory (same id = replace)')
  .option('-c, --category <category>', CATEGORY_HELP, 'memories')
  .option('--id <id>', 'Memory id (default: random UUID)')
  .option('-u, --user <id>', 'User id')
  .option('-a, --agent <id>', 'Agent id')
  .option('--team <id>', 'Team id')
  .option('-t, --topics <topics>', 'Comma-separated topics')
  .option('--input <text>', 'Raw input the memory was derived from')
  .option('--json', 'Print the stored record as JSON')
  .action(action((content: string, options: RememberOptions) => remember(content, options)));

program
  .command('memories')
  .description('List memories, or search them with --query')
  .option('-c, --category <category>', CATEGORY_HELP, 'memories')
  .option('-u, --user <id>', 'Only this user')
  .option('-a, --agent <id>', 'Only this agent')
  .option('--team <id>', 'Only this team')
  .option('-t, --topics <topics>', 'Comma-separated topics (any match)')
  .option('-q, --query <text>', 'Free-text query')
  .option('-m, --mode <mode>', 'Search mode: hybrid, dense or sparse')
  .option('-n, --limit <number>', 'Page size', '10')
  .option('-p, --page <number>', 'Page number (1-based)')
  .option('-s, --sort <field>', 'Sort field: updated_at, memory_id, user_id, agent_id, team_id, content')
  .option('-o, --order <order>', 'Sort order: asc or desc')
  .option('--json', 'Output as JSON')
  .action(action((options: MemoriesOptions) => memories(options)));

program
  .command('show <id>')
  .description('Show one memory')
  .option('-c, --category <category>', CATEGORY_HELP, 'memories')
  .option('--json', 'Output as JSON')
  .action(action((id: string, options: { category?: string; json?: boolean }) => show(id, options)));

program
  .command('forget <ids...>')
  .description('Delete memories by id')
  .option('-c, --category <category>', CATEGORY_HELP, 'memories')
  .action(action((ids: string[], options: { category?: string }) => forget(ids, options)));

program
  .command('clear')
  .description('Delete every memory in a category')
  .option('-c, --category <category>', CATEGORY_HELP, 'memories')
  .option('-y, --yes', 'Confirm deletion')
  .action(action((options: { category?: string; yes?: boolean }) => clear(options)));

program
  .command('topics')
  .description('List every topic in a category')
  .option('-c, --category <category>', CATEGORY_HELP, 'memories')
  .option('--json', 'Output as JSON')
  .action(action((options: { category?: string; json?: boolean }) => topics(options)));

program
  .command('stats')
  .description('Per-user memory counts, most recently updated first')
  .option('-c, --category <category>', CATEGORY_HELP, 'memories')
  .option('-n, --limit <number>', 'Page size')
  .option('-p, --page <number>', 'Page number (1-based)')
  .option('--json', 'Output as JSON')
  .action(action((options: { category?: string; limit?: string; page?: string; json?: boolean }) => stats(options)));

const stm = program.command('stm').description('Short-term memory (expires after the configured TTL)');

stm
  .command('set <key> <value>')
  .description('Store a JSON value')
  .action(action((key: string, value: string) => stmSet(key, value)));

stm
  .command('get <key>')
  .description('Read a value')
  .option('--json', 'Print null for a missing key')
  .action(action((key: string, options: { json?: boolean }) => stmGet(key, options)));

await program.parseAsync();
