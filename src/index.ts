#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import { initDB } from './db/client.js';
import { getSettings, parseSetting, updateSettings } from './db/settings.js';
import { runBuild } from './ingest/pipeline.js';
import { healthStatus } from './observability.js';
import { artifactsExist } from './retrieval/store.js';
import { KnowledgeBase } from './service.js';
import { registerCommands, startDiscordBot } from './discord/bot.js';

function parseFlags(args: string[]): { positional: string[]; flags: Record<string, string> } {
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  let i = 0;
  while (i < args.length) {
    if (args[i].startsWith('--') && i + 1 < args.length && !args[i + 1].startsWith('--')) {
      flags[args[i].slice(2)] = args[i + 1];
      i += 2;
    } else {
      positional.push(args[i]);
      i++;
    }
  }
  return { positional, flags };
}

function printUsage(): void {
  console.log('Usage:');
  console.log('  college-kb build [--data <dir>] [--out <dir>]');
  console.log('  college-kb ask "<question>"');
  console.log('  college-kb search "<query>" [--k <n>]');
  console.log('  college-kb status');
  console.log('  college-kb config set <anchoringEnabled|relevanceThreshold|topK> <value>');
  console.log('  college-kb discord');
}

async function main() {
  const config = loadConfig();
  const ctx = initDB(config.dbPath);

  const rawArgs = process.argv.slice(2);
  const cmd = rawArgs[0];
  const rest = rawArgs.slice(1);

  if (cmd === 'build') {
    const { flags } = parseFlags(rest);
    const kb = new KnowledgeBase({ config, ctx });
    const report = await runBuild(ctx, {
      config,
      encoder: kb.encoder,
      dataDir: flags.data,
      vectorstoreDir: flags.out
    });
    console.log(report.summary);
    return;
  }

  if (cmd === 'ask') {
    const question = parseFlags(rest).positional.join(' ');
    if (!question) {
      console.error('Error: Question required.\nUsage: college-kb ask "<question>"');
      process.exit(1);
    }
    const kb = new KnowledgeBase({ config, ctx });
    console.log(await kb.queryKnowledgeBase(question));
    return;
  }

  if (cmd === 'search') {
    const { positional, flags } = parseFlags(rest);
    const query = positional.join(' ');
    if (!query) {
      console.error('Error: Query required.\nUsage: college-kb search "<query>" [--k <n>]');
      process.exit(1);
    }
    const k = flags.k ? Number(flags.k) : undefined;
    if (k !== undefined && (!Number.isInteger(k) || k <= 0)) {
      console.error(`Error: --k must be a positive integer, got "${flags.k}"`);
      process.exit(1);
    }
    const kb = new KnowledgeBase({ config, ctx });
    await kb.initialize();
    const outcome = await kb.searchDetailed(query, k);
    if (outcome.status === 'failed') {
      console.error(outcome.error.message);
      process.exit(1);
    }
    console.log(JSON.stringify(outcome.results, null, 2));
    return;
  }

  if (cmd === 'status') {
    console.log(
      JSON.stringify(
        {
          health: healthStatus(ctx),
          settings: getSettings(ctx),
          artifacts: { dir: config.vectorstoreDir, present: artifactsExist(config.vectorstoreDir) }
        },
        null,
        2
      )
    );
    return;
  }

  if (cmd === 'config' && rest[0] === 'set' && rest[1] && rest[2] !== undefined) {
    const parsed = parseSetting(rest[1], rest.slice(2).join(' '));
    if (!parsed.ok) {
      console.error(`Error: ${parsed.error}`);
      process.exit(1);
    }
    updateSettings(ctx, parsed.patch);
    console.log(JSON.stringify(getSettings(ctx), null, 2));
    return;
  }

  if (cmd === 'discord') {
    const kb = new KnowledgeBase({ config, ctx });
    await kb.initialize();
    await registerCommands();
    await startDiscordBot(ctx, kb);
    return;
  }

  printUsage();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
