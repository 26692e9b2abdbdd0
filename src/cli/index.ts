#!/usr/bin/env node

/**
 * tidings — Command Line Interface
 *
 * start: run the scheduler kernel with the Telegram bot in the foreground.
 * status / reconcile / config: one-shot inspection and maintenance.
 *
 * @module cli
 * @version 1.0.0
 */

import { Command } from 'commander';
import { Api } from 'grammy';

import { Runtime } from '../autonomous/runtime.js';
import { ensureDataDir, loadConfig, setConfig } from '../config/config.js';
import { redact, setLogLevel } from '../kernel/logger.js';
import { TelegramSink } from '../integrations/telegram/index.js';
import { TelegramBot } from '../plugins/telegram-bot/index.js';
import type { Config } from '../types/index.js';
import { formatDuration } from '../utils/format.js';

// ═══════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════

interface ConfigOption {
  config?: string;
}

function fail(message: string): never {
  process.stderr.write(`Error: ${message}\n`);
  process.exit(1);
}

function resolveConfig(options: ConfigOption): Config {
  const result = loadConfig(options.config);
  if (!result.success) {
    fail(result.error.message);
  }
  setConfig(result.data);
  setLogLevel(result.data.logging.level);

  const dir = ensureDataDir(result.data);
  if (!dir.success) {
    fail(`Cannot create data directory: ${dir.error.message}`);
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRAM SETUP
// ═══════════════════════════════════════════════════════════════════════════

const program = new Command();

program
  .name('tidings')
  .description('Weekly allowance, bin collection and train watch alerts over Telegram')
  .version('1.0.0');

program
  .command('start')
  .description('Run the schedulers and the Telegram bot in the foreground')
  .option('-c, --config <path>', 'Path to config.json')
  .action(async (options: ConfigOption) => {
    const config = resolveConfig(options);
    if (!config.telegram.botToken) {
      fail('Telegram bot token not configured. Set TELEGRAM_BOT_TOKEN.');
    }

    const runtime = new Runtime({ config });
    const bot = new TelegramBot(
      runtime.eventBus,
      {
        ledger: runtime.budget?.ledger ?? null,
        bins: runtime.bins?.service ?? null,
        trains: runtime.trains,
        status: runtime,
      },
      config.telegram,
    );
    runtime.dispatcher.register(new TelegramSink(bot.bot.api));

    try {
      await runtime.start();
      await bot.start();
    } catch (error) {
      await runtime.stop();
      fail(`Failed to start: ${error instanceof Error ? error.message : String(error)}`);
    }

    process.stdout.write('tidings running. Press Ctrl+C to stop\n');

    let stopping = false;
    const shutdown = async () => {
      if (stopping) return;
      stopping = true;
      process.stdout.write('\nShutting down...\n');
      await bot.stop();
      await runtime.stop();
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());
  });

program
  .command('status')
  .description('Show each domain\'s next milestone and stored state summary')
  .option('-c, --config <path>', 'Path to config.json')
  .action(async (options: ConfigOption) => {
    const config = resolveConfig(options);
    const runtime = new Runtime({ config });

    try {
      await runtime.load();
      const now = runtime.clock.now();
      for (const entry of await runtime.status()) {
        const next = entry.nextMilestone
          ? `${entry.nextMilestone.toISOString()} (in ${formatDuration(entry.nextMilestone.getTime() - now.getTime())})`
          : '-';
        process.stdout.write(`${entry.domain.padEnd(8)} next: ${next}\n         ${entry.summary}\n`);
      }
    } finally {
      await runtime.stop();
    }
  });

program
  .command('reconcile')
  .description('Run catch-up for every scheduled domain once and deliver the resulting alerts')
  .option('-c, --config <path>', 'Path to config.json')
  .action(async (options: ConfigOption) => {
    const config = resolveConfig(options);
    const sinks = config.telegram.botToken ? [new TelegramSink(new Api(config.telegram.botToken))] : [];
    const runtime = new Runtime({ config, sinks });

    try {
      await runtime.load();
      runtime.dispatcher.start();
      for (const { domain, result } of await runtime.reconcileAll()) {
        const line = result
          ? `${result.changed ? 'updated' : 'unchanged'}, ${result.alerts.length} alert(s)`
          : 'failed (see log)';
        process.stdout.write(`${domain.padEnd(8)} ${line}\n`);
      }
    } finally {
      await runtime.stop();
    }
  });

program
  .command('config')
  .description('Print the effective configuration with secrets redacted')
  .option('-c, --config <path>', 'Path to config.json')
  .action((options: ConfigOption) => {
    const result = loadConfig(options.config);
    if (!result.success) {
      fail(result.error.message);
    }
    process.stdout.write(`${JSON.stringify(redact(result.data), null, 2)}\n`);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  fail(error instanceof Error ? error.message : String(error));
});
