#!/usr/bin/env node
import { render } from 'ink';
import React from 'react';
import chalk from 'chalk';
import App from './components/App.js';
import { ensureHarkDir, getPackageVersion, loadConfig, setRuntimeOverride } from './config/index.js';
import { createAssistant } from './services/assistant.js';
import { LoggerActivitySink } from './services/activity.js';
import { describeError } from './services/errors.js';
import { CliOptions, CliUsageError, parseArgs } from './utils/args.js';
import { logger } from './utils/logger.js';
import { setTerminalTitle, clearTerminal } from './utils/terminalUtils.js';

function showHelp() {
  const version = getPackageVersion();
  console.log(`
Hark v${version}
A personal assistant that routes requests to local tools or a general Ollama agent

Usage:
  hark [options] [query]

Options:
  --help, -h        Show this help message
  --verbose, -v     Show detailed execution logs
  --no-fallback     Never fall back to the Ollama agent
  --model, -m NAME  Ollama model for the fallback agent
  --host URL        Ollama server address
  --json            Print the dispatch result as JSON (with a query)

Arguments:
  query             Answer one request and exit; without it Hark starts an interactive session

Examples:
  hark                              # Interactive session
  hark what time is it              # One request
  hark --json tell me a joke        # One request, JSON output
  hark -m qwen2.5 --no-fallback     # Interactive, tools only
  `);
}

function parseOrExit(): CliOptions {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`hark: ${error.message}`);
      console.error('Run "hark --help" for usage.');
      process.exit(2);
    }
    throw error;
  }
}

async function runOnce(options: CliOptions): Promise<number> {
  const config = loadConfig();
  const assistant = createAssistant({
    config,
    ollama: { model: options.model, host: options.host },
    runtime: options.noFallback ? { enableFallback: false } : {},
    activity: new LoggerActivitySink(logger)
  });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const result = await assistant.dispatch(options.query, { signal: controller.signal });

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
  } else if (result.success) {
    console.log(result.response);
  } else {
    console.error(chalk.red(`${result.error} (${result.errorCode})`));
  }

  return result.success ? 0 : 1;
}

function runInteractive(options: CliOptions): void {
  const config = loadConfig();

  clearTerminal();
  setTerminalTitle('Hark');
  logger.setSilent(true);

  const { waitUntilExit } = render(
    <App
      themeName={config.theme}
      createDispatcher={activity =>
        createAssistant({
          config,
          ollama: { model: options.model, host: options.host },
          runtime: options.noFallback ? { enableFallback: false } : {},
          activity
        })
      }
      persistSetting={(key, value) => {
        setRuntimeOverride(key, value);
      }}
    />,
    { exitOnCtrlC: false }
  );

  waitUntilExit()
    .then(() => {
      logger.setSilent(false);
      process.exit(0);
    })
    .catch((error: unknown) => {
      logger.setSilent(false);
      logger.error('Interactive session failed', error);
      process.exit(1);
    });
}

const options = parseOrExit();

if (options.help) {
  showHelp();
  process.exit(0);
}

logger.setVerbose(options.verbose);
ensureHarkDir();

if (options.query) {
  runOnce(options)
    .then(code => process.exit(code))
    .catch((error: unknown) => {
      console.error(chalk.red(`hark: ${describeError(error)}`));
      process.exit(1);
    });
} else {
  runInteractive(options);
}
