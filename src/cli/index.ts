#!/usr/bin/env node
import { Command, Option } from 'commander';
import { resolveRunConfig } from '../config/run-config';
import { createEventLogger, LogFormat, LogMode } from '../logging/event-logger';
import { runScenarios } from '../runner/runner';
import { listBuiltInScenarios } from '../scenarios/catalogue';
import { loadScenarios } from '../scenarios/loader';
import { filterScenarios } from '../scenarios/selection';
import { selectScenario } from '../ui/scenario-ui';
import { waitForAcknowledgement } from '../ui/start-prompt';
import { createLogger } from '../utils/logger';

const program = new Command();

program
  .name('wire-probe')
  .description('Send raw, possibly malformed, HTTP requests and uploads to a server and print what comes back')
  .version('0.1.0');

program
  .command('run')
  .description('Run the scenario catalogue against a server')
  .option('--host <host>', 'Server host', 'localhost')
  .option('--port <number>', 'Server port', '8080')
  .addOption(
    new Option('--suite <name>', 'Built-in suite to run').choices(['parser', 'upload', 'all']).default('all')
  )
  .option('--scenario <id...>', 'Only run these scenario ids')
  .option('--source <dir>', 'Directory containing extra .yaml scenario files')
  .option('--timeout <ms>', 'Read timeout for every scenario, overriding suite defaults')
  .option('--pause <ms>', 'Pause between scenarios', '500')
  .option('--yes', 'Start without waiting for Enter', false)
  .option('--ui', 'Pick a scenario interactively', false)
  .addOption(new Option('--format <format>', 'Output format').choices(['pretty', 'jsonl']))
  .option('--verbose', 'Trace socket activity', false)
  .addHelpText(
    'after',
    `\nExamples:\n  wire-probe run\n  wire-probe run --suite parser --port 8081\n  wire-probe run --scenario invalid-method missing-version --yes\n  wire-probe run --source ./scenarios --suite upload\n`
  )
  .action(
    async (options: {
      host?: string;
      port?: string;
      suite?: string;
      scenario?: string[];
      source?: string;
      timeout?: string;
      pause?: string;
      yes?: boolean;
      ui?: boolean;
      format?: LogFormat;
      verbose?: boolean;
    }) => {
      const mode: LogMode = options.ui ? 'ui' : process.env.CI ? 'ci' : 'cli';
      const eventLogger = createEventLogger({ mode, format: options.format });
      const logger = createLogger('wire-probe', Boolean(options.verbose));

      try {
        const config = resolveRunConfig(options);
        const fileScenarios = await loadScenarios(config.sourceDir, eventLogger);
        let scenarios = filterScenarios(
          [...listBuiltInScenarios(config.suites), ...fileScenarios],
          config.scenarioIds
        );

        const interactive = Boolean(process.stdin.isTTY) && mode !== 'ci';

        if (options.ui) {
          if (interactive) {
            const choice = await selectScenario(scenarios);
            if (choice) {
              scenarios = filterScenarios(scenarios, [choice]);
            }
          } else {
            logger.warn('--ui needs an interactive terminal, running every selected scenario');
          }
        }

        eventLogger.emitEvent({
          event: 'startup',
          mode,
          host: config.target.host,
          port: config.target.port,
          sourceDir: config.sourceDir,
          pauseMs: config.pauseMs,
          scenarios: scenarios.map((scenario) => scenario.id),
        });

        if (!options.yes && interactive) {
          await waitForAcknowledgement({
            host: config.target.host,
            port: config.target.port,
            count: scenarios.length,
          });
        }

        await runScenarios({
          scenarios,
          target: config.target,
          eventLogger,
          pauseMs: config.pauseMs,
          timeoutMs: config.timeoutMs,
          logger,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : 'Unknown startup error';
        eventLogger.emitEvent({
          event: 'startup-failed',
          message,
        });
        process.exitCode = 1;
      }
    }
  );

program
  .command('list')
  .description('List the available scenario ids')
  .option('--source <dir>', 'Directory containing extra .yaml scenario files')
  .action(async (options: { source?: string }) => {
    const logger = createLogger('wire-probe');

    try {
      const fileScenarios = await loadScenarios(options.source?.trim() || undefined);
      const scenarios = [...listBuiltInScenarios(['parser', 'upload']), ...fileScenarios];
      for (const scenario of scenarios) {
        process.stdout.write(`${scenario.source.padEnd(7)} ${scenario.id.padEnd(20)} ${scenario.description}\n`);
      }
    } catch (error) {
      logger.error(error instanceof Error ? error.message : 'Unknown error while listing scenarios');
      process.exitCode = 1;
    }
  });

void program.parseAsync(process.argv);
