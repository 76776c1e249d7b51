import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../config/loader';
import { createModelRouter } from '../../models/factory';
import { errorMessage } from '../../utils/errors';
import { formatError, formatInfo, formatSuccess } from '../formatters';

export function registerModelsCommand(program: Command): void {
  program
    .command('models')
    .description('List logical models and their fallback order')
    .option('--json', 'Output as JSON', false)
    .action((options: { json?: boolean }) => {
      try {
        const config = loadConfig();
        const routes = createModelRouter(config).listRoutes();

        if (options.json) {
          console.log(JSON.stringify(routes, null, 2));
          return;
        }

        if (!routes.length) {
          console.log(formatInfo('No models available. Configure at least one provider API key.'));
          return;
        }

        console.log(formatSuccess('Models'));
        for (const route of routes) {
          const marker = route.logicalName === config.model.name ? chalk.bold(' (active)') : '';
          console.log(formatInfo(`${route.logicalName}${marker}`));
          route.entries.forEach((e, i) => console.log(formatInfo(`  ${i + 1}. ${e.id} ${e.provider}/${e.model}`)));
        }
      } catch (err) {
        console.error(formatError(errorMessage(err)));
        process.exitCode = 1;
      }
    });
}
