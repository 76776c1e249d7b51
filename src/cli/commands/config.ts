import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, maskConfig } from '../../config/loader';
import { createModelRouter } from '../../models/factory';
import { ConfigurationError, errorMessage } from '../../utils/errors';

function reportLoadError(error: unknown): void {
  console.error(chalk.red('Failed to load configuration:'));
  if (error instanceof ConfigurationError && error.issues.length) {
    error.issues.forEach((issue) => console.error(chalk.red(`  - ${issue}`)));
  } else {
    console.error(chalk.red(errorMessage(error)));
  }
  process.exitCode = 1;
}

export function registerConfigCommand(program: Command): void {
  const configCommand = program.command('config').description('Inspect configuration');

  configCommand
    .command('validate')
    .description('Validate current configuration')
    .action(() => {
      try {
        const config = loadConfig();
        console.log(chalk.green('✓ Configuration structure is valid.'));

        const router = createModelRouter(config);
        if (router.has(config.model.name)) {
          console.log(chalk.green(`✓ Model "${config.model.name}" has at least one provider with an API key.`));
        } else {
          console.log(chalk.red(`✗ Model "${config.model.name}" has no usable provider. Set an API key (e.g. KIMI_API_KEY).`));
          process.exitCode = 1;
        }
      } catch (error) {
        reportLoadError(error);
      }
    });

  configCommand
    .command('show')
    .description('Show current configuration')
    .action(() => {
      try {
        console.log(JSON.stringify(maskConfig(loadConfig()), null, 2));
      } catch (error) {
        reportLoadError(error);
      }
    });
}
