#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { basicChallengeValue } from '@lit-up/shared';
import { loadDeployConfig } from './config/index.js';
import { deployValuesFrom, injectBundleFile } from './bundle/inject.js';
import { previewRoute } from './preview/route.js';

// Print an error and fail the process without throwing past commander
function fail(error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  console.error(chalk.red(`Error: ${message}`));
  process.exitCode = 1;
}

const program = new Command();

program
  .name('lit-up-edge')
  .description('lit-up edge function tooling - routing preview and deploy-time injection')
  .version('1.0.0');

program
  .command('route <uri>')
  .description('Show how the edge function rewrites a request URI')
  .option('--versions <csv>', 'Active versions, comma-separated (first is the default)', 'v1')
  .action((uri: string, options: { versions: string }) => {
    const preview = previewRoute(uri, options.versions);

    console.log(chalk.cyan('Route preview'));
    console.log(chalk.gray(`   Active versions: ${preview.activeVersions.join(', ')}`));
    console.log(chalk.gray(`   Default version: ${preview.defaultVersion}`));
    console.log(`   Public file:     ${preview.isPublic ? chalk.green('yes') : 'no (requires Basic auth)'}`);
    console.log(`   ${preview.uri} ${chalk.gray('->')} ${chalk.green(preview.rewrittenUri)}`);
  });

program
  .command('challenge <username> <password>')
  .description('Print the Authorization header value the edge function expects')
  .action((username: string, password: string) => {
    console.log(basicChallengeValue(username, password));
  });

program
  .command('params')
  .description('Show the parameter store names and region for a stage')
  .option('-s, --stage <stage>', 'Deployment stage')
  .action((options: { stage?: string }) => {
    try {
      const config = loadDeployConfig({ stage: options.stage });
      console.log(chalk.cyan(`${config.project} (${config.stage})`));
      console.log(chalk.gray(`   Region:          ${config.region}`));
      console.log(`   Auth username:   ${config.parameterNames.authUsername}`);
      console.log(`   Auth password:   ${config.parameterNames.authPassword}`);
      console.log(`   Active versions: ${config.parameterNames.activeVersions}`);
    } catch (error) {
      fail(error);
    }
  });

program
  .command('inject <bundle>')
  .description('Inject parameter names and region into a built edge bundle')
  .option('-s, --stage <stage>', 'Deployment stage')
  .option('-o, --out <file>', 'Output file (default: overwrite the bundle)')
  .action((bundle: string, options: { stage?: string; out?: string }) => {
    try {
      const config = loadDeployConfig({ stage: options.stage });
      const written = injectBundleFile(bundle, deployValuesFrom(config), options.out);
      console.log(chalk.green(`✓ Injected ${config.stage} configuration`));
      console.log(chalk.gray(`   Output: ${written}`));
    } catch (error) {
      fail(error);
    }
  });

program.parse();
