#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { readFileSync, existsSync } from 'fs';
import { writeFile } from 'fs/promises';
import { DeploymentError } from './types/index.js';
import { ConsoleLogger } from './logger.js';
import { describeError, isDeploymentFailure } from './errors.js';
import { DEFAULT_ENV_FILE, renderEnvTemplate } from './config/index.js';
import {
  DEFAULT_DEPLOY_SETTINGS,
  DeploymentOrchestrator,
  ENDPOINT_INFO_FILE,
  EndpointProvisioner,
  EndpointVerifier,
  TEST_OUTPUT_DIR
} from './orchestration/index.js';
import { DEFAULT_IMAGE_RECIPE, DockerfileGenerator, loadImageRecipe } from './templates/index.js';

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));
  if (packageJson !== null && typeof packageJson === 'object' && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

function printErrors(errors: DeploymentError[]): void {
  for (const error of errors) {
    console.error(chalk.red(`❌ Error: ${error.message}`));
    if (error.remediation) {
      console.error(chalk.yellow(`💡 ${error.remediation}`));
    }
  }
}

function fail(error: unknown, verbose: boolean): never {
  if (isDeploymentFailure(error)) {
    printErrors([error.toDeploymentError()]);
  } else {
    console.error(chalk.red('❌ Error:'), describeError(error));
  }
  if (verbose) {
    console.error(error);
  }
  process.exit(isDeploymentFailure(error) ? error.exitCode : 1);
}

const program = new Command();

program
  .name('ocr-deploy')
  .description('Deploy the Chandra OCR model to RunPod Serverless')
  .version(readVersion());

program
  .command('deploy', { isDefault: true })
  .description('Load .env.runpod, install dependencies and run the deployment program')
  .option('-e, --env-file <path>', 'Path to the env configuration file', DEFAULT_ENV_FILE)
  .option('--runtime <command>', 'Runtime that runs the deployment program', DEFAULT_DEPLOY_SETTINGS.runtime)
  .option('--installer <command>', 'Package installer', DEFAULT_DEPLOY_SETTINGS.installer)
  .option('--dependency <package>', 'Package installed before deploying', DEFAULT_DEPLOY_SETTINGS.dependency)
  .option('--program <path>', 'Deployment program', DEFAULT_DEPLOY_SETTINGS.program)
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: {
    envFile: string;
    runtime: string;
    installer: string;
    dependency: string;
    program: string;
    verbose?: boolean;
  }) => {
    const logger = new ConsoleLogger(Boolean(options.verbose));

    // No spinner here: pip and the deployment program write straight to the terminal.
    logger.info('============================================');
    logger.info('Chandra OCR - RunPod Serverless Deployment');
    logger.info('============================================');
    logger.info('');

    const orchestrator = new DeploymentOrchestrator(
      {
        runtime: options.runtime,
        installer: options.installer,
        dependency: options.dependency,
        program: options.program
      },
      { logger }
    );
    const result = await orchestrator.deploy({ envFile: options.envFile });

    if (!result.success) {
      logger.info('');
      printErrors(result.errors ?? []);
      if (options.verbose && result.errors) {
        result.errors.forEach(error => {
          if (error.details !== undefined) {
            console.error(error.details);
          }
        });
      }
      process.exit(result.exitCode);
    }

    logger.info('');
    logger.info('Deployment complete!');
    logger.detail(`⏱️  Deployment took ${result.metadata.duration}ms`);
    logger.detail(`🆔 Deployment ID: ${result.metadata.deploymentId}`);
  });

program
  .command('provision')
  .description('Create or update the serverless endpoint through the RunPod API')
  .option('-e, --env-file <path>', 'Path to the env configuration file', DEFAULT_ENV_FILE)
  .option('-o, --output <path>', 'Where to write the endpoint info', ENDPOINT_INFO_FILE)
  .option('--no-output', 'Do not write the endpoint info file')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: { envFile: string; output: string | false; verbose?: boolean }) => {
    const logger = new ConsoleLogger(Boolean(options.verbose));
    // Persist-only spinner: the provisioner logs its own progress lines.
    const spinner = ora();
    logger.step('Provisioning RunPod endpoint...');

    try {
      const provisioner = new EndpointProvisioner({ logger });
      const info = await provisioner.provision({ envFile: options.envFile, output: options.output });

      spinner.succeed(info.status === 'created' ? 'Endpoint created' : 'Endpoint updated');
      console.log(chalk.green('\n✅ Endpoint Details:'));
      console.log(`  Name: ${info.name}`);
      console.log(`  ID: ${info.id}`);
      console.log(`  URL: ${chalk.underline(info.url)}`);
      console.log(`  Runsync URL: ${info.url}/runsync`);
      console.log(`  Run URL: ${info.url}/run`);
      if (options.output !== false) {
        console.log(chalk.gray(`\nEndpoint info saved to ${options.output}`));
      }
    } catch (error) {
      spinner.fail('Provisioning failed');
      fail(error, Boolean(options.verbose));
    }
  });

program
  .command('test')
  .description('Send a sample image or PDF to the deployed endpoint')
  .argument('<image>', 'Image or PDF path, or an http(s) URL')
  .option('-e, --env-file <path>', 'Path to the env configuration file', DEFAULT_ENV_FILE)
  .option('--endpoint-id <id>', 'Endpoint to test (default: RUNPOD_ENDPOINT_ID or the endpoint info file)')
  .option('-i, --info-file <path>', 'Endpoint info written by provision', ENDPOINT_INFO_FILE)
  .option('-o, --output <dir>', 'Directory for the returned markdown and HTML', TEST_OUTPUT_DIR)
  .option('--no-output', 'Do not save the results')
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (image: string, options: {
    envFile: string;
    endpointId?: string;
    infoFile: string;
    output: string | false;
    verbose?: boolean;
  }) => {
    const logger = new ConsoleLogger(Boolean(options.verbose));
    const spinner = ora();

    try {
      const report = await new EndpointVerifier({ logger }).verify({
        image,
        envFile: options.envFile,
        endpointId: options.endpointId,
        infoFile: options.infoFile,
        outputDir: options.output
      });

      spinner.succeed(`Processed ${report.pages.length} page(s) (job ${report.jobId})`);
      for (const page of report.pages) {
        console.log(chalk.bold(`\n--- Result ${page.pageNumber} ---`));
        console.log(`Token count: ${page.tokenCount ?? 'N/A'}`);
        console.log(`Extracted images: ${page.imageCount}`);
        console.log(`Chunks: ${page.chunkCount}`);
        if (page.markdown) {
          console.log(chalk.gray('Markdown preview:'));
          console.log(page.markdown.length > 200 ? `${page.markdown.slice(0, 200)}...` : page.markdown);
        }
      }
      if (options.output !== false) {
        console.log(chalk.gray(`\nFull results saved to ${options.output}`));
      }
    } catch (error) {
      spinner.fail('Endpoint test failed');
      fail(error, Boolean(options.verbose));
    }
  });

program
  .command('dockerfile')
  .description('Render the worker container Dockerfile')
  .option('-r, --recipe <path>', 'YAML image recipe merged over the defaults')
  .option('-o, --output <path>', 'Output Dockerfile path', 'Dockerfile')
  .option('--stdout', 'Print the Dockerfile instead of writing it')
  .action(async (options: { recipe?: string; output: string; stdout?: boolean }) => {
    const spinner = ora('Rendering Dockerfile...').start();

    try {
      const recipe = options.recipe ? await loadImageRecipe(options.recipe) : DEFAULT_IMAGE_RECIPE;
      const dockerfile = await new DockerfileGenerator().generate(recipe);

      if (options.stdout) {
        spinner.stop();
        process.stdout.write(dockerfile);
        return;
      }

      await writeFile(options.output, dockerfile, 'utf-8');
      spinner.succeed(`Dockerfile written: ${options.output}`);
      console.log(chalk.gray(`Base image: ${recipe.baseImage}`));
      console.log(chalk.gray(`Handler: ${recipe.handler}`));
    } catch (error) {
      spinner.fail('Rendering failed');
      fail(error, false);
    }
  });

program
  .command('init')
  .description('Create a starter env configuration file')
  .option('-o, --output <path>', 'Output configuration file path', DEFAULT_ENV_FILE)
  .option('-f, --force', 'Overwrite an existing file')
  .action(async (options: { output: string; force?: boolean }) => {
    const spinner = ora('Initializing deployment configuration...').start();

    try {
      if (existsSync(options.output) && !options.force) {
        throw new Error(`${options.output} already exists (use --force to overwrite)`);
      }

      await writeFile(options.output, renderEnvTemplate(), 'utf-8');

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log(`1. Set RUNPOD_API_KEY in ${options.output}`);
      console.log('2. Build and push the worker image (see: ocr-deploy dockerfile)');
      console.log(`3. Run: ${chalk.cyan('ocr-deploy deploy')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      fail(error, false);
    }
  });

program.parseAsync().catch((error: unknown) => {
  fail(error, false);
});
