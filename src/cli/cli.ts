#!/usr/bin/env node

import { readFileSync } from 'node:fs'
import * as path from 'node:path'
import chalk from 'chalk'
import { CommanderError } from 'commander'
import ora from 'ora'
import { table } from 'table'
import type { ChartPipelineResult } from '../pipeline'
import logger, { setLogLevel } from '../utils/logger'
import type { CliArgs } from './args-parser'
import { parseArgs } from './args-parser'
import { ConfigLoader, createDefaultChartsConfig } from './config-loader'
import { ConfigOverrides } from './config-overrides'
import { ConfigValidator } from './config-validator'
import { PipelineFactory } from './pipeline-factory'

/**
 * Get package version
 */
function getPackageVersion(): string {
  try {
    // Same relative location from src/cli and dist/cli
    const packagePath = path.join(__dirname, '..', '..', 'package.json')
    const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'))
    if (packageJson && typeof packageJson === 'object' && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version
    }
  } catch (error) {
    logger.debug('Could not read package version', { error: error instanceof Error ? error.message : String(error) })
  }
  return '0.0.0'
}

/**
 * Run the chart pipeline for parsed arguments
 * @returns Process exit code
 */
export async function run(args: CliArgs): Promise<number> {
  // Set up verbosity
  if (args.verbose > 0) {
    setLogLevel(args.verbose >= 2 ? 'debug' : 'info')
  }

  logger.info('Loading configuration', { path: args.config })
  const rawConfig = await ConfigLoader.load(args.config)

  // Apply command line overrides
  const overriddenConfig = ConfigOverrides.apply(rawConfig, args.override)

  // Validate configuration
  const validation = ConfigValidator.validateWithDetails(overriddenConfig)
  if (!validation.isValid) {
    console.error(chalk.red('Configuration validation failed:'))
    validation.errors.forEach((error) => {
      console.error(chalk.red(`  ${error.field || '(root)'}: ${error.message}`))
    })
    console.error(chalk.gray('\nExample configuration:'))
    console.error(chalk.gray(JSON.stringify(createDefaultChartsConfig(), null, 2)))
    return 1
  }
  validation.warnings.forEach((warning) => console.log(chalk.yellow(`⚠ ${warning}`)))

  const pipeline = PipelineFactory.create(validation.config)
  const spinner = args.noProgress ? undefined : ora('Loading series...').start()
  pipeline.onProgress(({ current, total, message }) => {
    if (spinner) {
      spinner.text = `[${current}/${total}] ${message}`
    }
  })

  let result: ChartPipelineResult
  try {
    result = await pipeline.execute()
  } catch (error) {
    spinner?.fail('Chart run failed')
    throw error
  }
  spinner?.succeed(`Wrote ${result.chartsWritten} charts`)

  console.log(chalk.cyan('\n=== Chart Summary ===\n'))
  console.log(table([
    ['Tickers loaded', String(result.tickers)],
    ['Charts written', String(result.chartsWritten)],
    ['Output', validation.config.output.path],
    ['Duration', `${(result.executionTime / 1000).toFixed(2)}s`]
  ]))
  return 0
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  let args: CliArgs
  try {
    args = parseArgs(process.argv, getPackageVersion())
  } catch (error) {
    // --help and --version also arrive here, with exit code 0
    process.exitCode = error instanceof CommanderError ? error.exitCode : 1
    return
  }

  try {
    process.exitCode = await run(args)
  } catch (error) {
    console.error(chalk.red('\nError:'), error instanceof Error ? error.message : error)
    process.exitCode = 1
  }
}

// Run the CLI if this is the main module
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error('Unhandled error:', error)
    process.exitCode = 1
  })
}
