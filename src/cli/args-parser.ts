import { Command } from 'commander'

/**
 * Parsed command-line arguments
 */
export interface CliArgs {
  /** Path to the configuration file */
  config: string

  /** Configuration overrides in dot notation (e.g., input.path=/new/path) */
  override: string[]

  /** Verbosity level for logging */
  verbose: number

  /** Disable progress output */
  noProgress: boolean
}

/**
 * Default CLI arguments
 */
export const DEFAULT_ARGS: CliArgs = {
  config: 'charts.json',
  override: [],
  verbose: 0,
  noProgress: false
}

interface ProgramOptions {
  config: string
  override: string[]
  verbose: number
  progress: boolean
}

/**
 * Builds the commander program
 * exitOverride makes commander throw a CommanderError instead of exiting,
 * including for --help and --version
 */
export function createProgram(version: string): Command {
  const program = new Command()

  program
    .name('chartseries')
    .description('Derive chart-ready series from daily stock prices')
    .version(version)
    .usage('[options]')
    .exitOverride()

  program
    .option(
      '-c, --config <file>',
      'path to chart configuration file',
      DEFAULT_ARGS.config
    )
    .option(
      '-o, --override <override...>',
      'configuration overrides in dot notation (e.g., input.path=/new/path)',
      DEFAULT_ARGS.override
    )
    .option(
      '-v, --verbose',
      'increase verbosity (can be used multiple times: -v, -vv)',
      (_: string, previous: number) => previous + 1,
      DEFAULT_ARGS.verbose
    )
    .option(
      '--no-progress',
      'disable progress output',
    )

  // Add examples to help
  program.addHelpText('after', `

Examples:
  $ chartseries                                   # Build charts from charts.json
  $ chartseries -c my-charts.json                 # Use custom config file
  $ chartseries -o tickers=AAPL,MSFT              # Override tickers
  $ chartseries -o output.format=csv              # Write CSV instead of JSON
  $ chartseries -o charts.0.granularity=week      # Override a chart parameter
  $ chartseries -vv                               # Run with debug logging

Configuration overrides use dot notation to target nested properties:
  input.path                - Data file path, {ticker} is replaced per ticker
  range.start, range.end    - Date range (YYYY-MM-DD)
  charts.<n>.<param>        - Parameter of the n-th chart
  output.path               - Output directory
`)

  return program
}

/**
 * Parse command-line arguments using commander
 * @throws CommanderError for --help, --version and invalid options
 */
export function parseArgs(argv: string[], version = '0.0.0'): CliArgs {
  const program = createProgram(version)
  program.parse(argv)
  const options = program.opts<ProgramOptions>()

  return {
    config: options.config,
    override: options.override,
    verbose: options.verbose,
    noProgress: options.progress === false // Commander converts --no-progress to progress: false
  }
}
