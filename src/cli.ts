import { resolve } from 'node:path';
import { parseArgs } from 'node:util';
import { loadConfig, loadEnvFiles, type LintConfig } from './config/env.js';
import { runLint } from './runner/orchestrator.js';
import { VERSION } from './ui/banner.js';
import { brand, color } from './ui/theme.js';
import { ArgumentError, errorMessage } from './utils/errors.js';
import { assertRepository, getProjectRoot } from './utils/git.js';
import { printBanner, printError, printVerbose } from './utils/logger.js';

export interface CLIOptions {
  feature: string;
  /** Directory the project root is discovered from. */
  startDir: string;
  strict: boolean;
  verbose: boolean;
}

export type ParsedCLI =
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'lint'; options: CLIOptions };

export function helpText(): string {
  return `
${brand.green('featurelint')} <feature> [start-dir] [options]

${color.bold('Arguments:')}
  feature      Feature whose directories are checked (case-insensitive)
  start-dir    Directory inside the git project (default: current directory)

${color.bold('Options:')}
  --strict     Exit with status 1 when any rule fails
  --verbose    Show the resolved project root before the report
  --version    Print the version
  --help       Show this help

${color.bold('Environment:')}
  FEATURES_PATH, INTERACTIONS_PATH, PAGES_PATH, STEPS_PATH
               Path segments between the project root and the feature name
  LOCATOR_CLASS_PATH
               Locator class import that steps and interactions must not use
  REPOSITORY_NAME
               Refuse to run outside a repository whose root ends with this name

  .env files from start-dir up to the project root are read; the nearest wins.
`.trimEnd();
}

function parseRaw(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        strict: { type: 'boolean', default: false },
        verbose: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
      },
      strict: true,
      allowPositionals: true,
    });
  } catch (err) {
    throw new ArgumentError(errorMessage(err));
  }
}

export function parseCLIArgs(argv: string[], cwd: string = process.cwd()): ParsedCLI {
  const { values, positionals } = parseRaw(argv);

  if (values.help || argv.length === 0) {
    return { command: 'help' };
  }
  if (values.version) {
    return { command: 'version' };
  }

  const [feature, startDir, ...rest] = positionals;
  if (!feature) {
    throw new ArgumentError("Didn't get a feature to test");
  }
  if (rest.length > 0) {
    throw new ArgumentError(`Unexpected argument: ${rest[0]}`);
  }

  return {
    command: 'lint',
    options: {
      feature,
      startDir: startDir ? resolve(cwd, startDir) : cwd,
      strict: Boolean(values.strict),
      verbose: Boolean(values.verbose),
    },
  };
}

export interface CliContext {
  cwd: string;
  env: Record<string, string | undefined>;
}

/**
 * Full command: arguments, project root, `.env` files, configuration, lint.
 * Returns the process exit code.
 */
export function runCli(
  argv: string[],
  context: CliContext = { cwd: process.cwd(), env: process.env },
): number {
  const fail = (prefix: string, err: unknown): number => {
    printError(`${prefix}: ${errorMessage(err)}`);
    return 1;
  };

  let cli: ParsedCLI;
  try {
    cli = parseCLIArgs(argv, context.cwd);
  } catch (err) {
    return fail('Problem with arguments', err);
  }

  if (cli.command === 'help') {
    console.log(helpText());
    return 0;
  }
  if (cli.command === 'version') {
    console.log(VERSION);
    return 0;
  }

  const { options } = cli;

  let projectRoot: string;
  try {
    projectRoot = getProjectRoot(options.startDir);
  } catch (err) {
    return fail('Problem getting project root', err);
  }

  let envFiles: string[];
  let config: LintConfig;
  try {
    envFiles = loadEnvFiles(options.startDir, projectRoot, context.env);
    config = loadConfig(context.env);
  } catch (err) {
    return fail('Problem initialising', err);
  }

  try {
    assertRepository(projectRoot, config.repositoryName);
  } catch (err) {
    return fail('Problem getting project root', err);
  }

  if (options.verbose) {
    printBanner(options.feature, projectRoot);
    printVerbose(`Project root: ${projectRoot}`);
    for (const file of envFiles) {
      printVerbose(`Loaded ${file}`);
    }
  }

  return runLint({
    projectRoot,
    feature: options.feature,
    config,
    strict: options.strict,
  }).exitCode;
}
