import { getSettings } from '../config/settings.js';
import { logger } from '../observability/logger.js';
import {
  MAPPING_OPTIONS,
  NOT_SUPPORTED_INIT_DEFAULT_OPTIONS,
  TERRAFORM_CLI_OPTIONS,
  type TerraformOptionValue,
  type TerraformOptions,
  type TerraformScalar,
} from './options.js';

export interface TerraformDeploymentOptions {
  /** Path for terraform state files (`-state`). */
  stateFilePath?: string;
  /** Default `-var` values; a command's own options override them. */
  terraformVariables?: Record<string, string>;
  /** `-parallelism=n`: concurrent operations while walking the graph. */
  parallelism?: number;
  /** `-target` resources for apply/destroy. */
  resourceTargets?: string[];
  /** `-var-file` with bulk variable definitions. */
  varDefinitionFile?: string;
}

function renderScalar(value: TerraformScalar): string {
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return String(value);
}

function isScalarList(value: TerraformOptionValue): value is readonly TerraformScalar[] {
  return Array.isArray(value);
}

export class TerraformDeploymentUtils {
  readonly stateFilePath?: string;
  readonly terraformVariables: Record<string, string>;
  readonly parallelism: number;
  readonly resourceTargets: string[];
  readonly varDefinitionFile?: string;
  // Never prompt; every value comes from configuration or the command line.
  readonly input = false;

  constructor(options: TerraformDeploymentOptions = {}) {
    this.stateFilePath = options.stateFilePath;
    this.terraformVariables = { ...(options.terraformVariables ?? {}) };
    this.parallelism = options.parallelism ?? getSettings().terraformParallelism;
    this.resourceTargets = [...(options.resourceTargets ?? [])];
    this.varDefinitionFile = options.varDefinitionFile;
  }

  /**
   * Splits `command` into tokens and appends one flag per option, in
   * insertion order. Underscores in option names become hyphens. Lists
   * repeat the flag, booleans render as true/false, null and undefined are
   * skipped, and mappings expand only for `backend-config` and `var`.
   */
  getCommandList(command: string, options: TerraformOptions = {}, ...args: string[]): string[] {
    const commands = command.split(/\s+/).filter(token => token.length > 0);

    for (const [rawKey, value] of Object.entries(options)) {
      const key = rawKey.replace(/_/g, '-');

      if (value === null || value === undefined) continue;

      if (isScalarList(value)) {
        for (const item of value) {
          commands.push(`-${key}=${renderScalar(item)}`);
        }
      } else if (typeof value === 'object') {
        if (!MAPPING_OPTIONS.includes(key)) {
          logger.warn('terraform_option_ignored', 'Mapping value is not supported for option', { option: key });
          continue;
        }
        for (const [name, entry] of Object.entries(value)) {
          commands.push(`-${key}=${name}=${renderScalar(entry)}`);
        }
      } else {
        commands.push(`-${key}=${renderScalar(value)}`);
      }
    }

    commands.push(...args);
    return commands;
  }

  /** Default CLI options overlaid with `inputOptions`, minus those `init` rejects. */
  getDefaultOptions(terraformCommand: string, inputOptions: TerraformOptions = {}): TerraformOptions {
    const options: TerraformOptions = {
      [TERRAFORM_CLI_OPTIONS.state]: this.stateFilePath,
      [TERRAFORM_CLI_OPTIONS.target]: this.resourceTargets,
      [TERRAFORM_CLI_OPTIONS.var]: this.terraformVariables,
      [TERRAFORM_CLI_OPTIONS.varFile]: this.varDefinitionFile,
      [TERRAFORM_CLI_OPTIONS.parallelism]: this.parallelism,
      [TERRAFORM_CLI_OPTIONS.input]: this.input,
      ...inputOptions,
    };

    if (terraformCommand === 'init') {
      for (const option of NOT_SUPPORTED_INIT_DEFAULT_OPTIONS) {
        delete options[option];
      }
    }

    return options;
  }

  buildCommand(terraformCommand: string, inputOptions: TerraformOptions = {}, ...args: string[]): string[] {
    const tokens = this.getCommandList(
      `terraform ${terraformCommand}`,
      this.getDefaultOptions(terraformCommand, inputOptions),
      ...args
    );
    logger.debug('terraform_command', 'Built terraform command', { tokens });
    return tokens;
  }
}
