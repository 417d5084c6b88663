export const TERRAFORM_CLI_OPTIONS = {
  state: 'state',
  target: 'target',
  var: 'var',
  varFile: 'var_file',
  parallelism: 'parallelism',
  input: 'input',
} as const;

export type TerraformCliOption = (typeof TERRAFORM_CLI_OPTIONS)[keyof typeof TERRAFORM_CLI_OPTIONS];

// `terraform init` rejects these.
export const NOT_SUPPORTED_INIT_DEFAULT_OPTIONS: readonly TerraformCliOption[] = [
  TERRAFORM_CLI_OPTIONS.state,
  TERRAFORM_CLI_OPTIONS.target,
  TERRAFORM_CLI_OPTIONS.var,
  TERRAFORM_CLI_OPTIONS.varFile,
  TERRAFORM_CLI_OPTIONS.parallelism,
];

/** Option names whose mapping values expand to one `-name=key=value` flag per entry. */
export const MAPPING_OPTIONS: readonly string[] = ['backend-config', 'var'];

export type TerraformScalar = string | number | boolean;

export type TerraformOptionValue =
  | TerraformScalar
  | null
  | undefined
  | readonly TerraformScalar[]
  | Readonly<Record<string, TerraformScalar>>;

export type TerraformOptions = Record<string, TerraformOptionValue>;
