import chalk from "chalk";
import { getConfig, validateConfig } from "../../config/index.js";
import { formatReport, validate } from "../../pipeline/validator.js";
import { readProject } from "../../tools/projectFiles.js";
import { ExitCode, errorMessage, toExitCode } from "../../utils/errors.js";
import type { ValidationReport } from "../../pipeline/types.js";

interface ValidateOptions {
  modules?: string;
  namespace?: string;
  json?: boolean;
}

/** Split `"utils, state main"` into `["utils", "state", "main"]`. */
export function splitModuleList(values: readonly string[]): string[] {
  return values.flatMap((v) => v.split(/[\s,]+/)).filter((v) => v.length > 0);
}

/**
 * Print failures to stderr and a one-line summary to stdout.
 */
export function printReport(report: ValidationReport): void {
  for (const entry of report.violations) {
    const where = entry.artifact ? chalk.white(`${entry.artifact}: `) : "";
    console.error(`${chalk.red("✗")} ${chalk.red(`[${entry.ruleId}]`)} ${where}${entry.message}`);
  }
  for (const entry of report.warnings) {
    const where = entry.artifact ? chalk.white(`${entry.artifact}: `) : "";
    console.error(`${chalk.yellow("!")} ${chalk.yellow(`[${entry.ruleId}]`)} ${where}${entry.message}`);
  }

  const passed = report.entries.filter((e) => e.passed).length;
  const summary =
    `${passed} check(s) passed, ${report.violations.length} violation(s), ` +
    `${report.warnings.length} warning(s)`;
  console.log(report.valid ? chalk.green(`✓ Valid — ${summary}`) : chalk.red(`✗ Invalid — ${summary}`));
}

export async function validateCommand(dir: string | undefined, options: ValidateOptions): Promise<void> {
  const config = getConfig();
  const configErrors = validateConfig(config);
  if (configErrors.length > 0) {
    for (const e of configErrors) console.error(chalk.red(`✗ ${e}`));
    process.exitCode = ExitCode.INPUT;
    return;
  }

  try {
    const files = readProject(dir ?? ".", config.layout);
    const modules = options.modules ? splitModuleList([options.modules]) : undefined;
    const report = validate(files, {
      namespace: options.namespace || config.namespace || undefined,
      dependencyOrder: modules,
    });

    if (options.json) {
      // stdout carries only the JSON; failures are repeated on stderr
      for (const line of formatReport(report)) console.error(line);
      console.log(JSON.stringify(report, null, 2));
    } else {
      console.log(chalk.gray(`Checked ${files.length} file(s) in ${dir ?? "."}`));
      printReport(report);
    }
    process.exitCode = report.valid ? ExitCode.OK : ExitCode.VIOLATIONS;
  } catch (error) {
    console.error(chalk.red("✗ Validation failed:"), errorMessage(error));
    process.exitCode = toExitCode(error);
  }
}
